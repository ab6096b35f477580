import type { ProcessorExecutor } from '../engine/executor';
import { LayoutInputError } from '../errors';
import { getLogger } from '../logger';
import type { ExecutionResult, Processor } from '../types';
import type { LayoutProvider, LoadOptions } from './types';

export { JsonLayoutProvider } from './json';
export { PdfLayoutProvider, itemsToBlocks } from './pdf';
export type { PdfTextItem } from './pdf';
export type { LayoutProvider, LoadOptions } from './types';

export function guessProvider(filename?: string, mime?: string): string | undefined {
  const ext = (filename || '').toLowerCase();
  const m = (mime || '').toLowerCase();
  if (ext.endsWith('.pdf') || m.includes('application/pdf')) return 'pdf';
  if (ext.endsWith('.json') || m.includes('application/json')) return 'json';
  return undefined;
}

/** Loads a document through the provider its filename or mime type calls for, then executes. */
export class ProcessorRunner {
  constructor(
    private readonly providers: Record<string, LayoutProvider>,
    private readonly executor: ProcessorExecutor
  ) {}

  async run(input: Uint8Array, opts: LoadOptions, processor: Processor): Promise<ExecutionResult> {
    const log = getLogger('ingest').child({ processor_id: processor.id });
    const kind = guessProvider(opts.filename, opts.mime);
    const provider = kind ? this.providers[kind] : undefined;
    if (!provider) {
      throw new LayoutInputError([`no layout provider for filename=${opts.filename ?? '-'} mime=${opts.mime ?? '-'}`]);
    }
    log.debug('ingest.provider', { provider: provider.name, filename: opts.filename, bytes: input.byteLength });
    const layout = await provider.load(input, opts);
    const result = this.executor.execute(layout, processor);
    if (!layout.warnings?.length) return result;
    return { ...result, warnings: [...layout.warnings, ...result.warnings], status: 'needs_review' };
  }
}
