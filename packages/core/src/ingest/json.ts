import type { DocumentLayout } from '../types';
import { parseLayout } from '../processors/schema';
import type { LayoutProvider, LoadOptions } from './types';

// Layout IR that was produced elsewhere (an OCR pass, a previous export) and saved as JSON.
export class JsonLayoutProvider implements LayoutProvider {
  readonly name = 'json';

  constructor(private readonly fingerprintBlocks?: number) {}

  async load(input: Uint8Array, opts: LoadOptions = {}): Promise<DocumentLayout> {
    const layout = parseLayout(Buffer.from(input).toString('utf8'), this.fingerprintBlocks);
    return opts.filename && !layout.filename ? { ...layout, filename: opts.filename } : layout;
  }
}
