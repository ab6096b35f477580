import {
  matchProcessor,
  parseProcessor,
  RequiredAnchorError,
  type DocumentLayout,
  type ExecutionResult,
  type LoadOptions,
  type Logger,
  type Processor,
  type ProcessorExecutor,
  type ProcessorRunner,
} from "@layout-rules/core";
import { v4 as uuidv4 } from "uuid";

export class NotFoundError extends Error {
  constructor(what: string) {
    super(`${what} not found`);
    this.name = "NotFoundError";
  }
}

export interface ProcessorSummary {
  id: string;
  name: string;
  document_type: string;
  version: number;
  created_at: string;
  success_count: number;
  failure_count: number;
}

type StoredProcessor = { processor: Processor; success_count: number; failure_count: number };

// In-memory store for dev (no DB); processors live as long as the process.
export class ProcessorService {
  private readonly processors = new Map<string, StoredProcessor>();

  constructor(
    private readonly executor: ProcessorExecutor,
    private readonly runner: ProcessorRunner,
    private readonly log: Logger
  ) {}

  create(input: unknown): Processor {
    const body = typeof input === "object" && input !== null && !("id" in input) ? { ...input, id: uuidv4() } : input;
    const processor = parseProcessor(body);
    this.processors.set(processor.id, { processor, success_count: 0, failure_count: 0 });
    this.log.info("processor.create", { processor_id: processor.id, name: processor.name, document_type: processor.document_type });
    return processor;
  }

  list(documentType?: string): ProcessorSummary[] {
    return Array.from(this.processors.values())
      .filter((s) => documentType === undefined || s.processor.document_type === documentType)
      .map(({ processor: p, success_count, failure_count }) => ({
        id: p.id,
        name: p.name,
        document_type: p.document_type,
        version: p.version,
        created_at: p.created_at,
        success_count,
        failure_count,
      }));
  }

  get(id: string): Processor {
    return this.stored(id).processor;
  }

  delete(id: string): void {
    if (!this.processors.delete(id)) throw new NotFoundError(`processor '${id}'`);
    this.log.info("processor.delete", { processor_id: id });
  }

  execute(id: string, layout: DocumentLayout): ExecutionResult {
    const stored = this.stored(id);
    return this.record(stored, () => this.executor.execute(layout, stored.processor));
  }

  async executeDocument(id: string, input: Uint8Array, opts: LoadOptions): Promise<ExecutionResult> {
    const stored = this.stored(id);
    try {
      const result = await this.runner.run(input, opts, stored.processor);
      this.count(stored, result);
      return result;
    } catch (err) {
      if (err instanceof RequiredAnchorError) stored.failure_count++;
      throw err;
    }
  }

  /** Runs the named processor, or the best match for the layout when no id is given. */
  route(layout: DocumentLayout, processorId?: string): ExecutionResult {
    if (processorId !== undefined) return this.execute(processorId, layout);
    const match = matchProcessor(layout, Array.from(this.processors.values(), (s) => s.processor));
    if (!match) throw new NotFoundError("matching processor");
    this.log.info("processor.route", { processor_id: match.processor.id, reason: match.reason, score: match.score });
    return this.execute(match.processor.id, layout);
  }

  private stored(id: string): StoredProcessor {
    const stored = this.processors.get(id);
    if (!stored) throw new NotFoundError(`processor '${id}'`);
    return stored;
  }

  private record(stored: StoredProcessor, run: () => ExecutionResult): ExecutionResult {
    try {
      const result = run();
      this.count(stored, result);
      return result;
    } catch (err) {
      if (err instanceof RequiredAnchorError) stored.failure_count++;
      throw err;
    }
  }

  private count(stored: StoredProcessor, result: ExecutionResult): void {
    if (result.validation.success) stored.success_count++;
    else stored.failure_count++;
  }
}
