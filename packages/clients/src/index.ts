import fetch from 'node-fetch';
import type {
  DocumentLayout,
  ExecutionResult,
  ExtractedData,
  Processor,
  Validation,
  ValidationResult,
} from '@layout-rules/core';

export type ClientOptions = { baseUrl: string; apiKey?: string };

export type ProcessorSummary = Pick<Processor, 'id' | 'name' | 'document_type' | 'version' | 'created_at'> & {
  success_count: number;
  failure_count: number;
};

/** Non-2xx response from the layout rules API; `body` is the parsed JSON error when there is one. */
export class LayoutRulesClientError extends Error {
  constructor(readonly status: number, readonly body: unknown) {
    super(`layout rules API responded ${status}`);
    this.name = 'LayoutRulesClientError';
  }
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

export class LayoutRulesClient {
  constructor(private opts: ClientOptions) {}

  private headers() {
    const h: Record<string, string> = { 'content-type': 'application/json' };
    if (this.opts.apiKey) h['authorization'] = `Bearer ${this.opts.apiKey}`;
    return h;
  }

  private async request<T>(method: string, path: string, body?: unknown): Promise<T> {
    const r = await fetch(`${this.opts.baseUrl}${path}`, {
      method,
      headers: this.headers(),
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    const text = await r.text();
    if (!r.ok) throw new LayoutRulesClientError(r.status, text ? safeJson(text) : undefined);
    const parsed: T = text ? JSON.parse(text) : undefined;
    return parsed;
  }

  health() {
    return this.request<{ ok: boolean }>('GET', '/health');
  }

  createProcessor(processor: Partial<Processor> & Pick<Processor, 'name'>) {
    return this.request<Processor>('POST', '/processors', processor);
  }

  listProcessors(documentType?: string) {
    const q = documentType ? `?${new URLSearchParams({ document_type: documentType })}` : '';
    return this.request<ProcessorSummary[]>('GET', `/processors${q}`);
  }

  getProcessor(id: string) {
    return this.request<Processor>('GET', `/processors/${encodeURIComponent(id)}`);
  }

  async deleteProcessor(id: string): Promise<void> {
    await this.request<undefined>('DELETE', `/processors/${encodeURIComponent(id)}`);
  }

  execute(processorId: string, layout: DocumentLayout) {
    return this.request<ExecutionResult>('POST', `/processors/${encodeURIComponent(processorId)}/execute`, { layout });
  }

  route(layout: DocumentLayout) {
    return this.request<ExecutionResult>('POST', '/execute', { layout });
  }

  validate(data: ExtractedData, validations: Validation[]) {
    return this.request<ValidationResult>('POST', '/validate', { data, validations });
  }

  fingerprint(layout: DocumentLayout) {
    return this.request<{ layout_hash: string }>('POST', '/layout/fingerprint', { layout });
  }
}
