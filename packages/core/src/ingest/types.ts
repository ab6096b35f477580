import type { DocumentLayout } from '../types';

export type LoadOptions = {
  filename?: string;
  mime?: string;
};

/** Turns raw document bytes into the layout IR the engine runs on. */
export interface LayoutProvider {
  readonly name: string;
  load(input: Uint8Array, opts?: LoadOptions): Promise<DocumentLayout>;
}
