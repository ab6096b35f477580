import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from "../config";
import { getLogger, type LogCtx, type Logger } from "../logger";

/** Per-execution state threaded through the engine steps. `warnings` is the only thing they mutate. */
export interface EngineContext {
  readonly config: EngineConfig;
  readonly log: Logger;
  readonly warnings: string[];
}

export function createContext(opts: { config?: Partial<EngineConfig>; log?: Logger } = {}): EngineContext {
  return {
    config: { ...DEFAULT_ENGINE_CONFIG, ...opts.config },
    log: opts.log ?? getLogger("core"),
    warnings: [],
  };
}

/** Logs a recoverable problem and records it on the execution result. */
export function degrade(ctx: EngineContext, event: string, message: string, extra?: LogCtx): void {
  ctx.log.warn(event, { ...extra, message });
  ctx.warnings.push(message);
}
