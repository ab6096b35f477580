export type Level = "trace" | "debug" | "info" | "warn" | "error";
type Threshold = Level | "silent";

export interface BaseCtx {
  service?: string;
  processor_id?: string;
  document_id?: string;
  request_id?: string;
}

export interface LogOptions {
  level?: Threshold;
  format?: "json" | "pretty";
  sink?: (line: string) => void;
}

export type LogCtx = Record<string, unknown>;

export interface Logger {
  child(ctx: BaseCtx): Logger;
  trace(msg: string, ctx?: LogCtx): void;
  debug(msg: string, ctx?: LogCtx): void;
  info(msg: string, ctx?: LogCtx): void;
  warn(msg: string, ctx?: LogCtx): void;
  error(msg: string, ctx?: LogCtx): void;
}

const LEVELS: Threshold[] = ["trace", "debug", "info", "warn", "error", "silent"];

function levelIndex(l: Threshold): number { return LEVELS.indexOf(l); }

function nowISO() { return new Date().toISOString(); }

function isThreshold(v: string | undefined): v is Threshold {
  return v !== undefined && LEVELS.some((l) => l === v);
}

export function getLogger(service?: string, opts: LogOptions = {}): Logger {
  const envLevel = process.env.LOG_LEVEL;
  const lvl: Threshold = opts.level ?? (isThreshold(envLevel) ? envLevel : "info");
  const fmt = opts.format ?? (process.env.LOG_FORMAT === "json" ? "json" : "pretty");
  // eslint-disable-next-line no-console
  const sink = opts.sink ?? ((line: string) => console.log(line));

  function emit(base: BaseCtx, level: Level, msg: string, extra?: LogCtx) {
    if (levelIndex(level) < levelIndex(lvl)) return;
    const ts = nowISO();
    if (fmt === "json") {
      sink(JSON.stringify({ ts, level, msg, ...base, ...(extra || {}) }));
      return;
    }
    const { service: svc, ...rest } = base;
    const ctx = { ...rest, ...(extra || {}) };
    const head = `[${ts}] ${level.toUpperCase()}${svc ? ` ${svc}` : ""}`;
    const ctxStr = Object.keys(ctx).length ? ` ${JSON.stringify(ctx)}` : "";
    sink(`${head} - ${msg}${ctxStr}`);
  }

  function create(base: BaseCtx): Logger {
    return {
      child(ctx: BaseCtx) { return create({ ...base, ...ctx }); },
      trace(msg, ctx) { emit(base, "trace", msg, ctx); },
      debug(msg, ctx) { emit(base, "debug", msg, ctx); },
      info(msg, ctx) { emit(base, "info", msg, ctx); },
      warn(msg, ctx) { emit(base, "warn", msg, ctx); },
      error(msg, ctx) { emit(base, "error", msg, ctx); },
    };
  }

  return create({ service });
}
