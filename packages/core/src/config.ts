import { getLogger } from "./logger";

// Tolerances are in normalized page units (0..1). They were tuned on box scores and
// honor rolls; layouts with heavy OCR jitter may need different values.
export interface EngineConfig {
  rowTolerance: number;
  columnTolerance: number;
  proximityThreshold: number;
  valueSearchDistance: number;
  fingerprintBlocks: number;
}

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = Object.freeze({
  rowTolerance: 0.015,
  columnTolerance: 0.03,
  proximityThreshold: 0.1,
  valueSearchDistance: 0.5,
  fingerprintBlocks: 50,
});

type Env = Record<string, string | undefined>;

function readNumber(
  env: Env,
  key: string,
  fallback: number,
  valid: (n: number) => boolean
): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n) || !valid(n)) {
    getLogger("core").warn("config.invalid_value", { key, value: raw, fallback });
    return fallback;
  }
  return n;
}

const unit = (n: number) => n > 0 && n <= 1;

export function loadEngineConfig(env: Env = process.env): EngineConfig {
  const d = DEFAULT_ENGINE_CONFIG;
  return {
    rowTolerance: readNumber(env, "LAYOUT_ROW_TOLERANCE", d.rowTolerance, unit),
    columnTolerance: readNumber(env, "LAYOUT_COLUMN_TOLERANCE", d.columnTolerance, unit),
    proximityThreshold: readNumber(env, "LAYOUT_PROXIMITY_THRESHOLD", d.proximityThreshold, unit),
    valueSearchDistance: readNumber(env, "LAYOUT_VALUE_SEARCH_DISTANCE", d.valueSearchDistance, unit),
    fingerprintBlocks: readNumber(env, "LAYOUT_FINGERPRINT_BLOCKS", d.fingerprintBlocks, (n) => Number.isInteger(n) && n > 0),
  };
}
