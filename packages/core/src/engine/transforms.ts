import type { ExtractedValue, Scalar, Transform } from "../types";

const INT_RX = /^[-+]?\d+$/;
const FLOAT_RX = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/;

function toText(v: Scalar): string {
  return v === null ? "" : String(v);
}

// Coercions never throw; text that does not parse becomes the zero of the target type.
export function transformScalar(value: Scalar, transform: Transform): Scalar {
  if (value === null) return null;
  const text = toText(value);
  switch (transform) {
    case "to_int": {
      if (typeof value === "number") return Math.trunc(value);
      const t = text.trim();
      return INT_RX.test(t) ? parseInt(t, 10) : 0;
    }
    case "to_float": {
      if (typeof value === "number") return value;
      const t = text.trim();
      return FLOAT_RX.test(t) ? Number(t) : 0;
    }
    case "strip":
      return text.trim();
    case "upper":
      return text.toUpperCase();
    case "lower":
      return text.toLowerCase();
    case "last_name_only": {
      const parts = text.split(/\s+/).filter(Boolean);
      return parts.length ? parts[parts.length - 1] : value;
    }
  }
}

export function applyTransform(value: ExtractedValue, transform?: Transform): ExtractedValue {
  if (!transform) return value;
  if (Array.isArray(value)) return value.map((v) => transformScalar(v, transform));
  return transformScalar(value, transform);
}
