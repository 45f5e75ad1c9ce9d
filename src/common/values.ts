// Helpers for the loosely typed values devices report.

export type JsonScalar = string | number | boolean | null;
export type JsonValue = JsonScalar | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

const DECIMAL_RE = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

export function isJsonObject(v: unknown): v is JsonObject {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/**
 * Numbers pass through, numeric strings are parsed, anything else is null.
 */
export function parseDecimal(v: unknown): number | null {
  if (typeof v === "number") {
    return Number.isFinite(v) ? v : null;
  }
  if (typeof v === "string") {
    const s = v.trim();
    if (DECIMAL_RE.test(s)) {
      const num = Number(s);
      if (Number.isFinite(num)) return num;
    }
  }
  return null;
}

/**
 * "24.0" -> "24", "19.50" -> "19.5", "+7" -> "7". Non-numeric input is
 * returned trimmed.
 */
export function canonicalDecimal(s: string): string {
  const num = parseDecimal(s);
  return num === null ? s.trim() : formatDecimal(num);
}

export function formatDecimal(n: number): string {
  // -0 prints as "0"
  return String(n === 0 ? 0 : n);
}

export function collapseWhitespace(s: string): string {
  return s.trim().replace(/\s+/g, " ");
}

/**
 * Decodes an MQTT payload: JSON where possible, otherwise the raw text.
 */
export function decodePayload(raw: Buffer | string): {
  value: JsonValue;
  decoded: boolean;
} {
  const text = typeof raw === "string" ? raw : raw.toString("utf8");
  try {
    const parsed: JsonValue = JSON.parse(text);
    return { value: parsed, decoded: true };
  } catch {
    return { value: text, decoded: false };
  }
}
