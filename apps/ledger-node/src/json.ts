/**
 * Wire encoding for ledger records.
 *
 * bigint → decimal string, Map → object, Set → array, camelCase keys →
 * snake_case. JSON.stringify cannot encode bigint, so every response and
 * event payload goes through toWire().
 */

export type Wire =
  | string
  | number
  | boolean
  | null
  | Wire[]
  | { [key: string]: Wire };

function snakeCase(key: string): string {
  return key.replace(/[A-Z]/g, (c) => `_${c.toLowerCase()}`);
}

export function toWire(value: unknown): Wire {
  if (value === null || value === undefined) return null;
  switch (typeof value) {
    case "bigint":
      return value.toString();
    case "string":
    case "number":
    case "boolean":
      return value;
    case "object":
      break;
    default:
      return null;
  }
  if (Array.isArray(value)) return value.map(toWire);
  if (value instanceof Set) return Array.from(value, toWire);
  if (value instanceof Map) {
    const out: { [key: string]: Wire } = {};
    for (const [k, v] of value) out[String(k)] = toWire(v);
    return out;
  }
  const out: { [key: string]: Wire } = {};
  for (const [k, v] of Object.entries(value)) {
    if (v === undefined) continue;
    out[snakeCase(k)] = toWire(v);
  }
  return out;
}
