import type { Kwargs } from '../domain/index.js';

function hasToJSON(value: object): value is { toJSON: () => unknown } {
  return 'toJSON' in value && typeof value.toJSON === 'function';
}

/**
 * Converts a value into a JSON-compatible form for the wire.
 *
 * Dates become ISO strings, maps become objects, sets become arrays and
 * non-finite numbers become null. Anything unrecognised is stringified.
 */
export function deformToBus(value: unknown): unknown {
  if (value === null || value === undefined) return null;

  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      return Number.isFinite(value) ? value : null;
    case 'bigint':
      return value.toString();
    case 'object':
      break;
    default:
      return String(value);
  }

  if (value instanceof Date) return value.toISOString();
  if (value instanceof Map) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of value) {
      out[String(k)] = deformToBus(v);
    }
    return out;
  }
  if (value instanceof Set) return [...value].map(deformToBus);
  if (Array.isArray(value)) return value.map(deformToBus);
  if (hasToJSON(value)) return deformToBus(value.toJSON());

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) {
    out[k] = deformToBus(v);
  }
  return out;
}

export function deformKwargs(kwargs: Readonly<Record<string, unknown>>): Kwargs {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(kwargs)) {
    out[k] = deformToBus(v);
  }
  return out;
}
