import { EncodingError } from './errors.js';

/**
 * Serializes a parsed JSON value byte-for-byte the way Python's
 * `json.dumps(value, sort_keys=...)` does with its default settings:
 * `", "` and `": "` separators and `ensure_ascii` escaping.
 *
 * Class hashes of legacy classes and of Sierra ABIs are keccak digests of
 * this exact text.
 */
export function pythonJsonDumps(value: unknown, sortKeys: boolean): string {
  if (value === null) return 'null';
  switch (typeof value) {
    case 'boolean':
      return value ? 'true' : 'false';
    case 'bigint':
      return value.toString(10);
    case 'number':
      if (!Number.isFinite(value)) {
        throw new EncodingError('Malformed', `Cannot serialize non-finite number ${value}`);
      }
      return String(value);
    case 'string':
      return asciiString(value);
    case 'object':
      if (Array.isArray(value)) {
        return `[${value.map((v: unknown) => pythonJsonDumps(v, sortKeys)).join(', ')}]`;
      }
      return dumpObject(value, sortKeys);
    default:
      throw new EncodingError('Malformed', `Cannot serialize a ${typeof value} as JSON`);
  }
}

function dumpObject(value: object, sortKeys: boolean): string {
  const entries = Object.entries(value).filter(([, v]) => v !== undefined);
  if (sortKeys) entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return `{${entries.map(([k, v]) => `${asciiString(k)}: ${pythonJsonDumps(v, sortKeys)}`).join(', ')}}`;
}

function asciiString(s: string): string {
  return JSON.stringify(s).replace(
    /[^\x20-\x7e]/g,
    (c) => `\\u${c.charCodeAt(0).toString(16).padStart(4, '0')}`,
  );
}
