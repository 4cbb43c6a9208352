/**
 * Canonical JSON
 *
 * Compact serialization with object keys sorted at every depth. Payload
 * sizes are measured on this form, so two equal values always serialize to
 * the same bytes.
 */

/**
 * Any value JSON can represent
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

function serialize(value: unknown): string | undefined {
  if (value === null) {
    return 'null';
  }
  if (typeof value === 'string' || typeof value === 'boolean') {
    return JSON.stringify(value);
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? JSON.stringify(value) : 'null';
  }
  if (typeof value === 'bigint') {
    throw new TypeError('BigInt values cannot be serialized to JSON');
  }
  if (typeof value !== 'object' || value === null) {
    // undefined, functions and symbols are dropped like JSON.stringify does
    return undefined;
  }

  if (Array.isArray(value)) {
    return `[${value.map((item) => serialize(item) ?? 'null').join(',')}]`;
  }

  const entries: string[] = [];
  for (const key of Object.keys(value).sort()) {
    const encoded = serialize(Reflect.get(value, key));
    if (encoded !== undefined) {
      entries.push(`${JSON.stringify(key)}:${encoded}`);
    }
  }
  return `{${entries.join(',')}}`;
}

/**
 * Serialize `value` with sorted keys and no whitespace.
 *
 * @example
 * canonicalJson({ b: 1, a: { d: 2, c: 3 } });
 * // '{"a":{"c":3,"d":2},"b":1}'
 */
export function canonicalJson(value: unknown): string {
  return serialize(value) ?? 'null';
}

/**
 * UTF-8 bytes of {@link canonicalJson}.
 */
export function canonicalJsonBytes(value: unknown): Buffer {
  return Buffer.from(canonicalJson(value), 'utf8');
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse JSON text, returning undefined instead of throwing on malformed input.
 */
export function tryParseJson(text: string): JsonValue | undefined {
  try {
    const parsed: JsonValue = JSON.parse(text);
    return parsed;
  } catch {
    return undefined;
  }
}
