/**
 * JSON encoding for responses.
 */

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (typeof value === 'object' && value !== null) {
    const source: object = value;
    // fromEntries defines own properties, so a `__proto__` key survives
    return Object.fromEntries(
      Object.keys(source)
        .sort()
        .map((key) => [key, sortKeys(Reflect.get(source, key))])
    );
  }
  return value;
}

/**
 * Encodes a value compactly, or with sorted keys and 2-space indent when
 * `pretty` is set.
 */
export function encodeJson(value: unknown, pretty = false): string {
  if (!pretty) {
    return JSON.stringify(value);
  }
  return JSON.stringify(sortKeys(value), null, 2);
}
