export type JsonObject = Record<string, unknown>;

export function isPlainObject(value: unknown): value is JsonObject {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function camelToSnakeCase(str: string): string {
  if (!/[a-z]/.test(str)) {
    return str;
  }
  return str.replace(/[A-Z]/g, (letter: string) => `_${letter.toLowerCase()}`);
}

/**
 * Reads a raw mapping into string-keyed entries. Plain objects contribute
 * their string and symbol keys; a symbol key stands for its description.
 * `Map` instances are accepted the same way.
 */
export function toEntries(raw: unknown): readonly (readonly [string, unknown])[] | undefined {
  if (raw instanceof Map) {
    const entries: [string, unknown][] = [];
    for (const [key, value] of raw) {
      const name = keyName(key);
      if (name !== undefined) entries.push([name, value]);
    }
    return entries;
  }
  if (!isPlainObject(raw)) {
    return undefined;
  }
  const entries: [string, unknown][] = Object.entries(raw);
  for (const symbol of Object.getOwnPropertySymbols(raw)) {
    const name = symbol.description;
    if (name !== undefined) {
      entries.push([name, Reflect.get(raw, symbol)]);
    }
  }
  return entries;
}

function keyName(key: unknown): string | undefined {
  if (typeof key === "string") return key;
  if (typeof key === "symbol") return key.description;
  return undefined;
}

/**
 * Matches raw keys against known snake_case field names. A key matches when it
 * is the field name itself or its camelCase spelling. Keys with no matching
 * field are dropped.
 */
export function normalizeKeys(
  raw: unknown,
  fieldNames: readonly string[],
): ReadonlyMap<string, unknown> | undefined {
  const entries = toEntries(raw);
  if (entries === undefined) {
    return undefined;
  }
  const known = new Set(fieldNames);
  const result = new Map<string, unknown>();
  for (const [key, value] of entries) {
    const name = known.has(key) ? key : camelToSnakeCase(key);
    if (known.has(name)) {
      result.set(name, value);
    }
  }
  return result;
}
