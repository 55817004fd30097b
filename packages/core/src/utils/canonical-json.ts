/**
 * @summary Canonical JSON (RFC 8785 / JCS) for program bytes and bundle ids.
 *
 * Programs are stored as the UTF-8 bytes of their canonical JSON, so two
 * programs with the same structure always hash to the same puzzle hash
 * regardless of key order or whitespace. Rules applied:
 * - object keys sorted by UTF-16 code units, no whitespace
 * - numbers in ECMAScript shortest form, `-0` written as `0`
 * - `undefined` members dropped; `null` members dropped unless `removeNulls`
 *   is false
 *
 * Amounts are carried as decimal strings by the codecs above this layer;
 * a bigint reaching the serializer is an error.
 *
 * RFC 8785: https://www.rfc-editor.org/rfc/rfc8785
 */

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export interface CanonicalizeOptions {
  /**
   * Drop object members whose value is null.
   * @default true
   */
  removeNulls?: boolean;

  /**
   * Nesting limit.
   * @default 100
   */
  maxDepth?: number;
}

function compareKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Serialize a value to canonical JSON.
 *
 * @throws Error on cycles, non-finite numbers, bigints, functions, symbols,
 *   a top-level undefined, or nesting beyond `maxDepth`
 *
 * @example
 * canonicalize({ kind: "standard", publicKey: "ab" }) // '{"kind":"standard","publicKey":"ab"}'
 * canonicalize([[51, "ab", "5"]])                     // '[[51,"ab","5"]]'
 */
export function canonicalize(value: unknown, options: CanonicalizeOptions = {}): string {
  const removeNulls = options.removeNulls ?? true;
  const maxDepth = options.maxDepth ?? 100;
  const ancestors = new Set<object>();

  // Returns undefined for values JSON omits (undefined members)
  const write = (val: unknown, depth: number): string | undefined => {
    if (depth > maxDepth) {
      throw new Error(`Maximum depth of ${maxDepth} exceeded during canonicalization`);
    }
    if (val === undefined) return undefined;
    if (val === null) return "null";

    switch (typeof val) {
      case "boolean":
        return val ? "true" : "false";
      case "string":
        return JSON.stringify(val);
      case "number":
        if (!Number.isFinite(val)) {
          throw new Error(`Cannot canonicalize non-finite number: ${val}`);
        }
        return Object.is(val, -0) ? "0" : JSON.stringify(val);
    }
    if (typeof val !== "object") {
      throw new Error(`Cannot canonicalize value of type ${typeof val}`);
    }

    if (ancestors.has(val)) {
      throw new Error("Circular reference detected during canonicalization");
    }
    ancestors.add(val);
    try {
      if (Array.isArray(val)) {
        const items: unknown[] = val;
        return "[" + items.map((item) => write(item, depth + 1) ?? "null").join(",") + "]";
      }

      const members: string[] = [];
      const entries: [string, unknown][] = Object.entries(val);
      for (const [key, member] of entries.sort(([a], [b]) => compareKeys(a, b))) {
        if (removeNulls && member === null) continue;
        const written = write(member, depth + 1);
        if (written !== undefined) {
          members.push(`${JSON.stringify(key)}:${written}`);
        }
      }
      return "{" + members.join(",") + "}";
    } finally {
      ancestors.delete(val);
    }
  };

  const result = write(value, 0);
  if (result === undefined) {
    throw new Error("Cannot canonicalize undefined at top level");
  }
  return result;
}

/**
 * True when both values serialize to the same canonical JSON. Values that
 * cannot be serialized are never equal.
 */
export function canonicalEquals(a: unknown, b: unknown, options?: CanonicalizeOptions): boolean {
  try {
    return canonicalize(a, options) === canonicalize(b, options);
  } catch {
    return false;
  }
}

/**
 * Type guard for values that round-trip through JSON unchanged.
 */
export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case "string":
    case "boolean":
      return true;
    case "number":
      return Number.isFinite(value);
    case "object":
      return Array.isArray(value)
        ? value.every(isJsonValue)
        : Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}
