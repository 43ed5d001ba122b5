/**
 * Type guards and validation helpers for untyped input (env, webhook bodies,
 * third-party JSON)
 */

/**
 * Ensure value is a plain object, throw descriptive error if not
 */
export function ensureRecord(
  v: unknown,
  name: string,
): Record<string, unknown> {
  if (!isRecord(v)) {
    throw new Error(`Expected object for ${name}, got ${describe(v)}`);
  }
  return v;
}

/**
 * Ensure value is an array, throw descriptive error if not
 */
export function ensureArray(v: unknown, name: string): unknown[] {
  if (!Array.isArray(v)) {
    throw new Error(`Expected array for ${name}, got ${describe(v)}`);
  }
  return v;
}

/**
 * Ensure value is a non-empty string, throw descriptive error if not
 */
export function ensureString(v: unknown, name: string): string {
  if (!isNonEmptyString(v)) {
    throw new Error(`Expected non-empty string for ${name}, got ${describe(v)}`);
  }
  return v;
}

/**
 * Parse a positive integer from an env-style string
 */
export function parsePositiveInt(v: string | undefined): number | null {
  if (v === undefined || !/^\d+$/.test(v.trim())) {
    return null;
  }
  const n = Number.parseInt(v.trim(), 10);
  return n > 0 ? n : null;
}

/**
 * Type guard for non-empty string
 */
export function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

/**
 * Type guard for plain-object values
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return value != null && typeof value === "object" && !Array.isArray(value);
}

function describe(v: unknown): string {
  if (v == null) return "null/undefined";
  if (Array.isArray(v)) return "array";
  if (typeof v === "string" && v.trim().length === 0) return "empty string";
  return typeof v;
}
