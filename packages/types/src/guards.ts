/**
 * Runtime type guards for untrusted input.
 * Use these at system boundaries (command arguments, config files, JSON text).
 */

// ─── Type Guards ────────────────────────────────────────────────────────────────

/** `true` if `value` is a string with at least one non-whitespace character. */
export function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

/**
 * Check whether `value` is a hexadecimal string of exactly `length` characters.
 * Case-insensitive, no prefix, no separators.
 */
export function isHexOfLength(value: unknown, length: number): value is string {
  return typeof value === 'string' && value.length === length && /^[0-9a-fA-F]*$/.test(value);
}

/**
 * Check whether `value` is a plain object (not an array, null, or an object with
 * a non-Object prototype).
 *
 * @returns `true` if `value` was created by `{}` or `Object.create(null)`.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** `true` if `value` is an integer in `[0, Number.MAX_SAFE_INTEGER]`. */
export function isNonNegativeSafeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;
}

// ─── JSON input ─────────────────────────────────────────────────────────────────

/** Keys that are dangerous if present in parsed JSON (prototype pollution vectors). */
const DANGEROUS_KEYS = new Set(['__proto__', 'constructor', 'prototype']);

/**
 * Recursively check parsed JSON for prototype-pollution keys.
 *
 * @throws Error if a dangerous key is found.
 */
export function assertNoDangerousKeys(obj: unknown): void {
  if (typeof obj !== 'object' || obj === null) return;

  if (Array.isArray(obj)) {
    for (const item of obj) {
      assertNoDangerousKeys(item);
    }
    return;
  }

  for (const [key, value] of Object.entries(obj)) {
    if (DANGEROUS_KEYS.has(key)) {
      throw new Error(`Potentially dangerous key "${key}" detected in JSON input`);
    }
    assertNoDangerousKeys(value);
  }
}

/**
 * Parse a JSON string with prototype pollution protection.
 *
 * @throws SyntaxError if parsing fails, Error if a dangerous key is detected.
 */
export function sanitizeJsonInput(value: string): unknown {
  const parsed: unknown = JSON.parse(value);
  assertNoDangerousKeys(parsed);
  return parsed;
}

// ─── Deep Freeze ────────────────────────────────────────────────────────────────

/**
 * Deeply freeze plain objects and arrays.
 *
 * Class instances (hashes, keys) are left alone: they guard their own bytes,
 * and typed arrays cannot be frozen at all.
 */
export function freezeDeep<T>(obj: T): Readonly<T> {
  if (Array.isArray(obj)) {
    Object.freeze(obj);
    for (const item of obj) {
      freezeDeep(item);
    }
  } else if (isPlainObject(obj)) {
    Object.freeze(obj);
    for (const value of Object.values(obj)) {
      freezeDeep(value);
    }
  }
  return obj;
}

// ─── Exhaustiveness Check ───────────────────────────────────────────────────────

/**
 * Place in the `default` branch of a `switch` over a union to get a
 * compile-time error when a case is not handled.
 *
 * @example
 * ```ts
 * switch (tx.type) {
 *   case 'delegate': return ...;
 *   case 'undelegate': return ...;
 *   case 'report': return ...;
 *   default: return assertNever(tx);
 * }
 * ```
 */
export function assertNever(value: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(value)}`);
}
