/**
 * @tessera/types: shared error taxonomy, logging and small utilities.
 *
 * @packageDocumentation
 */

// ─── Errors ─────────────────────────────────────────────────────────────────────

export {
  ErrorCode,
  TesseraError,
  InputError,
  CryptoError,
  IntegrityError,
  NotImplementedError,
  ConfigError,
  NodeError,
  classifyError,
  formatError,
} from './errors';
export type { TesseraErrorOptions, TesseraErrorJSON, ErrorKind } from './errors';

// ─── Result type ────────────────────────────────────────────────────────────────

/**
 * A discriminated union representing either a successful value or an error.
 *
 *   - `{ ok: true, value: T }`
 *   - `{ ok: false, error: E }`
 */
export type Result<T, E = Error> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

/**
 * Construct a successful Result.
 *
 * @example
 * ```typescript
 * const result = ok(42);
 * if (result.ok) console.log(result.value); // 42
 * ```
 */
export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

/** Construct a failed Result. */
export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

// ─── Runtime type guards ────────────────────────────────────────────────────────

export {
  isNonEmptyString,
  isHexOfLength,
  isPlainObject,
  isNonNegativeSafeInteger,
  sanitizeJsonInput,
  assertNoDangerousKeys,
  freezeDeep,
  assertNever,
} from './guards';

// ─── Structured logging ─────────────────────────────────────────────────────────

export { Logger, parseLogLevel, LogLevel } from './logger';
export type { LogEntry, LogOutput, LoggerOptions } from './logger';
