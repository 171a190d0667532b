/**
 * @quire/types — shared building blocks for the quire packages.
 *
 * Provides the documented error code system, structured and debug logging,
 * runtime guards, and the Result type used by every validator.
 *
 * @packageDocumentation
 */

// ─── Result type ────────────────────────────────────────────────────────────────

/**
 * A discriminated union holding either a success value or an error:
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
 * const result = ok('alice.example.com');
 * if (result.ok) console.log(result.value);
 * ```
 */
export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

/** Construct a failed Result. */
export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Unwrap a Result, throwing its error when it failed.
 *
 * Meant for tests and trusted input; validation paths should branch on
 * `ok` instead.
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) {
    return result.value;
  }
  throw result.error instanceof Error ? result.error : new Error(describeError(result.error));
}

function describeError(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

// ─── Errors ─────────────────────────────────────────────────────────────────────

export { QuireErrorCode, QuireError, formatError, isQuireError } from './errors';
export type { QuireErrorOptions } from './errors';

// ─── Structured logging ─────────────────────────────────────────────────────────

export { Logger, LogLevel, createLogger, defaultLogger, silentLogger } from './logger';
export type { LogEntry, LogOutput, LoggerOptions } from './logger';

// ─── Debug logging ──────────────────────────────────────────────────────────────

export { isDebugEnabled, createDebugLogger, debug } from './debug';
export type { DebugLogger } from './debug';

// ─── Runtime guards ─────────────────────────────────────────────────────────────

export {
  isPlainObject,
  isNonNegativeInteger,
  isStringArray,
  DANGEROUS_KEYS,
  assertNoDangerousKeys,
  sanitizeJsonInput,
  freezeDeep,
  assertNever,
} from './guards';
