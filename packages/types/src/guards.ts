/**
 * Runtime type guards and input hardening used at system boundaries
 * (lexicon ingestion, instance validation).
 */

// ─── Type Guards ────────────────────────────────────────────────────────────────

/**
 * Check whether `value` is a plain object: not an array, not null, and with
 * `Object.prototype` or `null` as its prototype. Class instances such as
 * `Uint8Array` or `Date` are rejected.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Check whether `value` is an integer greater than or equal to zero. */
export function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

/** Check whether `value` is an array whose every item is a string. */
export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

// ─── Sanitization Utilities ─────────────────────────────────────────────────────

/** Keys that are prototype pollution vectors when present in parsed JSON. */
export const DANGEROUS_KEYS: ReadonlySet<string> = new Set(['__proto__', 'constructor', 'prototype']);

/**
 * Recursively check a parsed value for prototype pollution keys.
 *
 * @param keys - Key names to reject. Callers that only ever read own
 *   properties can narrow this to `__proto__`.
 * @throws Error naming the first dangerous key found.
 */
export function assertNoDangerousKeys(obj: unknown, keys: ReadonlySet<string> = DANGEROUS_KEYS): void {
  if (typeof obj !== 'object' || obj === null) return;

  if (Array.isArray(obj)) {
    for (const item of obj) {
      assertNoDangerousKeys(item, keys);
    }
    return;
  }

  for (const [key, child] of Object.entries(obj)) {
    if (keys.has(key)) {
      throw new Error(`Potentially dangerous key "${key}" detected in JSON input`);
    }
    assertNoDangerousKeys(child, keys);
  }
}

/**
 * Parse JSON text and reject prototype pollution keys.
 *
 * @throws SyntaxError when the text is not JSON, Error on a dangerous key.
 */
export function sanitizeJsonInput(value: string, keys: ReadonlySet<string> = DANGEROUS_KEYS): unknown {
  const parsed: unknown = JSON.parse(value);
  assertNoDangerousKeys(parsed, keys);
  return parsed;
}

// ─── Deep Freeze ────────────────────────────────────────────────────────────────

/**
 * Deeply freeze arrays and plain objects. Primitives, functions and
 * already-frozen values are returned as they are.
 */
export function freezeDeep<T>(obj: T): Readonly<T> {
  if (obj === null || obj === undefined || typeof obj !== 'object') {
    return obj;
  }

  if (Object.isFrozen(obj)) {
    return obj;
  }

  Object.freeze(obj);

  if (Array.isArray(obj)) {
    for (const item of obj) {
      freezeDeep(item);
    }
  } else {
    for (const value of Object.values(obj)) {
      freezeDeep(value);
    }
  }

  return obj;
}

// ─── Exhaustiveness Check ───────────────────────────────────────────────────────

/**
 * Place in the `default` branch of a `switch` over a closed union to get a
 * compile-time error when a case is missing.
 *
 * @throws Error always.
 */
export function assertNever(value: never): never {
  throw new Error(`Unexpected value: ${String(value)}`);
}
