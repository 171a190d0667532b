/**
 * Verbose debug output gated on the `DEBUG` environment variable.
 *
 * Namespaces follow the `quire:<subsystem>` convention. When a namespace is
 * not enabled every method is a no-op, so debug calls can stay in hot paths.
 *
 * @packageDocumentation
 */

// ─── Debug detection ────────────────────────────────────────────────────────────

const ROOT_NAMESPACE = 'quire';

/**
 * Check whether debug output is enabled for `namespace`.
 *
 * Recognised `DEBUG` patterns (comma separated):
 * - `*`               every namespace
 * - `quire`, `quire:*` every quire namespace
 * - `quire:lexicon`   exactly that namespace
 * - `quire:lexicon:*` that namespace and its children
 *
 * @param namespace - Namespace to test; when omitted, reports whether any
 *   quire namespace is enabled.
 * @param env - Value to read instead of `process.env.DEBUG`.
 */
export function isDebugEnabled(namespace?: string, env?: string): boolean {
  const debugEnv = env ?? ((typeof process !== 'undefined' && process.env?.DEBUG) || '');
  if (!debugEnv) {
    return false;
  }

  const patterns = debugEnv.split(',').map((p) => p.trim()).filter(Boolean);
  const inRoot = !namespace || namespace === ROOT_NAMESPACE || namespace.startsWith(`${ROOT_NAMESPACE}:`);

  for (const pattern of patterns) {
    if (pattern === '*') {
      return true;
    }

    if ((pattern === ROOT_NAMESPACE || pattern === `${ROOT_NAMESPACE}:*`) && inRoot) {
      return true;
    }

    if (namespace && pattern === namespace) {
      return true;
    }

    if (namespace && pattern.endsWith(':*')) {
      const prefix = pattern.slice(0, -2);
      if (namespace === prefix || namespace.startsWith(prefix + ':')) {
        return true;
      }
    }
  }

  return false;
}

// ─── Debug logger ───────────────────────────────────────────────────────────────

/** The shape returned by {@link createDebugLogger}. */
export interface DebugLogger {
  /** Whether this logger produces output. */
  readonly enabled: boolean;
  log: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  /** Start a timer; the returned function logs the elapsed milliseconds. */
  time: (label: string) => () => void;
}

const noop = (): void => {};

const noopTimer = (): (() => void) => noop;

/**
 * Create a debug logger for `namespace`.
 *
 * @example
 * ```typescript
 * const dbg = createDebugLogger('quire:lexicon');
 * const stop = dbg.time('buildGraph');
 * // ... build ...
 * stop(); // [quire:lexicon] buildGraph: 1.42ms
 * ```
 */
export function createDebugLogger(namespace: string, env?: string): DebugLogger {
  if (!isDebugEnabled(namespace, env)) {
    return {
      enabled: false,
      log: noop,
      warn: noop,
      time: noopTimer,
    };
  }

  const prefix = `[${namespace}]`;

  return {
    enabled: true,
    log: (...args: unknown[]): void => {
      console.error(new Date().toISOString(), prefix, ...args);
    },
    warn: (...args: unknown[]): void => {
      console.error(new Date().toISOString(), prefix, 'WARN', ...args);
    },
    time: (label: string): (() => void) => {
      const start = performance.now();
      return (): void => {
        const elapsed = performance.now() - start;
        console.error(new Date().toISOString(), prefix, `${label}: ${elapsed.toFixed(2)}ms`);
      };
    },
  };
}

// ─── Pre-created loggers ────────────────────────────────────────────────────────

/**
 * Debug loggers for each subsystem, resolved once at import time.
 *
 * Enable with e.g. `DEBUG=quire:lexicon`.
 */
export const debug: {
  lexicon: DebugLogger;
  syntax: DebugLogger;
} = {
  lexicon: createDebugLogger('quire:lexicon'),
  syntax: createDebugLogger('quire:syntax'),
};
