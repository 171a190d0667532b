import {
  validateAtIdentifier,
  validateAtUri,
  validateCid,
  validateDatetime,
  validateDid,
  validateHandle,
  validateLanguage,
  validateNsid,
  validateRecordKey,
  validateTid,
  validateUri,
} from '@quire/syntax';
import type { FormatError } from '@quire/syntax';
import type { Result } from '@quire/types';

import { LexiconBuildError } from './errors';

/** Validates one string format, returning its canonical form. */
export type FormatValidator = (raw: string) => Result<string, FormatError>;

/** Format name to validator. Read-only once built. */
export type FormatRegistry = ReadonlyMap<string, FormatValidator>;

/** Options for {@link createFormatRegistry}. */
export interface FormatRegistryOptions {
  /** Validate `handle` strings in strict mode (the default). */
  strictHandles?: boolean;
}

/**
 * Build a format registry holding the standard formats plus `extra`
 * entries, which may add new names or replace standard ones.
 *
 * @example
 * ```typescript
 * const formats = createFormatRegistry({
 *   'hex-color': (raw) => /^#[0-9a-f]{6}$/.test(raw)
 *     ? ok(raw)
 *     : formatFailure('hex-color', 'Invalid', 'expected #rrggbb'),
 * });
 * ```
 */
export function createFormatRegistry(
  extra?: Readonly<Record<string, FormatValidator>>,
  options?: FormatRegistryOptions,
): FormatRegistry {
  const strict = options?.strictHandles ?? true;
  const registry = new Map<string, FormatValidator>([
    ['datetime', validateDatetime],
    ['language', validateLanguage],
    ['did', validateDid],
    ['handle', (raw) => validateHandle(raw, { strict })],
    ['at-uri', validateAtUri],
    ['at-identifier', validateAtIdentifier],
    ['cid', validateCid],
    ['nsid', validateNsid],
    ['tid', validateTid],
    ['record-key', validateRecordKey],
    ['uri', validateUri],
  ]);
  for (const [name, validator] of Object.entries(extra ?? {})) {
    registry.set(name, validator);
  }
  return registry;
}

/** The standard formats. */
export const DEFAULT_FORMAT_REGISTRY: FormatRegistry = createFormatRegistry();

/**
 * Find the validator for `name`.
 *
 * @throws {LexiconBuildError} `UnknownFormat` when the registry has no entry.
 */
export function lookupFormat(registry: FormatRegistry, name: string, definitionPath: string): FormatValidator {
  const validator = registry.get(name);
  if (!validator) {
    throw new LexiconBuildError('UnknownFormat', definitionPath, `unknown string format "${name}"`);
  }
  return validator;
}
