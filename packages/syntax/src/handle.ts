import { ok } from '@quire/types';
import type { Result } from '@quire/types';

import { formatFailure } from './errors';
import type { FormatError } from './errors';

/** Maximum handle length in characters. */
export const MAX_HANDLE_LENGTH = 253;

/** Maximum length of one dot-separated label. */
export const MAX_LABEL_LENGTH = 63;

/** Top-level domains that can never name a public handle. */
export const DISALLOWED_TLDS: readonly string[] = [
  'alt',
  'arpa',
  'example',
  'internal',
  'invalid',
  'local',
  'localhost',
  'onion',
];

/** Options for {@link validateHandle}. */
export interface HandleOptions {
  /**
   * When true (the default) a handle needs at least two labels and may not
   * end in a disallowed TLD. Non-strict mode accepts a bare label such as
   * `localhost`, for development setups.
   */
  strict?: boolean;
}

/**
 * Check one DNS label: 1-63 ASCII letters, digits or hyphens, with no
 * hyphen at either end.
 */
export function checkLabel(label: string, format: string): Result<string, FormatError> {
  if (label.length === 0) {
    return formatFailure(format, 'EmptyLabel', 'labels must not be empty');
  }
  if (label.length > MAX_LABEL_LENGTH) {
    return formatFailure(format, 'LabelTooLong', `label "${label.slice(0, 16)}..." is longer than ${MAX_LABEL_LENGTH} characters`);
  }
  if (!/^[A-Za-z0-9-]+$/.test(label)) {
    return formatFailure(format, 'InvalidCharacter', `label "${label}" may only contain letters, digits and hyphens`);
  }
  if (label.startsWith('-')) {
    return formatFailure(format, 'LeadingHyphen', `label "${label}" starts with a hyphen`);
  }
  if (label.endsWith('-')) {
    return formatFailure(format, 'TrailingHyphen', `label "${label}" ends with a hyphen`);
  }
  return ok(label);
}

/**
 * Validate a handle and return its canonical, lowercased form.
 *
 * @example
 * ```typescript
 * validateHandle('XX.LCS.MIT.EDU'); // { ok: true, value: 'xx.lcs.mit.edu' }
 * validateHandle('laptop.local');   // rule: 'DisallowedTld'
 * ```
 */
export function validateHandle(raw: string, options?: HandleOptions): Result<string, FormatError> {
  const strict = options?.strict ?? true;

  if (raw.length === 0) {
    return formatFailure('handle', 'Empty', 'handle must not be empty');
  }
  if (raw.length > MAX_HANDLE_LENGTH) {
    return formatFailure('handle', 'TooLong', `handle is longer than ${MAX_HANDLE_LENGTH} characters`);
  }

  const labels = raw.split('.');
  if (strict && labels.length < 2) {
    return formatFailure('handle', 'MissingDot', 'handle needs at least two labels');
  }

  for (const label of labels) {
    const checked = checkLabel(label, 'handle');
    if (!checked.ok) {
      return checked;
    }
  }

  const tld = labels[labels.length - 1].toLowerCase();
  if (/^[0-9]/.test(tld)) {
    return formatFailure('handle', 'TldStartsWithDigit', `top-level label "${tld}" starts with a digit`);
  }
  if (strict && DISALLOWED_TLDS.includes(tld)) {
    return formatFailure('handle', 'DisallowedTld', `".${tld}" is not an allowed top-level domain`);
  }

  return ok(raw.toLowerCase());
}

/** Whether `raw` is a valid handle. */
export function isValidHandle(raw: string, options?: HandleOptions): boolean {
  return validateHandle(raw, options).ok;
}
