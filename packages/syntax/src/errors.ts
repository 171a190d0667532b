/**
 * The error value every identifier validator returns on rejection.
 *
 * Validators never throw on bad input: they return `err(FormatError)` so the
 * lexicon validator can turn the failure into a violation with a path.
 */

import { err } from '@quire/types';
import type { Result } from '@quire/types';

/** Names of the formats this package validates. */
export type FormatName =
  | 'did'
  | 'handle'
  | 'nsid'
  | 'tid'
  | 'record-key'
  | 'cid'
  | 'language'
  | 'datetime'
  | 'at-identifier'
  | 'at-uri'
  | 'uri';

/** The specific rule an input broke. */
export type FormatRule =
  // shared
  | 'Empty'
  | 'TooLong'
  | 'InvalidCharacter'
  | 'BadSyntax'
  // labels (handles, NSID authorities)
  | 'EmptyLabel'
  | 'LabelTooLong'
  | 'LeadingHyphen'
  | 'TrailingHyphen'
  | 'TldStartsWithDigit'
  | 'MissingDot'
  | 'DisallowedTld'
  // did
  | 'MissingPrefix'
  | 'BadMethod'
  | 'EmptyIdentifier'
  | 'BadPercentEncoding'
  | 'TrailingColon'
  | 'BadPlcIdentifier'
  | 'BadWebHost'
  // nsid
  | 'TooFewSegments'
  | 'BadName'
  // tid
  | 'BadLength'
  | 'HighBitSet'
  // record key
  | 'ReservedName'
  // cid
  | 'BadMultibasePrefix'
  | 'BadEncoding'
  | 'UnsupportedVersion'
  | 'UnsupportedHashAlgorithm'
  | 'DigestLengthMismatch'
  | 'Truncated'
  // language
  | 'InvalidPrimaryLanguage'
  | 'InvalidSubtag'
  | 'DuplicateSubtag'
  // datetime
  | 'MissingTimezone'
  | 'UnknownLocalOffset'
  | 'FieldOutOfRange'
  // at-uri
  | 'BadScheme'
  | 'BadPath'
  | 'UnexpectedQuery'
  | 'UnexpectedFragment'
  | 'UnexpectedCredentials'
  // custom formats registered by callers
  | 'Invalid';

/** Why an input string is not a valid instance of a format. */
export interface FormatError {
  /** The format that rejected the input; custom formats use their own name. */
  readonly format: string;
  readonly rule: FormatRule;
  readonly message: string;
}

/** Build a failed Result carrying a {@link FormatError}. */
export function formatFailure(format: string, rule: FormatRule, message: string): Result<never, FormatError> {
  return err({ format, rule, message });
}

/**
 * Re-attribute an error from a nested validator to the enclosing format,
 * keeping its rule (an at-uri with a bad DID authority reports `BadMethod`).
 */
export function withFormat(error: FormatError, format: string, context?: string): FormatError {
  return {
    format,
    rule: error.rule,
    message: context ? `${context}: ${error.message}` : error.message,
  };
}
