import { assertNever } from '@quire/types';

import type { InstancePath, Violation, ViolationKind } from './types';

/**
 * Render an instance path for messages: `body.languages[0]`, or `(root)`
 * for the empty path.
 */
export function formatPath(path: InstancePath): string {
  if (path.length === 0) {
    return '(root)';
  }
  let out = '';
  for (const segment of path) {
    if (typeof segment === 'number') {
      out += `[${segment}]`;
    } else {
      out += out.length === 0 ? segment : `.${segment}`;
    }
  }
  return out;
}

function bounds(min: number | undefined, max: number | undefined): string {
  if (min !== undefined && max !== undefined) {
    return `between ${min} and ${max}`;
  }
  return min !== undefined ? `at least ${min}` : `at most ${max ?? 0}`;
}

/** Human-readable description of a violation kind. */
export function describeViolationKind(kind: ViolationKind): string {
  switch (kind.code) {
    case 'MissingRequiredField':
      return `required field "${kind.field}" is missing`;
    case 'UnexpectedType':
      return `expected ${kind.expected}, got ${kind.actual}`;
    case 'UnexpectedProperty':
      return `property "${kind.property}" is not allowed`;
    case 'StringTooLong':
      return `string is ${kind.actualBytes} bytes, more than ${kind.maxBytes}`;
    case 'StringTooShort':
      return `string is ${kind.actualBytes} bytes, fewer than ${kind.minBytes}`;
    case 'StringTooManyGraphemes':
      return `string has ${kind.actualGraphemes} graphemes, more than ${kind.maxGraphemes}`;
    case 'StringTooFewGraphemes':
      return `string has ${kind.actualGraphemes} graphemes, fewer than ${kind.minGraphemes}`;
    case 'OutOfRange':
      return `${kind.actual} is not ${bounds(kind.minimum, kind.maximum)}`;
    case 'FormatMismatch':
      return `not a valid ${kind.format}: ${kind.reason}`;
    case 'EnumMismatch':
      return `value must be one of ${kind.allowed.map((v) => JSON.stringify(v)).join(', ')}`;
    case 'ConstMismatch':
      return `value must be ${JSON.stringify(kind.expected)}`;
    case 'UnknownUnionTag':
      return `$type "${kind.tag}" is not one of ${kind.allowed.join(', ')}`;
    case 'ArrayLengthOutOfBounds':
      return `array has ${kind.actual} items, expected ${bounds(kind.minLength, kind.maxLength)}`;
    case 'ByteLengthOutOfBounds':
      return `bytes value is ${kind.actual} bytes, expected ${bounds(kind.minLength, kind.maxLength)}`;
    case 'BlobTooLarge':
      return `blob is ${kind.actual} bytes, more than ${kind.maxSize}`;
    case 'MimeTypeNotAccepted':
      return `MIME type "${kind.mimeType}" is not accepted (${kind.accept.join(', ')})`;
    case 'InvalidKey':
      return kind.reason;
    default:
      return assertNever(kind);
  }
}

/** Build a violation, deriving its message from the kind. */
export function violation(path: InstancePath, kind: ViolationKind): Violation {
  return { path: [...path], kind, message: describeViolationKind(kind) };
}

/** One line per violation: `body.languages[0]: not a valid language: ...`. */
export function formatViolations(violations: readonly Violation[]): string {
  return violations.map((v) => `${formatPath(v.path)}: ${v.message}`).join('\n');
}
