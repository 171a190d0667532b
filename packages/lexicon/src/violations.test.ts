import { describe, it, expect } from 'vitest';

import type { InstancePath, ViolationKind } from './types';
import { describeViolationKind, formatPath, formatViolations, violation } from './violations';

const paths: [InstancePath, string][] = [
  [[], '(root)'],
  [['body'], 'body'],
  [['body', 'languages', 0], 'body.languages[0]'],
  [[2, 'text'], '[2].text'],
];

describe('formatPath', () => {
  it.each(paths)('renders %j as %s', (path, text) => {
    expect(formatPath(path)).toBe(text);
  });
});

const kinds: [ViolationKind, string][] = [
  [{ code: 'MissingRequiredField', field: 'body' }, 'required field "body" is missing'],
  [{ code: 'UnexpectedType', expected: 'integer', actual: 'string' }, 'expected integer, got string'],
  [{ code: 'StringTooLong', maxBytes: 10, actualBytes: 12 }, 'string is 12 bytes, more than 10'],
  [{ code: 'StringTooManyGraphemes', maxGraphemes: 3, actualGraphemes: 4 }, 'string has 4 graphemes, more than 3'],
  [{ code: 'OutOfRange', minimum: 1, maximum: 5, actual: 9 }, '9 is not between 1 and 5'],
  [{ code: 'OutOfRange', minimum: 1, actual: 0 }, '0 is not at least 1'],
  [{ code: 'OutOfRange', maximum: 5, actual: 9 }, '9 is not at most 5'],
  [{ code: 'EnumMismatch', allowed: ['a', 'b'] }, 'value must be one of "a", "b"'],
  [{ code: 'ConstMismatch', expected: 'com.example.post' }, 'value must be "com.example.post"'],
  [{ code: 'ArrayLengthOutOfBounds', maxLength: 3, actual: 4 }, 'array has 4 items, expected at most 3'],
  [{ code: 'BlobTooLarge', maxSize: 100, actual: 101 }, 'blob is 101 bytes, more than 100'],
  [{ code: 'InvalidKey', rule: 'MissingKey', reason: 'a record key is required' }, 'a record key is required'],
];

describe('describeViolationKind', () => {
  it.each(kinds)('describes %j', (kind, message) => {
    expect(describeViolationKind(kind)).toBe(message);
  });
});

describe('violation', () => {
  it('copies the path and derives the message', () => {
    const path = ['body'];
    const v = violation(path, { code: 'UnexpectedProperty', property: 'extra' });
    path.push('changed');
    expect(v).toEqual({
      path: ['body'],
      kind: { code: 'UnexpectedProperty', property: 'extra' },
      message: 'property "extra" is not allowed',
    });
  });
});

describe('formatViolations', () => {
  it('prints one line per violation', () => {
    const text = formatViolations([
      violation(['body'], { code: 'MissingRequiredField', field: 'body' }),
      violation(['tags', 1], { code: 'UnexpectedType', expected: 'string', actual: 'integer' }),
    ]);
    expect(text).toBe('body: required field "body" is missing\ntags[1]: expected string, got integer');
  });
});
