import { TidGenerator, parseNsid, parseRecordKey, parseTid } from '@quire/syntax';
import { QuireError, QuireErrorCode, assertNever, isPlainObject } from '@quire/types';

import { splitRef } from './graph';
import type { LexiconGraph } from './graph';
import type { KeyRule, KeyStrategy, RecordNode, ValidationOutcome, Violation } from './types';
import { validateValue } from './validate';
import type { ValidateOptions } from './validate';
import { violation } from './violations';

const LITERAL_PREFIX = 'literal:';

// ─── Key strategies ─────────────────────────────────────────────────────────────

/**
 * Parse a record's `key` field: `tid`, `any`, `nsid`, or `literal:<value>`
 * where the value is itself a valid record key.
 */
export function parseKeyStrategy(raw: unknown): KeyStrategy | undefined {
  if (raw === 'tid' || raw === 'any' || raw === 'nsid') {
    return { kind: raw };
  }
  if (typeof raw === 'string' && raw.startsWith(LITERAL_PREFIX)) {
    const value = raw.slice(LITERAL_PREFIX.length);
    if (parseRecordKey(value).ok) {
      return { kind: 'literal', value };
    }
  }
  return undefined;
}

/** Inverse of {@link parseKeyStrategy}. */
export function formatKeyStrategy(strategy: KeyStrategy): string {
  return strategy.kind === 'literal' ? `${LITERAL_PREFIX}${strategy.value}` : strategy.kind;
}

/**
 * A checked or derived record key. `generated` is true when no key was
 * given and the strategy produced one.
 */
export type KeyValidationOutcome =
  | { readonly valid: true; readonly key: string; readonly generated: boolean }
  | { readonly valid: false; readonly violations: readonly Violation[] };

function keyFailure(rule: KeyRule, reason: string): KeyValidationOutcome {
  return { valid: false, violations: [violation([], { code: 'InvalidKey', rule, reason })] };
}

/**
 * Check `key` against `strategy`, or derive a key when none is given.
 * Only `tid` and `literal:` strategies can derive one; `tid` needs the
 * caller's `generator` to do so.
 */
export function validateKey(strategy: KeyStrategy, key: string | undefined, generator?: TidGenerator): KeyValidationOutcome {
  switch (strategy.kind) {
    case 'tid': {
      if (key === undefined) {
        return generator
          ? { valid: true, key: generator.next(), generated: true }
          : keyFailure('MissingKey', 'a record key or a TID generator is required');
      }
      const tid = parseTid(key);
      return tid.ok
        ? { valid: true, key: tid.value.tid, generated: false }
        : keyFailure('BadTid', `key "${key}" is not a valid TID: ${tid.error.message}`);
    }
    case 'literal':
      if (key === undefined) {
        return { valid: true, key: strategy.value, generated: true };
      }
      return key === strategy.value
        ? { valid: true, key, generated: false }
        : keyFailure('LiteralMismatch', `key must be "${strategy.value}", got "${key}"`);
    case 'any': {
      if (key === undefined) {
        return keyFailure('MissingKey', 'a record key is required');
      }
      const parsed = parseRecordKey(key);
      return parsed.ok
        ? { valid: true, key, generated: false }
        : keyFailure('BadRecordKey', `key "${key}" is not a valid record key: ${parsed.error.message}`);
    }
    case 'nsid': {
      if (key === undefined) {
        return keyFailure('MissingKey', 'a record key is required');
      }
      const parsed = parseNsid(key);
      return parsed.ok
        ? { valid: true, key: parsed.value.nsid, generated: false }
        : keyFailure('BadNsid', `key "${key}" is not a valid NSID: ${parsed.error.message}`);
    }
    default:
      return assertNever(strategy);
  }
}

// ─── Records ────────────────────────────────────────────────────────────────────

/** Options for {@link validateRecord}. */
export interface RecordValidateOptions extends ValidateOptions {
  /** The key the record will be stored under. Derived from the strategy when absent. */
  key?: string;
  /** Source of TID keys for `tid` records given no `key`. */
  tidGenerator?: TidGenerator;
}

/** Payload and key results, reported separately. */
export interface RecordValidationOutcome {
  readonly record: ValidationOutcome<unknown>;
  readonly key: KeyValidationOutcome;
}

/**
 * The record definition for `collection`.
 *
 * @throws {QuireError} DEFINITION_NOT_FOUND or DEFINITION_KIND_MISMATCH.
 */
export function recordDefinition(graph: LexiconGraph, collection: string): RecordNode {
  const nsid = parseNsid(collection);
  const handle = nsid.ok ? graph.lookup(nsid.value.nsid) : undefined;
  if (handle === undefined) {
    throw new QuireError(QuireErrorCode.DEFINITION_NOT_FOUND, `No record definition for ${collection}`, {
      context: { collection, documents: graph.documents },
    });
  }
  const node = graph.node(handle);
  if (node.kind !== 'record') {
    throw new QuireError(QuireErrorCode.DEFINITION_KIND_MISMATCH, `${collection} is a ${node.kind}, not a record`, {
      context: { collection, kind: node.kind },
    });
  }
  return node;
}

/**
 * Validate a record instance for `collection` and check or derive the key
 * it will be stored under.
 *
 * @example
 * ```typescript
 * const { record, key } = validateRecord(graph, 'com.example.post', instance, { key: rkey });
 * if (!record.valid) {
 *   return reject(record.violations);
 * }
 * if (!key.valid) {
 *   return retryWithNewKey(key.violations);
 * }
 * ```
 */
export function validateRecord(
  graph: LexiconGraph,
  collection: string,
  instance: unknown,
  options?: RecordValidateOptions,
): RecordValidationOutcome {
  const node = recordDefinition(graph, collection);
  const expected = splitRef(node.path).nsid;

  let record = validateValue(graph, node.payload, instance, options);
  if (isPlainObject(instance) && instance.$type !== undefined && instance.$type !== expected) {
    const typeViolation = violation(['$type'], { code: 'ConstMismatch', expected });
    record = { valid: false, violations: [typeViolation, ...(record.valid ? [] : record.violations)] };
  }

  return { record, key: validateKey(node.key, options?.key, options?.tidGenerator) };
}
