import { parseNsid } from '@quire/syntax';
import { ok, err, isPlainObject, isNonNegativeInteger, assertNoDangerousKeys, sanitizeJsonInput, QuireErrorCode } from '@quire/types';
import type { Result } from '@quire/types';

import { LexiconBuildError } from './errors';
import { LEXICON_VERSION } from './types';

/** Pattern every definition name must match. */
export const DEFINITION_NAME_PATTERN = /^[a-zA-Z][a-zA-Z0-9_]*$/;

// The builder reads only own keys, so `constructor` and `prototype` are
// ordinary property names in a schema.
const PROTO_ONLY: ReadonlySet<string> = new Set(['__proto__']);

/**
 * A document whose envelope has been checked. Definitions are still raw:
 * the graph builder checks each one as it compiles it.
 */
export interface ParsedDocument {
  readonly id: string;
  readonly revision?: number;
  readonly description?: string;
  readonly defs: Readonly<Record<string, unknown>>;
}

function invalid(path: string, message: string, cause?: Error): Result<never, LexiconBuildError> {
  return err(new LexiconBuildError('InvalidDocument', path, message, { cause }));
}

/**
 * Check a document's envelope: the `lexicon` version, an NSID `id`, and a
 * non-empty `defs` map with well-formed names.
 *
 * @example
 * ```typescript
 * const parsed = parseLexiconDocument({ lexicon: 1, id: 'com.example.like', defs: { main: { type: 'token' } } });
 * ```
 */
export function parseLexiconDocument(value: unknown): Result<ParsedDocument, LexiconBuildError> {
  if (!isPlainObject(value)) {
    return invalid('(document)', 'a lexicon document must be a JSON object');
  }
  try {
    assertNoDangerousKeys(value, PROTO_ONLY);
  } catch (e) {
    return invalid('(document)', e instanceof Error ? e.message : String(e), e instanceof Error ? e : undefined);
  }

  const { id } = value;
  if (typeof id !== 'string') {
    return invalid('(document)', '"id" must be a string');
  }
  const nsid = parseNsid(id);
  if (!nsid.ok) {
    return invalid(id, `"id" is not a valid NSID: ${nsid.error.message}`);
  }

  const { lexicon } = value;
  if (typeof lexicon !== 'number') {
    return invalid(id, '"lexicon" must be a version number');
  }
  if (lexicon !== LEXICON_VERSION) {
    return err(
      new LexiconBuildError('UnsupportedVersion', id, `lexicon version ${lexicon} is not supported (expected ${LEXICON_VERSION})`),
    );
  }

  let revision: number | undefined;
  if (value.revision !== undefined) {
    if (!isNonNegativeInteger(value.revision)) {
      return invalid(id, '"revision" must be a non-negative integer');
    }
    revision = value.revision;
  }
  let description: string | undefined;
  if (value.description !== undefined) {
    if (typeof value.description !== 'string') {
      return invalid(id, '"description" must be a string');
    }
    description = value.description;
  }

  const { defs } = value;
  if (!isPlainObject(defs) || Object.keys(defs).length === 0) {
    return invalid(id, '"defs" must be a non-empty object');
  }
  for (const name of Object.keys(defs)) {
    if (!DEFINITION_NAME_PATTERN.test(name)) {
      return invalid(`${id}#${name}`, `"${name}" is not a valid definition name`);
    }
  }

  return ok({ id: nsid.value.nsid, revision, description, defs });
}

/**
 * Parse lexicon JSON text, rejecting prototype-pollution keys, then check
 * the envelope as {@link parseLexiconDocument} does.
 */
export function parseLexiconJson(text: string): Result<ParsedDocument, LexiconBuildError> {
  let value: unknown;
  try {
    value = sanitizeJsonInput(text, PROTO_ONLY);
  } catch (e) {
    const cause = e instanceof Error ? e : undefined;
    return err(
      new LexiconBuildError('InvalidDocument', '(document)', `could not parse lexicon JSON: ${cause?.message ?? String(e)}`, {
        code: e instanceof SyntaxError ? QuireErrorCode.LEXICON_PARSE_FAILED : undefined,
        cause,
      }),
    );
  }
  return parseLexiconDocument(value);
}
