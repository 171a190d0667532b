import { parseNsid } from '@quire/syntax';
import { QuireError, QuireErrorCode } from '@quire/types';

import type { LexiconGraph } from './graph';
import type { BodyNode, ProcedureNode, QueryNode, ValidationOutcome, Violation } from './types';
import { acceptsMimeType, describeType, validateValue } from './validate';
import type { ValidateOptions } from './validate';
import { violation } from './violations';

function endpoint(graph: LexiconGraph, nsid: string): QueryNode | ProcedureNode {
  const parsed = parseNsid(nsid);
  const handle = parsed.ok ? graph.lookup(parsed.value.nsid) : undefined;
  if (handle === undefined) {
    throw new QuireError(QuireErrorCode.DEFINITION_NOT_FOUND, `No query or procedure definition for ${nsid}`, {
      context: { nsid, documents: graph.documents },
    });
  }
  const node = graph.node(handle);
  if (node.kind !== 'query' && node.kind !== 'procedure') {
    throw new QuireError(QuireErrorCode.DEFINITION_KIND_MISMATCH, `${nsid} is a ${node.kind}, not a query or procedure`, {
      context: { nsid, kind: node.kind },
    });
  }
  return node;
}

/** `application/json; charset=utf-8` to `application/json`. */
function essence(mimeType: string): string {
  const semicolon = mimeType.indexOf(';');
  return (semicolon < 0 ? mimeType : mimeType.slice(0, semicolon)).trim();
}

function checkBody(
  graph: LexiconGraph,
  declared: BodyNode | undefined,
  body: unknown,
  encoding: string | undefined,
  options: ValidateOptions | undefined,
): ValidationOutcome<unknown> {
  if (!declared) {
    return body === undefined
      ? { valid: true, value: undefined }
      : { valid: false, violations: [violation([], { code: 'UnexpectedType', expected: 'no body', actual: describeType(body) })] };
  }

  const violations: Violation[] = [];
  if (encoding !== undefined && !acceptsMimeType([declared.encoding], essence(encoding))) {
    violations.push(violation(['encoding'], { code: 'EnumMismatch', allowed: [declared.encoding] }));
  }
  if (declared.schema === undefined) {
    return violations.length > 0 ? { valid: false, violations } : { valid: true, value: body };
  }

  const outcome = validateValue(graph, declared.schema, body, options);
  if (!outcome.valid) {
    violations.push(...outcome.violations);
  }
  return violations.length > 0 ? { valid: false, violations } : outcome;
}

/**
 * Validate the query-string parameters of a query or procedure. Endpoints
 * without declared parameters accept any parameters unchanged.
 *
 * @throws {QuireError} DEFINITION_NOT_FOUND or DEFINITION_KIND_MISMATCH.
 */
export function validateParams(
  graph: LexiconGraph,
  nsid: string,
  params: unknown,
  options?: ValidateOptions,
): ValidationOutcome<unknown> {
  const node = endpoint(graph, nsid);
  const given = params ?? {};
  if (node.parameters === undefined) {
    return { valid: true, value: given };
  }
  return validateValue(graph, node.parameters, given, options);
}

/**
 * Validate a procedure's request body. `encoding`, when given, must match
 * the declared one (media-type parameters are ignored).
 *
 * @throws {QuireError} DEFINITION_KIND_MISMATCH for a query, which takes no body.
 */
export function validateInput(
  graph: LexiconGraph,
  nsid: string,
  body: unknown,
  encoding?: string,
  options?: ValidateOptions,
): ValidationOutcome<unknown> {
  const node = endpoint(graph, nsid);
  if (node.kind !== 'procedure') {
    throw new QuireError(QuireErrorCode.DEFINITION_KIND_MISMATCH, `${nsid} is a query and takes no input`, {
      context: { nsid },
    });
  }
  return checkBody(graph, node.input, body, encoding, options);
}

/** Validate the response body of a query or procedure. */
export function validateOutput(
  graph: LexiconGraph,
  nsid: string,
  body: unknown,
  encoding?: string,
  options?: ValidateOptions,
): ValidationOutcome<unknown> {
  return checkBody(graph, endpoint(graph, nsid).output, body, encoding, options);
}
