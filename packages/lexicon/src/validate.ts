/**
 * Checks instance values against a compiled {@link LexiconGraph}.
 *
 * Validation never throws for bad data: every problem becomes a
 * {@link Violation}. A value with the wrong type stops that branch, while
 * siblings are all checked so one pass reports everything. The input is
 * never mutated; a valid outcome carries a new value with identifiers in
 * canonical form and defaults filled in.
 */

import { decodeBase64, validateCid } from '@quire/syntax';
import { QuireError, QuireErrorCode, assertNever, isNonNegativeInteger, isPlainObject } from '@quire/types';

import { splitRef } from './graph';
import type { LexiconGraph } from './graph';
import type {
  ArrayNode,
  BlobNode,
  BytesNode,
  IntegerNode,
  InstancePath,
  NodeHandle,
  ObjectNode,
  ResolvedNode,
  StringNode,
  UnionNode,
  ValidationOutcome,
  Violation,
  ViolationKind,
} from './types';
import { violation } from './violations';

/** Options for {@link validateValue}. */
export interface ValidateOptions {
  /** Fill absent optional properties from their schema `default`. Defaults to `true`. */
  applyDefaults?: boolean;
}

type Path = (string | number)[];

const encoder = new TextEncoder();
const segmenter = new Intl.Segmenter(undefined, { granularity: 'grapheme' });

/** Length of `text` in UTF-8 bytes. */
export function utf8Length(text: string): number {
  return encoder.encode(text).length;
}

/** Number of user-perceived characters in `text`. */
export function graphemeLength(text: string): number {
  return Array.from(segmenter.segment(text)).length;
}

/**
 * Whether `mimeType` matches one of `accept`: exact types, `type/*`, or `*\/*`.
 * Comparison ignores case.
 */
export function acceptsMimeType(accept: readonly string[], mimeType: string): boolean {
  const actual = mimeType.toLowerCase();
  return accept.some((pattern) => {
    const p = pattern.toLowerCase();
    if (p === '*/*') {
      return true;
    }
    if (p.endsWith('/*')) {
      return actual.startsWith(p.slice(0, -1));
    }
    return p === actual;
  });
}

/** Short name of a value's runtime type, as used in `UnexpectedType`. */
export function describeType(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  if (value instanceof Uint8Array) {
    return 'bytes';
  }
  if (typeof value === 'number') {
    return Number.isInteger(value) ? 'integer' : 'number';
  }
  return typeof value;
}

function isJsonLike(value: unknown): boolean {
  if (value === null || typeof value === 'string' || typeof value === 'boolean' || value instanceof Uint8Array) {
    return true;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value);
  }
  if (Array.isArray(value)) {
    return value.every(isJsonLike);
  }
  if (isPlainObject(value)) {
    return Object.values(value).every(isJsonLike);
  }
  return false;
}

class Validator {
  readonly violations: Violation[] = [];
  private readonly applyDefaults: boolean;

  constructor(options: ValidateOptions | undefined) {
    this.applyDefaults = options?.applyDefaults ?? true;
  }

  private report(path: InstancePath, kind: ViolationKind): void {
    this.violations.push(violation(path, kind));
  }

  private mismatch(path: InstancePath, expected: string, value: unknown): unknown {
    this.report(path, { code: 'UnexpectedType', expected, actual: describeType(value) });
    return value;
  }

  check(graph: LexiconGraph, handle: NodeHandle, value: unknown, path: Path): unknown {
    const node = graph.node(handle);
    switch (node.kind) {
      case 'object':
        return this.object(graph, node, value, path);
      case 'record':
        return this.check(graph, node.payload, value, path);
      case 'array':
        return this.array(graph, node, value, path);
      case 'string':
        return this.string(node, value, path);
      case 'integer':
        return this.integer(node, value, path);
      case 'boolean':
        if (typeof value !== 'boolean') {
          return this.mismatch(path, 'boolean', value);
        }
        if (node.const !== undefined && value !== node.const) {
          this.report(path, { code: 'ConstMismatch', expected: node.const });
        }
        return value;
      case 'bytes':
        return this.bytes(node, value, path);
      case 'blob':
        return this.blob(node, value, path);
      case 'cid-link':
        return this.cidLink(value, path);
      case 'null':
        return value === null ? null : this.mismatch(path, 'null', value);
      case 'unknown':
        return isJsonLike(value) ? value : this.mismatch(path, 'JSON value', value);
      case 'token':
        if (typeof value !== 'string') {
          return this.mismatch(path, 'string', value);
        }
        if (value !== node.value) {
          this.report(path, { code: 'ConstMismatch', expected: node.value });
        }
        return value;
      case 'ref': {
        const target = graph.resolveTarget(node.target);
        return this.check(target.graph, target.handle, value, path);
      }
      case 'union':
        return this.union(graph, node, value, path);
      case 'query':
      case 'procedure':
        throw new QuireError(
          QuireErrorCode.DEFINITION_KIND_MISMATCH,
          `${node.path} is a ${node.kind}; validate its parameters or bodies instead`,
        );
      default:
        return assertNever(node);
    }
  }

  private object(graph: LexiconGraph, node: ObjectNode, value: unknown, path: Path): unknown {
    if (!isPlainObject(value)) {
      return this.mismatch(path, 'object', value);
    }
    const out: Record<string, unknown> = {};
    if (value.$type !== undefined) {
      out.$type = value.$type;
    }

    const declared = new Set<string>();
    for (const prop of node.properties) {
      declared.add(prop.name);
      const propPath = [...path, prop.name];
      const given = Object.hasOwn(value, prop.name) ? value[prop.name] : undefined;

      if (given === undefined) {
        if (prop.required) {
          this.report(propPath, { code: 'MissingRequiredField', field: prop.name });
        } else if (this.applyDefaults) {
          const fallback = defaultOf(graph.node(prop.handle));
          if (fallback !== undefined) {
            out[prop.name] = fallback;
          }
        }
        continue;
      }
      if (given === null) {
        if (prop.nullable) {
          out[prop.name] = null;
        } else if (prop.required) {
          this.report(propPath, { code: 'MissingRequiredField', field: prop.name });
        } else {
          this.report(propPath, { code: 'UnexpectedType', expected: expectedType(graph, prop.handle), actual: 'null' });
        }
        continue;
      }
      out[prop.name] = this.check(graph, prop.handle, given, propPath);
    }

    for (const [key, extra] of Object.entries(value)) {
      if (key === '$type' || declared.has(key)) {
        continue;
      }
      // never copied: assigning it would replace the output's prototype
      if (node.closed || key === '__proto__') {
        this.report([...path, key], { code: 'UnexpectedProperty', property: key });
      } else {
        out[key] = extra;
      }
    }
    return out;
  }

  private array(graph: LexiconGraph, node: ArrayNode, value: unknown, path: Path): unknown {
    if (!Array.isArray(value)) {
      return this.mismatch(path, 'array', value);
    }
    const { minLength, maxLength } = node;
    if ((minLength !== undefined && value.length < minLength) || (maxLength !== undefined && value.length > maxLength)) {
      this.report(path, { code: 'ArrayLengthOutOfBounds', minLength, maxLength, actual: value.length });
    }
    return value.map((item: unknown, index) => this.check(graph, node.items, item, [...path, index]));
  }

  private string(node: StringNode, value: unknown, path: Path): unknown {
    if (typeof value !== 'string') {
      return this.mismatch(path, 'string', value);
    }

    if (node.minLength !== undefined || node.maxLength !== undefined) {
      const bytes = utf8Length(value);
      if (node.maxLength !== undefined && bytes > node.maxLength) {
        this.report(path, { code: 'StringTooLong', maxBytes: node.maxLength, actualBytes: bytes });
      }
      if (node.minLength !== undefined && bytes < node.minLength) {
        this.report(path, { code: 'StringTooShort', minBytes: node.minLength, actualBytes: bytes });
      }
    }
    if (node.minGraphemes !== undefined || node.maxGraphemes !== undefined) {
      const graphemes = graphemeLength(value);
      if (node.maxGraphemes !== undefined && graphemes > node.maxGraphemes) {
        this.report(path, { code: 'StringTooManyGraphemes', maxGraphemes: node.maxGraphemes, actualGraphemes: graphemes });
      }
      if (node.minGraphemes !== undefined && graphemes < node.minGraphemes) {
        this.report(path, { code: 'StringTooFewGraphemes', minGraphemes: node.minGraphemes, actualGraphemes: graphemes });
      }
    }

    let out = value;
    if (node.format) {
      const result = node.format.validate(value);
      if (result.ok) {
        out = result.value;
      } else {
        this.report(path, {
          code: 'FormatMismatch',
          format: node.format.name,
          rule: result.error.rule,
          reason: result.error.message,
        });
      }
    }
    if (node.enum && !node.enum.includes(value)) {
      this.report(path, { code: 'EnumMismatch', allowed: node.enum });
    }
    if (node.const !== undefined && value !== node.const) {
      this.report(path, { code: 'ConstMismatch', expected: node.const });
    }
    return out;
  }

  private integer(node: IntegerNode, value: unknown, path: Path): unknown {
    if (typeof value !== 'number' || !Number.isInteger(value)) {
      return this.mismatch(path, 'integer', value);
    }
    const { minimum, maximum } = node;
    if ((minimum !== undefined && value < minimum) || (maximum !== undefined && value > maximum)) {
      this.report(path, { code: 'OutOfRange', minimum, maximum, actual: value });
    }
    if (node.enum && !node.enum.includes(value)) {
      this.report(path, { code: 'EnumMismatch', allowed: node.enum });
    }
    if (node.const !== undefined && value !== node.const) {
      this.report(path, { code: 'ConstMismatch', expected: node.const });
    }
    return value;
  }

  private bytes(node: BytesNode, value: unknown, path: Path): unknown {
    let data: Uint8Array | undefined;
    if (value instanceof Uint8Array) {
      data = value;
    } else if (isPlainObject(value) && Object.keys(value).length === 1) {
      const { $bytes } = value;
      data = typeof $bytes === 'string' ? decodeBase64($bytes) : undefined;
    }
    if (!data) {
      return this.mismatch(path, 'bytes', value);
    }
    const { minLength, maxLength } = node;
    if ((minLength !== undefined && data.length < minLength) || (maxLength !== undefined && data.length > maxLength)) {
      this.report(path, { code: 'ByteLengthOutOfBounds', minLength, maxLength, actual: data.length });
    }
    return value;
  }

  private blob(node: BlobNode, value: unknown, path: Path): unknown {
    if (!isPlainObject(value)) {
      return this.mismatch(path, 'blob', value);
    }
    const { ref, mimeType, size } = value;
    if (
      value.$type !== 'blob' ||
      !isPlainObject(ref) ||
      typeof ref.$link !== 'string' ||
      typeof mimeType !== 'string' ||
      !isNonNegativeInteger(size)
    ) {
      return this.mismatch(path, 'blob', value);
    }

    let link: string = ref.$link;
    const cid = validateCid(link);
    if (cid.ok) {
      link = cid.value;
    } else {
      this.report([...path, 'ref', '$link'], {
        code: 'FormatMismatch',
        format: 'cid',
        rule: cid.error.rule,
        reason: cid.error.message,
      });
    }
    if (node.accept && !acceptsMimeType(node.accept, mimeType)) {
      this.report([...path, 'mimeType'], { code: 'MimeTypeNotAccepted', mimeType, accept: node.accept });
    }
    if (node.maxSize !== undefined && size > node.maxSize) {
      this.report([...path, 'size'], { code: 'BlobTooLarge', maxSize: node.maxSize, actual: size });
    }
    return { $type: 'blob', ref: { $link: link }, mimeType, size };
  }

  private cidLink(value: unknown, path: Path): unknown {
    if (!isPlainObject(value) || Object.keys(value).length !== 1) {
      return this.mismatch(path, 'cid-link', value);
    }
    const { $link } = value;
    if (typeof $link !== 'string') {
      return this.mismatch(path, 'cid-link', value);
    }
    const cid = validateCid($link);
    if (!cid.ok) {
      this.report([...path, '$link'], {
        code: 'FormatMismatch',
        format: 'cid',
        rule: cid.error.rule,
        reason: cid.error.message,
      });
      return value;
    }
    return { $link: cid.value };
  }

  private union(graph: LexiconGraph, node: UnionNode, value: unknown, path: Path): unknown {
    if (!isPlainObject(value)) {
      return this.mismatch(path, 'object', value);
    }
    const { $type } = value;
    if ($type === undefined) {
      this.report([...path, '$type'], { code: 'MissingRequiredField', field: '$type' });
      return value;
    }
    if (typeof $type !== 'string') {
      return this.mismatch([...path, '$type'], 'string', $type);
    }

    const tag = $type.endsWith('#main') ? $type.slice(0, -'#main'.length) : $type;
    const member = node.members.find((m) => m.tag === tag);
    if (!member) {
      if (node.closed) {
        this.report([...path, '$type'], { code: 'UnknownUnionTag', tag: $type, allowed: node.members.map((m) => m.tag) });
      }
      return value;
    }
    const target = graph.resolveTarget(member.target);
    return this.check(target.graph, target.handle, value, path);
  }
}

function defaultOf(node: ResolvedNode): string | number | boolean | undefined {
  switch (node.kind) {
    case 'string':
    case 'integer':
    case 'boolean':
      return node.default;
    default:
      return undefined;
  }
}

function expectedType(graph: LexiconGraph, handle: NodeHandle): string {
  const node = graph.node(handle);
  switch (node.kind) {
    case 'ref': {
      const target = graph.resolveTarget(node.target);
      return expectedType(target.graph, target.handle);
    }
    case 'record':
    case 'union':
      return 'object';
    case 'token':
      return 'string';
    case 'unknown':
      return 'JSON value';
    default:
      return node.kind;
  }
}

/**
 * Validate `value` against the node at `handle`. `path` prefixes every
 * reported violation path.
 *
 * @throws {QuireError} DEFINITION_KIND_MISMATCH when `handle` is a query
 *   or procedure, REF_UNRESOLVED or RESOLVER_FAILED when an external ref
 *   can no longer be followed.
 */
export function validateValue(
  graph: LexiconGraph,
  handle: NodeHandle,
  value: unknown,
  options?: ValidateOptions,
  path: InstancePath = [],
): ValidationOutcome<unknown> {
  const validator = new Validator(options);
  const out = validator.check(graph, handle, value, [...path]);
  if (validator.violations.length > 0) {
    return { valid: false, violations: validator.violations };
  }
  return { valid: true, value: out };
}

/**
 * Validate `value` against the top-level definition `ref` (`nsid#name` or
 * `nsid`).
 *
 * @example
 * ```typescript
 * const outcome = validateDefinition(graph, 'com.example.post#reply', reply);
 * if (!outcome.valid) {
 *   console.error(formatViolations(outcome.violations));
 * }
 * ```
 *
 * @throws {QuireError} DEFINITION_NOT_FOUND when the graph has no such definition.
 */
export function validateDefinition(
  graph: LexiconGraph,
  ref: string,
  value: unknown,
  options?: ValidateOptions,
): ValidationOutcome<unknown> {
  const { nsid, name } = splitRef(ref);
  const handle = graph.lookup(nsid, name);
  if (handle === undefined) {
    throw new QuireError(QuireErrorCode.DEFINITION_NOT_FOUND, `No definition ${ref} in this graph`, {
      context: { ref, documents: graph.documents },
    });
  }
  return validateValue(graph, handle, value, options);
}
