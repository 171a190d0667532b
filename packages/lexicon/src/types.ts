/**
 * Type definitions for lexicon documents, the compiled node arena, and
 * validation outcomes.
 */

import type { FormatRule } from '@quire/syntax';

import type { LexiconGraph } from './graph';
import type { FormatValidator } from './formats';

/** The only lexicon document version this package understands. */
export const LEXICON_VERSION = 1;

// ─── Lexicon documents (authoring shape) ────────────────────────────────────────

interface RawMetadata {
  description?: string;
}

export interface RawBoolean extends RawMetadata {
  type: 'boolean';
  default?: boolean;
  const?: boolean;
}

export interface RawInteger extends RawMetadata {
  type: 'integer';
  default?: number;
  const?: number;
  minimum?: number;
  maximum?: number;
  enum?: number[];
}

export interface RawString extends RawMetadata {
  type: 'string';
  format?: string;
  default?: string;
  const?: string;
  /** Bound in UTF-8 bytes. */
  minLength?: number;
  /** Bound in UTF-8 bytes. */
  maxLength?: number;
  minGraphemes?: number;
  maxGraphemes?: number;
  /** Advisory; never enforced. */
  knownValues?: string[];
  enum?: string[];
}

export interface RawBytes extends RawMetadata {
  type: 'bytes';
  minLength?: number;
  maxLength?: number;
}

export interface RawBlob extends RawMetadata {
  type: 'blob';
  /** MIME patterns such as `image/png`, `image/*` or `*\/*`. */
  accept?: string[];
  maxSize?: number;
}

export interface RawCidLink extends RawMetadata {
  type: 'cid-link';
}

export interface RawNull extends RawMetadata {
  type: 'null';
}

export interface RawUnknown extends RawMetadata {
  type: 'unknown';
}

export interface RawToken extends RawMetadata {
  type: 'token';
}

export interface RawRef extends RawMetadata {
  type: 'ref';
  /** `#name`, `nsid#name`, or `nsid` (meaning `nsid#main`). */
  ref: string;
}

export interface RawUnion extends RawMetadata {
  type: 'union';
  refs: string[];
  /** A closed union rejects `$type` tags outside `refs`. */
  closed?: boolean;
}

export interface RawArray extends RawMetadata {
  type: 'array';
  items: RawDefinition;
  minLength?: number;
  maxLength?: number;
}

export interface RawObject extends RawMetadata {
  type: 'object';
  properties: Record<string, RawDefinition>;
  required?: string[];
  nullable?: string[];
  /** A closed object rejects properties it does not declare. */
  closed?: boolean;
}

export interface RawRecord extends RawMetadata {
  type: 'record';
  /** `tid`, `literal:<value>`, `any` or `nsid`. */
  key: string;
  record: RawObject;
}

export interface RawParams extends RawMetadata {
  type: 'params';
  properties: Record<string, RawBoolean | RawInteger | RawString | RawUnknown | RawArray>;
  required?: string[];
}

export interface RawBody extends RawMetadata {
  encoding: string;
  schema?: RawRef | RawUnion | RawObject;
}

export interface RawQuery extends RawMetadata {
  type: 'query';
  parameters?: RawParams;
  output?: RawBody;
}

export interface RawProcedure extends RawMetadata {
  type: 'procedure';
  parameters?: RawParams;
  input?: RawBody;
  output?: RawBody;
}

export type RawDefinition =
  | RawRecord
  | RawQuery
  | RawProcedure
  | RawObject
  | RawArray
  | RawString
  | RawInteger
  | RawBoolean
  | RawBytes
  | RawBlob
  | RawCidLink
  | RawNull
  | RawRef
  | RawUnion
  | RawUnknown
  | RawToken;

/** A lexicon document as authored. */
export interface LexiconDocument {
  lexicon: 1;
  /** NSID naming the document. */
  id: string;
  revision?: number;
  description?: string;
  defs: Record<string, RawDefinition>;
}

// ─── Compiled graph ─────────────────────────────────────────────────────────────

/** Index of a node in a graph's arena. */
export type NodeHandle = number;

/** A definition in another graph, as returned by an {@link ExternalResolver}. */
export interface ResolvedDefinition {
  readonly graph: LexiconGraph;
  readonly handle: NodeHandle;
}

/**
 * Looks up a definition outside the documents being compiled. Returns
 * `undefined` when the definition does not exist; may throw when lookup
 * itself fails.
 */
export type ExternalResolver = (nsid: string, name: string) => ResolvedDefinition | undefined;

/** Where a `ref` or union member points. */
export type RefTarget =
  | { readonly kind: 'local'; readonly handle: NodeHandle }
  | {
      readonly kind: 'external';
      readonly nsid: string;
      readonly name: string;
      readonly resolver: ExternalResolver;
    };

/** How a record's storage key is chosen and checked. */
export type KeyStrategy =
  | { readonly kind: 'tid' }
  | { readonly kind: 'literal'; readonly value: string }
  | { readonly kind: 'any' }
  | { readonly kind: 'nsid' };

interface NodeBase {
  /** Definition path, e.g. `com.example.post#main.properties.text`. */
  readonly path: string;
  readonly description?: string;
}

export interface RecordNode extends NodeBase {
  readonly kind: 'record';
  readonly key: KeyStrategy;
  readonly payload: NodeHandle;
}

export interface BodyNode {
  readonly encoding: string;
  readonly schema?: NodeHandle;
}

/** A named error a query or procedure may answer with. */
export interface ErrorDeclaration {
  readonly name: string;
  readonly description?: string;
}

export interface QueryNode extends NodeBase {
  readonly kind: 'query';
  readonly parameters?: NodeHandle;
  readonly output?: BodyNode;
  readonly errors?: readonly ErrorDeclaration[];
}

export interface ProcedureNode extends NodeBase {
  readonly kind: 'procedure';
  readonly parameters?: NodeHandle;
  readonly input?: BodyNode;
  readonly output?: BodyNode;
  readonly errors?: readonly ErrorDeclaration[];
}

export interface PropertyEntry {
  readonly name: string;
  readonly handle: NodeHandle;
  readonly required: boolean;
  readonly nullable: boolean;
}

export interface ObjectNode extends NodeBase {
  readonly kind: 'object';
  /** In declaration order. */
  readonly properties: readonly PropertyEntry[];
  readonly closed: boolean;
}

export interface ArrayNode extends NodeBase {
  readonly kind: 'array';
  readonly items: NodeHandle;
  readonly minLength?: number;
  readonly maxLength?: number;
}

export interface StringNode extends NodeBase {
  readonly kind: 'string';
  readonly format?: { readonly name: string; readonly validate: FormatValidator };
  readonly default?: string;
  readonly const?: string;
  readonly minLength?: number;
  readonly maxLength?: number;
  readonly minGraphemes?: number;
  readonly maxGraphemes?: number;
  readonly knownValues?: readonly string[];
  readonly enum?: readonly string[];
}

export interface IntegerNode extends NodeBase {
  readonly kind: 'integer';
  readonly default?: number;
  readonly const?: number;
  readonly minimum?: number;
  readonly maximum?: number;
  readonly enum?: readonly number[];
}

export interface BooleanNode extends NodeBase {
  readonly kind: 'boolean';
  readonly default?: boolean;
  readonly const?: boolean;
}

export interface BytesNode extends NodeBase {
  readonly kind: 'bytes';
  readonly minLength?: number;
  readonly maxLength?: number;
}

export interface BlobNode extends NodeBase {
  readonly kind: 'blob';
  readonly accept?: readonly string[];
  readonly maxSize?: number;
}

export interface CidLinkNode extends NodeBase {
  readonly kind: 'cid-link';
}

export interface NullNode extends NodeBase {
  readonly kind: 'null';
}

export interface UnknownNode extends NodeBase {
  readonly kind: 'unknown';
}

export interface TokenNode extends NodeBase {
  readonly kind: 'token';
  /** The literal an instance must equal, e.g. `com.example.defs#like`. */
  readonly value: string;
}

export interface RefNode extends NodeBase {
  readonly kind: 'ref';
  readonly ref: string;
  readonly target: RefTarget;
}

export interface UnionMember {
  /** `$type` value selecting this member: `nsid`, or `nsid#name` when not `main`. */
  readonly tag: string;
  readonly target: RefTarget;
}

export interface UnionNode extends NodeBase {
  readonly kind: 'union';
  readonly members: readonly UnionMember[];
  readonly closed: boolean;
}

/** A compiled definition. `ref` and union members hold handles, never copies. */
export type ResolvedNode =
  | RecordNode
  | QueryNode
  | ProcedureNode
  | ObjectNode
  | ArrayNode
  | StringNode
  | IntegerNode
  | BooleanNode
  | BytesNode
  | BlobNode
  | CidLinkNode
  | NullNode
  | UnknownNode
  | TokenNode
  | RefNode
  | UnionNode;

export type NodeKind = ResolvedNode['kind'];

// ─── Validation ─────────────────────────────────────────────────────────────────

/** Object keys and array indices from the validated root. */
export type InstancePath = ReadonlyArray<string | number>;

/** Why a record key was rejected. */
export type KeyRule = 'MissingKey' | 'BadTid' | 'LiteralMismatch' | 'BadRecordKey' | 'BadNsid';

/** What is wrong with an instance value. */
export type ViolationKind =
  | { readonly code: 'MissingRequiredField'; readonly field: string }
  | { readonly code: 'UnexpectedType'; readonly expected: string; readonly actual: string }
  | { readonly code: 'UnexpectedProperty'; readonly property: string }
  | { readonly code: 'StringTooLong'; readonly maxBytes: number; readonly actualBytes: number }
  | { readonly code: 'StringTooShort'; readonly minBytes: number; readonly actualBytes: number }
  | { readonly code: 'StringTooManyGraphemes'; readonly maxGraphemes: number; readonly actualGraphemes: number }
  | { readonly code: 'StringTooFewGraphemes'; readonly minGraphemes: number; readonly actualGraphemes: number }
  | { readonly code: 'OutOfRange'; readonly minimum?: number; readonly maximum?: number; readonly actual: number }
  | { readonly code: 'FormatMismatch'; readonly format: string; readonly rule: FormatRule; readonly reason: string }
  | { readonly code: 'EnumMismatch'; readonly allowed: readonly (string | number)[] }
  | { readonly code: 'ConstMismatch'; readonly expected: string | number | boolean }
  | { readonly code: 'UnknownUnionTag'; readonly tag: string; readonly allowed: readonly string[] }
  | {
      readonly code: 'ArrayLengthOutOfBounds';
      readonly minLength?: number;
      readonly maxLength?: number;
      readonly actual: number;
    }
  | {
      readonly code: 'ByteLengthOutOfBounds';
      readonly minLength?: number;
      readonly maxLength?: number;
      readonly actual: number;
    }
  | { readonly code: 'BlobTooLarge'; readonly maxSize: number; readonly actual: number }
  | { readonly code: 'MimeTypeNotAccepted'; readonly mimeType: string; readonly accept: readonly string[] }
  | { readonly code: 'InvalidKey'; readonly rule: KeyRule; readonly reason: string };

export type ViolationCode = ViolationKind['code'];

/** One problem found in an instance, located by path. */
export interface Violation {
  readonly path: InstancePath;
  readonly kind: ViolationKind;
  readonly message: string;
}

/** Result of validating one value. */
export type ValidationOutcome<T = unknown> =
  | { readonly valid: true; readonly value: T }
  | { readonly valid: false; readonly violations: readonly Violation[] };
