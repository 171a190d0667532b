/**
 * @quire/lexicon — compile lexicon schema documents and validate records
 * against them.
 *
 * {@link buildGraph} turns documents into an immutable {@link LexiconGraph};
 * {@link validateRecord}, {@link validateDefinition} and the RPC helpers
 * check untrusted values against it and report every violation by path.
 *
 * @packageDocumentation
 */

// ─── Types ──────────────────────────────────────────────────────────────────────

export { LEXICON_VERSION } from './types';
export type {
  LexiconDocument,
  RawDefinition,
  RawRecord,
  RawQuery,
  RawProcedure,
  RawParams,
  RawBody,
  RawObject,
  RawArray,
  RawString,
  RawInteger,
  RawBoolean,
  RawBytes,
  RawBlob,
  RawCidLink,
  RawNull,
  RawRef,
  RawUnion,
  RawUnknown,
  RawToken,
  NodeHandle,
  NodeKind,
  ResolvedNode,
  ResolvedDefinition,
  ExternalResolver,
  RefTarget,
  KeyStrategy,
  RecordNode,
  QueryNode,
  ProcedureNode,
  BodyNode,
  ErrorDeclaration,
  ObjectNode,
  PropertyEntry,
  ArrayNode,
  StringNode,
  IntegerNode,
  BooleanNode,
  BytesNode,
  BlobNode,
  CidLinkNode,
  NullNode,
  UnknownNode,
  TokenNode,
  RefNode,
  UnionNode,
  UnionMember,
  InstancePath,
  KeyRule,
  ViolationKind,
  ViolationCode,
  Violation,
  ValidationOutcome,
} from './types';

// ─── Errors ─────────────────────────────────────────────────────────────────────

export { LexiconBuildError, isLexiconBuildError } from './errors';
export type { BuildErrorKind, LexiconBuildErrorOptions } from './errors';

// ─── Documents & formats ────────────────────────────────────────────────────────

export { parseLexiconDocument, parseLexiconJson, DEFINITION_NAME_PATTERN } from './document';
export type { ParsedDocument } from './document';

export { createFormatRegistry, lookupFormat, DEFAULT_FORMAT_REGISTRY } from './formats';
export type { FormatValidator, FormatRegistry, FormatRegistryOptions } from './formats';

// ─── Graph ──────────────────────────────────────────────────────────────────────

export { LexiconGraph, splitRef } from './graph';
export { buildGraph, compileGraph, findReferenceCycle } from './builder';
export type { BuildOptions } from './builder';

export { LexiconRegistry } from './registry';
export type { LexiconRegistryOptions } from './registry';

// ─── Validation ─────────────────────────────────────────────────────────────────

export {
  validateValue,
  validateDefinition,
  acceptsMimeType,
  describeType,
  utf8Length,
  graphemeLength,
} from './validate';
export type { ValidateOptions } from './validate';

export {
  validateRecord,
  validateKey,
  recordDefinition,
  parseKeyStrategy,
  formatKeyStrategy,
} from './record';
export type { RecordValidateOptions, RecordValidationOutcome, KeyValidationOutcome } from './record';

export { validateParams, validateInput, validateOutput } from './rpc';

export { formatPath, formatViolations, describeViolationKind } from './violations';
