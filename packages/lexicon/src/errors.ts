import { QuireError, QuireErrorCode } from '@quire/types';
import type { QuireErrorOptions } from '@quire/types';

/** Every way a set of lexicon documents can fail to compile. */
export type BuildErrorKind =
  | 'UnsupportedVersion'
  | 'InvalidDocument'
  | 'InvalidDefinition'
  | 'DuplicateDefinition'
  | 'UnknownFormat'
  | 'UnresolvedRef'
  | 'ResolverFailed'
  | 'ReferenceCycle';

const CODES: Record<BuildErrorKind, QuireErrorCode> = {
  UnsupportedVersion: QuireErrorCode.LEXICON_VERSION_UNSUPPORTED,
  InvalidDocument: QuireErrorCode.LEXICON_INVALID_DOCUMENT,
  InvalidDefinition: QuireErrorCode.DEFINITION_INVALID,
  DuplicateDefinition: QuireErrorCode.DEFINITION_DUPLICATE,
  UnknownFormat: QuireErrorCode.FORMAT_UNKNOWN,
  UnresolvedRef: QuireErrorCode.REF_UNRESOLVED,
  ResolverFailed: QuireErrorCode.RESOLVER_FAILED,
  ReferenceCycle: QuireErrorCode.REFERENCE_CYCLE,
};

const HINTS: Partial<Record<BuildErrorKind, string>> = {
  UnsupportedVersion: 'Set "lexicon": 1 at the top of the document.',
  UnknownFormat: 'Check the spelling of "format", or register a validator with createFormatRegistry().',
  UnresolvedRef: 'Declare the definition, or pass a resolver that knows the document it lives in.',
  ReferenceCycle: 'Break the cycle with an array or an optional property.',
};

/** Options for {@link LexiconBuildError}. */
export interface LexiconBuildErrorOptions extends QuireErrorOptions {
  /** Overrides the code derived from the kind. */
  code?: QuireErrorCode;
}

/**
 * A schema-authoring mistake found while compiling lexicon documents.
 * Always fatal: no partial graph is produced.
 *
 * @example
 * ```typescript
 * const result = buildGraph([doc]);
 * if (!result.ok) {
 *   console.error(result.error.kind, result.error.definitionPath);
 * }
 * ```
 */
export class LexiconBuildError extends QuireError {
  readonly kind: BuildErrorKind;
  /** Where the problem is, e.g. `com.example.post#main.properties.body`. */
  readonly definitionPath: string;

  constructor(kind: BuildErrorKind, definitionPath: string, message: string, options?: LexiconBuildErrorOptions) {
    super(options?.code ?? CODES[kind], `${definitionPath}: ${message}`, {
      hint: options?.hint ?? HINTS[kind],
      cause: options?.cause,
      context: { ...options?.context, kind, definitionPath },
    });
    this.name = 'LexiconBuildError';
    this.kind = kind;
    this.definitionPath = definitionPath;
  }
}

/** Type guard for {@link LexiconBuildError}, optionally narrowed to one kind. */
export function isLexiconBuildError(value: unknown, kind?: BuildErrorKind): value is LexiconBuildError {
  return value instanceof LexiconBuildError && (kind === undefined || value.kind === kind);
}
