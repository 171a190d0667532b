/**
 * Documented error code system for quire.
 *
 * Every thrown error carries a unique code (QUIRE_Exxx) naming a specific
 * failure mode, so callers can branch on the code instead of parsing
 * messages. Instance-data problems are never thrown; they are returned as
 * violations by the validator.
 *
 * @packageDocumentation
 */

// ─── Error codes ────────────────────────────────────────────────────────────────

/** All quire error codes. */
export enum QuireErrorCode {
  // Lexicon documents (1xx)
  /** The lexicon document is not an object or is missing required fields. */
  LEXICON_INVALID_DOCUMENT = 'QUIRE_E100',
  /** The `lexicon` version field is not a supported version. */
  LEXICON_VERSION_UNSUPPORTED = 'QUIRE_E101',
  /** The lexicon JSON text could not be parsed. */
  LEXICON_PARSE_FAILED = 'QUIRE_E102',

  // Graph building (2xx)
  /** A definition is malformed for its kind. */
  DEFINITION_INVALID = 'QUIRE_E200',
  /** A definition (or a whole document) was declared twice. */
  DEFINITION_DUPLICATE = 'QUIRE_E201',
  /** A string definition names a format the registry does not know. */
  FORMAT_UNKNOWN = 'QUIRE_E202',
  /** A ref or union member does not resolve to an existing definition. */
  REF_UNRESOLVED = 'QUIRE_E203',
  /** The external resolver threw while resolving a cross-document ref. */
  RESOLVER_FAILED = 'QUIRE_E204',
  /** The definitions form a reference cycle no finite instance can satisfy. */
  REFERENCE_CYCLE = 'QUIRE_E205',

  // Validation entry points (3xx)
  /** The graph has no definition under the requested name. */
  DEFINITION_NOT_FOUND = 'QUIRE_E301',
  /** The requested definition exists but is not of the expected kind. */
  DEFINITION_KIND_MISMATCH = 'QUIRE_E302',

  // Identifier codecs (4xx)
  /** An identifier codec received a value it cannot encode. */
  CODEC_INVALID_INPUT = 'QUIRE_E400',
}

// ─── Error class ────────────────────────────────────────────────────────────────

/** Options for constructing a QuireError. */
export interface QuireErrorOptions {
  /** Additional structured context for diagnostics and logging. */
  context?: Record<string, unknown>;
  /** A human-readable hint suggesting how to resolve the error. */
  hint?: string;
  /** The underlying cause of this error, for error chaining. */
  cause?: Error;
}

/**
 * Base error class for all quire errors.
 *
 * @example
 * ```typescript
 * throw new QuireError(
 *   QuireErrorCode.DEFINITION_NOT_FOUND,
 *   'No record definition named com.example.post',
 *   { hint: 'Add the document to the graph before validating against it' }
 * );
 * ```
 */
export class QuireError extends Error {
  readonly code: QuireErrorCode;
  readonly context?: Record<string, unknown>;
  readonly hint?: string;

  constructor(code: QuireErrorCode, message: string, options?: QuireErrorOptions) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'QuireError';
    this.code = code;
    this.context = options?.context;
    this.hint = options?.hint;
  }

  /**
   * Return a structured JSON representation suitable for logging.
   */
  toJSON(): { code: string; message: string; hint?: string; context?: Record<string, unknown> } {
    const result: { code: string; message: string; hint?: string; context?: Record<string, unknown> } = {
      code: this.code,
      message: this.message,
    };
    if (this.hint !== undefined) {
      result.hint = this.hint;
    }
    if (this.context !== undefined) {
      result.context = this.context;
    }
    return result;
  }
}

// ─── Utility functions ──────────────────────────────────────────────────────────

/**
 * Format an error for display: the code and message, then the hint when
 * one is present.
 *
 * @example
 * ```typescript
 * console.log(formatError(err));
 * // [QUIRE_E203] Unresolved ref "#missing" in com.example.post#main
 * // Hint: Declare the definition or register the document it lives in
 * ```
 */
export function formatError(error: QuireError): string {
  const lines: string[] = [];
  lines.push(`[${error.code}] ${error.message}`);
  if (error.hint) {
    lines.push(`Hint: ${error.hint}`);
  }
  return lines.join('\n');
}

/** Type guard for {@link QuireError}, optionally narrowed to one code. */
export function isQuireError(value: unknown, code?: QuireErrorCode): value is QuireError {
  return value instanceof QuireError && (code === undefined || value.code === code);
}
