/**
 * Error code system for Tessera.
 *
 * Every error has a unique, documentable code (TSR_Exxx) grouped by kind,
 * so the command surface can tell operator mistakes apart from key
 * problems, repository integrity violations and placeholder commands.
 *
 * @packageDocumentation
 */

// ─── Error codes ────────────────────────────────────────────────────────────────

/** All Tessera error codes. */
export enum ErrorCode {
  // Input (1xx)
  /** A hash argument contains characters outside `[0-9a-fA-F]`. */
  INVALID_HASH = 'TSR_E100',
  /** A hash argument decodes to the wrong number of bytes. */
  WRONG_LENGTH = 'TSR_E101',
  /** The delegator of a governance transaction is malformed. */
  INVALID_DELEGATOR = 'TSR_E110',
  /** The delegatee of a delegation transaction is malformed. */
  INVALID_DELEGATEE = 'TSR_E111',
  /** The governance flag is not `true` or `false`. */
  INVALID_GOVERNANCE = 'TSR_E112',
  /** The proof authorizing a transaction is malformed. */
  INVALID_PROOF = 'TSR_E113',
  /** The finalization proof given to `sync` is malformed. */
  INVALID_FINALIZATION_PROOF = 'TSR_E114',
  /** The agenda commit hash to vote on is malformed. */
  INVALID_VOTE_TARGET = 'TSR_E115',
  /** The block commit hash to veto is malformed. */
  INVALID_VETO_TARGET = 'TSR_E116',
  /** A block height is not a non-negative integer. */
  INVALID_HEIGHT = 'TSR_E117',
  /** A command was invoked with missing or unknown arguments. */
  INVALID_ARGUMENT = 'TSR_E120',

  // Crypto (2xx)
  /** The signing primitive rejected the key material. */
  SIGNING_FAILED = 'TSR_E200',
  /** A key is not a valid 32-byte Ed25519 key. */
  INVALID_KEY = 'TSR_E201',

  // Integrity (3xx)
  /** The node detected a repository integrity violation. */
  INTEGRITY_VIOLATION = 'TSR_E300',

  // Placeholders (4xx)
  /** The command exists but has not been built yet. */
  NOT_IMPLEMENTED = 'TSR_E400',

  // Configuration (5xx)
  /** No `config.json` in the node directory. */
  CONFIG_NOT_FOUND = 'TSR_E500',
  /** `config.json` could not be parsed or has a bad field. */
  CONFIG_INVALID = 'TSR_E501',

  // Node (6xx)
  /** No node provider could be loaded. */
  NODE_UNAVAILABLE = 'TSR_E600',
  /** A lifecycle call into the node failed. */
  NODE_OPERATION_FAILED = 'TSR_E601',
}

// ─── Error classes ──────────────────────────────────────────────────────────────

/** Options for constructing a TesseraError. */
export interface TesseraErrorOptions {
  /** Additional structured context for diagnostics and logging. */
  context?: Record<string, unknown>;
  /** A human-readable hint suggesting how to resolve the error. */
  hint?: string;
  /** The underlying cause of this error, for error chaining. */
  cause?: Error;
}

/** Shape returned by {@link TesseraError.toJSON}. */
export interface TesseraErrorJSON {
  code: string;
  message: string;
  hint?: string;
  context?: Record<string, unknown>;
}

/**
 * Base error class for all Tessera errors.
 *
 * @example
 * ```typescript
 * throw new TesseraError(
 *   ErrorCode.CONFIG_INVALID,
 *   'config.json: publicKey must be 64 hex characters',
 *   { hint: 'Regenerate the key pair for this node.' }
 * );
 * ```
 */
export class TesseraError extends Error {
  readonly code: ErrorCode;
  readonly context?: Record<string, unknown>;
  readonly hint?: string;

  constructor(code: ErrorCode, message: string, options?: TesseraErrorOptions) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'TesseraError';
    this.code = code;
    this.context = options?.context;
    this.hint = options?.hint;
  }

  /** Return a structured JSON representation suitable for logging. */
  toJSON(): TesseraErrorJSON {
    const result: TesseraErrorJSON = {
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

/**
 * Thrown when an operator-supplied argument fails validation.
 *
 * `field` names the semantic role of the argument (`delegator`, `proof`,
 * `commit`, ...), never the position.
 */
export class InputError extends TesseraError {
  readonly field: string;

  constructor(code: ErrorCode, message: string, field: string, options?: TesseraErrorOptions) {
    super(code, message, options);
    this.name = 'InputError';
    this.field = field;
  }
}

/** Thrown when a cryptographic primitive fails. */
export class CryptoError extends TesseraError {
  constructor(code: ErrorCode, message: string, options?: TesseraErrorOptions) {
    super(code, message, options);
    this.name = 'CryptoError';
  }
}

/**
 * Raised by a node when the repository fails an integrity check.
 *
 * The command surface only classifies it; there is no remediation yet.
 */
export class IntegrityError extends TesseraError {
  constructor(message: string, options?: TesseraErrorOptions) {
    super(ErrorCode.INTEGRITY_VIOLATION, message, options);
    this.name = 'IntegrityError';
  }
}

/** Terminal signal for a command branch that has not been built. */
export class NotImplementedError extends TesseraError {
  readonly feature: string;

  constructor(feature: string) {
    super(ErrorCode.NOT_IMPLEMENTED, `${feature} is not implemented yet`);
    this.name = 'NotImplementedError';
    this.feature = feature;
  }
}

/** Thrown when the node configuration is missing or malformed. */
export class ConfigError extends TesseraError {
  constructor(code: ErrorCode, message: string, options?: TesseraErrorOptions) {
    super(code, message, options);
    this.name = 'ConfigError';
  }
}

/** Thrown when the node provider cannot be reached or a lifecycle call fails. */
export class NodeError extends TesseraError {
  constructor(code: ErrorCode, message: string, options?: TesseraErrorOptions) {
    super(code, message, options);
    this.name = 'NodeError';
  }
}

// ─── Classification ─────────────────────────────────────────────────────────────

/** Broad kind of a failure, used by the top-level handler. */
export type ErrorKind =
  | 'input'
  | 'crypto'
  | 'integrity'
  | 'not-implemented'
  | 'config'
  | 'node'
  | 'unknown';

const KIND_BY_PREFIX: Record<string, ErrorKind> = {
  '1': 'input',
  '2': 'crypto',
  '3': 'integrity',
  '4': 'not-implemented',
  '5': 'config',
  '6': 'node',
};

function hasErrorCode(value: Error): value is Error & { code: unknown } {
  return 'code' in value;
}

/**
 * Classify any thrown value.
 *
 * Integrity errors are recognised by class or by code, so a node built
 * against another copy of this package is still classified correctly.
 *
 * @example
 * ```typescript
 * classifyError(new IntegrityError('tampered ref')); // 'integrity'
 * classifyError(new Error('boom'));                  // 'unknown'
 * ```
 */
export function classifyError(error: unknown): ErrorKind {
  if (error instanceof IntegrityError) {
    return 'integrity';
  }
  if (!(error instanceof Error) || !hasErrorCode(error) || typeof error.code !== 'string') {
    return 'unknown';
  }
  const match = /^TSR_E(\d)\d\d$/.exec(error.code);
  if (!match) {
    return 'unknown';
  }
  return KIND_BY_PREFIX[match[1] ?? ''] ?? 'unknown';
}

/**
 * Format an error for display: `[code] message`, then the hint if present.
 *
 * @example
 * ```typescript
 * formatError(new NotImplementedError('git'));
 * // [TSR_E400] git is not implemented yet
 * ```
 */
export function formatError(error: TesseraError): string {
  const lines: string[] = [];
  lines.push(`[${error.code}] ${error.message}`);
  if (error.hint) {
    lines.push(`Hint: ${error.hint}`);
  }
  return lines.join('\n');
}
