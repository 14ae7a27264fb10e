/**
 * Structured-value decoder.
 *
 * Turns the canonical text form of domain values (JSON) into typed values.
 * Every failure is an {@link InputError} whose code and message name the
 * semantic role of the argument (delegator, proof, veto target, ...), with
 * the underlying reason attached as `cause`. A decoder either returns a
 * complete value or throws; it never returns a partial one.
 *
 * @packageDocumentation
 */

import {
  ErrorCode,
  InputError,
  isNonNegativeSafeInteger,
  isPlainObject,
  sanitizeJsonInput,
} from '@tessera/types';

import { decodeHexBytes } from './bytes';
import { CommitHash, decodeCommitHash } from './hash';
import { PublicKey, Signature } from './values';
import type { FinalizationProof, FinalizationSignTarget, TypedSignature } from './values';

// ─── Roles ────────────────────────────────────────────────────────────────────

/** The semantic role of an argument: which code to raise and how to name it. */
export interface Role {
  readonly code: ErrorCode;
  /** Argument name as the operator typed it. */
  readonly field: string;
  /** Phrase completing "invalid …". */
  readonly description: string;
}

export const Roles = {
  delegationDelegator: {
    code: ErrorCode.INVALID_DELEGATOR,
    field: 'delegator',
    description: 'delegator for a delegation transaction',
  },
  delegationDelegatee: {
    code: ErrorCode.INVALID_DELEGATEE,
    field: 'delegatee',
    description: 'delegatee for a delegation transaction',
  },
  delegationGovernance: {
    code: ErrorCode.INVALID_GOVERNANCE,
    field: 'governance',
    description: 'governance flag for a delegation transaction',
  },
  delegationProof: {
    code: ErrorCode.INVALID_PROOF,
    field: 'proof',
    description: 'proof for a delegation transaction',
  },
  undelegationDelegator: {
    code: ErrorCode.INVALID_DELEGATOR,
    field: 'delegator',
    description: 'delegator for an undelegation transaction',
  },
  undelegationProof: {
    code: ErrorCode.INVALID_PROOF,
    field: 'proof',
    description: 'proof for an undelegation transaction',
  },
  targetHeight: {
    code: ErrorCode.INVALID_HEIGHT,
    field: 'target_height',
    description: 'target block height',
  },
  finalizationProof: {
    code: ErrorCode.INVALID_FINALIZATION_PROOF,
    field: 'last_finalization_proof',
    description: 'last finalization proof for sync',
  },
  voteTarget: {
    code: ErrorCode.INVALID_VOTE_TARGET,
    field: 'commit',
    description: 'agenda commit hash to vote on',
  },
  vetoTarget: {
    code: ErrorCode.INVALID_VETO_TARGET,
    field: 'commit',
    description: 'block commit hash to veto on',
  },
} as const satisfies Record<string, Role>;

// ─── Helpers ──────────────────────────────────────────────────────────────────

class ShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ShapeError';
  }
}

function fail(role: Role, cause: unknown): never {
  const reason = cause instanceof Error ? cause.message : String(cause);
  throw new InputError(role.code, `invalid ${role.description}: ${reason}`, role.field, {
    cause: cause instanceof Error ? cause : undefined,
  });
}

/** Run `decode`, re-raising any failure under `role`. */
function withRole<T>(role: Role, decode: () => T): T {
  try {
    return decode();
  } catch (err) {
    if (err instanceof InputError && err.code === role.code) {
      throw err;
    }
    return fail(role, err);
  }
}

function parseJson(text: string): unknown {
  return sanitizeJsonInput(text);
}

function expectKeys(value: unknown, keys: readonly string[], what: string): Record<string, unknown> {
  if (!isPlainObject(value)) {
    throw new ShapeError(`${what} must be a JSON object`);
  }
  for (const key of Object.keys(value)) {
    if (!keys.includes(key)) {
      throw new ShapeError(`${what} has unknown field "${key}"`);
    }
  }
  for (const key of keys) {
    if (value[key] === undefined) {
      throw new ShapeError(`${what} is missing field "${key}"`);
    }
  }
  return value;
}

function hexField(value: unknown, length: number, what: string): Uint8Array {
  if (typeof value !== 'string') {
    throw new ShapeError(`${what} must be a hex string`);
  }
  return decodeHexBytes(value, length, what);
}

function publicKeyFrom(value: unknown): PublicKey {
  return new PublicKey(hexField(value, PublicKey.LENGTH, 'public key'));
}

function signatureFrom(value: unknown): Signature {
  return new Signature(hexField(value, Signature.LENGTH, 'signature'));
}

function typedSignatureFrom<T>(value: unknown): TypedSignature<T> {
  const obj = expectKeys(value, ['signature', 'signer'], 'typed signature');
  return Object.freeze({
    signature: signatureFrom(obj['signature']),
    signer: publicKeyFrom(obj['signer']),
  });
}

// ─── Decoders ─────────────────────────────────────────────────────────────────

/**
 * Decode a public key from its canonical text, a JSON string of 64 hex
 * characters.
 *
 * @example
 * ```typescript
 * decodePublicKey('"' + 'ab'.repeat(32) + '"', Roles.delegationDelegatee);
 * ```
 */
export function decodePublicKey(text: string, role: Role): PublicKey {
  return withRole(role, () => publicKeyFrom(parseJson(text)));
}

/** Decode a signature from a JSON string of 128 hex characters. */
export function decodeSignature(text: string, role: Role): Signature {
  return withRole(role, () => signatureFrom(parseJson(text)));
}

/**
 * Decode a proof: `{"signature":"<128 hex>","signer":"<64 hex>"}`.
 *
 * The payload type `T` is fixed by the caller; the bytes are checked
 * against it only when the proof is verified.
 */
export function decodeTypedSignature<T>(text: string, role: Role): TypedSignature<T> {
  return withRole(role, () => typedSignatureFrom<T>(parseJson(text)));
}

/**
 * Decode a finalization proof:
 * `{"round":<int>,"signatures":[{"signature":…,"signer":…}, …]}`.
 */
export function decodeFinalizationProof(
  text: string,
  role: Role = Roles.finalizationProof,
): FinalizationProof {
  return withRole(role, () => {
    const obj = expectKeys(parseJson(text), ['round', 'signatures'], 'finalization proof');
    const round = obj['round'];
    if (!isNonNegativeSafeInteger(round)) {
      throw new ShapeError('round must be a non-negative integer');
    }
    const signatures = obj['signatures'];
    if (!Array.isArray(signatures)) {
      throw new ShapeError('signatures must be an array');
    }
    return Object.freeze({
      round,
      signatures: Object.freeze(signatures.map((s) => typedSignatureFrom<FinalizationSignTarget>(s))),
    });
  });
}

/** Decode a governance flag: exactly `true` or `false`. */
export function decodeGovernance(text: string, role: Role = Roles.delegationGovernance): boolean {
  if (text === 'true') return true;
  if (text === 'false') return false;
  return fail(role, new ShapeError(`expected "true" or "false", got "${text}"`));
}

/** Decode a block height: a non-negative integer in decimal. */
export function decodeBlockHeight(text: string, role: Role = Roles.targetHeight): number {
  if (!/^\d+$/.test(text)) {
    return fail(role, new ShapeError(`expected a non-negative integer, got "${text}"`));
  }
  const height = Number(text);
  if (!Number.isSafeInteger(height)) {
    return fail(role, new ShapeError(`${text} is too large`));
  }
  return height;
}

/** Decode the agenda commit hash a vote is cast on (40 hex characters). */
export function decodeVoteTarget(text: string): CommitHash {
  return withRole(Roles.voteTarget, () => decodeCommitHash(text));
}

/** Decode the block commit hash to veto (40 hex characters). */
export function decodeVetoTarget(text: string): CommitHash {
  return withRole(Roles.vetoTarget, () => decodeCommitHash(text));
}

// ─── Encoders ─────────────────────────────────────────────────────────────────

/** Canonical text of a public key, accepted by {@link decodePublicKey}. */
export function encodePublicKey(key: PublicKey): string {
  return JSON.stringify(key.toHex());
}

/** Canonical text of a proof, accepted by {@link decodeTypedSignature}. */
export function encodeTypedSignature<T>(typed: TypedSignature<T>): string {
  return JSON.stringify({ signature: typed.signature.toHex(), signer: typed.signer.toHex() });
}

/** Canonical text of a finalization proof. */
export function encodeFinalizationProof(proof: FinalizationProof): string {
  return JSON.stringify({
    round: proof.round,
    signatures: proof.signatures.map((s) => ({ signature: s.signature.toHex(), signer: s.signer.toHex() })),
  });
}
