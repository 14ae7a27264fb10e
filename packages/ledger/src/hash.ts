/**
 * Hash codec: hexadecimal text to and from the two fixed-length hash kinds.
 *
 * A commit hash (20 bytes) addresses a unit of ledger history; a Hash256
 * (32 bytes) is the general-purpose digest. Handing one where the other is
 * expected is an input error, never a coincidence of types.
 *
 * @packageDocumentation
 */

import { sha256 } from '@tessera/crypto';

import { FixedBytes, decodeHexBytes } from './bytes';

/** 20-byte identifier of a commit. */
export class CommitHash extends FixedBytes {
  static readonly LENGTH = 20;
  readonly kind = 'commit-hash' as const;

  constructor(bytes: Uint8Array) {
    super(bytes, CommitHash.LENGTH, 'commit hash');
  }
}

/** 32-byte general-purpose hash. */
export class Hash256 extends FixedBytes {
  static readonly LENGTH = 32;
  readonly kind = 'hash256' as const;

  constructor(bytes: Uint8Array) {
    super(bytes, Hash256.LENGTH, 'hash');
  }

  /** SHA-256 of `data`. */
  static digest(data: Uint8Array): Hash256 {
    return new Hash256(sha256(data));
  }
}

/**
 * Decode a commit hash from 40 hex characters.
 *
 * @throws {InputError} `INVALID_HASH` or `WRONG_LENGTH`.
 *
 * @example
 * ```typescript
 * decodeCommitHash('00'.repeat(20)).toHex(); // '0000…00'
 * decodeCommitHash('abc');                    // throws WRONG_LENGTH
 * ```
 */
export function decodeCommitHash(text: string, field: string = 'commit hash'): CommitHash {
  return new CommitHash(decodeHexBytes(text, CommitHash.LENGTH, field));
}

/**
 * Decode a Hash256 from 64 hex characters.
 *
 * @throws {InputError} `INVALID_HASH` or `WRONG_LENGTH`.
 */
export function decodeHash256(text: string, field: string = 'hash'): Hash256 {
  return new Hash256(decodeHexBytes(text, Hash256.LENGTH, field));
}
