import { PUBLIC_KEY_LENGTH, SIGNATURE_LENGTH } from '@tessera/crypto';

import { FixedBytes } from './bytes';
import type { Hash256 } from './hash';

/** 32-byte Ed25519 public key. */
export class PublicKey extends FixedBytes {
  static readonly LENGTH = PUBLIC_KEY_LENGTH;
  readonly kind = 'public-key' as const;

  constructor(bytes: Uint8Array) {
    super(bytes, PublicKey.LENGTH, 'public key');
  }
}

/** 64-byte Ed25519 signature. */
export class Signature extends FixedBytes {
  static readonly LENGTH = SIGNATURE_LENGTH;
  readonly kind = 'signature' as const;

  constructor(bytes: Uint8Array) {
    super(bytes, Signature.LENGTH, 'signature');
  }
}

declare const payloadType: unique symbol;

/**
 * A signature bound to the payload type it was computed over.
 *
 * `T` is carried by a phantom, invariant member, so a
 * `TypedSignature<DelegationTransactionData>` cannot be passed where a
 * `TypedSignature<UndelegationTransactionData>` is expected. At run time
 * the binding is enforced by the signer, which mixes the payload kind into
 * the signed bytes.
 */
export interface TypedSignature<T> {
  readonly signature: Signature;
  readonly signer: PublicKey;
  readonly [payloadType]?: (payload: T) => T;
}

/** What each validator signs to finalize a block. */
export interface FinalizationSignTarget {
  readonly blockHash: Hash256;
  readonly round: number;
}

/** Evidence that a block has been irreversibly agreed upon. */
export interface FinalizationProof {
  readonly round: number;
  readonly signatures: readonly TypedSignature<FinalizationSignTarget>[];
}
