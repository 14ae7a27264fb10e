/**
 * Type-bound signing.
 *
 * A payload is never signed bare: the signed message is the canonical JSON
 * of `{ kind, payload }`, where `kind` names the payload type. A signature
 * made for one kind therefore fails verification for every other kind, even
 * when the field values happen to line up.
 *
 * Signing is offline. It needs only a payload and a private key.
 *
 * @packageDocumentation
 */

import { canonicalizeJson, keyPairFromPrivateKey, sign, verify } from '@tessera/crypto';
import { CryptoError, ErrorCode, TesseraError } from '@tessera/types';

import type { Hash256 } from './hash';
import type { DelegationTransactionData, UndelegationTransactionData } from './transaction';
import { PublicKey, Signature } from './values';
import type { FinalizationSignTarget, TypedSignature } from './values';

/** A named payload type and how it is laid out for signing. */
export interface SignTarget<T> {
  readonly kind: string;
  /** JSON-compatible view of the payload; byte strings print as hex. */
  encode(payload: T): unknown;
}

export const DelegationTarget: SignTarget<DelegationTransactionData> = {
  kind: 'delegation',
  encode: (data) => ({
    delegator: data.delegator,
    delegatee: data.delegatee,
    governance: data.governance,
    blockHeight: data.blockHeight,
    timestamp: data.timestamp,
  }),
};

export const UndelegationTarget: SignTarget<UndelegationTransactionData> = {
  kind: 'undelegation',
  encode: (data) => ({
    delegator: data.delegator,
    blockHeight: data.blockHeight,
    timestamp: data.timestamp,
  }),
};

export const FinalizationTarget: SignTarget<FinalizationSignTarget> = {
  kind: 'finalization',
  encode: (target) => ({ blockHash: target.blockHash, round: target.round }),
};

/** The exact bytes signed for `payload` under `target`. */
export function signingMessage<T>(target: SignTarget<T>, payload: T): Uint8Array {
  return new TextEncoder().encode(canonicalizeJson({ kind: target.kind, payload: target.encode(payload) }));
}

async function signBytes(message: Uint8Array, privateKey: Uint8Array): Promise<Signature> {
  try {
    return new Signature(await sign(message, privateKey));
  } catch (err) {
    if (err instanceof TesseraError) {
      throw new CryptoError(ErrorCode.SIGNING_FAILED, `failed to sign: ${err.message}`, { cause: err, hint: err.hint });
    }
    throw err;
  }
}

/**
 * Sign `payload` as a value of the kind described by `target`.
 *
 * @throws {CryptoError} `SIGNING_FAILED` when the key material is unusable.
 *
 * @example
 * ```typescript
 * const proof = await signTyped(DelegationTarget, data, config.privateKey);
 * await verifyTyped(DelegationTarget, data, proof); // true
 * ```
 */
export async function signTyped<T>(
  target: SignTarget<T>,
  payload: T,
  privateKey: Uint8Array,
): Promise<TypedSignature<T>> {
  const signature = await signBytes(signingMessage(target, payload), privateKey);
  const { publicKey } = await keyPairFromPrivateKey(privateKey);
  return Object.freeze({ signature, signer: new PublicKey(publicKey) });
}

/** Check a typed signature against `payload` and the signer it names. */
export async function verifyTyped<T>(
  target: SignTarget<T>,
  payload: T,
  typed: TypedSignature<T>,
): Promise<boolean> {
  return verify(signingMessage(target, payload), typed.signature.bytes, typed.signer.bytes);
}

/**
 * Sign a raw 32-byte digest. No payload kind is mixed in: the hash is
 * already the message.
 *
 * @throws {CryptoError} `SIGNING_FAILED` when the key material is unusable.
 */
export async function signHash(hash: Hash256, privateKey: Uint8Array): Promise<Signature> {
  return signBytes(hash.bytes, privateKey);
}

/** Verify a signature made by {@link signHash}. */
export async function verifyHash(hash: Hash256, signature: Signature, signer: PublicKey): Promise<boolean> {
  return verify(hash.bytes, signature.bytes, signer.bytes);
}
