import { describe, it, expect } from 'vitest';
import { keyPairFromPrivateKey, toHex } from '@tessera/crypto';
import { CryptoError, ErrorCode } from '@tessera/types';
import {
  DelegationTarget,
  UndelegationTarget,
  FinalizationTarget,
  signingMessage,
  signTyped,
  verifyTyped,
  signHash,
  verifyHash,
} from './signer';
import { Hash256 } from './hash';
import { buildDelegationData, buildUndelegationData } from './transaction';
import type { DelegationTransactionData, UndelegationTransactionData } from './transaction';
import { PublicKey } from './values';
import type { TypedSignature } from './values';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const PRIVATE_KEY = new Uint8Array(32).fill(7);
const OTHER_KEY = new Uint8Array(32).fill(9);
const DELEGATEE = new PublicKey(new Uint8Array(32).fill(0xbb));

async function publicKeyOf(privateKey: Uint8Array): Promise<PublicKey> {
  return new PublicKey((await keyPairFromPrivateKey(privateKey)).publicKey);
}

async function delegation(blockHeight: number, timestamp: number): Promise<DelegationTransactionData> {
  const delegator = await publicKeyOf(PRIVATE_KEY);
  return buildDelegationData({ delegator, delegatee: DELEGATEE, governance: true, blockHeight }, () => timestamp);
}

// ---------------------------------------------------------------------------
// signingMessage
// ---------------------------------------------------------------------------
describe('signingMessage', () => {
  it('is the canonical JSON of kind and payload', async () => {
    const delegator = new PublicKey(new Uint8Array(32).fill(0xaa));
    const data = buildUndelegationData({ delegator, blockHeight: 5 }, () => 1000);
    const text = new TextDecoder().decode(signingMessage(UndelegationTarget, data));
    expect(text).toBe(`{"kind":"undelegation","payload":{"blockHeight":5,"delegator":"${'aa'.repeat(32)}","timestamp":1000}}`);
  });

  it('writes hashes in finalization targets as hex', () => {
    const blockHash = new Hash256(new Uint8Array(32));
    const text = new TextDecoder().decode(signingMessage(FinalizationTarget, { blockHash, round: 2 }));
    expect(text).toBe(`{"kind":"finalization","payload":{"blockHash":"${'00'.repeat(32)}","round":2}}`);
  });
});

// ---------------------------------------------------------------------------
// signTyped / verifyTyped
// ---------------------------------------------------------------------------
describe('signTyped', () => {
  it('signs a delegation that verifies for the same payload', async () => {
    const data = await delegation(10, 1000);
    const proof = await signTyped(DelegationTarget, data, PRIVATE_KEY);
    expect(proof.signature.length).toBe(64);
    expect(await verifyTyped(DelegationTarget, data, proof)).toBe(true);
  });

  it('names the signer derived from the private key', async () => {
    const data = await delegation(10, 1000);
    const proof = await signTyped(DelegationTarget, data, PRIVATE_KEY);
    expect(proof.signer.equals(await publicKeyOf(PRIVATE_KEY))).toBe(true);
    expect(Object.isFrozen(proof)).toBe(true);
  });

  it('is deterministic for identical payloads', async () => {
    const a = await signTyped(DelegationTarget, await delegation(10, 1000), PRIVATE_KEY);
    const b = await signTyped(DelegationTarget, await delegation(10, 1000), PRIVATE_KEY);
    expect(a.signature.toHex()).toBe(b.signature.toHex());
  });

  it('differs when only the timestamp differs', async () => {
    const a = await signTyped(DelegationTarget, await delegation(10, 1000), PRIVATE_KEY);
    const b = await signTyped(DelegationTarget, await delegation(10, 1001), PRIVATE_KEY);
    expect(a.signature.toHex()).not.toBe(b.signature.toHex());
  });

  it('differs when only the block height differs', async () => {
    const a = await signTyped(DelegationTarget, await delegation(10, 1000), PRIVATE_KEY);
    const b = await signTyped(DelegationTarget, await delegation(11, 1000), PRIVATE_KEY);
    expect(a.signature.toHex()).not.toBe(b.signature.toHex());
  });

  it('fails with SIGNING_FAILED for a key of the wrong size', async () => {
    const data = await delegation(10, 1000);
    const error = await signTyped(DelegationTarget, data, new Uint8Array(12)).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(CryptoError);
    expect(error).toMatchObject({
      code: ErrorCode.SIGNING_FAILED,
      message: 'failed to sign: sign() expects a 32-byte private key, got 12 bytes',
    });
  });
});

describe('verifyTyped', () => {
  it('rejects a delegation proof checked as an undelegation with the same fields', async () => {
    const data = await delegation(10, 1000);
    const proof = await signTyped(DelegationTarget, data, PRIVATE_KEY);
    const undelegation: UndelegationTransactionData = {
      delegator: data.delegator,
      blockHeight: data.blockHeight,
      timestamp: data.timestamp,
    };
    const reused: TypedSignature<UndelegationTransactionData> = {
      signature: proof.signature,
      signer: proof.signer,
    };
    expect(await verifyTyped(UndelegationTarget, undelegation, reused)).toBe(false);
  });

  it('rejects a proof for a different payload', async () => {
    const proof = await signTyped(DelegationTarget, await delegation(10, 1000), PRIVATE_KEY);
    expect(await verifyTyped(DelegationTarget, await delegation(10, 2000), proof)).toBe(false);
  });

  it('rejects a proof naming the wrong signer', async () => {
    const data = await delegation(10, 1000);
    const proof = await signTyped(DelegationTarget, data, PRIVATE_KEY);
    const forged = { signature: proof.signature, signer: await publicKeyOf(OTHER_KEY) };
    expect(await verifyTyped(DelegationTarget, data, forged)).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// signHash / verifyHash
// ---------------------------------------------------------------------------
describe('signHash', () => {
  it('signs the raw 32 bytes of a hash', async () => {
    const hash = Hash256.digest(new TextEncoder().encode('agenda'));
    const signature = await signHash(hash, PRIVATE_KEY);
    const signer = await publicKeyOf(PRIVATE_KEY);
    expect(await verifyHash(hash, signature, signer)).toBe(true);
    expect(toHex(signature.bytes)).toHaveLength(128);
  });

  it('does not verify against another hash', async () => {
    const signature = await signHash(new Hash256(new Uint8Array(32)), PRIVATE_KEY);
    const signer = await publicKeyOf(PRIVATE_KEY);
    expect(await verifyHash(new Hash256(new Uint8Array(32).fill(1)), signature, signer)).toBe(false);
  });
});
