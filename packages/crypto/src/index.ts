import * as ed from '@noble/ed25519';
import { sha256 as nobleSha256 } from '@noble/hashes/sha256';
import { CryptoError, ErrorCode, InputError } from '@tessera/types';

export type { KeyPair, PrivateKeyBytes, PublicKeyBytes, SignatureBytes } from './types';
export { PRIVATE_KEY_LENGTH, PUBLIC_KEY_LENGTH, SIGNATURE_LENGTH } from './types';

import type { KeyPair, PrivateKeyBytes, SignatureBytes } from './types';
import { PRIVATE_KEY_LENGTH } from './types';

function assertPrivateKey(privateKey: Uint8Array, caller: string): void {
  if (!(privateKey instanceof Uint8Array) || privateKey.length !== PRIVATE_KEY_LENGTH) {
    throw new CryptoError(
      ErrorCode.INVALID_KEY,
      `${caller} expects a 32-byte private key, got ${privateKey instanceof Uint8Array ? `${privateKey.length} bytes` : typeof privateKey}`,
      { hint: 'Provide the 32-byte Ed25519 private key from config.json.' }
    );
  }
}

/**
 * Reconstruct a KeyPair from an existing private key.
 *
 * The input is copied so the caller's array is not retained.
 */
export async function keyPairFromPrivateKey(privateKey: Uint8Array): Promise<KeyPair> {
  assertPrivateKey(privateKey, 'keyPairFromPrivateKey()');
  const publicKey = await ed.getPublicKeyAsync(privateKey);
  return {
    privateKey: new Uint8Array(privateKey),
    publicKey,
    publicKeyHex: toHex(publicKey),
  };
}

/**
 * Sign arbitrary bytes with an Ed25519 private key.
 *
 * @returns A 64-byte Ed25519 signature.
 * @throws {CryptoError} `INVALID_KEY` for a key of the wrong size,
 *   `SIGNING_FAILED` when the primitive rejects the key.
 */
export async function sign(message: Uint8Array, privateKey: PrivateKeyBytes): Promise<SignatureBytes> {
  assertPrivateKey(privateKey, 'sign()');
  try {
    return await ed.signAsync(message, privateKey);
  } catch (err) {
    throw new CryptoError(
      ErrorCode.SIGNING_FAILED,
      `Ed25519 signing operation failed: ${err instanceof Error ? err.message : String(err)}`,
      { hint: 'Ensure the private key is a valid 32-byte Ed25519 key.', cause: err instanceof Error ? err : undefined }
    );
  }
}

/**
 * Verify an Ed25519 signature against a message and public key.
 *
 * Safe to call with untrusted inputs: any internal error (malformed key,
 * truncated signature) returns `false`.
 */
export async function verify(
  message: Uint8Array,
  signature: SignatureBytes,
  publicKey: Uint8Array
): Promise<boolean> {
  try {
    return await ed.verifyAsync(signature, message, publicKey);
  } catch {
    return false;
  }
}

/** SHA-256 digest of arbitrary bytes. */
export function sha256(data: Uint8Array): Uint8Array {
  return nobleSha256(data);
}

/**
 * Deterministic JSON serialization (sorted keys, RFC 8785 style).
 *
 * Byte arrays are written as lowercase hex strings and objects exposing
 * `toJSON()` are serialized through it, so domain values canonicalize the
 * same way they print.
 *
 * @example
 * ```typescript
 * canonicalizeJson({ z: 1, a: 2 }); // '{"a":2,"z":1}'
 * ```
 */
export function canonicalizeJson(obj: unknown): string {
  return JSON.stringify(sortKeys(obj));
}

function hasToJSON(value: object): value is { toJSON(): unknown } {
  return 'toJSON' in value && typeof value.toJSON === 'function';
}

function sortKeys(value: unknown): unknown {
  if (value === null || value === undefined) {
    return value;
  }
  if (value instanceof Uint8Array) {
    return toHex(value);
  }
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (typeof value === 'object') {
    if (hasToJSON(value)) {
      return sortKeys(value.toJSON());
    }
    const sorted: Record<string, unknown> = {};
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [key, v] of entries) {
      if (v !== undefined) {
        sorted[key] = sortKeys(v);
      }
    }
    return sorted;
  }
  return value;
}

/**
 * Encode a byte array to a lowercase hex string.
 *
 * @example
 * ```typescript
 * toHex(new Uint8Array([255, 0])); // 'ff00'
 * ```
 */
export function toHex(data: Uint8Array): string {
  let hex = '';
  for (const byte of data) {
    hex += byte.toString(16).padStart(2, '0');
  }
  return hex;
}

/**
 * Decode a hex string to a byte array.
 *
 * @param field - Role of the value, used in error messages.
 * @throws {InputError} `INVALID_HASH` on a non-hex character,
 *   `WRONG_LENGTH` on an odd number of characters.
 *
 * @example
 * ```typescript
 * fromHex('ff00'); // Uint8Array [255, 0]
 * ```
 */
export function fromHex(hex: string, field: string = 'hex'): Uint8Array {
  if (!/^[0-9a-fA-F]*$/.test(hex)) {
    throw new InputError(
      ErrorCode.INVALID_HASH,
      `invalid ${field}: contains non-hexadecimal characters`,
      field,
      { hint: 'Hex strings must only contain characters 0-9 and a-f (case-insensitive), without a 0x prefix.' }
    );
  }
  if (hex.length % 2 !== 0) {
    throw new InputError(
      ErrorCode.WRONG_LENGTH,
      `invalid ${field}: odd number of hex characters (${hex.length})`,
      field
    );
  }
  const bytes = new Uint8Array(hex.length / 2);
  for (let i = 0; i < hex.length; i += 2) {
    bytes[i / 2] = parseInt(hex.substring(i, i + 2), 16);
  }
  return bytes;
}

/**
 * Constant-time comparison of two byte arrays.
 *
 * Always examines every byte even if a mismatch is found early.
 */
export function constantTimeEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }
  let diff = 0;
  for (let i = 0; i < a.length; i++) {
    diff |= (a[i] ?? 0) ^ (b[i] ?? 0);
  }
  return diff === 0;
}
