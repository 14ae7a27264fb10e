/** Raw 32-byte Ed25519 private key */
export type PrivateKeyBytes = Uint8Array;

/** Raw 32-byte Ed25519 public key */
export type PublicKeyBytes = Uint8Array;

/** 64-byte Ed25519 signature */
export type SignatureBytes = Uint8Array;

/** A key pair for signing and verification */
export interface KeyPair {
  /** 32-byte private key */
  privateKey: PrivateKeyBytes;
  /** 32-byte public key */
  publicKey: PublicKeyBytes;
  /** Hex-encoded public key for display/storage */
  publicKeyHex: string;
}

/** Byte lengths fixed by Ed25519. */
export const PRIVATE_KEY_LENGTH = 32;
export const PUBLIC_KEY_LENGTH = 32;
export const SIGNATURE_LENGTH = 64;
