import { constantTimeEqual, fromHex, toHex } from '@tessera/crypto';
import { ErrorCode, InputError } from '@tessera/types';

const HEX_CHARS = /^[0-9a-fA-F]*$/;

/**
 * Decode hex text that must encode exactly `length` bytes.
 *
 * Characters are checked before length, so text with a `g` or a space is
 * always `INVALID_HASH` and any other miscount (odd, empty, too long) is
 * `WRONG_LENGTH`.
 *
 * @param field - Role of the value, used in error messages.
 */
export function decodeHexBytes(text: string, length: number, field: string): Uint8Array {
  if (!HEX_CHARS.test(text)) {
    throw new InputError(
      ErrorCode.INVALID_HASH,
      `invalid ${field}: contains non-hexadecimal characters`,
      field,
      { hint: 'Use plain hexadecimal (0-9, a-f) without a 0x prefix or separators.' },
    );
  }
  if (text.length !== length * 2) {
    throw new InputError(
      ErrorCode.WRONG_LENGTH,
      `a ${field} must be ${length} bytes (${length * 2} hex characters), got ${text.length} characters`,
      field,
      { context: { expected: length * 2, actual: text.length } },
    );
  }
  return fromHex(text, field);
}

/**
 * Immutable fixed-length byte string.
 *
 * The bytes are copied on the way in and out. Subclasses add a literal
 * `kind` so that two byte strings of different purpose never type-check
 * as each other.
 */
export abstract class FixedBytes {
  readonly #bytes: Uint8Array;

  protected constructor(bytes: Uint8Array, length: number, name: string) {
    if (bytes.length !== length) {
      throw new InputError(
        ErrorCode.WRONG_LENGTH,
        `a ${name} must be ${length} bytes, got ${bytes.length}`,
        name,
      );
    }
    this.#bytes = new Uint8Array(bytes);
  }

  /** A copy of the underlying bytes. */
  get bytes(): Uint8Array {
    return new Uint8Array(this.#bytes);
  }

  get length(): number {
    return this.#bytes.length;
  }

  /** Byte-wise equality; values of different classes are never equal. */
  equals(other: FixedBytes): boolean {
    return other.constructor === this.constructor && constantTimeEqual(this.#bytes, other.#bytes);
  }

  toHex(): string {
    return toHex(this.#bytes);
  }

  toString(): string {
    return this.toHex();
  }

  toJSON(): string {
    return this.toHex();
  }
}
