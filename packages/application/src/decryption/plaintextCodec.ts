import { EncryptedTypes, encryptedTypeCode, encryptedTypeFromCode, type EncryptedType } from '@cipherledger/domain';

export type TypedPlaintext = Readonly<{
  type: EncryptedType;
  value: number;
}>;

const ENCODED_LENGTH = 5;
const U32_MAX = 0xffffffff;

/**
 * `[type code (1) | value as big-endian u32 (4)]`. Booleans travel as 0 or 1.
 */
export function encodePlaintext(plaintext: TypedPlaintext): Uint8Array {
  const { type, value } = plaintext;
  if (!Number.isInteger(value) || value < 0 || value > U32_MAX) {
    throw new Error(`Plaintext must be an unsigned 32-bit integer, got ${value}`);
  }
  if (type === EncryptedTypes.ebool && value > 1) {
    throw new Error(`Boolean plaintext must be 0 or 1, got ${value}`);
  }
  const out = new Uint8Array(ENCODED_LENGTH);
  out[0] = encryptedTypeCode(type);
  new DataView(out.buffer).setUint32(1, value, false);
  return out;
}

export function decodePlaintext(bytes: Uint8Array): TypedPlaintext {
  if (bytes.length !== ENCODED_LENGTH) {
    throw new Error(`Encoded plaintext must be ${ENCODED_LENGTH} bytes, got ${bytes.length}`);
  }
  const type = encryptedTypeFromCode(bytes[0]);
  if (!type) {
    throw new Error(`Unknown encrypted type code ${bytes[0]}`);
  }
  const value = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getUint32(1, false);
  if (type === EncryptedTypes.ebool && value > 1) {
    throw new Error(`Boolean plaintext must be 0 or 1, got ${value}`);
  }
  return { type, value };
}
