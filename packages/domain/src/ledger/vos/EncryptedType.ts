export const EncryptedTypes = {
  euint32: 'euint32',
  ebool: 'ebool',
} as const;

export type EncryptedType = (typeof EncryptedTypes)[keyof typeof EncryptedTypes];

const TYPE_CODES: Record<EncryptedType, number> = {
  euint32: 4,
  ebool: 0,
};

/** One-byte tag used when encoding a typed plaintext. */
export function encryptedTypeCode(type: EncryptedType): number {
  return TYPE_CODES[type];
}

export function encryptedTypeFromCode(code: number): EncryptedType | null {
  if (code === TYPE_CODES.euint32) return EncryptedTypes.euint32;
  if (code === TYPE_CODES.ebool) return EncryptedTypes.ebool;
  return null;
}
