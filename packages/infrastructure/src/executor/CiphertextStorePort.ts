import type { EncryptedType } from '@cipherledger/domain';

export type StoredCiphertext = Readonly<{
  handle: string;
  type: EncryptedType;
  /** AES-GCM ciphertext of the encoded plaintext, bound to the handle. */
  ciphertext: Uint8Array;
}>;

/**
 * Arena of ciphertexts addressed by handle. Entries are write-once; only
 * transient results are ever deleted.
 */
export interface CiphertextStorePort {
  put(entry: StoredCiphertext): Promise<void>;
  get(handle: string): Promise<StoredCiphertext | null>;
  delete(handles: readonly string[]): Promise<void>;
}
