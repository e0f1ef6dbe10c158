/** 256-bit AES-GCM key material. */
export type SymmetricKey = Uint8Array;

export type KeyPair = Readonly<{
  publicKey: Uint8Array;
  privateKey: Uint8Array;
}>;

/**
 * Cryptographic primitives used by the Application layer.
 *
 * Implementations present a pure Uint8Array-based API. ECDH public keys are
 * raw uncompressed P-256 points (65 bytes), ECDSA public keys SPKI, private
 * keys PKCS#8.
 */
export interface CryptoServicePort {
  // Key generation
  generateKey(): Promise<SymmetricKey>;
  generateSigningKeyPair(): Promise<KeyPair>;
  generateEncryptionKeyPair(): Promise<KeyPair>;

  // AEAD encryption/decryption
  encrypt(plaintext: Uint8Array, key: SymmetricKey, aad?: Uint8Array): Promise<Uint8Array>;
  decrypt(ciphertext: Uint8Array, key: SymmetricKey, aad?: Uint8Array): Promise<Uint8Array>;

  // Public-key sealing (ECIES-style to the recipient's ECDH key)
  seal(plaintext: Uint8Array, recipientPublicKey: Uint8Array, aad?: Uint8Array): Promise<Uint8Array>;
  open(envelope: Uint8Array, recipientPrivateKey: Uint8Array, aad?: Uint8Array): Promise<Uint8Array>;

  // Signatures (ECDSA P-256)
  sign(data: Uint8Array, privateKey: Uint8Array): Promise<Uint8Array>;
  verify(data: Uint8Array, signature: Uint8Array, publicKey: Uint8Array): Promise<boolean>;

  // Hashing and key derivation
  digest(data: Uint8Array): Promise<Uint8Array>;
  deriveKey(masterKey: Uint8Array, context: string): Promise<SymmetricKey>;
}
