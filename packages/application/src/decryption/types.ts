import type { UserDecryptionAuthorization } from './authorization';

export type UserDecryptionRequest = Readonly<{
  handles: readonly string[];
  /** Address of the signing holder. */
  user: string;
  /** SPKI-encoded P-256 ECDSA public key the signature verifies under. */
  signerPublicKey: Uint8Array;
  signature: Uint8Array;
  authorization: UserDecryptionAuthorization;
}>;

/**
 * One value sealed to the session key, bound to its handle as associated data.
 */
export type SealedValue = Readonly<{
  handle: string;
  sealed: Uint8Array;
}>;

export type NetworkInfo = Readonly<{
  systemAddress: string;
  networkPublicKey: Uint8Array;
}>;
