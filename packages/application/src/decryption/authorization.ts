import { UserAddress } from '@cipherledger/domain';
import type { CryptoServicePort } from '../shared/ports/CryptoServicePort';

export const SECONDS_PER_DAY = 86_400;

const AUTHORIZATION_DOMAIN = 'cipherledger/user-decryption/v1';

/**
 * What a holder signs to let the re-encryption service seal values to a
 * short-lived session key.
 */
export type UserDecryptionAuthorization = Readonly<{
  /** Raw P-256 ECDH public key of the session. */
  sessionPublicKey: Uint8Array;
  /** Ledger systems whose ciphertexts this authorization covers. */
  systemAddresses: readonly string[];
  /** Unix seconds from which the authorization is valid. */
  startTimestamp: number;
  durationDays: number;
}>;

/**
 * Canonical byte form of an authorization. Signer and verifier must both
 * produce exactly these bytes.
 */
export function encodeAuthorization(authorization: UserDecryptionAuthorization): Uint8Array {
  const lines = [
    AUTHORIZATION_DOMAIN,
    `session:${Buffer.from(authorization.sessionPublicKey).toString('base64')}`,
    `systems:${authorization.systemAddresses.map((a) => a.toLowerCase()).join(',')}`,
    `start:${authorization.startTimestamp}`,
    `days:${authorization.durationDays}`,
  ];
  return new TextEncoder().encode(lines.join('\n'));
}

export function authorizationExpiresAt(authorization: UserDecryptionAuthorization): number {
  return authorization.startTimestamp + authorization.durationDays * SECONDS_PER_DAY;
}

/**
 * Address of the holder of an ECDSA public key: the last 20 bytes of its
 * SHA-256 digest.
 */
export async function deriveAddress(crypto: CryptoServicePort, publicKey: Uint8Array): Promise<UserAddress> {
  const digest = await crypto.digest(publicKey);
  return UserAddress.fromBytes(digest.slice(digest.length - 20));
}
