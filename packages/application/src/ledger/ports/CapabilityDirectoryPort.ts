import type { CiphertextHandle, UserAddress } from '@cipherledger/domain';

/**
 * Which principals may ask for the plaintext behind a handle.
 * Grants are additive and never revoked.
 */
export interface CapabilityDirectoryPort {
  grant(handle: CiphertextHandle, principals: readonly UserAddress[]): Promise<void>;
  mayDecrypt(handle: CiphertextHandle, principal: UserAddress): Promise<boolean>;
}
