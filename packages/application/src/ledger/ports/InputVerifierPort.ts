import type { CiphertextHandle, UserAddress } from '@cipherledger/domain';

export type InputVerificationRequest = Readonly<{
  handle: CiphertextHandle;
  inputProof: Uint8Array;
  submitter: UserAddress;
}>;

/**
 * Checks that an externally encrypted input was built for this system and
 * this submitter, and brings it into the executor.
 *
 * Rejects with InvalidProofError; never inspects the plaintext.
 */
export interface InputVerifierPort {
  verify(request: InputVerificationRequest): Promise<CiphertextHandle>;
}
