import type { CiphertextHandle } from '@cipherledger/domain';

/**
 * Homomorphic operations over handles held by the ciphertext executor.
 * Every operation yields a fresh handle; none reveals a plaintext except
 * `revealBoolean`, which is reserved to the hosting system.
 */
export interface EncryptedComputePort {
  /** Sum of two 32-bit ciphertexts, wrapping modulo 2^32. */
  add(a: CiphertextHandle, b: CiphertextHandle): Promise<CiphertextHandle>;
  /** Floor division of a 32-bit ciphertext by a plaintext divisor. */
  divideByScalar(a: CiphertextHandle, divisor: number): Promise<CiphertextHandle>;
  greaterOrEqual(a: CiphertextHandle, scalar: number): Promise<CiphertextHandle>;
  lessOrEqual(a: CiphertextHandle, scalar: number): Promise<CiphertextHandle>;
  and(a: CiphertextHandle, b: CiphertextHandle): Promise<CiphertextHandle>;
  revealBoolean(handle: CiphertextHandle): Promise<boolean>;
  /** Drop intermediates that were never handed out. */
  discard(handles: readonly CiphertextHandle[]): Promise<void>;
}
