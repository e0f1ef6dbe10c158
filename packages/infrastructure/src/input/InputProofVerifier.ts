import {
  InvalidProofError,
  type CryptoServicePort,
  type InputVerificationRequest,
  type InputVerifierPort,
} from '@cipherledger/application';
import type { CiphertextHandle, UserAddress } from '@cipherledger/domain';
import type { LocalFheExecutor } from '../executor/LocalFheExecutor';
import { decodeInputProof, inputBinding, inputHandle, type InputProof } from './inputProof';

/**
 * Accepts an external input only if its proof names this system and the
 * submitting principal and commits to the presented handle.
 */
export class InputProofVerifier implements InputVerifierPort {
  constructor(
    private readonly crypto: CryptoServicePort,
    private readonly executor: LocalFheExecutor,
    private readonly systemAddress: UserAddress
  ) {}

  async verify(request: InputVerificationRequest): Promise<CiphertextHandle> {
    if (request.inputProof.length === 0) {
      throw new InvalidProofError('Input proof is empty');
    }

    const proof = this.decode(request.inputProof);
    if (!proof.system.equals(this.systemAddress)) {
      throw new InvalidProofError('Input proof is bound to another system');
    }
    if (!proof.submitter.equals(request.submitter)) {
      throw new InvalidProofError('Input proof is bound to another submitter');
    }

    for (const [index, envelope] of proof.envelopes.entries()) {
      const binding = inputBinding(proof.system, proof.submitter, index);
      const committed = await inputHandle(this.crypto, envelope, binding);
      if (!committed.equals(request.handle)) {
        continue;
      }
      try {
        await this.executor.ingestExternal(committed, envelope, binding);
      } catch {
        throw new InvalidProofError('Input ciphertext failed authentication');
      }
      return committed;
    }

    throw new InvalidProofError('Handle is not covered by the input proof');
  }

  private decode(bytes: Uint8Array): InputProof {
    try {
      return decodeInputProof(bytes);
    } catch (error) {
      const reason = error instanceof Error ? error.message : 'unreadable';
      throw new InvalidProofError(`Malformed input proof: ${reason}`);
    }
  }
}
