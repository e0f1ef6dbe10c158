import { CiphertextHandle } from '@cipherledger/domain';
import type { EncryptedComputePort } from '../../../src/ledger/ports/EncryptedComputePort';
import type { InputVerifierPort, InputVerificationRequest } from '../../../src/ledger/ports/InputVerifierPort';
import { InvalidProofError } from '../../../src/errors/ledgerErrors';
import type { TypedPlaintext } from '../../../src/decryption/plaintextCodec';
import type { DecryptionOraclePort } from '../../../src/decryption/ports/DecryptionOraclePort';

const U32 = 2 ** 32;

/**
 * Plaintext-backed executor for handler tests. Handles are sequential; the
 * "ciphertext" is the number kept beside it.
 */
export class FakeEncryptedCompute implements EncryptedComputePort, InputVerifierPort, DecryptionOraclePort {
  private readonly values = new Map<string, TypedPlaintext>();
  private readonly pendingInputs = new Map<string, { value: number; proof: string; submitter: string }>();
  private counter = 0;
  readonly operations: string[] = [];

  /** Register an externally encrypted input the verifier will accept. */
  submitInput(value: number, submitter: string): { handle: string; inputProof: Uint8Array } {
    const handle = this.nextHandle();
    const proof = `proof:${handle.value}:${submitter.toLowerCase()}`;
    this.pendingInputs.set(handle.value, { value, proof, submitter: submitter.toLowerCase() });
    return { handle: handle.value, inputProof: new TextEncoder().encode(proof) };
  }

  async verify(request: InputVerificationRequest): Promise<CiphertextHandle> {
    const pending = this.pendingInputs.get(request.handle.value);
    const proof = new TextDecoder().decode(request.inputProof);
    if (!pending || pending.proof !== proof || pending.submitter !== request.submitter.value) {
      throw new InvalidProofError();
    }
    this.operations.push('verify');
    return this.store({ type: 'euint32', value: pending.value });
  }

  async add(a: CiphertextHandle, b: CiphertextHandle): Promise<CiphertextHandle> {
    this.operations.push('add');
    return this.store({ type: 'euint32', value: (this.read(a) + this.read(b)) % U32 });
  }

  async divideByScalar(a: CiphertextHandle, divisor: number): Promise<CiphertextHandle> {
    this.operations.push('div');
    return this.store({ type: 'euint32', value: Math.floor(this.read(a) / divisor) });
  }

  async greaterOrEqual(a: CiphertextHandle, scalar: number): Promise<CiphertextHandle> {
    this.operations.push('ge');
    return this.store({ type: 'ebool', value: this.read(a) >= scalar ? 1 : 0 });
  }

  async lessOrEqual(a: CiphertextHandle, scalar: number): Promise<CiphertextHandle> {
    this.operations.push('le');
    return this.store({ type: 'ebool', value: this.read(a) <= scalar ? 1 : 0 });
  }

  async and(a: CiphertextHandle, b: CiphertextHandle): Promise<CiphertextHandle> {
    this.operations.push('and');
    return this.store({ type: 'ebool', value: this.read(a) & this.read(b) });
  }

  async revealBoolean(handle: CiphertextHandle): Promise<boolean> {
    this.operations.push('reveal');
    return this.read(handle) === 1;
  }

  async discard(handles: readonly CiphertextHandle[]): Promise<void> {
    this.operations.push('discard');
    for (const handle of handles) {
      this.values.delete(handle.value);
    }
  }

  has(handle: CiphertextHandle): boolean {
    return this.values.has(handle.value);
  }

  async decrypt(handle: CiphertextHandle): Promise<TypedPlaintext> {
    const value = this.values.get(handle.value);
    if (!value) throw new Error(`Unknown handle ${handle.value}`);
    return value;
  }

  plaintextOf(handle: CiphertextHandle | string): number {
    return this.read(typeof handle === 'string' ? CiphertextHandle.from(handle) : handle);
  }

  private read(handle: CiphertextHandle): number {
    const value = this.values.get(handle.value);
    if (!value) throw new Error(`Unknown handle ${handle.value}`);
    return value.value;
  }

  private store(value: TypedPlaintext): CiphertextHandle {
    const handle = this.nextHandle();
    this.values.set(handle.value, value);
    return handle;
  }

  private nextHandle(): CiphertextHandle {
    this.counter += 1;
    return CiphertextHandle.from(`0x${this.counter.toString(16).padStart(64, '0')}`);
  }
}
