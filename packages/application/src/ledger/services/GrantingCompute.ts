import type { CiphertextHandle, UserAddress } from '@cipherledger/domain';
import type { CapabilityDirectoryPort } from '../ports/CapabilityDirectoryPort';
import type { EncryptedComputePort } from '../ports/EncryptedComputePort';

/**
 * Executor facade bound to one owner: every handle it returns has already
 * been granted to the hosting system and that owner.
 */
export class GrantingCompute {
  private readonly principals: readonly UserAddress[];

  constructor(
    private readonly compute: EncryptedComputePort,
    private readonly directory: CapabilityDirectoryPort,
    system: UserAddress,
    owner: UserAddress
  ) {
    this.principals = owner.equals(system) ? [system] : [system, owner];
  }

  async adopt(handle: CiphertextHandle): Promise<CiphertextHandle> {
    await this.directory.grant(handle, this.principals);
    return handle;
  }

  async add(a: CiphertextHandle, b: CiphertextHandle): Promise<CiphertextHandle> {
    return this.adopt(await this.compute.add(a, b));
  }

  async divideByScalar(a: CiphertextHandle, divisor: number): Promise<CiphertextHandle> {
    return this.adopt(await this.compute.divideByScalar(a, divisor));
  }
}
