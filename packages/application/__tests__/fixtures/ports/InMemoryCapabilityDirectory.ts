import type { CiphertextHandle, UserAddress } from '@cipherledger/domain';
import type { CapabilityDirectoryPort } from '../../../src/ledger/ports/CapabilityDirectoryPort';

export class InMemoryCapabilityDirectory implements CapabilityDirectoryPort {
  private readonly grants = new Set<string>();

  async grant(handle: CiphertextHandle, principals: readonly UserAddress[]): Promise<void> {
    for (const principal of principals) {
      this.grants.add(`${handle.value}:${principal.value}`);
    }
  }

  async mayDecrypt(handle: CiphertextHandle, principal: UserAddress): Promise<boolean> {
    return this.grants.has(`${handle.value}:${principal.value}`);
  }

  get size(): number {
    return this.grants.size;
  }
}
