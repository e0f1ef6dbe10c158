import type { CapabilityDirectoryPort } from '@cipherledger/application';
import type { CiphertextHandle, UserAddress } from '@cipherledger/domain';

/**
 * Grant table keyed by handle. Grants only accumulate.
 */
export class InMemoryCapabilityDirectory implements CapabilityDirectoryPort {
  private readonly grants = new Map<string, Set<string>>();

  async grant(handle: CiphertextHandle, principals: readonly UserAddress[]): Promise<void> {
    const holders = this.grants.get(handle.value) ?? new Set<string>();
    for (const principal of principals) {
      holders.add(principal.value);
    }
    this.grants.set(handle.value, holders);
  }

  async mayDecrypt(handle: CiphertextHandle, principal: UserAddress): Promise<boolean> {
    return this.grants.get(handle.value)?.has(principal.value) ?? false;
  }
}
