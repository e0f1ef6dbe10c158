import type { CiphertextStorePort, StoredCiphertext } from './CiphertextStorePort';

export class InMemoryCiphertextStore implements CiphertextStorePort {
  private readonly entries = new Map<string, StoredCiphertext>();

  async put(entry: StoredCiphertext): Promise<void> {
    if (!this.entries.has(entry.handle)) {
      this.entries.set(entry.handle, entry);
    }
  }

  async get(handle: string): Promise<StoredCiphertext | null> {
    return this.entries.get(handle) ?? null;
  }

  async delete(handles: readonly string[]): Promise<void> {
    for (const handle of handles) {
      this.entries.delete(handle);
    }
  }

  get size(): number {
    return this.entries.size;
  }
}
