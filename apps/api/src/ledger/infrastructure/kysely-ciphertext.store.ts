import { Inject, Injectable } from '@nestjs/common';
import { EncryptedTypes, type EncryptedType } from '@cipherledger/domain';
import type { CiphertextStorePort, StoredCiphertext } from '@cipherledger/infrastructure';
import { DatabaseService } from '@platform/infrastructure/database/database.service';

const toEncryptedType = (value: string): EncryptedType => {
  switch (value) {
    case EncryptedTypes.euint32:
      return EncryptedTypes.euint32;
    case EncryptedTypes.ebool:
      return EncryptedTypes.ebool;
    default:
      throw new Error(`Unknown stored ciphertext type ${value}`);
  }
};

@Injectable()
export class KyselyCiphertextStore implements CiphertextStorePort {
  constructor(@Inject(DatabaseService) private readonly dbService: Pick<DatabaseService, 'getDb'>) {}

  async put(entry: StoredCiphertext): Promise<void> {
    await this.dbService
      .getDb()
      .insertInto('ledger.ciphertexts')
      .values({
        handle: entry.handle,
        type: entry.type,
        ciphertext: Buffer.from(entry.ciphertext),
      })
      .onConflict((oc) => oc.column('handle').doNothing())
      .execute();
  }

  async delete(handles: readonly string[]): Promise<void> {
    if (handles.length === 0) return;
    await this.dbService.getDb().deleteFrom('ledger.ciphertexts').where('handle', 'in', handles).execute();
  }

  async get(handle: string): Promise<StoredCiphertext | null> {
    const row = await this.dbService
      .getDb()
      .selectFrom('ledger.ciphertexts')
      .select(['handle', 'type', 'ciphertext'])
      .where('handle', '=', handle)
      .executeTakeFirst();
    if (!row) return null;
    return {
      handle: row.handle,
      type: toEncryptedType(row.type),
      ciphertext: new Uint8Array(row.ciphertext),
    };
  }
}
