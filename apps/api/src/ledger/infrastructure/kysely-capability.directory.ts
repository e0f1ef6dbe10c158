import { Inject, Injectable } from '@nestjs/common';
import type { CapabilityDirectoryPort } from '@cipherledger/application';
import type { CiphertextHandle, UserAddress } from '@cipherledger/domain';
import { DatabaseService } from '@platform/infrastructure/database/database.service';

@Injectable()
export class KyselyCapabilityDirectory implements CapabilityDirectoryPort {
  constructor(@Inject(DatabaseService) private readonly dbService: Pick<DatabaseService, 'getDb'>) {}

  async grant(handle: CiphertextHandle, principals: readonly UserAddress[]): Promise<void> {
    if (principals.length === 0) return;
    await this.dbService
      .getDb()
      .insertInto('ledger.grants')
      .values(principals.map((principal) => ({ handle: handle.value, principal: principal.value })))
      .onConflict((oc) => oc.columns(['handle', 'principal']).doNothing())
      .execute();
  }

  async mayDecrypt(handle: CiphertextHandle, principal: UserAddress): Promise<boolean> {
    const row = await this.dbService
      .getDb()
      .selectFrom('ledger.grants')
      .select(['handle'])
      .where('handle', '=', handle.value)
      .where('principal', '=', principal.value)
      .executeTakeFirst();
    return row !== undefined;
  }
}
