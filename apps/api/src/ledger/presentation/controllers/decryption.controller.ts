import { BadRequestException, Body, Controller, Get, HttpCode, Inject, Param, Post, Query } from '@nestjs/common';
import { CiphertextHandle, UserAddress } from '@cipherledger/domain';
import type { TrustLedgerServices } from '@cipherledger/infrastructure';
import { validated } from '@platform/presentation/validated';
import { TRUST_LEDGER_SERVICES } from '../../ledger.tokens';
import { CapabilityQueryDto } from '../dto/CapabilityQueryDto';
import { UserDecryptDto } from '../dto/UserDecryptDto';
import { withHttpErrors } from '../http-errors';

const toBase64 = (bytes: Uint8Array): string => Buffer.from(bytes).toString('base64');
const fromBase64 = (value: string): Uint8Array => new Uint8Array(Buffer.from(value, 'base64'));

/**
 * Re-encryption service. Requests authenticate through the holder's signed
 * authorization rather than the gateway header.
 */
@Controller('decryption')
export class DecryptionController {
  constructor(@Inject(TRUST_LEDGER_SERVICES) private readonly ledger: TrustLedgerServices) {}

  @Get('network')
  network() {
    return {
      systemAddress: this.ledger.systemAddress.value,
      networkPublicKey: toBase64(this.ledger.networkPublicKey),
    };
  }

  @Get('capabilities/:handle')
  async capability(@Param('handle') handle: string, @Query(validated(CapabilityQueryDto)) query: CapabilityQueryDto) {
    if (!CiphertextHandle.isValid(handle)) {
      throw new BadRequestException('handle must be a 32-byte hex value');
    }
    const ciphertext = CiphertextHandle.from(handle);
    const principal = UserAddress.from(query.principal);
    const mayDecrypt = await this.ledger.directory.mayDecrypt(ciphertext, principal);
    return { handle: ciphertext.value, principal: principal.value, mayDecrypt };
  }

  @Post('user-decrypt')
  @HttpCode(200)
  async userDecrypt(@Body(validated(UserDecryptDto)) dto: UserDecryptDto) {
    const sealed = await withHttpErrors(() =>
      this.ledger.userDecryption.handle({
        handles: dto.handles,
        user: dto.user,
        signerPublicKey: fromBase64(dto.signerPublicKey),
        signature: fromBase64(dto.signature),
        authorization: {
          sessionPublicKey: fromBase64(dto.authorization.sessionPublicKey),
          systemAddresses: dto.authorization.systemAddresses,
          startTimestamp: dto.authorization.startTimestamp,
          durationDays: dto.authorization.durationDays,
        },
      })
    );
    return { results: sealed.map((value) => ({ handle: value.handle, sealed: toBase64(value.sealed) })) };
  }
}
