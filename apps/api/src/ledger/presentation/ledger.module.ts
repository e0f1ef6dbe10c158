import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Timestamp } from '@cipherledger/domain';
import { bootstrapTrustLedger } from '@cipherledger/infrastructure';
import { AccessModule } from '@access/presentation/access.module';
import type { AppEnv } from '../../config/env';
import { KyselyCapabilityDirectory } from '../infrastructure/kysely-capability.directory';
import { KyselyCiphertextStore } from '../infrastructure/kysely-ciphertext.store';
import { KyselyTrustLedgerRepository } from '../infrastructure/kysely-trust-ledger.repository';
import { LoggingEventBus } from '../infrastructure/logging-event-bus';
import { LEDGER_CLOCK, TRUST_LEDGER_SERVICES } from '../ledger.tokens';
import { DecryptionController } from './controllers/decryption.controller';
import { LedgerController } from './controllers/ledger.controller';

const fromBase64 = (value: string): Uint8Array => new Uint8Array(Buffer.from(value, 'base64'));

@Module({
  imports: [AccessModule],
  controllers: [LedgerController, DecryptionController],
  providers: [
    KyselyTrustLedgerRepository,
    KyselyCiphertextStore,
    KyselyCapabilityDirectory,
    { provide: LoggingEventBus, useFactory: () => new LoggingEventBus() },
    { provide: LEDGER_CLOCK, useValue: () => Timestamp.now() },
    {
      provide: TRUST_LEDGER_SERVICES,
      useFactory: (
        config: ConfigService<AppEnv, true>,
        store: KyselyTrustLedgerRepository,
        ciphertexts: KyselyCiphertextStore,
        directory: KyselyCapabilityDirectory,
        eventBus: LoggingEventBus,
        clock: () => Timestamp
      ) =>
        bootstrapTrustLedger({
          systemAddress: config.get('LEDGER_SYSTEM_ADDRESS', { infer: true }),
          network: {
            publicKey: fromBase64(config.get('NETWORK_PUBLIC_KEY', { infer: true })),
            privateKey: fromBase64(config.get('NETWORK_PRIVATE_KEY', { infer: true })),
            storageKey: fromBase64(config.get('NETWORK_STORAGE_KEY', { infer: true })),
          },
          maxValidityDays: config.get('DECRYPTION_MAX_VALIDITY_DAYS', { infer: true }),
          repository: store,
          readModel: store,
          ciphertexts,
          directory,
          eventBus,
          now: clock,
        }),
      inject: [
        ConfigService,
        KyselyTrustLedgerRepository,
        KyselyCiphertextStore,
        KyselyCapabilityDirectory,
        LoggingEventBus,
        LEDGER_CLOCK,
      ],
    },
  ],
})
export class LedgerModule {}
