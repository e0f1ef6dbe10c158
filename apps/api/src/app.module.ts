import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AccessModule } from '@access/presentation/access.module';
import { DatabaseModule } from '@platform/infrastructure/database/database.module';
import { HealthController } from '@platform/presentation/health.controller';
import { LedgerModule } from '@ledger/presentation/ledger.module';
import { validateEnv } from './config/env';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnv,
    }),
    DatabaseModule,
    AccessModule,
    LedgerModule,
  ],
  controllers: [HealthController],
})
export class AppModule {}
