import { Controller, Get, Inject, ServiceUnavailableException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DatabaseService } from '@platform/infrastructure/database/database.service';
import type { AppEnv } from '../../config/env';

@Controller('health')
export class HealthController {
  constructor(
    @Inject(DatabaseService) private readonly database: DatabaseService,
    @Inject(ConfigService) private readonly config: ConfigService<AppEnv, true>
  ) {}

  @Get()
  async check(): Promise<{ status: 'ok'; db: true; systemAddress: string }> {
    if (!(await this.database.ping())) {
      throw new ServiceUnavailableException({ status: 'unavailable', db: false });
    }
    return { status: 'ok', db: true, systemAddress: this.config.get('LEDGER_SYSTEM_ADDRESS', { infer: true }) };
  }
}
