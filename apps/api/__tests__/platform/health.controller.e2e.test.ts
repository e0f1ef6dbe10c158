import 'reflect-metadata';
import type { INestApplication } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import request from 'supertest';
import { afterEach, describe, expect, it } from 'vitest';
import { DatabaseService } from '../../src/platform/infrastructure/database/database.service';
import { HealthController } from '../../src/platform/presentation/health.controller';

const SYSTEM_ADDRESS = '0x5fbdb2315678afecb367f032d93f642f64180aa3';

describe('GET /health', () => {
  let app: INestApplication | null = null;

  const start = async (reachable: boolean): Promise<INestApplication> => {
    const moduleRef = await Test.createTestingModule({
      controllers: [HealthController],
      providers: [
        { provide: DatabaseService, useValue: { ping: async () => reachable } },
        { provide: ConfigService, useValue: { get: () => SYSTEM_ADDRESS } },
      ],
    }).compile();
    app = moduleRef.createNestApplication({ logger: false });
    await app.init();
    return app;
  };

  afterEach(async () => {
    await app?.close();
    app = null;
  });

  it('reports the ledger system when the database answers', async () => {
    const server = (await start(true)).getHttpServer();

    const response = await request(server).get('/health');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ status: 'ok', db: true, systemAddress: SYSTEM_ADDRESS });
  });

  it('returns 503 when the database is unreachable', async () => {
    const server = (await start(false)).getHttpServer();

    const response = await request(server).get('/health');

    expect(response.status).toBe(503);
    expect(response.body).toEqual({ status: 'unavailable', db: false });
  });
});
