import {
  Body,
  Controller,
  Get,
  HttpCode,
  Inject,
  Param,
  ParseIntPipe,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import { RecordTrustEvent, ValidateBatch, ViewStatistics } from '@cipherledger/application';
import type { StatisticsSnapshot, Timestamp, UserAddress } from '@cipherledger/domain';
import type { TrustLedgerServices } from '@cipherledger/infrastructure';
import { Principal } from '@access/principal.decorator';
import { validated } from '@platform/presentation/validated';
import { PrincipalGuard } from '@access/presentation/guards/principal.guard';
import { LEDGER_CLOCK, TRUST_LEDGER_SERVICES } from '../../ledger.tokens';
import { RangeQueryDto } from '../dto/RangeQueryDto';
import { RecordEventDto } from '../dto/RecordEventDto';
import { ValidateBatchDto } from '../dto/ValidateBatchDto';
import { withHttpErrors } from '../http-errors';

const fromBase64 = (value: string): Uint8Array => new Uint8Array(Buffer.from(value, 'base64'));

const toStatisticsView = (snapshot: StatisticsSnapshot) => ({
  eventCount: snapshot.eventCount,
  lastActivity: snapshot.lastActivity,
  hasData: snapshot.hasData,
});

@Controller('ledger')
@UseGuards(PrincipalGuard)
export class LedgerController {
  constructor(
    @Inject(TRUST_LEDGER_SERVICES) private readonly ledger: TrustLedgerServices,
    @Inject(LEDGER_CLOCK) private readonly clock: () => Timestamp
  ) {}

  @Post('events')
  async record(@Body(validated(RecordEventDto)) dto: RecordEventDto, @Principal() principal: UserAddress) {
    return withHttpErrors(() =>
      this.ledger.commands.handleRecord(
        new RecordTrustEvent(
          {
            user: principal.value,
            handle: dto.handle,
            inputProof: fromBase64(dto.inputProof),
            timestamp: this.clock().value,
          },
          { actorId: principal.value }
        )
      )
    );
  }

  @Post('batch-validations')
  @HttpCode(200)
  async validateBatch(@Body(validated(ValidateBatchDto)) dto: ValidateBatchDto, @Principal() principal: UserAddress) {
    const results = await withHttpErrors(() =>
      this.ledger.commands.handleValidateBatch(
        new ValidateBatch({
          user: principal.value,
          handles: dto.handles,
          inputProofs: dto.inputProofs.map(fromBase64),
        })
      )
    );
    return { results };
  }

  @Get(':user/total')
  async total(@Param('user') user: string) {
    const handle = await withHttpErrors(() => this.ledger.queries.getTotal(user));
    return { user, handle: handle.value };
  }

  @Get(':user/average')
  async average(@Param('user') user: string) {
    const handle = await withHttpErrors(() => this.ledger.queries.getAverage(user));
    return { user, handle: handle.value };
  }

  @Get(':user/count')
  async count(@Param('user') user: string) {
    return { user, eventCount: await withHttpErrors(() => this.ledger.queries.getEventCount(user)) };
  }

  @Get(':user/history-length')
  async historyLength(@Param('user') user: string) {
    return { user, historyLength: await withHttpErrors(() => this.ledger.queries.getHistoryLength(user)) };
  }

  @Get(':user/last-activity')
  async lastActivity(@Param('user') user: string) {
    return { user, lastActivity: await withHttpErrors(() => this.ledger.queries.getLastActivity(user)) };
  }

  @Get(':user/events/:index')
  async byIndex(@Param('user') user: string, @Param('index', ParseIntPipe) index: number) {
    const handle = await withHttpErrors(() => this.ledger.queries.getByIndex(user, index));
    return { user, index, handle: handle.value };
  }

  @Get(':user/events')
  async range(@Param('user') user: string, @Query(validated(RangeQueryDto)) query: RangeQueryDto) {
    const handles = await withHttpErrors(() => this.ledger.queries.getRange(user, query.start, query.end));
    return { user, start: query.start, end: query.end, handles: handles.map((h) => h.value) };
  }

  @Post(':user/statistics')
  @HttpCode(200)
  async liveStatistics(@Param('user') user: string, @Principal() principal: UserAddress) {
    const snapshot = await withHttpErrors(() =>
      this.ledger.commands.handleViewStatistics(
        new ViewStatistics({ user, viewedBy: principal.value, timestamp: this.clock().value })
      )
    );
    return toStatisticsView(snapshot);
  }

  @Get(':user/statistics/cached')
  async cachedStatistics(@Param('user') user: string) {
    const snapshot = await withHttpErrors(() => this.ledger.queries.getCachedStatistics(user));
    return {
      ...toStatisticsView(snapshot),
      packed: `0x${snapshot.pack().toString(16).padStart(64, '0')}`,
    };
  }
}
