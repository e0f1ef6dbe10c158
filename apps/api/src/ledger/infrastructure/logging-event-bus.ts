import { Logger } from '@nestjs/common';
import {
  ScoreQueried,
  StatisticsViewed,
  TrustEventRecorded,
  trustLedgerEventTypes,
  type DomainEvent,
} from '@cipherledger/domain';
import { InMemoryEventBus } from '@cipherledger/infrastructure';

const summarize = (event: DomainEvent): string => {
  if (event instanceof TrustEventRecorded) {
    return `user=${event.user.value} index=${event.index} count=${event.eventCount}`;
  }
  if (event instanceof ScoreQueried) {
    return `user=${event.user.value} operation=${event.operation}`;
  }
  if (event instanceof StatisticsViewed) {
    return `user=${event.user.value} count=${event.eventCount} lastActivity=${event.lastActivity}`;
  }
  return `aggregate=${event.aggregateId.value}`;
};

/**
 * Event bus whose only built-in subscriber writes each ledger notification
 * to the Nest logger.
 */
export class LoggingEventBus extends InMemoryEventBus {
  private readonly logger = new Logger(LoggingEventBus.name);

  constructor() {
    super();
    for (const eventType of Object.values(trustLedgerEventTypes)) {
      this.subscribe(eventType, (event) => {
        this.logger.log(`${event.eventType} ${summarize(event)}`);
      });
    }
  }
}
