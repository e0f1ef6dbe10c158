export const trustLedgerEventTypes = {
  trustEventRecorded: 'TrustEventRecorded',
  scoreQueried: 'ScoreQueried',
  statisticsViewed: 'StatisticsViewed',
} as const;

export type TrustLedgerEventType = (typeof trustLedgerEventTypes)[keyof typeof trustLedgerEventTypes];

export const ScoreQueryOperations = {
  record: 'RECORD',
} as const;

export type ScoreQueryOperation = (typeof ScoreQueryOperations)[keyof typeof ScoreQueryOperations];
