export * from './eventTypes';
export * from './TrustEventRecorded';
export * from './ScoreQueried';
export * from './StatisticsViewed';

import type { TrustEventRecorded } from './TrustEventRecorded';
import type { ScoreQueried } from './ScoreQueried';
import type { StatisticsViewed } from './StatisticsViewed';

export type TrustLedgerEvent = TrustEventRecorded | ScoreQueried | StatisticsViewed;
