import { BaseCommand } from '../../shared/ports/BaseCommand';

export type ViewStatisticsPayload = {
  user: string;
  viewedBy: string;
  timestamp: number;
};

/**
 * Live statistics read. Modelled as a command because it refreshes the
 * cached snapshot and emits StatisticsViewed.
 */
export class ViewStatistics extends BaseCommand implements Readonly<ViewStatisticsPayload> {
  readonly type = 'ViewStatistics';
  readonly user: string;
  readonly viewedBy: string;
  readonly timestamp: number;

  constructor(payload: ViewStatisticsPayload) {
    super();
    this.user = payload.user;
    this.viewedBy = payload.viewedBy;
    this.timestamp = payload.timestamp;
  }
}
