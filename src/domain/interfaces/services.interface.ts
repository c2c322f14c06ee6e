import type { AlertCondition } from '../entities/alert-condition.entity';
import type { IndicatorId, IndicatorSample } from '../entities/indicator-sample.entity';
import type { MarketSnapshot } from '../entities/market-snapshot.entity';

export interface SourceFailure {
  readonly source: string;
  readonly error: string;
}

export interface SnapshotCollection {
  readonly snapshot: MarketSnapshot;
  readonly failures: readonly SourceFailure[];
}

export interface IMarketDataGateway {
  /** Runs every fetcher once, in order. Never rejects on a source failure. */
  collectSnapshot(takenAt?: Date): Promise<SnapshotCollection>;
}

export interface RenderedChart {
  readonly indicatorId: IndicatorId;
  readonly filename: string;
  readonly contentType: 'image/png';
  readonly content: Buffer;
}

export interface IChartRenderer {
  /** Rejects with RenderError when the series cannot be drawn. */
  render(indicatorId: IndicatorId, samples: readonly IndicatorSample[]): Promise<RenderedChart>;
}

export interface IndicatorReading {
  readonly indicatorId: IndicatorId;
  readonly value: number;
  readonly timestamp: Date;
}

export interface NotificationResult {
  readonly sent: boolean;
  readonly alertCount: number;
  readonly messageId?: string;
}

export interface INotificationService {
  /**
   * Sends one email for the alerts, or nothing when the list is empty.
   * Rejects with NotifyError when delivery fails.
   */
  notify(
    alerts: readonly AlertCondition[],
    charts: ReadonlyMap<IndicatorId, RenderedChart>,
    latest: ReadonlyMap<IndicatorId, IndicatorReading>,
  ): Promise<NotificationResult>;
}
