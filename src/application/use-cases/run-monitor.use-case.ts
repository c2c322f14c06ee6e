import type { AlertCondition } from '../../domain/entities/alert-condition.entity';
import type { IndicatorId } from '../../domain/entities/indicator-sample.entity';
import type { IIndicatorHistoryRepository } from '../../domain/interfaces/repositories.interface';
import type {
  IChartRenderer,
  IMarketDataGateway,
  INotificationService,
  IndicatorReading,
  NotificationResult,
  RenderedChart,
  SourceFailure,
} from '../../domain/interfaces/services.interface';
import type { ThresholdConfig } from '../../config/monitor.config';
import type { EvaluationCoordinator, EvaluationOutcome } from '../../modules/evaluation';
import type { IndicatorHistory } from '../../modules/indicator-history/indicator-history';
import type { SnapshotRecorder } from '../../modules/indicator-history/snapshot-recorder';
import { RenderError } from '../../shared/errors';
import { Logger } from '../../shared/logger';

export interface RunMonitorDependencies {
  readonly gateway: IMarketDataGateway;
  readonly repository: IIndicatorHistoryRepository;
  readonly recorder: SnapshotRecorder;
  readonly coordinator: EvaluationCoordinator;
  /** Null when charts are disabled. */
  readonly chartRenderer: IChartRenderer | null;
  readonly notifier: INotificationService;
  readonly thresholds: ThresholdConfig;
  readonly clock?: () => Date;
  readonly print?: (line: string) => void;
}

export interface RunReport {
  readonly startedAt: Date;
  readonly failures: readonly SourceFailure[];
  readonly recorded: readonly IndicatorId[];
  readonly outcomes: readonly EvaluationOutcome[];
  readonly alerts: readonly AlertCondition[];
  readonly chartIds: readonly IndicatorId[];
  readonly notification: NotificationResult;
  readonly summary: string;
}

export function formatRunSummary(at: Date, alerts: readonly AlertCondition[]): string {
  const kinds = alerts.map((alert) => alert.kind);
  return `${at.toISOString()} | Triggers: ${kinds.length > 0 ? kinds.join(', ') : 'None'}`;
}

function relatedIds(alerts: readonly AlertCondition[]): IndicatorId[] {
  return [...new Set(alerts.flatMap((alert) => [...alert.relatedIndicatorIds]))];
}

/**
 * One monitoring pass: collect → record → evaluate → chart, all inside the
 * history scope so the store is written before the email goes out.
 */
export class RunMonitorUseCase {
  private readonly logger = new Logger(RunMonitorUseCase.name);
  private readonly clock: () => Date;
  private readonly print: (line: string) => void;

  constructor(private readonly deps: RunMonitorDependencies) {
    this.clock = deps.clock ?? (() => new Date());
    this.print = deps.print ?? ((line) => console.log(line));
  }

  async execute(): Promise<RunReport> {
    const startedAt = this.clock();
    this.logger.info(`🚀 Monitor run started at ${startedAt.toISOString()}`);

    const scope = await this.deps.repository.withHistory(async (history) => {
      const { snapshot, failures } = await this.deps.gateway.collectSnapshot(startedAt);
      const recorded = this.deps.recorder.record(snapshot, history);
      const { outcomes, alerts } = this.deps.coordinator.evaluate({
        snapshot,
        history,
        thresholds: this.deps.thresholds,
      });

      const ids = relatedIds(alerts);
      const charts = await this.renderCharts(ids, history);
      const latest = new Map<IndicatorId, IndicatorReading>();
      for (const id of ids) {
        const sample = history.latest(id);
        if (sample) latest.set(id, { indicatorId: id, value: sample.value, timestamp: sample.timestamp });
      }

      return { failures, recorded, outcomes, alerts, charts, latest };
    });

    // printed first so the triggers reach stdout even when delivery fails
    const summary = formatRunSummary(startedAt, scope.alerts);
    this.print(summary);

    const notification = await this.deps.notifier.notify(scope.alerts, scope.charts, scope.latest);

    return {
      startedAt,
      failures: scope.failures,
      recorded: scope.recorded,
      outcomes: scope.outcomes,
      alerts: scope.alerts,
      chartIds: [...scope.charts.keys()],
      notification,
      summary,
    };
  }

  private async renderCharts(
    ids: readonly IndicatorId[],
    history: IndicatorHistory,
  ): Promise<Map<IndicatorId, RenderedChart>> {
    const charts = new Map<IndicatorId, RenderedChart>();
    const renderer = this.deps.chartRenderer;
    if (!renderer) return charts;

    for (const id of ids) {
      try {
        charts.set(id, await renderer.render(id, history.all(id)));
      } catch (error) {
        if (!(error instanceof RenderError)) throw error;
        this.logger.warn(`${error.message}; falling back to text`);
      }
    }
    return charts;
  }
}
