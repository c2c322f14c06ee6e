import type { AlertCondition, AlertKind } from '../../domain/entities/alert-condition.entity';
import type { MarketSnapshot } from '../../domain/entities/market-snapshot.entity';
import type { ThresholdConfig } from '../../config/monitor.config';
import type { IndicatorHistory } from '../indicator-history/indicator-history';

export type PrimaryAlertKind = Exclude<AlertKind, 'FullExit'>;

export interface EvaluationContext {
  readonly snapshot: MarketSnapshot;
  readonly history: IndicatorHistory;
  readonly thresholds: ThresholdConfig;
}

export interface Evaluator {
  readonly kind: PrimaryAlertKind;
  /** Names of the snapshot inputs this evaluator needs that are unavailable this run. */
  missingInputs(snapshot: MarketSnapshot): string[];
  evaluate(context: EvaluationContext): AlertCondition | null;
}

export type EvaluationOutcome =
  | { readonly kind: AlertKind; readonly status: 'skipped'; readonly reason: string }
  | { readonly kind: AlertKind; readonly status: 'clear' }
  | { readonly kind: AlertKind; readonly status: 'fired'; readonly alert: AlertCondition };

export interface EvaluationReport {
  readonly outcomes: readonly EvaluationOutcome[];
  readonly alerts: readonly AlertCondition[];
}
