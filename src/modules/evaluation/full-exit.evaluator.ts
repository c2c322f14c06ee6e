import { createAlert, type AlertCondition } from '../../domain/entities/alert-condition.entity';
import type { IndicatorId } from '../../domain/entities/indicator-sample.entity';
import type { MarketSnapshot } from '../../domain/entities/market-snapshot.entity';
import type { EvaluationOutcome, PrimaryAlertKind } from './evaluation.types';

export const FULL_EXIT_PREREQUISITES: readonly PrimaryAlertKind[] = [
  'DominanceLow',
  'M2Flattening',
  'AltcoinPullback',
];

/**
 * Escalation rule: fires only when every prerequisite evaluator ran and
 * fired this run. A skipped prerequisite blocks it.
 */
export function evaluateFullExit(
  outcomes: readonly EvaluationOutcome[],
  snapshot: MarketSnapshot,
): AlertCondition | null {
  const fired: AlertCondition[] = [];
  for (const kind of FULL_EXIT_PREREQUISITES) {
    const outcome = outcomes.find((o) => o.kind === kind);
    if (!outcome || outcome.status !== 'fired') return null;
    fired.push(outcome.alert);
  }

  const related = new Set<IndicatorId>(fired.flatMap((alert) => [...alert.relatedIndicatorIds]));
  const lines = ['Multiple red flags:', ...fired.map((alert) => `- ${alert.message}`)];

  if (snapshot.fearGreed !== undefined) {
    lines.push(`- Fear & Greed ${snapshot.fearGreed}`);
    related.add('fear_greed');
  }

  const trend = outcomes.find((o) => o.kind === 'TrendSpike');
  if (trend && trend.status !== 'skipped') {
    lines.push(`- Social/Coinbase hype: ${trend.status === 'fired' ? 'yes' : 'no'}`);
  }

  lines.push('EXIT ALL crypto positions now.');
  return createAlert('FullExit', lines.join('\n'), related);
}
