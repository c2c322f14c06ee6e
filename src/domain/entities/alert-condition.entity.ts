import type { IndicatorId } from './indicator-sample.entity';

export const ALERT_KINDS = [
  'FullExit',
  'DominanceLow',
  'M2Flattening',
  'AltcoinPullback',
  'TrendSpike',
] as const;

/** Ordered by severity: the first kind present names the email. */
export type AlertKind = (typeof ALERT_KINDS)[number];

export interface AlertCondition {
  readonly kind: AlertKind;
  readonly message: string;
  readonly relatedIndicatorIds: ReadonlySet<IndicatorId>;
}

export function createAlert(
  kind: AlertKind,
  message: string,
  relatedIndicatorIds: Iterable<IndicatorId>,
): AlertCondition {
  return Object.freeze({ kind, message, relatedIndicatorIds: new Set(relatedIndicatorIds) });
}
