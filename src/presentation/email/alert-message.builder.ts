/**
 * Alert Email Builder
 *
 * Turns the alerts of one run into a single email: subject named after the
 * most severe kind, one section per kind, inline charts referenced by
 * `cid:` with a latest-value line where no chart is available.
 */

import {
  ALERT_KINDS,
  type AlertCondition,
  type AlertKind,
} from '../../domain/entities/alert-condition.entity';
import {
  INDICATOR_LABELS,
  type IndicatorId,
} from '../../domain/entities/indicator-sample.entity';
import type { IndicatorReading, RenderedChart } from '../../domain/interfaces/services.interface';
import { formatCompact, formatUsd } from '../../shared/format';

export interface EmailAttachment {
  readonly filename: string;
  readonly content: Buffer;
  readonly contentType: string;
  readonly cid: string;
}

export interface AlertEmail {
  readonly subject: string;
  readonly text: string;
  readonly html: string;
  readonly attachments: readonly EmailAttachment[];
}

interface KindConfig {
  emoji: string;
  title: string;
}

const KIND_CONFIGS: Record<AlertKind, KindConfig> = {
  FullExit: { emoji: '🚨', title: 'FULL EXIT SIGNAL' },
  DominanceLow: { emoji: '⚠️', title: 'Trim Risky Alts' },
  M2Flattening: { emoji: '⚠️', title: 'Rotate Out of Midcaps' },
  AltcoinPullback: { emoji: '⚠️', title: 'Altcoin Pullback' },
  TrendSpike: { emoji: '📈', title: 'Retail Hype Spike' },
};

export function escapeHtml(text: string): string {
  if (!text) return '';
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

export function chartCid(indicatorId: IndicatorId): string {
  return `${indicatorId}@market-exit-monitor`;
}

export function formatIndicatorValue(indicatorId: IndicatorId, value: number): string {
  switch (indicatorId) {
    case 'btc_dominance':
    case 'eth_dominance':
      return `${value.toFixed(2)}%`;
    case 'altcoin_market_cap':
      return formatUsd(value);
    case 'altcoin_share':
      return value.toFixed(4);
    case 'm2_supply':
      return formatCompact(value, 1);
    case 'fear_greed':
    case 'social_hits':
      return value.toFixed(0);
    case 'coinbase_app_rank':
      return `#${value.toFixed(0)}`;
  }
}

function latestLine(indicatorId: IndicatorId, reading: IndicatorReading | undefined): string {
  const label = INDICATOR_LABELS[indicatorId];
  if (!reading) return `${label}: no data`;
  return `${label}: ${formatIndicatorValue(indicatorId, reading.value)} (as of ${reading.timestamp.toISOString()})`;
}

export function buildSubject(alerts: readonly AlertCondition[]): string {
  const kinds = ALERT_KINDS.filter((kind) => alerts.some((alert) => alert.kind === kind));
  if (kinds.length === 0) return 'No alerts';

  const { emoji, title } = KIND_CONFIGS[kinds[0]];
  return kinds.length > 1 ? `${emoji} ${title} (+${kinds.length - 1} more)` : `${emoji} ${title}`;
}

export function buildAlertEmail(
  alerts: readonly AlertCondition[],
  charts: ReadonlyMap<IndicatorId, RenderedChart>,
  latest: ReadonlyMap<IndicatorId, IndicatorReading>,
): AlertEmail {
  const textSections: string[] = [];
  const htmlSections: string[] = [];
  const attached = new Map<IndicatorId, EmailAttachment>();

  for (const kind of ALERT_KINDS) {
    const ofKind = alerts.filter((alert) => alert.kind === kind);
    if (ofKind.length === 0) continue;

    const { emoji, title } = KIND_CONFIGS[kind];
    const related = new Set<IndicatorId>(ofKind.flatMap((alert) => [...alert.relatedIndicatorIds]));

    let text = `${emoji} ${title}\n`;
    let html = `<h2>${emoji} ${escapeHtml(title)}</h2>\n`;

    for (const alert of ofKind) {
      text += `${alert.message}\n`;
      html += `<p>${escapeHtml(alert.message).replace(/\n/g, '<br>')}</p>\n`;
    }

    for (const indicatorId of related) {
      const chart = charts.get(indicatorId);
      if (chart) {
        const cid = chartCid(indicatorId);
        attached.set(indicatorId, {
          filename: chart.filename,
          content: chart.content,
          contentType: chart.contentType,
          cid,
        });
        text += `[chart: ${chart.filename}]\n`;
        html += `<img src="cid:${escapeHtml(cid)}" alt="${escapeHtml(INDICATOR_LABELS[indicatorId])}">\n`;
      } else {
        const line = latestLine(indicatorId, latest.get(indicatorId));
        text += `${line}\n`;
        html += `<p><i>${escapeHtml(line)}</i></p>\n`;
      }
    }

    textSections.push(text.trimEnd());
    htmlSections.push(`<section>\n${html}</section>`);
  }

  return {
    subject: buildSubject(alerts),
    text: `${textSections.join('\n\n')}\n`,
    html: `<html><body>\n${htmlSections.join('\n')}\n</body></html>`,
    attachments: [...attached.values()],
  };
}
