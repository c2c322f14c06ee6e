import {
  createSample,
  isIndicatorId,
  type IndicatorId,
  type IndicatorSample,
} from '../../domain/entities/indicator-sample.entity';
import type { IndicatorHistory } from '../../modules/indicator-history/indicator-history';
import { isRecord } from '../../shared/guards';

export interface StoredSample {
  timestamp: string;
  value: number;
}

export type HistoryDocument = Partial<Record<IndicatorId, StoredSample[]>>;

export interface ParsedHistory {
  readonly samples: IndicatorSample[];
  readonly legacy: boolean;
  readonly skipped: string[];
}

/** Indicator the ratio-only format tracked under the key `ratio`. */
export const LEGACY_INDICATOR: IndicatorId = 'altcoin_share';

function parseTimestamp(raw: unknown): Date | null {
  if (typeof raw !== 'string' && typeof raw !== 'number') return null;
  const date = new Date(raw);
  return Number.isNaN(date.getTime()) ? null : date;
}

function parseLegacy(entries: unknown[], skipped: string[]): IndicatorSample[] {
  const samples: IndicatorSample[] = [];
  entries.forEach((entry, index) => {
    if (!isRecord(entry) || typeof entry.ratio !== 'number' || !Number.isFinite(entry.ratio)) {
      skipped.push(`legacy entry #${index}: missing numeric ratio`);
      return;
    }
    // "YYYY-MM-DD" parses as midnight UTC
    const timestamp = parseTimestamp(entry.date);
    if (!timestamp) {
      skipped.push(`legacy entry #${index}: invalid date`);
      return;
    }
    samples.push(createSample(LEGACY_INDICATOR, entry.ratio, timestamp));
  });
  return samples;
}

function parseCurrent(document: Record<string, unknown>, skipped: string[]): IndicatorSample[] {
  const samples: IndicatorSample[] = [];
  for (const [key, entries] of Object.entries(document)) {
    if (!isIndicatorId(key)) {
      skipped.push(`unknown indicator "${key}"`);
      continue;
    }
    if (!Array.isArray(entries)) {
      skipped.push(`${key}: expected an array of samples`);
      continue;
    }
    entries.forEach((entry: unknown, index) => {
      const timestamp = isRecord(entry) ? parseTimestamp(entry.timestamp) : null;
      const value = isRecord(entry) ? entry.value : undefined;
      if (!timestamp || typeof value !== 'number' || !Number.isFinite(value)) {
        skipped.push(`${key} entry #${index}: expected {timestamp, value}`);
        return;
      }
      samples.push(createSample(key, value, timestamp));
    });
  }
  return samples;
}

/**
 * Reads either the per-indicator document or the legacy ratio-only array.
 * Throws TypeError when the top-level shape is neither.
 */
export function parseHistoryDocument(raw: unknown): ParsedHistory {
  const skipped: string[] = [];

  if (Array.isArray(raw)) {
    return { samples: sortByTime(parseLegacy(raw, skipped)), legacy: true, skipped };
  }
  if (isRecord(raw)) {
    return { samples: sortByTime(parseCurrent(raw, skipped)), legacy: false, skipped };
  }
  throw new TypeError('history document must be an object or a legacy array');
}

// stable, so equal timestamps keep their file order
function sortByTime(samples: IndicatorSample[]): IndicatorSample[] {
  return samples.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
}

export function toHistoryDocument(history: IndicatorHistory, maxSamples: number): HistoryDocument {
  const document: HistoryDocument = {};
  for (const indicatorId of history.indicatorIds()) {
    document[indicatorId] = history
      .all(indicatorId)
      .slice(-maxSamples)
      .map((sample) => ({ timestamp: sample.timestamp.toISOString(), value: sample.value }));
  }
  return document;
}
