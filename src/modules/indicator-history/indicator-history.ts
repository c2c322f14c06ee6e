import type { IndicatorId, IndicatorSample } from '../../domain/entities/indicator-sample.entity';
import { maxOf, normalizedRange } from './series.math';

/**
 * Trailing window over one indicator's samples: either the last `count`
 * samples, or every sample with `until - spanMs <= timestamp <= until`.
 * `until` defaults to the timestamp of the newest sample.
 */
export type HistoryWindow =
  | { readonly count: number }
  | { readonly spanMs: number; readonly until?: Date };

export const DAY_MS = 24 * 60 * 60 * 1000;

export function lastDays(days: number, until?: Date): HistoryWindow {
  return { spanMs: days * DAY_MS, until };
}

/**
 * Per-indicator, append-only time series. Samples of one indicator are kept
 * in non-decreasing timestamp order; equal timestamps are allowed.
 */
export class IndicatorHistory {
  private readonly series = new Map<IndicatorId, IndicatorSample[]>();
  private dirty = false;

  constructor(samples: Iterable<IndicatorSample> = []) {
    for (const sample of samples) {
      this.push(sample.indicatorId, sample);
    }
  }

  append(indicatorId: IndicatorId, sample: IndicatorSample): void {
    if (sample.indicatorId !== indicatorId) {
      throw new RangeError(`Sample for ${sample.indicatorId} appended to ${indicatorId}`);
    }
    this.push(indicatorId, sample);
    this.dirty = true;
  }

  /** Lazy, restartable view: every iteration re-reads the current series. */
  recent(indicatorId: IndicatorId, window: HistoryWindow): Iterable<IndicatorSample> {
    const series = this.series;
    return {
      *[Symbol.iterator]() {
        const samples = series.get(indicatorId) ?? [];
        const [from, to] = windowBounds(samples, window);
        for (let i = from; i < to; i++) {
          yield samples[i];
        }
      },
    };
  }

  peak(indicatorId: IndicatorId, window: HistoryWindow): number | null {
    return maxOf(valuesOf(this.recent(indicatorId, window)));
  }

  flattenMetric(indicatorId: IndicatorId, window: HistoryWindow): number | null {
    return normalizedRange(Array.from(valuesOf(this.recent(indicatorId, window))));
  }

  latest(indicatorId: IndicatorId): IndicatorSample | null {
    const samples = this.series.get(indicatorId);
    return samples && samples.length > 0 ? samples[samples.length - 1] : null;
  }

  all(indicatorId: IndicatorId): readonly IndicatorSample[] {
    return [...(this.series.get(indicatorId) ?? [])];
  }

  size(indicatorId: IndicatorId): number {
    return this.series.get(indicatorId)?.length ?? 0;
  }

  indicatorIds(): IndicatorId[] {
    return Array.from(this.series.keys()).filter((id) => this.size(id) > 0);
  }

  isDirty(): boolean {
    return this.dirty;
  }

  markDirty(): void {
    this.dirty = true;
  }

  markClean(): void {
    this.dirty = false;
  }

  private push(indicatorId: IndicatorId, sample: IndicatorSample): void {
    let samples = this.series.get(indicatorId);
    if (!samples) {
      samples = [];
      this.series.set(indicatorId, samples);
    }

    const last = samples[samples.length - 1];
    if (last && sample.timestamp.getTime() < last.timestamp.getTime()) {
      throw new RangeError(
        `Out-of-order sample for ${indicatorId}: ${sample.timestamp.toISOString()} < ${last.timestamp.toISOString()}`,
      );
    }
    samples.push(sample);
  }
}

function* valuesOf(samples: Iterable<IndicatorSample>): Generator<number> {
  for (const sample of samples) yield sample.value;
}

// [from, to) indexes into an ascending series
function windowBounds(samples: readonly IndicatorSample[], window: HistoryWindow): [number, number] {
  if (samples.length === 0) return [0, 0];

  if ('count' in window) {
    const count = Math.max(0, Math.floor(window.count));
    return [Math.max(0, samples.length - count), samples.length];
  }

  const until = (window.until ?? samples[samples.length - 1].timestamp).getTime();
  const since = until - Math.max(0, window.spanMs);

  let from = 0;
  while (from < samples.length && samples[from].timestamp.getTime() < since) from++;
  let to = from;
  while (to < samples.length && samples[to].timestamp.getTime() <= until) to++;
  return [from, to];
}
