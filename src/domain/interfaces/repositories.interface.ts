import type { IndicatorHistory } from '../../modules/indicator-history/indicator-history';

export interface IIndicatorHistoryRepository {
  /** A missing or unreadable file gives an empty history; an unreadable one is kept aside first. */
  load(): Promise<IndicatorHistory>;
  save(history: IndicatorHistory): Promise<void>;
  /** Loads the history, runs `work`, and writes the history back if `work` completes. */
  withHistory<T>(work: (history: IndicatorHistory) => Promise<T>): Promise<T>;
}
