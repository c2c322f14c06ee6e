import { IndicatorHistoryRepository } from './indicator-history.repository';

/**
 * Rewrites a history file in the current per-indicator format and returns
 * `<indicator>=<count>` for each series written. A file that exists but
 * cannot be read rejects with `HistoryLoadError` and is left as it was.
 */
export async function migrateHistoryFile(filePath: string, maxSamples: number): Promise<string[]> {
  const repository = new IndicatorHistoryRepository(filePath, maxSamples);
  const history = await repository.loadExisting();
  await repository.save(history);
  return history.indicatorIds().map((id) => `${id}=${history.size(id)}`);
}
