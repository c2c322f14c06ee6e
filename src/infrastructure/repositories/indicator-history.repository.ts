import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { IIndicatorHistoryRepository } from '../../domain/interfaces/repositories.interface';
import { IndicatorHistory } from '../../modules/indicator-history/indicator-history';
import { HistoryLoadError, describeError } from '../../shared/errors';
import { Logger } from '../../shared/logger';
import { parseHistoryDocument, toHistoryDocument, type ParsedHistory } from './history-document';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Flat JSON history store. Writes go to a sibling temp file that is then
 * renamed over the target, so an interrupted run leaves the old file intact.
 */
export class IndicatorHistoryRepository implements IIndicatorHistoryRepository {
  private readonly logger = new Logger(IndicatorHistoryRepository.name);

  constructor(
    private readonly filePath: string,
    private readonly maxSamples: number,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  /**
   * An unreadable file is moved aside as `<file>.corrupt-<time>` and the run
   * starts empty, so the next save cannot overwrite it.
   */
  public async load(): Promise<IndicatorHistory> {
    try {
      return await this.loadExisting();
    } catch (error) {
      if (!(error instanceof HistoryLoadError)) throw error;

      const asidePath = await this.setAside(error);
      this.logger.warn(`${error.message}; moved it to ${asidePath} and starting with an empty history`);
      return new IndicatorHistory();
    }
  }

  /** Like `load`, but a file that exists and cannot be read is a `HistoryLoadError`. */
  public async loadExisting(): Promise<IndicatorHistory> {
    let text: string;
    try {
      text = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        this.logger.info(`No history file at ${this.filePath}, starting fresh`);
        return new IndicatorHistory();
      }
      throw new HistoryLoadError(this.filePath, describeError(error), { cause: error });
    }

    let parsed: ParsedHistory;
    try {
      parsed = parseHistoryDocument(JSON.parse(text));
    } catch (error) {
      throw new HistoryLoadError(this.filePath, describeError(error), { cause: error });
    }

    for (const reason of parsed.skipped) {
      this.logger.warn(`Skipped history entry: ${reason}`);
    }

    const history = new IndicatorHistory(parsed.samples);
    if (parsed.legacy) {
      this.logger.info(`Migrating legacy ratio history (${parsed.samples.length} samples)`);
      history.markDirty();
    }
    return history;
  }

  public async save(history: IndicatorHistory): Promise<void> {
    const document = toHistoryDocument(history, this.maxSamples);
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;

    await mkdir(path.dirname(path.resolve(this.filePath)), { recursive: true });
    await writeFile(tmpPath, `${JSON.stringify(document, null, 2)}\n`, 'utf8');
    await rename(tmpPath, this.filePath);

    history.markClean();
    const total = Object.values(document).reduce((n, samples) => n + (samples?.length ?? 0), 0);
    this.logger.debug(`History saved to ${this.filePath} (${total} samples)`);
  }

  public async withHistory<T>(work: (history: IndicatorHistory) => Promise<T>): Promise<T> {
    const history = await this.load();
    const result = await work(history);
    if (history.isDirty()) {
      await this.save(history);
    }
    return result;
  }

  private async setAside(loadError: HistoryLoadError): Promise<string> {
    const stamp = this.clock().toISOString().replace(/[:.]/g, '-');
    const asidePath = `${this.filePath}.corrupt-${stamp}`;
    try {
      await rename(this.filePath, asidePath);
    } catch (error) {
      const reason = `${describeError(loadError.cause)}; cannot move it aside: ${describeError(error)}`;
      throw new HistoryLoadError(this.filePath, reason, { cause: error });
    }
    return asidePath;
  }
}
