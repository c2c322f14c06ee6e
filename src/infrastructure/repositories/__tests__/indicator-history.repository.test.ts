import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm, writeFile, access } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { IndicatorHistoryRepository } from '../indicator-history.repository';
import { createSample } from '../../../domain/entities/indicator-sample.entity';
import { parseHistoryDocument } from '../history-document';
import { HistoryLoadError } from '../../../shared/errors';

async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

describe('IndicatorHistoryRepository', () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'history-'));
    filePath = path.join(dir, 'alt_history.json');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('starts empty when the file is missing', async () => {
    const history = await new IndicatorHistoryRepository(filePath, 500).load();

    expect(history.indicatorIds()).toEqual([]);
    expect(history.isDirty()).toBe(false);
  });

  it('round-trips samples through the file', async () => {
    const repository = new IndicatorHistoryRepository(filePath, 500);
    const history = await repository.load();
    history.append('btc_dominance', createSample('btc_dominance', 51.2, new Date('2024-06-01T00:00:00Z')));
    history.append('btc_dominance', createSample('btc_dominance', 50.8, new Date('2024-06-01T12:00:00Z')));

    await repository.save(history);

    expect(history.isDirty()).toBe(false);
    expect(JSON.parse(await readFile(filePath, 'utf8'))).toEqual({
      btc_dominance: [
        { timestamp: '2024-06-01T00:00:00.000Z', value: 51.2 },
        { timestamp: '2024-06-01T12:00:00.000Z', value: 50.8 },
      ],
    });

    const reloaded = await repository.load();
    expect(reloaded.all('btc_dominance').map((s) => s.value)).toEqual([51.2, 50.8]);
    expect(reloaded.isDirty()).toBe(false);
  });

  it('keeps only the newest samples per indicator', async () => {
    const repository = new IndicatorHistoryRepository(filePath, 2);
    const history = await repository.load();
    [40, 45, 50].forEach((value, i) =>
      history.append('fear_greed', createSample('fear_greed', value, new Date(Date.UTC(2024, 0, i + 1)))),
    );

    await repository.save(history);

    const reloaded = await repository.load();
    expect(reloaded.all('fear_greed').map((s) => s.value)).toEqual([45, 50]);
  });

  it('reads the legacy ratio list and rewrites it', async () => {
    await writeFile(
      filePath,
      JSON.stringify([
        { date: '2024-01-01', ratio: 0.3 },
        { date: '2024-01-02', ratio: 0.31 },
      ]),
    );
    const repository = new IndicatorHistoryRepository(filePath, 500);

    const count = await repository.withHistory(async (history) => {
      expect(history.isDirty()).toBe(true);
      return history.size('altcoin_share');
    });

    expect(count).toBe(2);
    expect(JSON.parse(await readFile(filePath, 'utf8'))).toEqual({
      altcoin_share: [
        { timestamp: '2024-01-01T00:00:00.000Z', value: 0.3 },
        { timestamp: '2024-01-02T00:00:00.000Z', value: 0.31 },
      ],
    });
  });

  it('moves a malformed file aside and starts empty', async () => {
    await writeFile(filePath, '{not json');

    const history = await new IndicatorHistoryRepository(filePath, 500, () => new Date('2024-06-01T12:00:00Z')).load();

    expect(history.indicatorIds()).toEqual([]);
    expect(await exists(filePath)).toBe(false);
    expect(await readFile(`${filePath}.corrupt-2024-06-01T12-00-00-000Z`, 'utf8')).toBe('{not json');
  });

  it('keeps the original bytes of a malformed file when the run saves', async () => {
    const original = '{"altcoin_market_cap":[{"timestamp":"2024-05-01T00:00:00Z","value":100}], }';
    await writeFile(filePath, original);
    const repository = new IndicatorHistoryRepository(filePath, 500, () => new Date('2024-06-01T12:00:00Z'));

    await repository.withHistory(async (history) => {
      history.append('fear_greed', createSample('fear_greed', 50, new Date('2024-06-01T00:00:00Z')));
    });

    expect((await readdir(dir)).sort()).toEqual([
      'alt_history.json',
      'alt_history.json.corrupt-2024-06-01T12-00-00-000Z',
    ]);
    expect(await readFile(`${filePath}.corrupt-2024-06-01T12-00-00-000Z`, 'utf8')).toBe(original);
    expect(JSON.parse(await readFile(filePath, 'utf8'))).toEqual({
      fear_greed: [{ timestamp: '2024-06-01T00:00:00.000Z', value: 50 }],
    });
  });

  it('refuses a malformed file on a strict load and leaves it in place', async () => {
    await writeFile(filePath, '{not json');

    await expect(new IndicatorHistoryRepository(filePath, 500).loadExisting()).rejects.toBeInstanceOf(HistoryLoadError);
    expect(await readFile(filePath, 'utf8')).toBe('{not json');
  });

  it('skips malformed entries', async () => {
    await writeFile(
      filePath,
      JSON.stringify({
        fear_greed: [{ timestamp: '2024-01-01T00:00:00Z', value: 40 }, { value: 'x' }],
        bogus: [],
      }),
    );

    const history = await new IndicatorHistoryRepository(filePath, 500).load();

    expect(history.all('fear_greed').map((s) => s.value)).toEqual([40]);
  });

  it('does not write when nothing changed', async () => {
    await new IndicatorHistoryRepository(filePath, 500).withHistory(async () => undefined);

    expect(await exists(filePath)).toBe(false);
  });

  it('does not write when the work fails', async () => {
    const repository = new IndicatorHistoryRepository(filePath, 500);

    await expect(
      repository.withHistory(async (history) => {
        history.append('fear_greed', createSample('fear_greed', 40, new Date()));
        throw new Error('evaluation failed');
      }),
    ).rejects.toThrow('evaluation failed');
    expect(await exists(filePath)).toBe(false);
  });
});

describe('parseHistoryDocument', () => {
  it('reports what it skipped', () => {
    const parsed = parseHistoryDocument({
      fear_greed: [{ timestamp: 'yesterday', value: 1 }],
      whales: [],
      m2_supply: 'n/a',
    });

    expect(parsed.samples).toEqual([]);
    expect(parsed.legacy).toBe(false);
    expect(parsed.skipped).toEqual([
      'fear_greed entry #0: expected {timestamp, value}',
      'unknown indicator "whales"',
      'm2_supply: expected an array of samples',
    ]);
  });

  it('reports bad legacy entries', () => {
    const parsed = parseHistoryDocument([{ date: '2024-01-01' }, { date: 'soon', ratio: 0.2 }]);

    expect(parsed.legacy).toBe(true);
    expect(parsed.skipped).toEqual(['legacy entry #0: missing numeric ratio', 'legacy entry #1: invalid date']);
  });

  it('rejects other top-level shapes', () => {
    expect(() => parseHistoryDocument('history')).toThrow(TypeError);
  });
});
