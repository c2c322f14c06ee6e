import type { IIndicatorFetcher } from '../../../domain/interfaces/fetcher.interface';
import type { M2Observation } from '../../../domain/entities/market-snapshot.entity';
import { FetchError } from '../../../shared/errors';
import { isRecord, toFiniteNumber } from '../../../shared/guards';
import type { JsonApiClient } from '../../http/json-api.client';

// FRED publishes "." for observations that have no value yet
const MISSING_VALUE = '.';

/** Money-supply series from the FRED observations endpoint, oldest first. */
export class FredM2Fetcher implements IIndicatorFetcher<readonly M2Observation[]> {
  public readonly fetcherId = 'fred-m2';

  constructor(
    private readonly client: JsonApiClient,
    private readonly url: string,
    private readonly apiKey: string,
    private readonly seriesId: string,
  ) {}

  async fetch(): Promise<readonly M2Observation[]> {
    if (!this.apiKey) {
      throw new FetchError(this.fetcherId, 'FRED_API_KEY is not configured');
    }

    const body = await this.client.getJson(this.fetcherId, this.url, {
      series_id: this.seriesId,
      api_key: this.apiKey,
      file_type: 'json',
    });

    if (!isRecord(body) || !Array.isArray(body.observations)) {
      throw new FetchError(this.fetcherId, 'Unexpected response: missing observations');
    }

    const entries: unknown[] = body.observations;
    const observations: M2Observation[] = [];
    for (const entry of entries) {
      if (!isRecord(entry) || typeof entry.date !== 'string') {
        throw new FetchError(this.fetcherId, 'Unexpected observation: missing date');
      }
      if (entry.value === MISSING_VALUE) continue;

      const value = toFiniteNumber(entry.value);
      if (value === null) {
        throw new FetchError(this.fetcherId, `Unexpected observation value for ${entry.date}`);
      }
      observations.push({ date: entry.date, value });
    }
    return observations;
  }
}
