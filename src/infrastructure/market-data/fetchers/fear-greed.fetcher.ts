import type { IIndicatorFetcher } from '../../../domain/interfaces/fetcher.interface';
import { FetchError } from '../../../shared/errors';
import { isRecord, toFiniteNumber } from '../../../shared/guards';
import type { JsonApiClient } from '../../http/json-api.client';

export class FearGreedFetcher implements IIndicatorFetcher<number> {
  public readonly fetcherId = 'fear-greed';

  constructor(
    private readonly client: JsonApiClient,
    private readonly url: string,
  ) {}

  async fetch(): Promise<number> {
    const body = await this.client.getJson(this.fetcherId, this.url);
    const first: unknown = isRecord(body) && Array.isArray(body.data) ? body.data[0] : undefined;
    const value = isRecord(first) ? toFiniteNumber(first.value) : null;

    if (value === null || !Number.isInteger(value)) {
      throw new FetchError(this.fetcherId, 'Unexpected response: data[0].value is not an integer');
    }
    return value;
  }
}
