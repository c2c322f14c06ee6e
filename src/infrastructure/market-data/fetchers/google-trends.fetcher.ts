import type { IIndicatorFetcher } from '../../../domain/interfaces/fetcher.interface';
import { FetchError, describeError } from '../../../shared/errors';
import { isRecord } from '../../../shared/guards';
import type { JsonApiClient } from '../../http/json-api.client';

/**
 * Titles of today's trending searches. The endpoint prefixes its JSON with
 * an anti-XSSI guard such as `)]}',`; parsing starts at the first `{`.
 */
export class GoogleTrendsFetcher implements IIndicatorFetcher<readonly string[]> {
  public readonly fetcherId = 'google-trends';

  constructor(
    private readonly client: JsonApiClient,
    private readonly url: string,
  ) {}

  async fetch(): Promise<readonly string[]> {
    const text = await this.client.getText(this.fetcherId, this.url);
    const start = text.indexOf('{');
    if (start < 0) return [];

    let body: unknown;
    try {
      body = JSON.parse(text.slice(start));
    } catch (error) {
      throw new FetchError(this.fetcherId, `Malformed JSON: ${describeError(error)}`, { cause: error });
    }

    const days = isRecord(body) && isRecord(body.default) ? body.default.trendingSearchesDays : undefined;
    if (!Array.isArray(days) || days.length === 0) return [];

    const today: unknown = days[0];
    const searches = isRecord(today) ? today.trendingSearches : undefined;
    if (!Array.isArray(searches)) return [];

    const entries: unknown[] = searches;
    const topics: string[] = [];
    for (const search of entries) {
      const query = isRecord(search) && isRecord(search.title) ? search.title.query : undefined;
      if (typeof query === 'string' && query !== '') topics.push(query);
    }
    return topics;
  }
}
