import type { IIndicatorFetcher } from '../../../domain/interfaces/fetcher.interface';
import { FetchError } from '../../../shared/errors';
import { isRecord } from '../../../shared/guards';
import type { JsonApiClient } from '../../http/json-api.client';

/** App names of the App Store top-free chart, in rank order. */
export class AppStoreRankingFetcher implements IIndicatorFetcher<readonly string[]> {
  public readonly fetcherId = 'app-store-ranking';

  constructor(
    private readonly client: JsonApiClient,
    private readonly url: string,
  ) {}

  async fetch(): Promise<readonly string[]> {
    const body = await this.client.getJson(this.fetcherId, this.url);
    const results = isRecord(body) && isRecord(body.feed) ? body.feed.results : undefined;

    if (!Array.isArray(results)) {
      throw new FetchError(this.fetcherId, 'Unexpected response: missing feed.results');
    }

    return results.map((app: unknown, index) => {
      if (!isRecord(app) || typeof app.name !== 'string') {
        throw new FetchError(this.fetcherId, `Unexpected response: app #${index + 1} has no name`);
      }
      return app.name;
    });
  }
}
