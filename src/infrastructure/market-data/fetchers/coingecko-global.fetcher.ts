import type { IIndicatorFetcher } from '../../../domain/interfaces/fetcher.interface';
import type { GlobalMarketData } from '../../../domain/entities/market-snapshot.entity';
import { FetchError } from '../../../shared/errors';
import { isRecord, toFiniteNumber } from '../../../shared/guards';
import type { JsonApiClient } from '../../http/json-api.client';

interface CoinGeckoGlobalResponse {
  data: {
    market_cap_percentage: Record<string, unknown>;
    total_market_cap: Record<string, unknown>;
  };
}

function isGlobalResponse(body: unknown): body is CoinGeckoGlobalResponse {
  return (
    isRecord(body) &&
    isRecord(body.data) &&
    isRecord(body.data.market_cap_percentage) &&
    isRecord(body.data.total_market_cap)
  );
}

export class CoinGeckoGlobalFetcher implements IIndicatorFetcher<GlobalMarketData> {
  public readonly fetcherId = 'coingecko-global';

  constructor(
    private readonly client: JsonApiClient,
    private readonly url: string,
  ) {}

  async fetch(): Promise<GlobalMarketData> {
    const body = await this.client.getJson(this.fetcherId, this.url);
    if (!isGlobalResponse(body)) {
      throw new FetchError(this.fetcherId, 'Unexpected response: missing data.market_cap_percentage');
    }

    const btcDominance = toFiniteNumber(body.data.market_cap_percentage.btc);
    const ethDominance = toFiniteNumber(body.data.market_cap_percentage.eth);
    const totalMarketCapUsd = toFiniteNumber(body.data.total_market_cap.usd);

    if (btcDominance === null || ethDominance === null || totalMarketCapUsd === null) {
      throw new FetchError(this.fetcherId, 'Unexpected response: btc/eth dominance or total USD cap missing');
    }

    return { btcDominance, ethDominance, totalMarketCapUsd };
  }
}
