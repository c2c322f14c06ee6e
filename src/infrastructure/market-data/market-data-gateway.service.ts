import type { IIndicatorFetcher } from '../../domain/interfaces/fetcher.interface';
import type {
  IMarketDataGateway,
  SnapshotCollection,
  SourceFailure,
} from '../../domain/interfaces/services.interface';
import type {
  GlobalMarketData,
  M2Observation,
  MarketSnapshot,
} from '../../domain/entities/market-snapshot.entity';
import { FetchError, describeError } from '../../shared/errors';
import { Logger } from '../../shared/logger';
import type { Mutable } from '../../shared/types/mutable.type';

export interface MarketFetchers {
  readonly global: IIndicatorFetcher<GlobalMarketData>;
  readonly m2: IIndicatorFetcher<readonly M2Observation[]>;
  readonly fearGreed: IIndicatorFetcher<number>;
  readonly trends: IIndicatorFetcher<readonly string[]>;
  readonly apps: IIndicatorFetcher<readonly string[]>;
}

/**
 * Runs the fetchers one after another and assembles the run's snapshot.
 * A failed source leaves its snapshot field unset and is reported in
 * `failures`; the remaining sources still run.
 */
export class MarketDataGatewayService implements IMarketDataGateway {
  private readonly logger = new Logger('MarketDataGateway');

  constructor(private readonly fetchers: MarketFetchers) {}

  public async collectSnapshot(takenAt: Date = new Date()): Promise<SnapshotCollection> {
    const failures: SourceFailure[] = [];
    const snapshot: Mutable<MarketSnapshot> = { takenAt };

    snapshot.global = await this.tryFetch(this.fetchers.global, failures);
    snapshot.m2 = await this.tryFetch(this.fetchers.m2, failures);
    snapshot.fearGreed = await this.tryFetch(this.fetchers.fearGreed, failures);
    snapshot.trendingTopics = await this.tryFetch(this.fetchers.trends, failures);
    snapshot.topApps = await this.tryFetch(this.fetchers.apps, failures);

    const total = Object.keys(this.fetchers).length;
    this.logger.info(`Snapshot collected: ${total - failures.length}/${total} sources available`);

    return { snapshot, failures };
  }

  private async tryFetch<T>(fetcher: IIndicatorFetcher<T>, failures: SourceFailure[]): Promise<T | undefined> {
    const startMs = Date.now();
    try {
      const value = await fetcher.fetch();
      this.logger.debug(`✅ ${fetcher.fetcherId} fetched in ${Date.now() - startMs}ms`);
      return value;
    } catch (error) {
      const failure =
        error instanceof FetchError
          ? error
          : new FetchError(fetcher.fetcherId, describeError(error), { cause: error });
      this.logger.warn(`⚠️ ${fetcher.fetcherId} unavailable this run: ${failure.message}`);
      failures.push({ source: fetcher.fetcherId, error: failure.message });
      return undefined;
    }
  }
}
