import {
  createSample,
  type IndicatorId,
} from '../../domain/entities/indicator-sample.entity';
import {
  altcoinMarketCap,
  altcoinShare,
  type M2Observation,
  type MarketSnapshot,
} from '../../domain/entities/market-snapshot.entity';
import { Logger } from '../../shared/logger';
import { coinbaseRank, matchSocialTerms, socialFeed } from '../evaluation/social-terms';
import type { IndicatorHistory } from './indicator-history';

/**
 * Appends the indicator values derived from one snapshot to the history.
 * Sources that failed this run contribute nothing.
 */
export class SnapshotRecorder {
  private readonly logger = new Logger(SnapshotRecorder.name);

  constructor(private readonly socialTerms: readonly string[]) {}

  /** Returns the ids that received a new sample. */
  record(snapshot: MarketSnapshot, history: IndicatorHistory): IndicatorId[] {
    const recorded: IndicatorId[] = [];
    const add = (id: IndicatorId, value: number, timestamp: Date = snapshot.takenAt): void => {
      const last = history.latest(id);
      if (last && timestamp.getTime() < last.timestamp.getTime()) {
        this.logger.warn(
          `Skipping ${id} at ${timestamp.toISOString()}: history already has ${last.timestamp.toISOString()}`,
        );
        return;
      }
      history.append(id, createSample(id, value, timestamp));
      if (!recorded.includes(id)) recorded.push(id);
    };

    if (snapshot.global) {
      add('btc_dominance', snapshot.global.btcDominance);
      add('eth_dominance', snapshot.global.ethDominance);
      add('altcoin_market_cap', altcoinMarketCap(snapshot.global));
      add('altcoin_share', altcoinShare(snapshot.global));
    }

    if (snapshot.m2) {
      this.mergeM2(snapshot.m2, history, add);
    }

    if (snapshot.fearGreed !== undefined) {
      add('fear_greed', snapshot.fearGreed);
    }

    const feed = socialFeed(snapshot);
    if (feed) {
      add('social_hits', matchSocialTerms(this.socialTerms, feed).length);
    }

    if (snapshot.topApps) {
      const rank = coinbaseRank(snapshot.topApps);
      if (rank !== null) add('coinbase_app_rank', rank);
    }

    this.logger.debug(`Recorded ${recorded.length} indicators: ${recorded.join(', ')}`);
    return recorded;
  }

  // M2 arrives as a full published series; only observations newer than the stored tail are added
  private mergeM2(
    observations: readonly M2Observation[],
    history: IndicatorHistory,
    add: (id: IndicatorId, value: number, timestamp: Date) => void,
  ): void {
    const last = history.latest('m2_supply');
    const after = last ? last.timestamp.getTime() : Number.NEGATIVE_INFINITY;

    const fresh = observations
      .map((o) => ({ timestamp: new Date(`${o.date}T00:00:00Z`), value: o.value }))
      .filter((o) => !Number.isNaN(o.timestamp.getTime()) && o.timestamp.getTime() > after)
      .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());

    for (const o of fresh) {
      add('m2_supply', o.value, o.timestamp);
    }
  }
}
