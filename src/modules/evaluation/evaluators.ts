import { createAlert } from '../../domain/entities/alert-condition.entity';
import { altcoinMarketCap } from '../../domain/entities/market-snapshot.entity';
import { lastDays } from '../indicator-history/indicator-history';
import { formatUsd } from '../../shared/format';
import { coinbaseRank, matchSocialTerms, socialFeed } from './social-terms';
import type { Evaluator } from './evaluation.types';

export const dominanceLowEvaluator: Evaluator = {
  kind: 'DominanceLow',

  missingInputs: (snapshot) => (snapshot.global ? [] : ['global market data']),

  evaluate({ snapshot, thresholds }) {
    if (!snapshot.global) return null;
    const btc = snapshot.global.btcDominance;
    if (!(btc < thresholds.btcDominanceFloor)) return null;

    return createAlert(
      'DominanceLow',
      `BTC dominance ${btc.toFixed(2)}% < ${thresholds.btcDominanceFloor}% → trim low-cap alts.`,
      ['btc_dominance'],
    );
  },
};

export const m2FlatteningEvaluator: Evaluator = {
  kind: 'M2Flattening',

  missingInputs: (snapshot) => (snapshot.m2 ? [] : ['M2 series']),

  evaluate({ history, thresholds }) {
    const window = thresholds.m2FlatWindow;
    const metric = history.flattenMetric('m2_supply', { count: window });
    if (metric === null || !(metric < thresholds.m2FlatEpsilon)) return null;

    return createAlert(
      'M2Flattening',
      `M2 moved ${(metric * 100).toFixed(3)}% over the last ${window} observations ` +
        `(< ${(thresholds.m2FlatEpsilon * 100).toFixed(3)}%) → global liquidity peaking/flattening, rotate out of midcaps.`,
      ['m2_supply'],
    );
  },
};

export const altcoinPullbackEvaluator: Evaluator = {
  kind: 'AltcoinPullback',

  missingInputs: (snapshot) => (snapshot.global ? [] : ['global market data']),

  evaluate({ snapshot, history, thresholds }) {
    if (!snapshot.global) return null;
    const current = altcoinMarketCap(snapshot.global);
    const days = thresholds.altPullbackWindowDays;

    // the current value counts toward the peak even if it is not recorded yet
    const recorded = history.peak('altcoin_market_cap', lastDays(days, snapshot.takenAt));
    const peak = Math.max(recorded ?? current, current);
    if (!(peak > 0)) return null;

    const ratio = current / peak;
    if (ratio > thresholds.altPullbackRatio) return null;

    return createAlert(
      'AltcoinPullback',
      `Altcoin market cap ${formatUsd(current)} is ${((1 - ratio) * 100).toFixed(1)}% below its ` +
        `${days}-day high of ${formatUsd(peak)} (ratio ${ratio.toFixed(3)} ≤ ${thresholds.altPullbackRatio}) → scale out of ETH.`,
      ['altcoin_market_cap'],
    );
  },
};

export const trendSpikeEvaluator: Evaluator = {
  kind: 'TrendSpike',

  missingInputs: (snapshot) => (socialFeed(snapshot) ? [] : ['trend feed', 'app ranking feed']),

  evaluate({ snapshot, thresholds }) {
    const feed = socialFeed(snapshot);
    if (!feed) return null;

    const matched = matchSocialTerms(thresholds.socialTerms, feed);
    const rank = coinbaseRank(snapshot.topApps ?? []);
    if (rank !== null && !matched.some((term) => term.toLowerCase().includes('coinbase'))) {
      matched.push(`Coinbase app #${rank}`);
    }
    if (matched.length < thresholds.trendHitsRequired) return null;

    return createAlert(
      'TrendSpike',
      `${matched.length} monitored terms trending (${matched.join(', ')}) ≥ ${thresholds.trendHitsRequired} → retail hype building.`,
      ['social_hits'],
    );
  },
};

/** Applied in this order on every run. */
export const PRIMARY_EVALUATORS: readonly Evaluator[] = [
  dominanceLowEvaluator,
  m2FlatteningEvaluator,
  altcoinPullbackEvaluator,
  trendSpikeEvaluator,
];
