export const INDICATOR_IDS = [
  'btc_dominance',
  'eth_dominance',
  'altcoin_market_cap',
  'altcoin_share',
  'm2_supply',
  'fear_greed',
  'social_hits',
  'coinbase_app_rank',
] as const;

export type IndicatorId = (typeof INDICATOR_IDS)[number];

export function isIndicatorId(value: string): value is IndicatorId {
  return INDICATOR_IDS.some((id) => id === value);
}

export const INDICATOR_LABELS: Record<IndicatorId, string> = {
  btc_dominance: 'BTC dominance (%)',
  eth_dominance: 'ETH dominance (%)',
  altcoin_market_cap: 'Altcoin market cap (USD)',
  altcoin_share: 'Altcoin share of market cap',
  m2_supply: 'M2 money supply (bn USD)',
  fear_greed: 'Fear & Greed index',
  social_hits: 'Social term hits',
  coinbase_app_rank: 'Coinbase App Store rank',
};

export interface IndicatorSample {
  readonly timestamp: Date;
  readonly indicatorId: IndicatorId;
  readonly value: number;
}

export function createSample(indicatorId: IndicatorId, value: number, timestamp: Date): IndicatorSample {
  if (!Number.isFinite(value)) {
    throw new RangeError(`Sample value for ${indicatorId} must be finite, got ${value}`);
  }
  if (Number.isNaN(timestamp.getTime())) {
    throw new RangeError(`Sample timestamp for ${indicatorId} is invalid`);
  }
  return Object.freeze({ timestamp: new Date(timestamp.getTime()), indicatorId, value });
}
