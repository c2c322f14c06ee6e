export interface M2Observation {
  readonly date: string; // YYYY-MM-DD, as published by FRED
  readonly value: number;
}

export interface GlobalMarketData {
  readonly btcDominance: number;
  readonly ethDominance: number;
  readonly totalMarketCapUsd: number;
}

/**
 * Values fetched during one run. An absent field means the source failed
 * and every evaluator depending on it is skipped.
 */
export interface MarketSnapshot {
  readonly takenAt: Date;
  readonly global?: GlobalMarketData;
  readonly m2?: readonly M2Observation[];
  readonly fearGreed?: number;
  readonly trendingTopics?: readonly string[];
  readonly topApps?: readonly string[];
}

export function altcoinMarketCap(global: GlobalMarketData): number {
  return (global.totalMarketCapUsd * (100 - global.btcDominance - global.ethDominance)) / 100;
}

export function altcoinShare(global: GlobalMarketData): number {
  if (global.totalMarketCapUsd <= 0) return 0;
  return altcoinMarketCap(global) / global.totalMarketCapUsd;
}
