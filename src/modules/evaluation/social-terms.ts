/**
 * Configured terms that occur (case-insensitive substring) in at least one
 * feed entry. Each term counts once, in configuration order.
 */
export function matchSocialTerms(terms: readonly string[], feed: readonly string[]): string[] {
  const entries = feed.map((entry) => entry.toLowerCase());
  const seen = new Set<string>();
  const matched: string[] = [];

  for (const term of terms) {
    const needle = term.trim().toLowerCase();
    if (!needle || seen.has(needle)) continue;
    seen.add(needle);
    if (entries.some((entry) => entry.includes(needle))) {
      matched.push(term.trim());
    }
  }
  return matched;
}

/** 1-based position of the first app whose name mentions Coinbase. */
export function coinbaseRank(apps: readonly string[]): number | null {
  const index = apps.findIndex((name) => name.toLowerCase().includes('coinbase'));
  return index >= 0 ? index + 1 : null;
}

export function socialFeed(snapshot: {
  readonly trendingTopics?: readonly string[];
  readonly topApps?: readonly string[];
}): readonly string[] | null {
  if (!snapshot.trendingTopics && !snapshot.topApps) return null;
  return [...(snapshot.trendingTopics ?? []), ...(snapshot.topApps ?? [])];
}
