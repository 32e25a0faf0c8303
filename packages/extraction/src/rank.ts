import type { RankOptions, ScoredListing } from "./types";

export function compareRank(a: ScoredListing, b: ScoredListing): number {
  return b.score - a.score || a.priceCents - b.priceCents || a.position - b.position;
}

export function rankListings(listings: Iterable<ScoredListing>, options: RankOptions = {}): ScoredListing[] {
  const ranked = [...listings].filter((listing) => options.includeAll || listing.score > 0).sort(compareRank);

  if (options.topN !== undefined) {
    if (!Number.isInteger(options.topN) || options.topN < 1) {
      throw new RangeError(`topN must be a positive integer, got ${options.topN}`);
    }
    return ranked.slice(0, options.topN);
  }

  return ranked;
}
