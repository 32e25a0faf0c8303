import { parseSpecs } from "./specs";
import type { BaselineConfig, ComparisonFlags, ParsedSpecs, RawListing, ScoredListing } from "./types";

export const SCORE_WEIGHTS = {
  cpu: 2,
  ram: 2,
  storage: 1,
  discount: 1,
} as const satisfies Record<keyof ComparisonFlags, number>;

export function compareSpecs(listing: RawListing, specs: ParsedSpecs, baseline: BaselineConfig): ComparisonFlags {
  return {
    cpu: exceeds(specs.cpuGen, baseline.cpuGen),
    ram: exceeds(specs.ramGb, baseline.ramGb),
    storage: specs.storageGb === null ? null : specs.storageGb >= baseline.storageGb,
    discount: listing.regularPriceCents !== null && listing.regularPriceCents > listing.priceCents,
  };
}

export function scoreFlags(flags: ComparisonFlags): number {
  return (
    (flags.cpu === true ? SCORE_WEIGHTS.cpu : 0) +
    (flags.ram === true ? SCORE_WEIGHTS.ram : 0) +
    (flags.storage === true ? SCORE_WEIGHTS.storage : 0) +
    (flags.discount ? SCORE_WEIGHTS.discount : 0)
  );
}

export function buildNotes(specs: ParsedSpecs, flags: ComparisonFlags): string {
  const notes: string[] = [];
  if (flags.cpu === true) {
    notes.push(`CPU+ (Gen ${specs.cpuGen})`);
  }
  if (flags.ram === true) {
    notes.push(`RAM+ (${specs.ramGb}GB)`);
  }
  if (flags.storage === true) {
    notes.push(`Storage+ (${specs.storageGb}GB)`);
  }
  return notes.join(", ");
}

export function scoreListing(listing: RawListing, baseline: BaselineConfig, specs: ParsedSpecs = parseSpecs(listing.name)): ScoredListing {
  const flags = compareSpecs(listing, specs, baseline);

  return Object.freeze({
    ...listing,
    specs: Object.freeze({ ...specs }),
    flags: Object.freeze(flags),
    savingCents: flags.discount && listing.regularPriceCents !== null ? listing.regularPriceCents - listing.priceCents : null,
    score: scoreFlags(flags),
    notes: buildNotes(specs, flags),
  });
}

function exceeds(value: number | null, baseline: number): boolean | null {
  return value === null ? null : value > baseline;
}
