import { readFile } from "node:fs/promises";

import pLimit from "p-limit";
import { ZodError } from "zod";

import { parseBlob } from "./blob";
import { scoreListing } from "./compare";
import { parseBaseline } from "./config";
import { isDealFinderError } from "./errors";
import { iterateListings } from "./listings";
import { rankListings } from "./rank";
import type { AnalysisResult, BaselineConfig, DealReport, ListingSkip, RankOptions, ScoredListing } from "./types";

export type FindDealsOptions = RankOptions & {
  baseUrl?: string;
};

type ServiceDependencies = {
  readPage?: (file: string) => Promise<string>;
  concurrency?: number;
};

/**
 * Runs the whole pipeline over one saved page: locate the embedded state, extract
 * listings, parse and score each one against the baseline, then rank.
 *
 * Structural problems with the page throw; per-listing gaps end up in `skipped`.
 */
export function findDeals(html: string, baseline: BaselineConfig, options: FindDealsOptions = {}): DealReport {
  const checkedBaseline = parseBaseline(baseline);
  const state = parseBlob(html);

  const skipped: ListingSkip[] = [];
  const scored: ScoredListing[] = [];
  const listings = iterateListings(state, {
    baseUrl: options.baseUrl,
    onSkip: (skip) => {
      skipped.push(skip);
    },
  });

  for (const listing of listings) {
    scored.push(scoreListing(listing, checkedBaseline));
  }

  return {
    deals: rankListings(scored, { includeAll: options.includeAll, topN: options.topN }),
    extractedCount: scored.length,
    skipped,
  };
}

export class DealFinderService {
  private readPage: (file: string) => Promise<string>;
  private concurrency: number;

  constructor(deps: ServiceDependencies = {}) {
    this.readPage = deps.readPage ?? ((file) => readFile(file, "utf8"));
    this.concurrency = deps.concurrency ?? 2;
  }

  async analyzeFile(file: string, baseline: BaselineConfig, options: FindDealsOptions = {}): Promise<AnalysisResult> {
    try {
      const html = await this.readPage(file);
      return {
        file,
        status: "SUCCESS",
        report: findDeals(html, baseline, options),
      };
    } catch (error) {
      return {
        file,
        status: "FAILED",
        reason: failureReason(error),
        message: error instanceof Error ? error.message : String(error),
      };
    }
  }

  async analyzeFiles(files: string[], baseline: BaselineConfig, options: FindDealsOptions = {}): Promise<AnalysisResult[]> {
    const limit = pLimit(this.concurrency);
    return Promise.all(files.map((file) => limit(() => this.analyzeFile(file, baseline, options))));
  }
}

export function failureReason(error: unknown): string {
  if (isDealFinderError(error)) {
    return error.code;
  }
  if (error instanceof ZodError || error instanceof RangeError) {
    return "INVALID_OPTIONS";
  }
  if (error instanceof Error && "code" in error && error.code === "ENOENT") {
    return "FILE_NOT_FOUND";
  }
  return "UNEXPECTED_ERROR";
}
