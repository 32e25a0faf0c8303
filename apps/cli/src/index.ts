#!/usr/bin/env tsx
import "dotenv/config";

import { writeFile } from "node:fs/promises";
import path from "node:path";

import {
  DealFinderService,
  describeBaseline,
  formatBestDeal,
  formatDealsTable,
  loadDefaults,
  renderWishlistHtml,
  type AnalysisResult,
} from "@laptop-deals/extraction";
import { ZodError } from "zod";

import { CliUsageError, parseCliArgs, USAGE, type CliOptions } from "./args";

async function main(): Promise<number> {
  const defaults = loadDefaults();
  const parsed = parseCliArgs(process.argv.slice(2), defaults);

  if (parsed.help) {
    console.log(USAGE);
    return 0;
  }

  const { options } = parsed;
  const service = new DealFinderService({ concurrency: defaults.fileConcurrency });

  console.log(`[deals] Comparing against ${describeBaseline(options.baseline)}`);
  const results = await service.analyzeFiles(options.files, options.baseline, { includeAll: options.includeAll });

  let failed = 0;
  for (const [index, result] of results.entries()) {
    if (result.status === "FAILED" || !result.report) {
      failed += 1;
      console.error(`[deals] ${result.file}: ${result.reason ?? "UNEXPECTED_ERROR"} ${result.message ?? ""}`.trim());
      continue;
    }
    await printResult(result, options, results.length > 1 ? index + 1 : null);
  }

  return failed > 0 ? 1 : 0;
}

async function printResult(result: AnalysisResult, options: CliOptions, fileNumber: number | null): Promise<void> {
  const report = result.report;
  if (!report) {
    return;
  }

  console.log(`[deals] ${result.file}: found ${report.extractedCount} products`);
  if (report.skipped.length > 0) {
    const reasons = new Map<string, number>();
    for (const skip of report.skipped) {
      reasons.set(skip.reason, (reasons.get(skip.reason) ?? 0) + 1);
    }
    const summary = [...reasons].map(([reason, count]) => `${reason}=${count}`).join(", ");
    console.log(`[deals] ${result.file}: skipped ${report.skipped.length} product nodes (${summary})`);
  }

  console.log(`[deals] Found ${report.deals.length} ${options.includeAll ? "products" : "potential upgrades"}`);
  console.log(formatDealsTable(report.deals, options.baseline));

  const best = report.deals[0];
  if (best) {
    console.log(formatBestDeal(best));
  }

  if (options.wishlist && report.deals.length > 0) {
    const output = fileNumber === null ? options.output : numberedPath(options.output, fileNumber);
    await writeFile(output, renderWishlistHtml(report.deals, { topN: options.topN }), "utf8");
    console.log(`[deals] Wishlist saved to: ${output}`);
  }
}

function numberedPath(file: string, fileNumber: number): string {
  const parsed = path.parse(file);
  return path.join(parsed.dir, `${parsed.name}-${fileNumber}${parsed.ext}`);
}

void main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof CliUsageError) {
      console.error(`[deals] ${error.message}`);
      console.error(USAGE);
    } else if (error instanceof ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`).join("; ");
      console.error(`[deals] Invalid options: ${issues}`);
    } else {
      console.error("[deals] Run failed", error);
    }
    process.exitCode = 1;
  });
