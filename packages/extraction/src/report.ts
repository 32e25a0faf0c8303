import { formatPrice } from "./price";
import type { BaselineConfig, ParsedSpecs, ScoredListing } from "./types";

const TABLE_WIDTH = 100;
const NAME_COLUMN_WIDTH = 58;

export function shortenName(name: string, maxLength = 55): string {
  return name.length > maxLength ? `${name.slice(0, maxLength)}...` : name;
}

export function describeBaseline(baseline: BaselineConfig): string {
  return `CPU Gen ${baseline.cpuGen}, RAM ${baseline.ramGb}GB, Storage ${baseline.storageGb}GB`;
}

export function describeSpecs(specs: ParsedSpecs): string {
  return [
    `CPU Gen ${specs.cpuGen ?? "unknown"}`,
    `RAM ${formatGigabytes(specs.ramGb)}`,
    `Storage ${formatGigabytes(specs.storageGb)}`,
    `GPU ${specs.gpu ?? "unknown"}`,
  ].join(", ");
}

export function formatDealRow(deal: ScoredListing): string {
  const savings = deal.savingCents === null ? "-" : formatPrice(deal.savingCents);
  return [
    shortenName(deal.name).padEnd(NAME_COLUMN_WIDTH),
    formatPrice(deal.priceCents).padStart(10),
    savings.padStart(10),
    deal.notes || "-",
  ].join(" | ");
}

export function formatDealsTable(deals: readonly ScoredListing[], baseline: BaselineConfig): string {
  if (deals.length === 0) {
    return "No upgrades found matching your criteria.";
  }

  const rule = "=".repeat(TABLE_WIDTH);
  return [
    rule,
    `LAPTOP DEALS - Compared to: ${describeBaseline(baseline)}`,
    rule,
    ["Name".padEnd(NAME_COLUMN_WIDTH), "Price".padStart(10), "Savings".padStart(10), "Notes"].join(" | "),
    "-".repeat(TABLE_WIDTH),
    ...deals.map(formatDealRow),
  ].join("\n");
}

export function formatBestDeal(deal: ScoredListing): string {
  const banner = "*".repeat(60);
  return [
    banner,
    "  BEST UPGRADE DEAL FOUND",
    banner,
    `  Product: ${shortenName(deal.name, 70)}`,
    `  Price:   ${formatPrice(deal.priceCents)}`,
    deal.savingCents === null ? null : `  Savings: ${formatPrice(deal.savingCents)}`,
    `  Specs:   ${describeSpecs(deal.specs)}`,
    `  Score:   ${deal.score}`,
    `  Link:    ${deal.url}`,
    banner,
  ]
    .filter((line): line is string => line !== null)
    .join("\n");
}

function formatGigabytes(value: number | null): string {
  return value === null ? "unknown" : `${value}GB`;
}
