import { z } from "zod";

import { SchemaMismatchError } from "./errors";
import { toPriceCents } from "./price";
import type { ListingSkip, RawListing, SkipReason } from "./types";
import { resolveProductUrl, STORE_BASE_URL } from "./url";

// Search pages and category pages keep their result sets in different places.
export const PRODUCT_CONTAINER_PATHS: ReadonlyArray<readonly string[]> = [
  ["productList", "data", "products"],
  ["productList", "data", "results"],
  ["search", "searchResult", "results"],
  ["search", "searchResult", "products"],
  ["search", "results"],
];

const optionalText = z.string().trim().min(1).optional().catch(undefined);

const PRODUCT_NODE_SCHEMA = z.object({
  name: optionalText,
  sku: z
    .union([z.string(), z.number()])
    .transform((value) => String(value).trim())
    .pipe(z.string().min(1))
    .optional()
    .catch(undefined),
  seoUrl: optionalText,
  priceWithoutEhf: z.unknown(),
  salePrice: z.unknown(),
  currentPrice: z.unknown(),
  price: z.unknown(),
  regularPrice: z.unknown(),
  originalPrice: z.unknown(),
  wasPrice: z.unknown(),
  saving: z.unknown(),
});

type ProductContainer = {
  label: string;
  nodes: unknown[];
};

export type ExtractOptions = {
  baseUrl?: string;
  onSkip?: (skip: ListingSkip) => void;
};

/**
 * Yields one listing per product node, in page order, skipping nodes that lack a
 * name, price or URL and any node whose URL was already emitted.
 *
 * The top-level shape is checked when this is called, so a page with no product
 * containers fails before anything is iterated.
 */
export function iterateListings(state: unknown, options: ExtractOptions = {}): Generator<RawListing, void, undefined> {
  return walkContainers(findProductContainers(state), options);
}

export function extractListings(state: unknown, options: ExtractOptions = {}): RawListing[] {
  return [...iterateListings(state, options)];
}

function* walkContainers(containers: ProductContainer[], options: ExtractOptions): Generator<RawListing, void, undefined> {
  const baseUrl = options.baseUrl ?? STORE_BASE_URL;
  const seenUrls = new Set<string>();
  let position = 0;

  for (const container of containers) {
    for (const [index, node] of container.nodes.entries()) {
      const parsed = toRawListing(node, baseUrl);

      if ("reason" in parsed) {
        options.onSkip?.({ reason: parsed.reason, index, container: container.label });
        continue;
      }

      if (seenUrls.has(parsed.url)) {
        options.onSkip?.({ reason: "DUPLICATE_URL", index, container: container.label, url: parsed.url });
        continue;
      }

      seenUrls.add(parsed.url);
      yield { ...parsed, position };
      position += 1;
    }
  }
}

function findProductContainers(state: unknown): ProductContainer[] {
  if (!isRecord(state)) {
    throw new SchemaMismatchError(`Expected embedded state to be an object, got ${describeType(state)}`);
  }

  const containers: ProductContainer[] = [];
  for (const path of PRODUCT_CONTAINER_PATHS) {
    const value = readPath(state, path);
    if (Array.isArray(value)) {
      containers.push({ label: path.join("."), nodes: value });
    }
  }

  if (containers.length === 0) {
    const keys = Object.keys(state).slice(0, 12).join(", ") || "none";
    throw new SchemaMismatchError(`No product list found in embedded state (top-level keys: ${keys})`);
  }

  return containers;
}

function toRawListing(node: unknown, baseUrl: string): Omit<RawListing, "position"> | { reason: SkipReason } {
  const parsed = PRODUCT_NODE_SCHEMA.safeParse(node);
  if (!parsed.success) {
    return { reason: "INVALID_NODE" };
  }

  const record = parsed.data;
  if (!record.name) {
    return { reason: "MISSING_NAME" };
  }

  const priceCents = firstPriceCents([record.priceWithoutEhf, record.salePrice, record.currentPrice, record.price]);
  if (priceCents === null) {
    return { reason: "MISSING_PRICE" };
  }

  const sku = record.sku ?? null;
  const url = resolveProductUrl(record.seoUrl ?? null, sku, baseUrl);
  if (!url) {
    return { reason: "MISSING_URL" };
  }

  return {
    name: record.name.replace(/\s+/g, " "),
    priceCents,
    regularPriceCents: resolveRegularPriceCents(record, priceCents),
    url,
    sku,
  };
}

function resolveRegularPriceCents(record: z.infer<typeof PRODUCT_NODE_SCHEMA>, priceCents: number): number | null {
  const explicit = firstPriceCents([record.regularPrice, record.originalPrice, record.wasPrice]);
  if (explicit !== null) {
    return explicit;
  }

  const savingCents = toPriceCents(record.saving);
  return savingCents === null ? null : priceCents + savingCents;
}

function firstPriceCents(candidates: unknown[]): number | null {
  for (const candidate of candidates) {
    const cents = toPriceCents(candidate);
    if (cents !== null) {
      return cents;
    }
  }
  return null;
}

function readPath(value: unknown, path: readonly string[]): unknown {
  let current = value;
  for (const key of path) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[key];
  }
  return current;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describeType(value: unknown): string {
  if (value === null) {
    return "null";
  }
  return Array.isArray(value) ? "array" : typeof value;
}
