import { readFileSync } from "node:fs";

import { describe, expect, it } from "vitest";

import { parseBlob } from "../blob";
import { SchemaMismatchError } from "../errors";
import { extractListings, iterateListings } from "../listings";
import type { ListingSkip } from "../types";

const savedPage = readFileSync(new URL("./fixtures/bestbuy-laptops.html", import.meta.url), "utf8");

describe("extractListings", () => {
  it("walks every product container in page order", () => {
    const listings = extractListings(parseBlob(savedPage));

    expect(listings.map((listing) => listing.sku)).toEqual(["17000001", "17000002", "17000003", "17000005", "17000006"]);
    expect(listings.map((listing) => listing.position)).toEqual([0, 1, 2, 3, 4]);
  });

  it("normalizes prices, original prices and URLs", () => {
    const [acer, asus, hp, msi, dell] = extractListings(parseBlob(savedPage));

    expect(acer).toEqual({
      name: "Acer Nitro V 15.6\" FHD Gaming Laptop, Intel Core i7-13620H, 32GB RAM, 2048GB SSD",
      priceCents: 129999,
      regularPriceCents: 149999,
      url: "https://www.bestbuy.ca/en-ca/product/acer-nitro-v/17000001",
      sku: "17000001",
      position: 0,
    });
    expect(asus.url).toBe("https://www.bestbuy.ca/en-ca/product/asus-vivobook-16/17000002");
    expect(asus.regularPriceCents).toBe(74999);
    expect(hp.regularPriceCents).toBeNull();
    expect(hp.url).toBe("https://www.bestbuy.ca/en-ca/product/hp-15-6-laptop/17000003");
    expect(msi.priceCents).toBe(99999);
    expect(msi.regularPriceCents).toBe(119999);
    expect(dell.url).toBe("https://www.bestbuy.ca/en-ca/product/17000006");
  });

  it("keeps the first listing for a repeated product URL and reports the rest", () => {
    const skipped: ListingSkip[] = [];
    const listings = extractListings(parseBlob(savedPage), { onSkip: (skip) => skipped.push(skip) });

    const asus = listings.filter((listing) => listing.sku === "17000002");
    expect(asus).toHaveLength(1);
    expect(asus[0].priceCents).toBe(74999);
    expect(skipped).toEqual([
      {
        reason: "DUPLICATE_URL",
        index: 3,
        container: "productList.data.products",
        url: "https://www.bestbuy.ca/en-ca/product/asus-vivobook-16/17000002",
      },
      { reason: "MISSING_PRICE", index: 4, container: "productList.data.products" },
      { reason: "MISSING_URL", index: 1, container: "search.searchResult.results" },
      { reason: "INVALID_NODE", index: 2, container: "search.searchResult.results" },
      { reason: "MISSING_NAME", index: 3, container: "search.searchResult.results" },
    ]);
  });

  it("yields the same URL set on repeated runs", () => {
    const state = parseBlob(savedPage);
    const first = extractListings(state).map((listing) => listing.url);
    const second = extractListings(state).map((listing) => listing.url);

    expect(second).toEqual(first);
    expect(new Set(first).size).toBe(first.length);
  });

  it("produces listings lazily", () => {
    const state = {
      search: {
        results: [
          { name: "First", priceWithoutEhf: 100, sku: "1" },
          { name: "Second", priceWithoutEhf: 200, sku: "2" },
        ],
      },
    };

    const iterator = iterateListings(state);
    expect(iterator.next().value).toMatchObject({ name: "First", priceCents: 10000 });
    expect(iterator.next().value).toMatchObject({ name: "Second", priceCents: 20000 });
    expect(iterator.next().done).toBe(true);
  });

  it("accepts an empty product list", () => {
    expect(extractListings({ productList: { data: { products: [] } } })).toEqual([]);
  });

  it("falls back to the product path built from the SKU", () => {
    const [listing] = extractListings({ search: { searchResult: { products: [{ name: "Laptop", price: "$1 099,99", sku: 42 }] } } });

    expect(listing.url).toBe("https://www.bestbuy.ca/en-ca/product/42");
    expect(listing.priceCents).toBe(109999);
  });

  it("throws SchemaMismatch when the state is not an object", () => {
    expect(() => iterateListings([1, 2, 3])).toThrow(SchemaMismatchError);
  });

  it("throws SchemaMismatch when no product container exists", () => {
    expect(() => iterateListings({ header: {}, footer: {} })).toThrow(/top-level keys: header, footer/);
  });
});
