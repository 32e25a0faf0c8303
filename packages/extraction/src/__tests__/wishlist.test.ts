import { load } from "cheerio";
import { describe, expect, it } from "vitest";

import { scoreListing } from "../compare";
import type { BaselineConfig, RawListing } from "../types";
import { renderWishlistHtml } from "../wishlist";

const baseline: BaselineConfig = { ramGb: 16, storageGb: 512, cpuGen: 10 };

function makeDeal(position: number, name: string, regularPriceCents: number | null = null) {
  const listing: RawListing = {
    name,
    priceCents: 99999,
    regularPriceCents,
    url: `https://www.bestbuy.ca/en-ca/product/${position}?a=1&b=2`,
    sku: String(position),
    position,
  };
  return scoreListing(listing, baseline);
}

describe("renderWishlistHtml", () => {
  const deals = [
    makeDeal(0, "MSI Thin 15 (Intel Core i5-12450H / 16GB DDR4 / 512GB SSD / GeForce RTX 4050)", 119999),
    makeDeal(1, "Generic Laptop 32GB RAM 1TB SSD"),
    makeDeal(2, "Another Laptop i7-13620H"),
  ];

  it("renders the top listings", () => {
    const $ = load(renderWishlistHtml(deals, { topN: 2 }));

    expect($("title").text()).toBe("My Laptop Wishlist");
    expect($(".subtitle").text()).toBe("Top 2 upgrade options based on my analysis");
    expect($(".item")).toHaveLength(2);
    expect($(".item h2").first().text()).toBe("1. MSI Thin 15 (Intel Core i5-12450H / 16GB DDR4 / 512GB SSD / ...");
    expect($(".item .price-tag").first().text()).toBe("$999.99");
    expect($(".item .savings").first().text()).toBe("Save $200.00!");
    expect($(".item .savings")).toHaveLength(1);
    expect($(".item a.btn").first().attr("href")).toBe("https://www.bestbuy.ca/en-ca/product/0?a=1&b=2");
  });

  it("lists only the known specs", () => {
    const $ = load(renderWishlistHtml(deals));
    const specs = $(".item")
      .eq(1)
      .find(".specs li")
      .map((_, node) => $(node).text())
      .get();

    expect(specs).toEqual(["RAM: 32GB", "Storage: 1024GB"]);
    expect($(".item").eq(1).find(".upgrade-notes").text()).toBe("Upgrades: RAM+ (32GB), Storage+ (1024GB)");
  });

  it("inserts listing text as text", () => {
    const $ = load(renderWishlistHtml([makeDeal(9, "<script>alert(1)</script> 64GB RAM")]));

    expect($("script")).toHaveLength(0);
    expect($(".item h2").text()).toBe("1. <script>alert(1)</script> 64GB RAM");
  });
});
