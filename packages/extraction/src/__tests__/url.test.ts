import { describe, expect, it } from "vitest";

import { normalizeProductUrl, resolveProductUrl } from "../url";

describe("resolveProductUrl", () => {
  it("resolves a relative product path against the store", () => {
    expect(resolveProductUrl("/en-ca/product/acer-nitro-v/17000001", "17000001")).toBe(
      "https://www.bestbuy.ca/en-ca/product/acer-nitro-v/17000001",
    );
  });

  it("builds a path from the SKU when there is no product path", () => {
    expect(resolveProductUrl(null, "17000006")).toBe("https://www.bestbuy.ca/en-ca/product/17000006");
  });

  it("returns null without a path or SKU", () => {
    expect(resolveProductUrl("  ", null)).toBeNull();
  });
});

describe("normalizeProductUrl", () => {
  it("drops tracking parameters, fragments and trailing slashes", () => {
    expect(normalizeProductUrl("https://www.bestbuy.ca/en-ca/product/x/1/?utm_source=feed&b=2&a=1#reviews")).toBe(
      "https://www.bestbuy.ca/en-ca/product/x/1?a=1&b=2",
    );
  });

  it("resolves relative paths against the store before cleaning them", () => {
    expect(normalizeProductUrl("/en-ca/product/x/1/?icmp=Recos_4across&ICMP=x#top")).toBe(
      "https://www.bestbuy.ca/en-ca/product/x/1",
    );
  });
});
