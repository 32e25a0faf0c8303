import { readFileSync } from "node:fs";

import { describe, expect, it } from "vitest";

import { locateBlob, parseBlob } from "../blob";
import { BlobMalformedError, BlobNotFoundError, DealFinderError } from "../errors";

const savedPage = readFileSync(new URL("./fixtures/bestbuy-laptops.html", import.meta.url), "utf8");

function isBalanced(text: string): boolean {
  let depth = 0;
  let inString = false;
  let escaped = false;
  for (const char of text) {
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === "\\") {
        escaped = true;
      } else if (char === "\"") {
        inString = false;
      }
      continue;
    }
    if (char === "\"") {
      inString = true;
    } else if (char === "{" || char === "[") {
      depth += 1;
    } else if (char === "}" || char === "]") {
      depth -= 1;
      if (depth < 0) {
        return false;
      }
    }
  }
  return depth === 0 && !inString;
}

function captureError(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  return null;
}

describe("locateBlob", () => {
  it("finds the state object between surrounding scripts", () => {
    const blob = locateBlob(savedPage);

    expect(blob.text.startsWith("{\"config\"")).toBe(true);
    expect(blob.text.endsWith("}}}")).toBe(true);
    expect(savedPage.slice(blob.end, blob.end + 1)).toBe(";");
    expect(savedPage.slice(blob.start, blob.end)).toBe(blob.text);
    expect(isBalanced(blob.text)).toBe(true);
  });

  it("ignores braces and escaped quotes inside string values", () => {
    const html = `<script>window.__INITIAL_STATE__ = {"a":"}]{\\"","b":[1,{"c":"]"}]}; var after = {};</script>`;

    expect(locateBlob(html).text).toBe(`{"a":"}]{\\"","b":[1,{"c":"]"}]}`);
  });

  it("accepts an array value and no whitespace around the assignment", () => {
    expect(locateBlob("x;window.__INITIAL_STATE__=[1,[2]];y").text).toBe("[1,[2]]");
  });

  it("skips comparisons against the anchor", () => {
    const html = `if (window.__INITIAL_STATE__ === undefined) {} window.__INITIAL_STATE__ = {"ok":true};`;

    expect(locateBlob(html).text).toBe(`{"ok":true}`);
  });

  it("throws BlobNotFound when the anchor is absent", () => {
    expect(() => locateBlob("<html><script>window.other = {};</script></html>")).toThrow(BlobNotFoundError);
  });

  it("throws BlobMalformed when braces never balance", () => {
    const html = `<script>window.__INITIAL_STATE__ = {"products":[{"name":"A"}</script>`;

    expect(() => locateBlob(html)).toThrow(BlobMalformedError);
  });

  it("throws BlobMalformed on a mismatched closing bracket", () => {
    expect(() => locateBlob(`window.__INITIAL_STATE__ = {"a":[1}]`)).toThrow(/Unbalanced "}"/);
  });

  it("throws BlobMalformed when the anchor is not followed by JSON", () => {
    expect(() => locateBlob("window.__INITIAL_STATE__ = loadState();")).toThrow(BlobMalformedError);
  });
});

describe("parseBlob", () => {
  it("decodes the embedded state", () => {
    const state = parseBlob(savedPage);

    expect(state).toMatchObject({ config: { locale: "en-CA", banner: "{Boxing Week} [deals] \"now\" on" } });
  });

  it("throws BlobMalformed for balanced but invalid JSON", () => {
    expect(() => parseBlob("window.__INITIAL_STATE__ = {products: []};")).toThrow(BlobMalformedError);
  });

  it("reports a missing anchor with its error code", () => {
    const error = captureError(() => parseBlob("<html></html>"));

    expect(error).toBeInstanceOf(DealFinderError);
    expect(error instanceof DealFinderError ? error.code : null).toBe("BLOB_NOT_FOUND");
    expect(error instanceof Error ? error.name : null).toBe("BlobNotFoundError");
  });
});
