import { BlobMalformedError, BlobNotFoundError } from "./errors";
import type { BlobLocation } from "./types";

const ANCHOR_PATTERN = /window\.__INITIAL_STATE__\s*=(?!=)\s*/g;

/**
 * Finds the JSON value assigned to `window.__INITIAL_STATE__` in a saved page.
 * The returned range is end-exclusive and always bracket-balanced.
 */
export function locateBlob(text: string): BlobLocation {
  let firstMismatch: BlobMalformedError | null = null;

  for (const anchor of text.matchAll(ANCHOR_PATTERN)) {
    const start = (anchor.index ?? 0) + anchor[0].length;
    const opener = text.charAt(start);

    if (opener !== "{" && opener !== "[") {
      firstMismatch ??= new BlobMalformedError(
        `Expected a JSON object or array after the state anchor, found ${describeChar(text, start)}`,
        start,
      );
      continue;
    }

    const end = findBalancedEnd(text, start);
    return { start, end, text: text.slice(start, end) };
  }

  if (firstMismatch) {
    throw firstMismatch;
  }

  throw new BlobNotFoundError();
}

export function parseBlob(text: string): unknown {
  const blob = locateBlob(text);

  try {
    return JSON.parse(blob.text);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new BlobMalformedError(`Embedded product data is not valid JSON: ${detail}`, blob.start);
  }
}

function findBalancedEnd(text: string, start: number): number {
  const closers: string[] = [];
  let inString = false;
  let escaped = false;

  for (let index = start; index < text.length; index += 1) {
    const char = text.charAt(index);

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
    } else if (char === "{") {
      closers.push("}");
    } else if (char === "[") {
      closers.push("]");
    } else if (char === "}" || char === "]") {
      const expected = closers.pop();
      if (expected !== char) {
        throw new BlobMalformedError(`Unbalanced "${char}" in embedded product data at offset ${index}`, index);
      }
      if (closers.length === 0) {
        return index + 1;
      }
    }
  }

  throw new BlobMalformedError("Embedded product data never closes before the end of the page", text.length);
}

function describeChar(text: string, index: number): string {
  return index >= text.length ? "end of input" : JSON.stringify(text.charAt(index));
}
