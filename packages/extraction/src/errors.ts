export type DealFinderErrorCode = "BLOB_NOT_FOUND" | "BLOB_MALFORMED" | "SCHEMA_MISMATCH";

export class DealFinderError extends Error {
  readonly code: DealFinderErrorCode;

  constructor(code: DealFinderErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class BlobNotFoundError extends DealFinderError {
  constructor(message = "No embedded product data found in page") {
    super("BLOB_NOT_FOUND", message);
  }
}

export class BlobMalformedError extends DealFinderError {
  readonly offset?: number;

  constructor(message: string, offset?: number) {
    super("BLOB_MALFORMED", message);
    this.offset = offset;
  }
}

export class SchemaMismatchError extends DealFinderError {
  constructor(message: string) {
    super("SCHEMA_MISMATCH", message);
  }
}

export function isDealFinderError(error: unknown): error is DealFinderError {
  return error instanceof DealFinderError;
}
