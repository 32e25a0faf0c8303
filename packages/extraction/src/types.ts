export type BlobLocation = {
  start: number;
  end: number;
  text: string;
};

export type RawListing = {
  name: string;
  priceCents: number;
  regularPriceCents: number | null;
  url: string;
  sku: string | null;
  position: number;
};

export type SkipReason = "INVALID_NODE" | "MISSING_NAME" | "MISSING_PRICE" | "MISSING_URL" | "DUPLICATE_URL";

export type ListingSkip = {
  reason: SkipReason;
  index: number;
  container: string;
  url?: string;
};

export type ParsedSpecs = {
  cpuGen: number | null;
  cpuModel: string | null;
  ramGb: number | null;
  storageGb: number | null;
  gpu: string | null;
};

export type BaselineConfig = {
  readonly ramGb: number;
  readonly storageGb: number;
  readonly cpuGen: number;
};

export type ComparisonFlags = {
  cpu: boolean | null;
  ram: boolean | null;
  storage: boolean | null;
  discount: boolean;
};

export type ScoredListing = Readonly<
  RawListing & {
    specs: Readonly<ParsedSpecs>;
    flags: Readonly<ComparisonFlags>;
    savingCents: number | null;
    score: number;
    notes: string;
  }
>;

export type RankOptions = {
  includeAll?: boolean;
  topN?: number;
};

export type DealReport = {
  deals: ScoredListing[];
  extractedCount: number;
  skipped: ListingSkip[];
};

export type AnalysisResult = {
  file: string;
  status: "SUCCESS" | "FAILED";
  report?: DealReport;
  reason?: string;
  message?: string;
};
