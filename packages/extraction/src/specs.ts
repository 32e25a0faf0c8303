import type { ParsedSpecs } from "./types";

type SpecField = "cpuGen" | "ramGb" | "storageGb" | "gpu";

export type SpecRule = {
  name: string;
  field: SpecField;
  extract: (title: string) => Partial<ParsedSpecs> | null;
};

type SizeToken = {
  gigabytes: number;
  unit: "GB" | "TB";
};

// Generation reported for chip families whose model numbers do not encode one.
export const LATEST_CPU_GENERATION = 14;

const RYZEN_GENERATION_OFFSET = 6;
const MAX_BARE_RAM_GB = 64;
const MIN_BARE_STORAGE_GB = 128;

// A size with none of these right after it is a "bare" size: the title does not
// say whether it is memory or storage.
const BARE_SIZE_PATTERN =
  /(\d+(?:\.\d+)?)\s*(GB|TB)\b(?!\s*(?:(?:LP|G)?DDR|V?RAM\b|memory\b|SSD\b|HDD\b|eMMC\b|UFS\b|storage\b|NVMe\b|PCIe\b|M\.2))/gi;

/**
 * Field extractors, in priority order. For each field the first rule that
 * produces a value wins; later rules for that field are not consulted.
 */
export const SPEC_RULES: readonly SpecRule[] = [
  {
    name: "intel-core-model",
    field: "cpuGen",
    extract: matchOnce(/\bi([3579])[-\s]?(\d{4,5})(?!\s*[GT]B\b)([a-z]{0,2}\d?)\b/i, (match) => ({
      cpuGen: positiveInteger(intelGeneration(match[2])),
      cpuModel: `i${match[1]}-${match[2]}${match[3].toUpperCase()}`,
    })),
  },
  {
    name: "intel-core-ultra",
    field: "cpuGen",
    extract: matchOnce(/\b(?:core\s+)?ultra\s*([579])\b(?:[\s-]*(\d{3}[a-z]{0,2})\b)?/i, (match) => ({
      cpuGen: LATEST_CPU_GENERATION,
      cpuModel: joinModel(`Ultra ${match[1]}`, match[2]?.toUpperCase()),
    })),
  },
  {
    name: "amd-ryzen-ai",
    field: "cpuGen",
    extract: matchOnce(/\bryzen\s+ai\s+(?:max\+?\s+)?([579])\b(?:\s*(?:hx|pro)?\s*(\d{3})\b)?/i, (match) => ({
      cpuGen: LATEST_CPU_GENERATION,
      cpuModel: joinModel(`Ryzen AI ${match[1]}`, match[2]),
    })),
  },
  {
    name: "amd-ryzen-model",
    field: "cpuGen",
    extract: matchOnce(/\bryzen\s*([3579])\s*(?:pro\s+)?(\d{4})([a-z]{0,2})\b/i, (match) => ({
      cpuGen: Number(match[2].charAt(0)) + RYZEN_GENERATION_OFFSET,
      cpuModel: `Ryzen ${match[1]} ${match[2]}${match[3].toUpperCase()}`,
    })),
  },
  {
    name: "snapdragon-x",
    field: "cpuGen",
    extract: matchOnce(/\bsnapdragon\s*x\b(?:\s*(plus|elite))?/i, (match) => ({
      cpuGen: LATEST_CPU_GENERATION,
      cpuModel: joinModel("Snapdragon X", match[1] ? capitalize(match[1]) : undefined),
    })),
  },
  {
    name: "ram-keyword",
    field: "ramGb",
    extract: matchOnce(/\b(\d{1,3})\s*GB\s*(?:(?:LP)?DDR\d\w*\s*)?(?:RAM|memory)\b/i, (match) => ({
      ramGb: positiveInteger(Number(match[1])),
    })),
  },
  {
    name: "ram-ddr",
    field: "ramGb",
    extract: matchOnce(/\b(\d{1,3})\s*GB\s*(?:LP)?DDR\d/i, (match) => ({
      ramGb: positiveInteger(Number(match[1])),
    })),
  },
  {
    name: "ram-bare-size",
    field: "ramGb",
    extract: (title) => {
      const token = bareSizes(title).find((size) => size.unit === "GB" && size.gigabytes <= MAX_BARE_RAM_GB);
      return token ? { ramGb: token.gigabytes } : null;
    },
  },
  {
    name: "storage-keyword",
    field: "storageGb",
    extract: matchOnce(
      /(\d+(?:\.\d+)?)\s*(TB|GB)\s*(?:(?:PCIe|NVMe|M\.2|Gen\s?\d)\s*)*(?:SSD|HDD|eMMC|UFS|storage|NVMe|PCIe)\b/i,
      (match) => ({ storageGb: toGigabytes(match[1], match[2]) }),
    ),
  },
  {
    name: "storage-bare-terabytes",
    field: "storageGb",
    extract: (title) => {
      const token = bareSizes(title).find((size) => size.unit === "TB");
      return token ? { storageGb: token.gigabytes } : null;
    },
  },
  {
    name: "storage-bare-size",
    field: "storageGb",
    extract: (title) => {
      const token = bareSizes(title).find((size) => size.unit === "GB" && size.gigabytes >= MIN_BARE_STORAGE_GB);
      return token ? { storageGb: token.gigabytes } : null;
    },
  },
  {
    name: "nvidia-geforce",
    field: "gpu",
    extract: matchOnce(/\b(RTX|GTX)\s*(\d{3,4})(\s*ti)?\b/i, (match) => ({
      gpu: `${match[1].toUpperCase()} ${match[2]}${match[3] ? " Ti" : ""}`,
    })),
  },
  {
    name: "amd-radeon",
    field: "gpu",
    extract: matchOnce(/\bRX\s*(\d{4})(\s*XTX|\s*XT|[SM])?\b/i, (match) => ({
      gpu: `RX ${match[1]}${radeonSuffix(match[2])}`,
    })),
  },
];

export function emptySpecs(): ParsedSpecs {
  return {
    cpuGen: null,
    cpuModel: null,
    ramGb: null,
    storageGb: null,
    gpu: null,
  };
}

export function parseSpecs(title: string, rules: readonly SpecRule[] = SPEC_RULES): ParsedSpecs {
  const specs = emptySpecs();
  const normalized = title.replace(/\s+/g, " ");

  for (const rule of rules) {
    if (specs[rule.field] !== null) {
      continue;
    }

    const found = rule.extract(normalized);
    if (!found || found[rule.field] === null || found[rule.field] === undefined) {
      continue;
    }

    Object.assign(specs, found);
  }

  return specs;
}

/**
 * 5-digit models and 4-digit models starting with 1 (i7-1165G7, i5-1235U) carry
 * a two-digit generation; older 4-digit models carry one digit.
 */
export function intelGeneration(modelNumber: string): number {
  if (modelNumber.length === 5 || (modelNumber.length === 4 && modelNumber.startsWith("1"))) {
    return Number(modelNumber.slice(0, 2));
  }
  return Number(modelNumber.charAt(0));
}

export function toGigabytes(amount: string, unit: string): number | null {
  const value = Number.parseFloat(amount);
  if (!Number.isFinite(value)) {
    return null;
  }
  return positiveInteger(unit.toUpperCase() === "TB" ? value * 1024 : value);
}

function bareSizes(title: string): SizeToken[] {
  const tokens: SizeToken[] = [];
  for (const match of title.matchAll(BARE_SIZE_PATTERN)) {
    const gigabytes = toGigabytes(match[1], match[2]);
    if (gigabytes !== null) {
      tokens.push({ gigabytes, unit: match[2].toUpperCase() === "TB" ? "TB" : "GB" });
    }
  }
  return tokens;
}

function matchOnce(
  pattern: RegExp,
  read: (match: RegExpMatchArray) => Partial<ParsedSpecs>,
): (title: string) => Partial<ParsedSpecs> | null {
  return (title) => {
    const match = title.match(pattern);
    return match ? read(match) : null;
  };
}

function positiveInteger(value: number): number | null {
  const rounded = Math.round(value);
  return Number.isFinite(rounded) && rounded > 0 ? rounded : null;
}

function joinModel(family: string, model: string | undefined): string {
  return model ? `${family} ${model}` : family;
}

// Single-letter suffixes (7600S, 6500M) stay attached; XT and XTX are separate words.
function radeonSuffix(raw: string | undefined): string {
  const suffix = raw?.trim().toUpperCase() ?? "";
  return suffix.length > 1 ? ` ${suffix}` : suffix;
}

function capitalize(input: string): string {
  return input.charAt(0).toUpperCase() + input.slice(1).toLowerCase();
}
