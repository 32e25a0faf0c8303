import { z } from "zod";

import { BASELINE_SCHEMA, type DealDefaults } from "@laptop-deals/extraction";

const CLI_OPTIONS_SCHEMA = z.object({
  files: z.array(z.string().min(1)).min(1, "At least one --html file is required"),
  baseline: BASELINE_SCHEMA,
  includeAll: z.boolean(),
  topN: z.number().int().positive(),
  wishlist: z.boolean(),
  output: z.string().min(1),
});

export type CliOptions = z.infer<typeof CLI_OPTIONS_SCHEMA>;

// Malformed command line; the caller prints the message with the usage text.
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export type ParsedArgs = { help: true } | { help: false; options: CliOptions };

const VALUE_FLAGS = new Set(["--html", "-f", "--ram", "--storage", "--cpu-gen", "--top", "--output", "-o"]);

export function parseCliArgs(argv: string[], defaults: DealDefaults): ParsedArgs {
  const files: string[] = [];
  const raw: Record<string, string> = {};
  let includeAll = false;
  let wishlist = false;

  for (let i = 0; i < argv.length; i += 1) {
    const [flag, inlineValue] = splitFlag(argv[i]);

    if (flag === "--help" || flag === "-h") {
      return { help: true };
    }
    if (flag === "--all") {
      includeAll = true;
      continue;
    }
    if (flag === "--wishlist" || flag === "-w") {
      wishlist = true;
      continue;
    }
    if (!VALUE_FLAGS.has(flag)) {
      throw new CliUsageError(`Unknown option: ${argv[i]}`);
    }

    const value = inlineValue ?? argv[i + 1];
    if (inlineValue === undefined) {
      i += 1;
    }
    if (value === undefined || value.startsWith("-")) {
      throw new CliUsageError(`Option ${flag} needs a value`);
    }

    if (flag === "--html" || flag === "-f") {
      files.push(value);
    } else {
      raw[flag === "-o" ? "--output" : flag] = value;
    }
  }

  const options = CLI_OPTIONS_SCHEMA.parse({
    files,
    baseline: {
      ramGb: readInt(raw["--ram"], defaults.baseline.ramGb),
      storageGb: readInt(raw["--storage"], defaults.baseline.storageGb),
      cpuGen: readInt(raw["--cpu-gen"], defaults.baseline.cpuGen),
    },
    includeAll,
    topN: readInt(raw["--top"], defaults.topN),
    wishlist,
    output: raw["--output"] ?? "wishlist.html",
  });

  return { help: false, options };
}

export const USAGE = `
Laptop Deal Finder

Usage:
  deals --html <saved-page.html> [options]

Options:
  --html, -f <file>   Saved search results page (repeat for several pages)
  --ram <GB>          Current RAM in GB (default: DEALS_BASELINE_RAM_GB or 16)
  --storage <GB>      Current storage in GB (default: DEALS_BASELINE_STORAGE_GB or 512)
  --cpu-gen <n>       Current CPU generation (default: DEALS_BASELINE_CPU_GEN or 10)
  --all               Show every listing, not only upgrades
  --top <n>           Listings to include in the wishlist (default: DEALS_TOP_N or 3)
  --wishlist, -w      Write an HTML wishlist of the top listings
  --output, -o <path> Wishlist path (default: wishlist.html)
  --help, -h          Show this help

Example:
  deals --html laptops.html --ram 16 --storage 1800 --cpu-gen 10 --wishlist --top 5
`;

function splitFlag(arg: string): [string, string | undefined] {
  const equals = arg.indexOf("=");
  if (arg.startsWith("--") && equals !== -1) {
    return [arg.slice(0, equals), arg.slice(equals + 1)];
  }
  return [arg, undefined];
}

// Non-numeric input becomes NaN so the schema reports it.
function readInt(raw: string | undefined, fallback: number): number {
  if (raw === undefined) {
    return fallback;
  }
  return /^-?\d+$/.test(raw.trim()) ? Number.parseInt(raw, 10) : Number.NaN;
}
