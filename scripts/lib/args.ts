import { OUTPUT_FORMATS, type OutputFormat } from "../../src/lib/types";

export type ArchiveArgs = {
  configPath: string;
  outputDir?: string;
  formats?: OutputFormat[];
  verbose: boolean;
  quiet: boolean;
};

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((f) => f === value);
}

function requireValue(argv: string[], i: number, flag: string): string {
  const value = argv[i + 1];
  if (value == null || value.startsWith("--") || !value.trim()) throw new Error(`${flag} needs a value`);
  return value.trim();
}

export function parseArgs(argv: string[]): ArchiveArgs {
  const args: ArchiveArgs = {
    configPath: "broadsheet.config.json",
    verbose: false,
    quiet: false
  };

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (token === "--verbose") {
      args.verbose = true;
      continue;
    }
    if (token === "--quiet") {
      args.quiet = true;
      continue;
    }
    if (token === "--config") {
      args.configPath = requireValue(argv, i, "--config");
      i += 1;
      continue;
    }
    if (token === "--out") {
      args.outputDir = requireValue(argv, i, "--out");
      i += 1;
      continue;
    }
    if (token === "--formats") {
      const list = requireValue(argv, i, "--formats")
        .split(",")
        .map((s) => s.trim())
        .filter(Boolean);
      const unknown = list.filter((f) => !isOutputFormat(f));
      if (unknown.length > 0) {
        throw new Error(`--formats: unknown format ${unknown.join(", ")} (expected ${OUTPUT_FORMATS.join(", ")})`);
      }
      args.formats = [...new Set(list.filter(isOutputFormat))];
      i += 1;
      continue;
    }
    throw new Error(`unknown argument: ${token}`);
  }

  return args;
}
