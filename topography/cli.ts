import { dirname, join } from "node:path";
import { assembleDirectory } from "./assemble.ts";
import { config, parseJobs, parseRadialList } from "./config.ts";
import { convertMatrix } from "./convert.ts";
import { ensureDir } from "./csv.ts";
import { dedupeDirectory } from "./dedupe.ts";
import { classify, errorMessage, formatError } from "./errors.ts";
import { defaultExtractOutput, extractDirectory } from "./extract.ts";
import { createLogger, type Logger } from "./logger.ts";
import { filterDirectory, splitDirectory } from "./radial.ts";

export const USAGE = `Usage: topo <command> [options]

Commands:
  extract   --input <dir|file> [--output <dir>] [--jobs N]
  dedupe    --input <dir> [--output <audit dir, default: parent of input>] [--cohort <name>] [--dry-run]
  assemble  --input <processed dir> --output <combined dir> [--sample <id>]... [--jobs N]
  filter    --input <dir|file> [--output <dir>] [--radial 1,8] [--jobs N]
  split     --input <dir|file> [--output <base dir>] [--radial 1,4,8] [--jobs N]
  convert   --input <matrix.csv> --output <file> [--value-column <name>]
  pipeline  --input <raw dir> [--output <combined dir>] [--jobs N]`;

const BOOLEAN_FLAGS = new Set(["dry-run", "help"]);

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export type ParsedArgs = {
  command: string | undefined;
  flags: Map<string, string[]>;
  switches: Set<string>;
};

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const flags = new Map<string, string[]>();
  const switches = new Set<string>();
  let command: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a.startsWith("--")) {
      if (command !== undefined) throw new UsageError(`Unexpected argument: ${a}`);
      command = a;
      continue;
    }
    const eq = a.indexOf("=");
    const name = eq === -1 ? a.slice(2) : a.slice(2, eq);
    if (BOOLEAN_FLAGS.has(name)) {
      switches.add(name);
      continue;
    }
    let value: string | undefined;
    if (eq !== -1) value = a.slice(eq + 1);
    else {
      value = argv[i + 1];
      if (value === undefined || value.startsWith("--")) throw new UsageError(`Missing value for --${name}`);
      i++;
    }
    flags.set(name, [...(flags.get(name) ?? []), value]);
  }
  return { command, flags, switches };
}

function optional(args: ParsedArgs, name: string): string | undefined {
  const values = args.flags.get(name);
  return values === undefined ? undefined : values[values.length - 1];
}

function required(args: ParsedArgs, name: string): string {
  const v = optional(args, name);
  if (v === undefined) throw new UsageError(`Missing required --${name}`);
  return v;
}

function jobsOf(args: ParsedArgs): number {
  try {
    return parseJobs(optional(args, "jobs"), config.JOBS);
  } catch (e) {
    throw new UsageError(errorMessage(e));
  }
}

function radialsOf(args: ParsedArgs): string[] {
  const raw = optional(args, "radial");
  try {
    return raw === undefined ? config.DEFAULT_RADIALS : parseRadialList(raw);
  } catch (e) {
    throw new UsageError(errorMessage(e));
  }
}

export type CliDeps = {
  logger?: Logger;
  /** Where usage text goes; defaults to stderr. */
  printUsage?: (text: string) => void;
};

async function dispatch(args: ParsedArgs, log: Logger): Promise<void> {
  const jobs = () => jobsOf(args);
  switch (args.command) {
    case "extract": {
      const input = required(args, "input");
      const output = optional(args, "output") ?? (await defaultExtractOutput(input));
      await extractDirectory(input, output, { jobs: jobs(), logger: log });
      return;
    }
    case "dedupe": {
      await dedupeDirectory(required(args, "input"), {
        auditDir: optional(args, "output"),
        cohort: optional(args, "cohort"),
        dryRun: args.switches.has("dry-run"),
        logger: log,
      });
      return;
    }
    case "assemble": {
      await assembleDirectory(required(args, "input"), required(args, "output"), {
        samples: args.flags.get("sample"),
        jobs: jobs(),
        logger: log,
      });
      return;
    }
    case "filter": {
      await filterDirectory(required(args, "input"), radialsOf(args), optional(args, "output"), {
        jobs: jobs(),
        logger: log,
      });
      return;
    }
    case "split": {
      const targets = radialsOf(args).map((k) => Number(k));
      await splitDirectory(required(args, "input"), targets, optional(args, "output"), { jobs: jobs(), logger: log });
      return;
    }
    case "convert": {
      const output = required(args, "output");
      await ensureDir(dirname(output), true);
      await convertMatrix(required(args, "input"), output, {
        valueColumn: optional(args, "value-column"),
        logger: log,
      });
      return;
    }
    case "pipeline": {
      const input = required(args, "input");
      const processed = join(input, config.PROCESSED_DIR_NAME);
      const combined = optional(args, "output") ?? join(input, "combined_data");
      await extractDirectory(input, processed, { jobs: jobs(), logger: log });
      await assembleDirectory(processed, combined, { jobs: jobs(), logger: log });
      return;
    }
    case undefined:
      throw new UsageError("Missing command");
    default:
      throw new UsageError(`Unknown command: ${args.command}`);
  }
}

/**
 * Runs one CLI invocation and returns the process exit code. Per-file
 * failures are logged by the stages and do not affect the code.
 */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const printUsage = deps.printUsage ?? ((text: string) => console.error(text));
  let args: ParsedArgs;
  try {
    args = parseArgs(argv);
  } catch (e) {
    printUsage(`${errorMessage(e)}\n\n${USAGE}`);
    return 1;
  }
  if (args.switches.has("help")) {
    printUsage(USAGE);
    return 0;
  }

  const log = deps.logger ?? createLogger(args.command ? `topo-${args.command}` : "topo");
  try {
    await dispatch(args, log);
    return 0;
  } catch (e) {
    if (e instanceof UsageError) {
      printUsage(`${e.message}\n\n${USAGE}`);
      return 1;
    }
    log.error(formatError(classify(e)));
    return 1;
  }
}
