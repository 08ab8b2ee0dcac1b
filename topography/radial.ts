import { stat } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { config } from "./config.ts";
import { ensureDir, listCsvFiles, readTable, writeCsvAtomic, type Row } from "./csv.ts";
import { PipelineError } from "./errors.ts";
import { createLogger, type Logger } from "./logger.ts";
import { formatSummary, runBatch, type BatchSummary } from "./pool.ts";

export const RADIAL_COLUMN = "Radial_Index";

function radialColumn(header: Row, path: string): number {
  const idx = header.indexOf(RADIAL_COLUMN);
  if (idx === -1) throw new PipelineError("ColumnMissing", `${RADIAL_COLUMN} column not found`, { path });
  return idx;
}

/** Strict integer parse of a `Radial_Index` cell; null when it is not an integer. */
export function parseRadialIndex(cell: string | undefined): number | null {
  if (cell === undefined || !/^[+-]?\d+$/.test(cell)) return null;
  const n = Number(cell);
  return Number.isSafeInteger(n) ? n : null;
}

export function radialDirName(k: number): string {
  return `radial_${k}`;
}

// ── Filter ──

export type FilterResult = { input: string; output: string; kept: number; total: number };

/**
 * Copies the header and every row whose `Radial_Index` text is one of
 * `allowed` into `<outDir>/<file name>`, preserving row order.
 */
export async function filterFile(input: string, allowed: ReadonlySet<string>, outDir: string): Promise<FilterResult> {
  const { header, rows } = await readTable(input);
  const col = radialColumn(header, input);
  const kept = rows.filter((r) => {
    const v = r[col];
    return v !== undefined && allowed.has(v);
  });
  const output = join(outDir, basename(input));
  await writeCsvAtomic(output, [header, ...kept]);
  return { input, output, kept: kept.length, total: rows.length };
}

// ── Split ──

export type SplitResult = { input: string; outputs: { radial: number; path: string; rows: number }[] };

/**
 * Fans one combined file out into `<baseDir>/radial_<k>/<file name>` for every
 * target `k`. Rows whose index does not parse or is not targeted are dropped.
 */
export async function splitFile(input: string, targets: readonly number[], baseDir: string): Promise<SplitResult> {
  const { header, rows } = await readTable(input);
  const col = radialColumn(header, input);

  const buckets = new Map<number, Row[]>();
  for (const k of targets) buckets.set(k, []);
  for (const r of rows) {
    const k = parseRadialIndex(r[col]);
    if (k === null) continue;
    buckets.get(k)?.push(r);
  }

  const outputs: SplitResult["outputs"] = [];
  for (const [radial, bucket] of buckets) {
    const dir = join(baseDir, radialDirName(radial));
    await ensureDir(dir);
    const path = join(dir, basename(input));
    await writeCsvAtomic(path, [header, ...bucket]);
    outputs.push({ radial, path, rows: bucket.length });
  }
  return { input, outputs };
}

// ── Batch entry points ──

export type RadialOptions = {
  jobs?: number;
  logger?: Logger;
};

async function inputFiles(input: string): Promise<{ files: string[]; root: string }> {
  const info = await stat(input).catch((e: unknown) => {
    throw new PipelineError("InputMissing", "input not found", { path: input, cause: e });
  });
  if (info.isDirectory()) return { files: await listCsvFiles(input), root: input };
  return { files: [input], root: dirname(input) };
}

export type FilterReport = { outDir: string; results: FilterResult[]; summary: BatchSummary };

export async function filterDirectory(
  input: string,
  allowed: readonly string[],
  outDir?: string,
  opts: RadialOptions = {},
): Promise<FilterReport> {
  const log = opts.logger ?? createLogger("radial-filter");
  const { files, root } = await inputFiles(input);
  const target = outDir ?? join(root, config.LIMITED_DIR_NAME);
  await ensureDir(target, true);

  const allowedSet = new Set(allowed);
  log.info(`Filtering ${files.length} file(s) to Radial_Index in {${allowed.join(", ")}} into ${target}`);
  const { outcomes, summary } = await runBatch(files, (f) => filterFile(f, allowedSet, target), {
    jobs: opts.jobs ?? config.JOBS,
    label: (f) => f,
    logger: log,
  });
  const results = outcomes.flatMap((o) => (o.ok ? [o.value] : []));
  for (const r of results) log.debug(`Processed ${basename(r.input)}: kept ${r.kept}/${r.total}`);
  log.info(formatSummary("filter", summary));
  return { outDir: target, results, summary };
}

export type SplitReport = { baseDir: string; results: SplitResult[]; summary: BatchSummary };

export async function splitDirectory(
  input: string,
  targets: readonly number[],
  baseDir?: string,
  opts: RadialOptions = {},
): Promise<SplitReport> {
  const log = opts.logger ?? createLogger("radial-split");
  const { files, root } = await inputFiles(input);
  const base = baseDir ?? root;
  const unique = [...new Set(targets)];
  for (const k of unique) await ensureDir(join(base, radialDirName(k)), true);

  log.info(`Splitting ${files.length} file(s) by Radial_Index {${unique.join(", ")}} under ${base}`);
  const { outcomes, summary } = await runBatch(files, (f) => splitFile(f, unique, base), {
    jobs: opts.jobs ?? config.JOBS,
    label: (f) => f,
    logger: log,
  });
  const results = outcomes.flatMap((o) => (o.ok ? [o.value] : []));
  log.info(formatSummary("split", summary));
  return { baseDir: base, results, summary };
}
