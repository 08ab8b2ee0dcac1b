import type { Stats } from "node:fs";
import { stat } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { COLS_TO_KEEP, ROWS_TO_KEEP, SECTION_DESCRIPTORS, config, type SectionDescriptor } from "./config.ts";
import { ensureDir, listCsvFiles, readRecords, removeStale, writeCsvAtomic, type Row } from "./csv.ts";
import { PipelineError, classify, formatError } from "./errors.ts";
import { createLogger, type Logger } from "./logger.ts";
import { formatSummary, runBatch, type BatchSummary } from "./pool.ts";
import { sectionDirName, sectionOutputPath } from "./sections.ts";

export type SectionResult =
  | { tag: string; status: "written"; path: string; rows: number; skippedRows: number }
  | { tag: string; status: "missing" }
  | { tag: string; status: "empty"; skippedRows: number }
  | { tag: string; status: "failed"; error: PipelineError };

export type FileExtraction = {
  input: string;
  sections: SectionResult[];
};

export type ExtractDeps = {
  descriptors?: readonly SectionDescriptor[];
  logger?: Logger;
};

/** Zero-based index of the first record whose trimmed first cell is `tag`, or -1. */
export function findMarkerRow(rows: readonly Row[], tag: string): number {
  return rows.findIndex((r) => r.length > 0 && r[0].trim() === tag);
}

export type SectionSlice = {
  rows: Row[];
  /** 1-based record numbers dropped for having too few columns. */
  malformed: { record: number; columns: number }[];
};

/**
 * Takes records `[marker + skip, marker + skip + 256)`, dropping rows narrower
 * than 32 cells and truncating wider ones. Cells are kept as text.
 */
export function sliceSection(rows: readonly Row[], markerIndex: number, skip: number): SectionSlice {
  const start = markerIndex + skip;
  const end = Math.min(start + ROWS_TO_KEEP, rows.length);
  const out: Row[] = [];
  const malformed: SectionSlice["malformed"] = [];
  for (let i = start; i < end; i++) {
    const row = rows[i];
    if (row.length < COLS_TO_KEEP) {
      malformed.push({ record: i + 1, columns: row.length });
      continue;
    }
    out.push(row.slice(0, COLS_TO_KEEP));
  }
  return { rows: out, malformed };
}

async function extractSection(
  input: string,
  records: readonly Row[],
  outDir: string,
  desc: SectionDescriptor,
  log: Logger,
): Promise<SectionResult> {
  const out = sectionOutputPath(outDir, desc, basename(input));
  const marker = findMarkerRow(records, desc.tag);
  if (marker === -1) {
    log.warn(formatError(new PipelineError("MarkerMissing", `section ${desc.tag} not found`, { path: input })));
    await removeStale(out);
    return { tag: desc.tag, status: "missing" };
  }

  const slice = sliceSection(records, marker, desc.skip);
  for (const m of slice.malformed) {
    log.warn(
      formatError(
        new PipelineError(
          "MalformedRow",
          `row ${m.record} has only ${m.columns} columns (expected ${COLS_TO_KEEP}), skipping row`,
          { path: input },
        ),
      ),
    );
  }

  if (slice.rows.length === 0) {
    log.error(`${input}: no rows written for ${desc.tag} (start=${marker + desc.skip})`);
    await removeStale(out);
    return { tag: desc.tag, status: "empty", skippedRows: slice.malformed.length };
  }

  try {
    await ensureDir(dirname(out));
    await writeCsvAtomic(out, slice.rows);
  } catch (e) {
    const error = classify(e, out);
    log.error(formatError(error));
    return { tag: desc.tag, status: "failed", error };
  }

  if (slice.rows.length !== ROWS_TO_KEEP) {
    log.warn(`${input}: ${desc.tag} expected ${ROWS_TO_KEEP} rows, wrote ${slice.rows.length}`);
  }
  log.debug(`Created ${out}, rows written: ${slice.rows.length}`);
  return { tag: desc.tag, status: "written", path: out, rows: slice.rows.length, skippedRows: slice.malformed.length };
}

/** Harvests every section of one raw export into `<outDir>/<Section>/`. */
export async function extractFile(input: string, outDir: string, deps: ExtractDeps = {}): Promise<FileExtraction> {
  const log = deps.logger ?? createLogger("extract");
  const descriptors = deps.descriptors ?? SECTION_DESCRIPTORS;
  const records = await readRecords(input);

  const sections: SectionResult[] = [];
  for (const desc of descriptors) {
    sections.push(await extractSection(input, records, outDir, desc, log));
  }
  return { input, sections };
}

export type ExtractReport = {
  files: FileExtraction[];
  summary: BatchSummary & { sectionsWritten: number; sectionsSkipped: number };
};

export type ExtractOptions = ExtractDeps & {
  jobs?: number;
};

function statInput(input: string): Promise<Stats> {
  return stat(input).catch((e: unknown) => {
    throw new PipelineError("InputMissing", "input not found", { path: input, cause: e });
  });
}

/** Default output location: `processed_data` beside the raw files. */
export async function defaultExtractOutput(input: string): Promise<string> {
  const info = await statInput(input);
  const root = info.isDirectory() ? input : dirname(input);
  return join(root, config.PROCESSED_DIR_NAME);
}

/**
 * Runs the extractor over a raw file or every `*.csv` directly inside a
 * directory. Section directories are created up front; failing to create
 * them aborts the batch.
 */
export async function extractDirectory(input: string, outDir: string, opts: ExtractOptions = {}): Promise<ExtractReport> {
  const log = opts.logger ?? createLogger("extract");
  const descriptors = opts.descriptors ?? SECTION_DESCRIPTORS;

  const info = await statInput(input);
  const files = info.isDirectory() ? await listCsvFiles(input) : [input];

  await ensureDir(outDir, true);
  for (const desc of descriptors) await ensureDir(join(outDir, sectionDirName(desc.tag)), true);

  log.info(`Extracting ${descriptors.length} sections from ${files.length} file(s) into ${outDir}`);
  const { outcomes, summary } = await runBatch(files, (f) => extractFile(f, outDir, { descriptors, logger: log }), {
    jobs: opts.jobs ?? config.JOBS,
    label: (f) => f,
    logger: log,
  });

  const extracted = outcomes.flatMap((o) => (o.ok ? [o.value] : []));
  const all = extracted.flatMap((f) => f.sections);
  const sectionsWritten = all.filter((s) => s.status === "written").length;
  const report: ExtractReport = {
    files: extracted,
    summary: { ...summary, sectionsWritten, sectionsSkipped: all.length - sectionsWritten },
  };
  log.info(`${formatSummary("extract", summary)} (sections written ${sectionsWritten}, skipped ${report.summary.sectionsSkipped})`);
  return report;
}
