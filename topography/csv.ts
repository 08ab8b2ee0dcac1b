import { createReadStream } from "node:fs";
import { mkdir, readdir, rename, rm, writeFile } from "node:fs/promises";
import { basename, join } from "node:path";
import { parse } from "csv-parse";
import { stringify } from "csv-stringify/sync";
import { PipelineError, errorMessage } from "./errors.ts";

export type Row = string[];

function errnoCode(e: unknown): string | undefined {
  if (typeof e === "object" && e !== null && "code" in e && typeof e.code === "string") return e.code;
  return undefined;
}

function toRow(record: unknown): Row {
  if (!Array.isArray(record)) return [String(record)];
  return record.map((cell) => (typeof cell === "string" ? cell : String(cell)));
}

/**
 * Streams a headerless CSV and collects every non-empty record. Column counts
 * may vary between records, which instrument exports rely on.
 */
export async function readRecords(path: string): Promise<Row[]> {
  const rows: Row[] = [];
  const input = createReadStream(path);
  const parser = input.pipe(
    parse({
      bom: true,
      relax_column_count: true,
      relax_quotes: true,
      skip_empty_lines: true,
    }),
  );
  // pipe() does not forward source errors
  input.on("error", (e) => parser.destroy(e));
  try {
    for await (const record of parser) rows.push(toRow(record));
  } catch (e) {
    if (errnoCode(e) === "ENOENT") {
      throw new PipelineError("InputMissing", "file not found", { path, cause: e });
    }
    throw e;
  }
  return rows;
}

/** Splits a CSV with a header line into its header and data rows. */
export async function readTable(path: string): Promise<{ header: Row; rows: Row[] }> {
  const [header, ...rows] = await readRecords(path);
  return { header: header ?? [], rows };
}

export function formatCsv(rows: Row[]): string {
  return stringify(rows, { record_delimiter: "unix" });
}

/**
 * Writes rows to `<path>.tmp` and renames into place, so a crashed run never
 * leaves a half-written file under the final name.
 */
export async function writeCsvAtomic(path: string, rows: Row[]): Promise<void> {
  const tmp = `${path}.tmp`;
  try {
    await writeFile(tmp, formatCsv(rows), "utf-8");
    await rename(tmp, path);
  } catch (e) {
    await rm(tmp, { force: true });
    throw new PipelineError("IoWrite", `cannot write output: ${errorMessage(e)}`, { path, cause: e });
  }
}

/** Deletes an output left by an earlier run; absent files are fine. */
export async function removeStale(path: string): Promise<void> {
  try {
    await rm(path, { force: true });
  } catch (e) {
    throw new PipelineError("IoWrite", `cannot remove stale output: ${errorMessage(e)}`, { path, cause: e });
  }
}

/** `mkdir -p`. A failure is fatal to the batch when `topLevel` is set. */
export async function ensureDir(path: string, topLevel = false): Promise<void> {
  try {
    await mkdir(path, { recursive: true });
  } catch (e) {
    const kind = topLevel ? "OutputDirUncreatable" : "IoWrite";
    throw new PipelineError(kind, `cannot create directory: ${errorMessage(e)}`, { path, cause: e });
  }
}

/** `*.csv` regular files directly inside `dir`, sorted by name. */
export async function listCsvFiles(dir: string): Promise<string[]> {
  let entries;
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (e) {
    throw new PipelineError("InputMissing", `cannot list directory: ${errorMessage(e)}`, { path: dir, cause: e });
  }
  return entries
    .filter((e) => e.isFile() && e.name.toLowerCase().endsWith(".csv"))
    .map((e) => join(dir, e.name))
    .sort((a, b) => (basename(a) < basename(b) ? -1 : basename(a) > basename(b) ? 1 : 0));
}
