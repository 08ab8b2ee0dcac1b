import { unlink } from "node:fs/promises";
import { basename, dirname, join, resolve } from "node:path";
import { config } from "./config.ts";
import { ensureDir, listCsvFiles, writeCsvAtomic, type Row } from "./csv.ts";
import { PipelineError, errorMessage, formatError } from "./errors.ts";
import { createLogger, type Logger } from "./logger.ts";
import { planDeduplication, type DuplicateRemoval } from "./samples.ts";

export const AUDIT_HEADER: Row = ["Keep File", "Remove File", "Reason"];

export type DedupeOptions = {
  /** Directory for the audit CSV; defaults to the parent of the input directory. */
  auditDir?: string;
  /** Suffix of the audit file name; defaults to the input directory's name. */
  cohort?: string;
  /** Write the audit but leave every file in place. */
  dryRun?: boolean;
  logger?: Logger;
};

export type DedupeReport = {
  auditPath: string;
  removals: DuplicateRemoval[];
  deleted: string[];
  missing: string[];
  failed: string[];
};

export function auditFileName(cohort: string): string {
  return `duplicate_removal_report_${cohort}.csv`;
}

export function auditRows(removals: readonly DuplicateRemoval[]): Row[] {
  return [AUDIT_HEADER, ...removals.map((r) => [r.keep.fileName, r.remove.fileName, r.reason])];
}

async function removeFile(path: string): Promise<"deleted" | "missing"> {
  try {
    await unlink(path);
    return "deleted";
  } catch (e) {
    if (typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT") return "missing";
    throw e;
  }
}

/**
 * Keeps the lowest-sequence file per patient–eye in `inputDir`, records every
 * decision in the audit CSV, then deletes the rest. Runs sequentially so the
 * audit order is reproducible.
 */
export async function dedupeDirectory(inputDir: string, opts: DedupeOptions = {}): Promise<DedupeReport> {
  const log = opts.logger ?? createLogger("dedupe");
  const auditDir = opts.auditDir ?? dirname(resolve(inputDir));
  const cohort = opts.cohort ?? config.AUDIT_COHORT ?? basename(resolve(inputDir));
  const auditPath = join(auditDir, auditFileName(cohort));

  const names = (await listCsvFiles(inputDir)).map((p) => basename(p));
  log.info(`Scanning ${names.length} CSV file(s) in ${inputDir}`);

  const removals = planDeduplication(names);
  await ensureDir(auditDir, true);
  await writeCsvAtomic(auditPath, auditRows(removals));

  const report: DedupeReport = { auditPath, removals, deleted: [], missing: [], failed: [] };
  if (removals.length === 0) {
    log.info(`No duplicates found; audit written to ${auditPath}`);
    return report;
  }
  for (const r of removals) log.info(`${r.keep.fileName} | ${r.remove.fileName} | ${r.reason}`);

  if (opts.dryRun) {
    log.info(`Dry run: ${removals.length} file(s) would be removed`);
    return report;
  }

  for (const r of removals) {
    const target = join(inputDir, r.remove.fileName);
    try {
      const result = await removeFile(target);
      if (result === "deleted") {
        report.deleted.push(r.remove.fileName);
        log.debug(`Removed ${target}`);
      } else {
        report.missing.push(r.remove.fileName);
        log.warn(formatError(new PipelineError("InputMissing", "already gone at deletion time", { path: target })));
      }
    } catch (e) {
      report.failed.push(r.remove.fileName);
      log.error(formatError(new PipelineError("IoWrite", `cannot delete: ${errorMessage(e)}`, { path: target })));
    }
  }

  log.info(
    `dedupe: kept ${new Set(removals.map((r) => r.keep.fileName)).size}, removed ${report.deleted.length}, ` +
      `missing ${report.missing.length}, failed ${report.failed.length}; audit ${auditPath}`,
  );
  return report;
}
