import { mkdtemp, mkdir, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import type { Logger, LogLevel } from "./logger.ts";

export type RecordingLogger = Logger & { lines: { level: LogLevel; msg: string }[] };

/** Logger that keeps every line in memory instead of printing. */
export function recordingLogger(): RecordingLogger {
  const lines: RecordingLogger["lines"] = [];
  return {
    lines,
    debug: (msg) => lines.push({ level: "debug", msg }),
    info: (msg) => lines.push({ level: "info", msg }),
    warn: (msg) => lines.push({ level: "warn", msg }),
    error: (msg) => lines.push({ level: "error", msg }),
  };
}

export function linesAt(log: RecordingLogger, level: LogLevel): string[] {
  return log.lines.filter((l) => l.level === level).map((l) => l.msg);
}

export function tempDir(prefix = "topo-test-"): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function writeText(path: string, text: string): Promise<string> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, text, "utf-8");
  return path;
}

export function grid<T>(rows: number, cols: number, cell: (r: number, c: number) => T): T[][] {
  return Array.from({ length: rows }, (_, r) => Array.from({ length: cols }, (_, c) => cell(r, c)));
}

export function toCsv(rows: readonly (readonly (string | number)[])[]): string {
  return rows.map((r) => r.join(",")).join("\n") + "\n";
}

export type RawSection = { tag: string; skip: number; rows: string[][] };

/**
 * Builds an instrument-style export: narrative header, a blank line, then each
 * section as its tag line, `skip - 1` descriptor lines and the data rows.
 */
export function rawExport(sections: readonly RawSection[]): string {
  const lines = ["Casia Export,Version 1", "Patient,Test Patient", ""];
  for (const s of sections) {
    lines.push(`${s.tag},,`);
    for (let i = 1; i < s.skip; i++) lines.push(`descriptor ${i},unit`);
    for (const r of s.rows) lines.push(r.join(","));
  }
  return lines.join("\n") + "\n";
}
