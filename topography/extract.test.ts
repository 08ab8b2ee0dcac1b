import { existsSync } from "node:fs";
import { readFile, readdir } from "node:fs/promises";
import { join } from "node:path";
import { beforeEach, describe, expect, it } from "vitest";
import { discoverSamples } from "./assemble.ts";
import { SECTION_DESCRIPTORS } from "./config.ts";
import { extractDirectory, extractFile, findMarkerRow, sliceSection } from "./extract.ts";
import { sectionDirName, sectionFilePrefix } from "./sections.ts";
import { grid, linesAt, rawExport, recordingLogger, tempDir, toCsv, writeText } from "./test-helpers.ts";

const cellText = (r: number, c: number) => `${r}.${c}0`;

function header(n: number): string[][] {
  return [["[T]"], ...Array.from({ length: n - 1 }, () => ["descriptor"])];
}

describe("section naming", () => {
  it("strips brackets for the directory and underscores spaces for the prefix", () => {
    expect(sectionDirName("[Elevation Anterior]")).toBe("Elevation Anterior");
    expect(sectionFilePrefix("[Elevation Anterior]")).toBe("Elevation_Anterior");
  });
});

describe("findMarkerRow", () => {
  it("matches the trimmed first cell exactly", () => {
    const rows = [["[Pachymetry] x"], ["  [Pachymetry] ", "a"], ["[Pachymetry]"]];
    expect(findMarkerRow(rows, "[Pachymetry]")).toBe(1);
  });

  it("returns -1 when the tag is absent", () => {
    expect(findMarkerRow([["a"], []], "[Pachymetry]")).toBe(-1);
  });
});

describe("sliceSection", () => {
  it("keeps exactly 256 rows when more follow", () => {
    const rows = [...header(3), ...grid(257, 32, cellText)];
    const slice = sliceSection(rows, 0, 3);
    expect(slice.rows).toHaveLength(256);
    expect(slice.rows[0][0]).toBe("0.00");
    expect(slice.rows[255][31]).toBe("255.310");
    expect(slice.malformed).toEqual([]);
  });

  it("returns what is there when the file runs short", () => {
    const rows = [...header(3), ...grid(255, 32, cellText)];
    expect(sliceSection(rows, 0, 3).rows).toHaveLength(255);
  });

  it("truncates wide rows to 32 cells", () => {
    const rows = [...header(3), ...grid(256, 40, cellText)];
    const slice = sliceSection(rows, 0, 3);
    expect(slice.rows.every((r) => r.length === 32)).toBe(true);
    expect(slice.rows[0][31]).toBe("0.310");
  });

  it("skips narrow rows and reports their record number", () => {
    const data = grid(256, 32, cellText);
    data[10] = ["1", "2", "3", "4", "5"];
    const slice = sliceSection([...header(3), ...data], 0, 3);
    expect(slice.rows).toHaveLength(255);
    expect(slice.malformed).toEqual([{ record: 14, columns: 5 }]);
  });
});

describe("extractFile", () => {
  let root: string;

  beforeEach(async () => {
    root = await tempDir("topo-extract-");
  });

  it("writes each present section as a headerless 256 x 32 text block", async () => {
    const pach = grid(256, 32, cellText);
    const elev = grid(256, 32, (r, c) => `-${r}.5${c}`);
    const input = await writeText(
      join(root, "A_B_C_D_L_001.csv"),
      rawExport([
        { tag: "[Pachymetry]", skip: 3, rows: pach },
        { tag: "[Elevation Anterior]", skip: 11, rows: elev },
      ]),
    );
    const out = join(root, "processed_data");
    const log = recordingLogger();

    const result = await extractFile(input, out, { logger: log });

    const pachPath = join(out, "Pachymetry", "Pachymetry_A_B_C_D_L_001.csv");
    const elevPath = join(out, "Elevation Anterior", "Elevation_Anterior_A_B_C_D_L_001.csv");
    expect(await readFile(pachPath, "utf-8")).toBe(toCsv(pach));
    expect(await readFile(elevPath, "utf-8")).toBe(toCsv(elev));

    const written = result.sections.filter((s) => s.status === "written").map((s) => s.tag);
    expect(written).toEqual(["[Pachymetry]", "[Elevation Anterior]"]);
    expect(result.sections.filter((s) => s.status === "missing")).toHaveLength(6);
    expect(linesAt(log, "warn").filter((l) => l.startsWith("[MarkerMissing]"))).toHaveLength(6);
  });

  it("produces byte-identical output when re-run", async () => {
    const input = await writeText(
      join(root, "s.csv"),
      rawExport([{ tag: "[Axial Anterior]", skip: 3, rows: grid(256, 32, cellText) }]),
    );
    const out = join(root, "out");
    await extractFile(input, out, { logger: recordingLogger() });
    const first = await readFile(join(out, "Axial Anterior", "Axial_Anterior_s.csv"), "utf-8");
    await extractFile(input, out, { logger: recordingLogger() });
    const second = await readFile(join(out, "Axial Anterior", "Axial_Anterior_s.csv"), "utf-8");
    expect(second).toBe(first);
  });

  it("writes a short section and warns about the shortfall", async () => {
    const input = await writeText(
      join(root, "short.csv"),
      rawExport([{ tag: "[Height Posterior]", skip: 3, rows: grid(255, 32, cellText) }]),
    );
    const log = recordingLogger();
    const result = await extractFile(input, join(root, "out"), { logger: log });

    const section = result.sections.find((s) => s.tag === "[Height Posterior]");
    expect(section).toMatchObject({ status: "written", rows: 255 });
    expect(linesAt(log, "warn")).toContain(`${input}: [Height Posterior] expected 256 rows, wrote 255`);
  });

  it("reports an empty section without creating a file", async () => {
    const input = await writeText(join(root, "empty.csv"), rawExport([{ tag: "[Pachymetry]", skip: 3, rows: [] }]));
    const out = join(root, "out");
    const log = recordingLogger();
    const result = await extractFile(input, out, { logger: log });

    expect(result.sections.find((s) => s.tag === "[Pachymetry]")?.status).toBe("empty");
    expect(existsSync(join(out, "Pachymetry", "Pachymetry_empty.csv"))).toBe(false);
    expect(linesAt(log, "error")).toEqual([`${input}: no rows written for [Pachymetry] (start=5)`]);
  });

  it("drops sections from an earlier run that the export no longer yields", async () => {
    const path = join(root, "again.csv");
    const out = join(root, "out");
    await writeText(
      path,
      rawExport([
        { tag: "[Pachymetry]", skip: 3, rows: grid(256, 32, cellText) },
        { tag: "[Axial Anterior]", skip: 3, rows: grid(256, 32, cellText) },
      ]),
    );
    await extractFile(path, out, { logger: recordingLogger() });
    await writeText(path, rawExport([{ tag: "[Pachymetry]", skip: 3, rows: [] }]));

    const result = await extractFile(path, out, { logger: recordingLogger() });

    expect(result.sections.slice(0, 2).map((s) => s.status)).toEqual(["empty", "missing"]);
    expect(existsSync(join(out, "Pachymetry", "Pachymetry_again.csv"))).toBe(false);
    expect(existsSync(join(out, "Axial Anterior", "Axial_Anterior_again.csv"))).toBe(false);
  });

  it("names outputs with a lower-case .csv extension", async () => {
    const input = await writeText(
      join(root, "A_B_C_D_R_002.CSV"),
      rawExport([{ tag: "[Elevation Anterior]", skip: 11, rows: grid(256, 32, cellText) }]),
    );
    const out = join(root, "out");
    await extractFile(input, out, { logger: recordingLogger() });

    expect(await readdir(join(out, "Elevation Anterior"))).toEqual(["Elevation_Anterior_A_B_C_D_R_002.csv"]);
    expect(await discoverSamples(out)).toEqual(["A_B_C_D_R_002"]);
  });
});

describe("extractDirectory", () => {
  it("processes every raw csv and prepares all section directories", async () => {
    const root = await tempDir("topo-extract-dir-");
    const body = rawExport([{ tag: "[Pachymetry]", skip: 3, rows: grid(256, 32, cellText) }]);
    await writeText(join(root, "one.csv"), body);
    await writeText(join(root, "two.csv"), body);
    await writeText(join(root, "notes.txt"), "ignored");
    const out = join(root, "processed_data");

    const report = await extractDirectory(root, out, { jobs: 2, logger: recordingLogger() });

    expect(report.summary).toEqual({ processed: 2, failed: 0, sectionsWritten: 2, sectionsSkipped: 14 });
    expect((await readdir(out)).sort()).toEqual(SECTION_DESCRIPTORS.map((d) => sectionDirName(d.tag)).sort());
    expect((await readdir(join(out, "Pachymetry"))).sort()).toEqual(["Pachymetry_one.csv", "Pachymetry_two.csv"]);
  });
});
