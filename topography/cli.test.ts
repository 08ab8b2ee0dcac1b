import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { USAGE, UsageError, parseArgs, runCli } from "./cli.ts";
import { SECTION_DESCRIPTORS } from "./config.ts";
import { grid, rawExport, recordingLogger, tempDir, toCsv, writeText } from "./test-helpers.ts";

function capture() {
  const printed: string[] = [];
  return { printed, deps: { logger: recordingLogger(), printUsage: (t: string) => printed.push(t) } };
}

describe("parseArgs", () => {
  it("reads the command, valued flags and switches", () => {
    const args = parseArgs(["filter", "--input", "a", "--radial=1,8", "--dry-run", "--sample", "x", "--sample", "y"]);
    expect(args.command).toBe("filter");
    expect(args.flags.get("input")).toEqual(["a"]);
    expect(args.flags.get("radial")).toEqual(["1,8"]);
    expect(args.flags.get("sample")).toEqual(["x", "y"]);
    expect(args.switches.has("dry-run")).toBe(true);
  });

  it("rejects a flag without a value", () => {
    expect(() => parseArgs(["extract", "--input"])).toThrow(UsageError);
    expect(() => parseArgs(["extract", "--input", "--jobs", "2"])).toThrow("Missing value for --input");
  });

  it("rejects a second positional argument", () => {
    expect(() => parseArgs(["extract", "split"])).toThrow("Unexpected argument: split");
  });
});

describe("runCli", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("reports a bad TOPO_JOBS as a usage error", async () => {
    vi.stubEnv("TOPO_JOBS", "zero");
    const { printed, deps } = capture();
    expect(await runCli(["filter", "--input", "x"], deps)).toBe(1);
    expect(printed).toEqual([`TOPO_JOBS: Invalid job count: zero\n\n${USAGE}`]);
  });

  it("reports a bad TOPO_RADIALS as a usage error", async () => {
    vi.stubEnv("TOPO_RADIALS", "1,x");
    const { printed, deps } = capture();
    expect(await runCli(["split", "--input", "x"], deps)).toBe(1);
    expect(printed).toEqual([`TOPO_RADIALS: Invalid radial index "x" in "1,x"\n\n${USAGE}`]);
  });

  it("prints usage and fails without a command", async () => {
    const { printed, deps } = capture();
    expect(await runCli([], deps)).toBe(1);
    expect(printed).toEqual([`Missing command\n\n${USAGE}`]);
  });

  it("fails on an unknown command", async () => {
    const { printed, deps } = capture();
    expect(await runCli(["cluster"], deps)).toBe(1);
    expect(printed[0].startsWith("Unknown command: cluster")).toBe(true);
  });

  it("prints usage for --help", async () => {
    const { printed, deps } = capture();
    expect(await runCli(["--help"], deps)).toBe(0);
    expect(printed).toEqual([USAGE]);
  });

  it("fails on missing required flags and bad values", async () => {
    const { printed, deps } = capture();
    expect(await runCli(["assemble", "--input", "x"], deps)).toBe(1);
    expect(printed[0].startsWith("Missing required --output")).toBe(true);
    expect(await runCli(["filter", "--input", "x", "--jobs", "0"], deps)).toBe(1);
    expect(await runCli(["split", "--input", "x", "--radial", "a"], deps)).toBe(1);
  });

  it("fails when the input does not exist", async () => {
    const { deps } = capture();
    expect(await runCli(["filter", "--input", "/nonexistent/topo-input"], deps)).toBe(1);
  });

  it("filters a directory with an explicit radial list", async () => {
    const dir = await tempDir("topo-cli-");
    await writeText(join(dir, "s_combined.csv"), toCsv([["Meridian_Index", "Radial_Index"], ["1", "1"], ["1", "2"]]));
    const { deps } = capture();
    expect(await runCli(["filter", "--input", dir, "--radial", "2"], deps)).toBe(0);
    expect(await readFile(join(dir, "limited", "s_combined.csv"), "utf-8")).toBe("Meridian_Index,Radial_Index\n1,2\n");
  });

  it("runs extraction and assembly end to end", async () => {
    const raw = await tempDir("topo-cli-raw-");
    const sections = SECTION_DESCRIPTORS.map((d, i) => ({
      tag: d.tag,
      skip: d.skip,
      rows: grid(256, 32, (r, c) => String(i * 10 + r + c / 4)),
    }));
    await writeText(join(raw, "A_B_C_D_L_001.csv"), rawExport(sections));
    const combined = join(await tempDir("topo-cli-out-"), "combined");
    const { deps } = capture();

    expect(await runCli(["pipeline", "--input", raw, "--output", combined, "--jobs", "2"], deps)).toBe(0);

    expect(existsSync(join(raw, "processed_data", "Pachymetry", "Pachymetry_A_B_C_D_L_001.csv"))).toBe(true);
    const text = await readFile(join(combined, "A_B_C_D_L_001_combined.csv"), "utf-8");
    expect(text.split("\n")).toHaveLength(8194);
  });
});
