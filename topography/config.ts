import { availableParallelism } from "node:os";
import dotenv from "dotenv";

dotenv.config();

// ── Instrument constants (fixed by the export format) ──

export const ROWS_TO_KEEP = 256;
export const COLS_TO_KEEP = 32;
export const NUM_MERIDIANS = ROWS_TO_KEEP;
export const NUM_RADIALS = COLS_TO_KEEP;
export const GRID_CELLS = NUM_MERIDIANS * NUM_RADIALS;

export type SectionDescriptor = { tag: string; skip: number };

export const SECTION_DESCRIPTORS: readonly SectionDescriptor[] = [
  { tag: "[Pachymetry]", skip: 3 },
  { tag: "[Axial Anterior]", skip: 3 },
  { tag: "[Axial Posterior]", skip: 3 },
  { tag: "[Axial Keratometric]", skip: 3 },
  { tag: "[Height Anterior]", skip: 3 },
  { tag: "[Height Posterior]", skip: 3 },
  { tag: "[Elevation Anterior]", skip: 11 },
  { tag: "[Elevation Posterior]", skip: 11 },
];

export const PARAMETERS = [
  "Axial_Anterior",
  "Axial_Posterior",
  "Elevation_Anterior",
  "Elevation_Posterior",
  "Axial_Keratometric",
  "Height_Anterior",
  "Height_Posterior",
  "Pachymetry",
] as const;

export type Parameter = (typeof PARAMETERS)[number];

// ── Runtime settings ──

export function parseJobs(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1) throw new Error(`Invalid job count: ${raw}`);
  return n;
}

export function parseRadialList(raw: string): string[] {
  const values = raw
    .split(",")
    .map((v) => v.trim())
    .filter((v) => v.length > 0);
  if (values.length === 0) throw new Error(`Empty radial list: "${raw}"`);
  for (const v of values) {
    if (!/^\d+$/.test(v)) throw new Error(`Invalid radial index "${v}" in "${raw}"`);
  }
  return [...new Set(values)];
}

function fromEnv<T>(name: string, parse: (raw: string | undefined) => T): T {
  try {
    return parse(process.env[name]);
  } catch (e) {
    throw new Error(`${name}: ${e instanceof Error ? e.message : String(e)}`);
  }
}

// Env-backed values are read on access so a bad setting surfaces where it is used.
export const config = {
  get JOBS(): number {
    return fromEnv("TOPO_JOBS", (raw) => parseJobs(raw, availableParallelism()));
  },
  get DEFAULT_RADIALS(): string[] {
    return fromEnv("TOPO_RADIALS", (raw) => parseRadialList(raw ?? "1,4,8,12,16,24,28,32"));
  },
  get AUDIT_COHORT(): string | undefined {
    return process.env.TOPO_COHORT;
  },
  PROCESSED_DIR_NAME: "processed_data",
  LIMITED_DIR_NAME: "limited",
} as const;

export type Config = typeof config;
