import { readdir } from "node:fs/promises";
import { join } from "node:path";
import { GRID_CELLS, NUM_MERIDIANS, NUM_RADIALS, PARAMETERS, config, type Parameter } from "./config.ts";
import { ensureDir, readRecords, removeStale, writeCsvAtomic, type Row } from "./csv.ts";
import { PipelineError, errorMessage } from "./errors.ts";
import { alphaAngle, cellGeometry } from "./geometry.ts";
import { createLogger, type Logger } from "./logger.ts";
import { formatNumber, parseCell } from "./numeric.ts";
import { formatSummary, runBatch, type BatchSummary } from "./pool.ts";
import { parameterPath } from "./sections.ts";
import { computeStats, standardize, type Stats } from "./stats.ts";

export type ParameterTable = Record<Parameter, Float64Array>;
export type ParameterStats = Record<Parameter, Stats>;

export const GEOMETRY_COLUMNS = [
  "Meridian_Index",
  "Radial_Index",
  "Meridian_Angle_Deg",
  "Meridian_Angle_Rad",
  "Normalized_Radius",
  "Transformed_Radius",
  "Cos_Theta",
  "Sin_Theta",
  "X_Coordinate",
  "Y_Coordinate",
  "Alpha_Angle",
] as const;

export const GRID_HEADER: Row = [
  ...GEOMETRY_COLUMNS,
  ...PARAMETERS.flatMap((p) => [`${p}_Value`, `${p}_Scaled`]),
];

export function combinedFileName(sampleId: string): string {
  return `${sampleId}_combined.csv`;
}

// ── Loading ──

/** Reads one headerless section matrix into a flat row-major vector of exactly 8192 doubles. */
export async function readParameterMatrix(path: string): Promise<Float64Array> {
  const records = await readRecords(path);
  const count = records.reduce((n, r) => n + r.length, 0);
  if (count !== GRID_CELLS) {
    throw new PipelineError("ShapeMismatch", `expected ${GRID_CELLS} values, found ${count}`, { path });
  }
  const values = new Float64Array(GRID_CELLS);
  let k = 0;
  records.forEach((row, r) => {
    row.forEach((cell, col) => {
      values[k++] = parseCell(cell, { path, row: r + 1, column: col + 1 });
    });
  });
  return values;
}

function byParameter<T>(fn: (param: Parameter) => T): Record<Parameter, T> {
  return {
    Axial_Anterior: fn("Axial_Anterior"),
    Axial_Posterior: fn("Axial_Posterior"),
    Elevation_Anterior: fn("Elevation_Anterior"),
    Elevation_Posterior: fn("Elevation_Posterior"),
    Axial_Keratometric: fn("Axial_Keratometric"),
    Height_Anterior: fn("Height_Anterior"),
    Height_Posterior: fn("Height_Posterior"),
    Pachymetry: fn("Pachymetry"),
  };
}

export async function loadParameterTable(baseDir: string, sampleId: string): Promise<ParameterTable> {
  const vectors: Float64Array[] = [];
  for (const param of PARAMETERS) {
    vectors.push(await readParameterMatrix(parameterPath(baseDir, param, sampleId)));
  }
  return byParameter((param) => vectors[PARAMETERS.indexOf(param)]);
}

export function computeParameterStats(table: ParameterTable, sampleId?: string): ParameterStats {
  return byParameter((param) => {
    const stats = computeStats(table[param]);
    if (!Number.isFinite(stats.mean) || !Number.isFinite(stats.stdDev)) {
      throw new PipelineError("NonFinite", `statistics for ${param} are not finite`, { path: sampleId });
    }
    return stats;
  });
}

// ── Row generation ──

/**
 * Builds the 8192 long-form rows in `(meridian asc, radial asc)` order. Cell
 * `(meridian, radial)` reads index `meridian * 32 + radial` of every parameter.
 */
export function buildGridRows(table: ParameterTable, stats: ParameterStats): Row[] {
  const rows: Row[] = new Array<Row>(GRID_CELLS);
  for (let meridian = 0; meridian < NUM_MERIDIANS; meridian++) {
    for (let radial = 0; radial < NUM_RADIALS; radial++) {
      const idx = meridian * NUM_RADIALS + radial;
      const g = cellGeometry(meridian, radial);
      const alpha = alphaAngle(table.Pachymetry[idx], table.Height_Anterior[idx], table.Height_Posterior[idx]);

      const row: Row = [
        String(g.meridianIndex),
        String(g.radialIndex),
        formatNumber(g.meridianAngleDeg),
        formatNumber(g.meridianAngleRad),
        formatNumber(g.normalizedRadius),
        formatNumber(g.transformedRadius),
        formatNumber(g.cosTheta),
        formatNumber(g.sinTheta),
        formatNumber(g.x),
        formatNumber(g.y),
        formatNumber(alpha),
      ];
      for (const param of PARAMETERS) {
        const value = table[param][idx];
        row.push(formatNumber(value), formatNumber(standardize(value, stats[param])));
      }
      rows[idx] = row;
    }
  }
  return rows;
}

// ── Per-sample and batch entry points ──

export type AssembleDeps = {
  logger?: Logger;
};

/**
 * Joins all eight sections of `sampleId` into `<outDir>/<sampleId>_combined.csv`.
 * Any missing or bad input rejects the sample and removes its combined file
 * from an earlier run.
 */
export async function assembleSample(
  baseDir: string,
  sampleId: string,
  outDir: string,
  deps: AssembleDeps = {},
): Promise<string> {
  const log = deps.logger ?? createLogger("assemble");
  const out = join(outDir, combinedFileName(sampleId));
  let table: ParameterTable;
  let stats: ParameterStats;
  try {
    table = await loadParameterTable(baseDir, sampleId);
    stats = computeParameterStats(table, sampleId);
  } catch (e) {
    await removeStale(out);
    throw e;
  }
  for (const param of PARAMETERS) {
    log.debug(`${sampleId} ${param}: mean=${stats[param].mean.toFixed(6)} sd=${stats[param].stdDev.toFixed(6)}`);
  }

  await ensureDir(outDir);
  await writeCsvAtomic(out, [GRID_HEADER, ...buildGridRows(table, stats)]);
  log.debug(`Created combined file ${out}`);
  return out;
}

/** Reference section used to enumerate samples when none are given. */
export const DISCOVERY_PARAMETER: Parameter = "Elevation_Anterior";

/** Sample ids that have an `Elevation Anterior` section file under `baseDir`, sorted. */
export async function discoverSamples(baseDir: string): Promise<string[]> {
  const dir = join(baseDir, DISCOVERY_PARAMETER.replace(/_/g, " "));
  const prefix = `${DISCOVERY_PARAMETER}_`;
  let names: string[];
  try {
    names = await readdir(dir);
  } catch (e) {
    throw new PipelineError("InputMissing", `cannot list reference section: ${errorMessage(e)}`, { path: dir, cause: e });
  }
  return names
    .filter((n) => n.startsWith(prefix) && n.endsWith(".csv") && n.length > prefix.length + 4)
    .map((n) => n.slice(prefix.length, -4))
    .sort();
}

export type AssembleOptions = AssembleDeps & {
  samples?: readonly string[];
  jobs?: number;
};

export type AssembleReport = {
  written: string[];
  rejected: { sampleId: string; error: PipelineError }[];
  summary: BatchSummary;
};

/** Assembles every sample (given or discovered) with one worker per sample. */
export async function assembleDirectory(baseDir: string, outDir: string, opts: AssembleOptions = {}): Promise<AssembleReport> {
  const log = opts.logger ?? createLogger("assemble");
  const samples = opts.samples ?? (await discoverSamples(baseDir));
  await ensureDir(outDir, true);

  log.info(`Assembling ${samples.length} sample(s) from ${baseDir} into ${outDir}`);
  const { outcomes, summary } = await runBatch(samples, (id) => assembleSample(baseDir, id, outDir, { logger: log }), {
    jobs: opts.jobs ?? config.JOBS,
    label: (id) => id,
    logger: log,
  });

  const report: AssembleReport = { written: [], rejected: [], summary };
  for (const o of outcomes) {
    if (o.ok) report.written.push(o.value);
    else report.rejected.push({ sampleId: o.item, error: o.error });
  }
  log.info(formatSummary("assemble", summary));
  return report;
}
