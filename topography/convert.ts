import { readRecords, writeCsvAtomic, type Row } from "./csv.ts";
import { PipelineError } from "./errors.ts";
import { createLogger, type Logger } from "./logger.ts";
import { formatNumber, parseCell } from "./numeric.ts";

export const DEFAULT_VALUE_COLUMN = "Keratometry_Value";

export function matrixHeader(valueColumn: string): Row {
  return [
    "Meridian_Index",
    "Radial_Index",
    "Meridian_Angle_Deg",
    "Meridian_Angle_Rad",
    "Normalized_Radius",
    "Cos_Theta",
    "Sin_Theta",
    "X_Coordinate",
    "Y_Coordinate",
    valueColumn,
  ];
}

/**
 * Long-form rows for a single matrix stored radial-major: record `r` is radial
 * position `r + 1`, column `m` is meridian `m + 1`. Coordinates use the plain
 * normalized radius.
 */
export function matrixToRows(matrix: readonly (readonly number[])[]): Row[] {
  const radials = matrix.length;
  const meridians = radials > 0 ? matrix[0].length : 0;
  const rows: Row[] = [];
  matrix.forEach((values, r) => {
    const normalizedRadius = radials > 1 ? r / (radials - 1) : 0;
    values.forEach((value, m) => {
      const deg = m * (360 / meridians);
      const rad = deg * (Math.PI / 180);
      const cos = Math.cos(rad);
      const sin = Math.sin(rad);
      rows.push([
        String(m + 1),
        String(r + 1),
        formatNumber(deg),
        formatNumber(rad),
        formatNumber(normalizedRadius),
        formatNumber(cos),
        formatNumber(sin),
        formatNumber(normalizedRadius * cos),
        formatNumber(normalizedRadius * sin),
        formatNumber(value),
      ]);
    });
  });
  return rows;
}

export type ConvertOptions = {
  valueColumn?: string;
  logger?: Logger;
};

/** Converts one headerless radial-major matrix file into a long-form CSV. */
export async function convertMatrix(input: string, output: string, opts: ConvertOptions = {}): Promise<number> {
  const log = opts.logger ?? createLogger("convert");
  const records = await readRecords(input);
  if (records.length === 0) throw new PipelineError("ShapeMismatch", "matrix is empty", { path: input });

  const width = records[0].length;
  const matrix = records.map((row, r) => {
    if (row.length !== width) {
      throw new PipelineError("ShapeMismatch", `row ${r + 1} has ${row.length} columns, expected ${width}`, {
        path: input,
      });
    }
    return row.map((cell, col) => parseCell(cell, { path: input, row: r + 1, column: col + 1 }));
  });

  const rows = matrixToRows(matrix);
  await writeCsvAtomic(output, [matrixHeader(opts.valueColumn ?? DEFAULT_VALUE_COLUMN), ...rows]);
  log.info(`Converted ${input}: ${records.length} radial × ${width} meridian cells written to ${output}`);
  return rows.length;
}
