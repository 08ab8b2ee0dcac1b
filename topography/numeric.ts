import { PipelineError } from "./errors.ts";

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const NON_FINITE = /^[+-]?(nan|inf|infinity)$/i;

/**
 * Parses one matrix cell as a double. Plain decimal and exponent notation are
 * accepted; blanks, hex and padded values are not. Spelled-out NaN/infinity
 * parse but are rejected as non-finite.
 */
export function parseCell(cell: string, where: { path: string; row: number; column: number }): number {
  const at = `row ${where.row}, column ${where.column}`;
  if (NON_FINITE.test(cell)) {
    throw new PipelineError("NonFinite", `non-finite value "${cell}" at ${at}`, { path: where.path });
  }
  if (!DECIMAL.test(cell)) {
    throw new PipelineError("ParseNumeric", `non-numeric value "${cell}" at ${at}`, { path: where.path });
  }
  const v = Number(cell);
  if (!Number.isFinite(v)) {
    throw new PipelineError("NonFinite", `value "${cell}" overflows at ${at}`, { path: where.path });
  }
  return v;
}

/** Shortest round-trip text for a double; NaN prints as `NaN`. */
export function formatNumber(v: number): string {
  return String(v);
}
