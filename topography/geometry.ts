import { NUM_MERIDIANS, NUM_RADIALS } from "./config.ts";

const DEG_TO_RAD = Math.PI / 180;

/**
 * Legacy radial remapping kept for compatibility with existing combined
 * files: `cos(sin(x) / x)`, with 1 at the origin. This is not the Bessel
 * function of the first kind.
 */
export function legacyJ0(x: number): number {
  if (x === 0) return 1;
  return Math.cos(Math.sin(x) / x);
}

export type CellGeometry = {
  meridianIndex: number;
  radialIndex: number;
  meridianAngleDeg: number;
  meridianAngleRad: number;
  normalizedRadius: number;
  transformedRadius: number;
  cosTheta: number;
  sinTheta: number;
  x: number;
  y: number;
};

/** Geometry of the zero-based cell `(meridian, radial)`; indices in the result are 1-based. */
export function cellGeometry(
  meridian: number,
  radial: number,
  meridians = NUM_MERIDIANS,
  radials = NUM_RADIALS,
): CellGeometry {
  const meridianAngleDeg = meridian * (360 / meridians);
  const meridianAngleRad = meridianAngleDeg * DEG_TO_RAD;
  const normalizedRadius = radials > 1 ? radial / (radials - 1) : 0;
  const transformedRadius = legacyJ0(Math.PI * normalizedRadius);
  const cosTheta = Math.cos(meridianAngleRad);
  const sinTheta = Math.sin(meridianAngleRad);
  return {
    meridianIndex: meridian + 1,
    radialIndex: radial + 1,
    meridianAngleDeg,
    meridianAngleRad,
    normalizedRadius,
    transformedRadius,
    cosTheta,
    sinTheta,
    x: transformedRadius * cosTheta,
    y: transformedRadius * sinTheta,
  };
}

/** `Pachymetry / (Height_Posterior − Height_Anterior)`, NaN on a zero denominator. */
export function alphaAngle(pachymetry: number, heightAnterior: number, heightPosterior: number): number {
  const denom = heightPosterior - heightAnterior;
  if (denom === 0) return NaN;
  return pachymetry / denom;
}
