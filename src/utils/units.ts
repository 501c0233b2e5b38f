// src/utils/units.ts

import { toInt16 } from './utils.js';

/** Wire units per degree (0.01° resolution) */
export const ANGLE_SCALE = 100;
/** Wire units per millimetre (0.1 mm resolution) */
export const COORD_SCALE = 10;

/** Pose indices below this carry coordinates, the rest carry rotations */
export const COORD_AXES = 3;

/** Relative distance from an integer below which a product counts as that integer */
const SCALE_EPSILON = 1e-9;

/**
 * `value * factor` narrowed to int16. A product sitting within float error of an
 * integer (0.29 * 100 = 28.999...) is taken as that integer before truncation.
 */
function scaleToInt16(value: number, factor: number): number {
  const scaled = value * factor;
  const nearest = Math.round(scaled);
  const snapped =
    Math.abs(scaled - nearest) <= SCALE_EPSILON * Math.max(1, Math.abs(scaled)) ? nearest : scaled;
  return toInt16(snapped);
}

export function encodeAngle(degree: number): number {
  return scaleToInt16(degree, ANGLE_SCALE);
}

export function encodeCoord(mm: number): number {
  return scaleToInt16(mm, COORD_SCALE);
}

export function decodeAngle(value: number): number {
  return value / ANGLE_SCALE;
}

export function decodeCoord(value: number): number {
  return value / COORD_SCALE;
}

/**
 * Scales a pose vector to wire integers: x, y, z by 10 and rx, ry, rz by 100.
 */
export function coordsToInt(coords: readonly number[]): number[] {
  return coords.map((value, i) => (i < COORD_AXES ? encodeCoord(value) : encodeAngle(value)));
}

/**
 * Inverse of {@link coordsToInt}.
 */
export function intToCoords(values: readonly number[]): number[] {
  return values.map((value, i) => (i < COORD_AXES ? decodeCoord(value) : decodeAngle(value)));
}
