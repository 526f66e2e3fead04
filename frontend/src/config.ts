import { MAX_VERTEX_COUNT } from './geometry';

// ----------------------------------------------------------------
// Canvas
// ----------------------------------------------------------------

export const DEFAULT_IMAGE_SIZE = 1200;

/** Parse `VITE_IMAGE_SIZE`; anything that is not a positive integer falls back to the default. */
export function parseImageSize(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') return DEFAULT_IMAGE_SIZE;
  const n = Number(raw);
  return Number.isInteger(n) && n > 0 ? n : DEFAULT_IMAGE_SIZE;
}

export const IMAGE_SIZE = parseImageSize(import.meta.env.VITE_IMAGE_SIZE);
/** Diameter of the polygon / circle: 90% of the canvas side. */
export const DRAWING_SIZE = IMAGE_SIZE * 0.9;

// ----------------------------------------------------------------
// Slider ranges & defaults
// ----------------------------------------------------------------

export interface SliderRange {
  min: number;
  max: number;
  initial: number;
}

export const MAX_MODULUS = 1000;

export const VERTEX_RANGE: SliderRange = { min: 3, max: MAX_VERTEX_COUNT, initial: 3 };
export const MODULUS_RANGE: SliderRange = { min: 1, max: MAX_MODULUS, initial: 100 };
/** Upper bound follows the current modulus at runtime. */
export const MULTIPLIER_RANGE: SliderRange = { min: 0, max: MAX_MODULUS, initial: 2 };
export const ANGLE_RANGE: SliderRange = { min: -180, max: 180, initial: -150 };
