import { MappedCoordinate, ResampleThresholds, ResizeParams, SampleStrategy, Texel, TRANSPARENT_BLACK } from '../kernel/types';
import type { SourceTexture } from '../kernel/texture';
import { NEAREST_SCALE_THRESHOLD, TRANSPARENT_ALPHA_THRESHOLD } from '../constants';

// ------------------------------------------------------------------
// Kernel Stages
// ------------------------------------------------------------------
// Each stage mirrors one block of the generated WGSL. Arithmetic goes through
// Math.fround so the interpreter rounds where an f32 shader would.

const f32 = Math.fround;

const DEFAULT_THRESHOLDS: ResampleThresholds = {
  nearestScaleThreshold: NEAREST_SCALE_THRESHOLD,
  transparentAlphaThreshold: TRANSPARENT_ALPHA_THRESHOLD
};

export const lerp = (a: number, b: number, t: number): number => f32(a + (b - a) * t);

export const mixTexel = (a: Readonly<Texel>, b: Readonly<Texel>, t: number): Texel => [
  lerp(a[0], b[0], t),
  lerp(a[1], b[1], t),
  lerp(a[2], b[2], t),
  lerp(a[3], b[3], t)
];

/**
 * Bounds Guard. False for invocations the rounded-up grid places outside the output.
 */
export const boundsGuard = (x: number, y: number, params: ResizeParams): boolean =>
  x < params.outputWidth && y < params.outputHeight;

/**
 * Coordinate Mapper. Output pixel -> fractional source coordinate, no rounding.
 */
export const mapCoordinate = (x: number, y: number, params: ResizeParams): MappedCoordinate => {
  const scaleX = f32(params.inputWidth / params.outputWidth);
  const scaleY = f32(params.inputHeight / params.outputHeight);
  return {
    srcX: f32(x * scaleX),
    srcY: f32(y * scaleY),
    scaleX,
    scaleY
  };
};

/**
 * Strategy Selector.
 */
export const selectStrategy = (scaleX: number, scaleY: number, nearestScaleThreshold: number): SampleStrategy => {
  // The shader's threshold is an f32 override.
  const threshold = f32(nearestScaleThreshold);
  return scaleX < threshold && scaleY < threshold
    ? SampleStrategy.Nearest
    : SampleStrategy.Bilinear;
};

export interface BilinearSamples {
  s00: Texel;
  s10: Texel;
  s01: Texel;
  s11: Texel;
  fx: number;
  fy: number;
}

/**
 * NEAREST sampler: truncate and fetch one texel.
 * The clamp only matters if f32 rounding pushed the coordinate onto the extent.
 */
export const sampleNearest = (source: SourceTexture, coord: MappedCoordinate): Texel => {
  const x = Math.min(Math.trunc(coord.srcX), source.width - 1);
  const y = Math.min(Math.trunc(coord.srcY), source.height - 1);
  return source.load(x, y);
};

/**
 * BILINEAR sampler: fetch the 2x2 neighborhood with its bottom-right edge clamped.
 */
export const sampleBilinear = (source: SourceTexture, coord: MappedCoordinate): BilinearSamples => {
  const maxX = source.width - 1;
  const maxY = source.height - 1;

  const x1 = Math.min(Math.floor(coord.srcX), maxX);
  const y1 = Math.min(Math.floor(coord.srcY), maxY);
  const x2 = Math.min(x1 + 1, maxX);
  const y2 = Math.min(y1 + 1, maxY);

  return {
    s00: source.load(x1, y1),
    s10: source.load(x2, y1),
    s01: source.load(x1, y2),
    s11: source.load(x2, y2),
    fx: f32(coord.srcX - x1),
    fy: f32(coord.srcY - y1)
  };
};

export const isTransparentNeighborhood = (samples: BilinearSamples, alphaThreshold: number): boolean => {
  const threshold = f32(alphaThreshold);
  return samples.s00[3] < threshold &&
    samples.s10[3] < threshold &&
    samples.s01[3] < threshold &&
    samples.s11[3] < threshold;
};

/**
 * BILINEAR compositor: transparency short-circuit, then two horizontal blends and one vertical.
 */
export const compositeBilinear = (samples: BilinearSamples, alphaThreshold: number): Texel => {
  if (isTransparentNeighborhood(samples, alphaThreshold)) {
    return [...TRANSPARENT_BLACK];
  }
  const top = mixTexel(samples.s00, samples.s10, samples.fx);
  const bottom = mixTexel(samples.s01, samples.s11, samples.fx);
  return mixTexel(top, bottom, samples.fy);
};

/**
 * The whole per-invocation computation. Returns null when the Bounds Guard discards.
 */
export const resampleTexel = (
  source: SourceTexture,
  params: ResizeParams,
  x: number,
  y: number,
  thresholds: ResampleThresholds = DEFAULT_THRESHOLDS
): Texel | null => {
  if (!boundsGuard(x, y, params)) return null;

  const coord = mapCoordinate(x, y, params);
  switch (selectStrategy(coord.scaleX, coord.scaleY, thresholds.nearestScaleThreshold)) {
    case SampleStrategy.Nearest:
      return sampleNearest(source, coord);
    case SampleStrategy.Bilinear:
      return compositeBilinear(sampleBilinear(source, coord), thresholds.transparentAlphaThreshold);
  }
};
