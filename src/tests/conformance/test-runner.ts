import { expect } from 'vitest';
import type { ResizeResult } from '../../kernel/executor';
import type { ResampleThresholdsInput } from '../../kernel/schemas';
import { SourceTexture } from '../../kernel/texture';
import { InterpreterBackend } from './interpreter-backend';
import { TestBackend } from './types';
import { WebGpuBackend } from './webgpu-backend';

const backends = [InterpreterBackend, WebGpuBackend];

// The interpreter always runs; GPU backends join only when asked for by name.
export const availableBackends: TestBackend[] = process.env.TEST_BACKEND
  ? [InterpreterBackend, ...backends.filter(b => b !== InterpreterBackend && b.name === process.env.TEST_BACKEND)]
  : [InterpreterBackend];

if (process.env.TEST_BACKEND && !backends.some(b => b.name === process.env.TEST_BACKEND)) {
  console.warn(`[TestRunner] Warning: No backend found matching TEST_BACKEND='${process.env.TEST_BACKEND}'. Available: ${backends.map(b => b.name).join(', ')}`);
}

// ------------------------------------------------------------------
// Test Helpers
// ------------------------------------------------------------------

export type Rgba8 = [number, number, number, number];

export const rgba8Source = (width: number, height: number, fill: (x: number, y: number) => Rgba8): SourceTexture => {
  const data = new Uint8Array(width * height * 4);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      data.set(fill(x, y), (y * width + x) * 4);
    }
  }
  return SourceTexture.fromRgba8(width, height, data);
};

// Distinct, opaque colour per texel.
export const gradientTexel = (x: number, y: number): Rgba8 => [x * 40 % 256, y * 40 % 256, (x + y) * 10 % 256, 255];

export const runResize = async (
  backend: TestBackend,
  source: SourceTexture,
  outputWidth: number,
  outputHeight: number,
  thresholds?: ResampleThresholdsInput
): Promise<ResizeResult> => {
  const executor = await backend.createExecutor(thresholds);
  try {
    return await executor.resize(source, outputWidth, outputHeight);
  } finally {
    executor.destroy();
  }
};

export const expectBytes = (actual: readonly number[], expected: readonly number[], tolerance: number) => {
  expect(actual).toHaveLength(expected.length);
  actual.forEach((v, i) => {
    expect(Math.abs(v - expected[i]), `channel ${i}: got ${v}, expected ${expected[i]}`).toBeLessThanOrEqual(tolerance);
  });
};
