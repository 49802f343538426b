import { describe, it, expect } from 'vitest';
import { availableBackends, expectBytes, Rgba8, rgba8Source, runResize } from './test-runner';

const RED: Rgba8 = [255, 0, 0, 255];
const GREEN: Rgba8 = [0, 255, 0, 255];
const BLUE: Rgba8 = [0, 0, 255, 255];
const WHITE: Rgba8 = [255, 255, 255, 255];

const rgbw = () => rgba8Source(2, 2, (x, y) => [[RED, GREEN], [BLUE, WHITE]][y][x]);

describe('Conformance: Bilinear Interpolation', () => {
  availableBackends.forEach(backend => {
    it(`should blend the 2x2 neighbourhood at its centre [${backend.name}]`, async () => {
      // Scale 0.5 is not below 0.5, so the upscale takes BILINEAR.
      // Output (1,1) maps to source (0.5, 0.5): (0.5, 0.5, 0.5, 1.0).
      const result = await runResize(backend, rgbw(), 4, 4, { nearestScaleThreshold: 0.5 });

      expectBytes(result.destination.readBytes(1, 1), [128, 128, 128, 255], backend.byteTolerance);
      expectBytes(result.destination.readBytes(0, 0), RED, backend.byteTolerance);
      // (3,3) -> (1.5, 1.5): every neighbour clamps onto WHITE.
      expectBytes(result.destination.readBytes(3, 3), WHITE, backend.byteTolerance);
    });

    it(`should pick the truncated texel for the same upscale at the default threshold [${backend.name}]`, async () => {
      const result = await runResize(backend, rgbw(), 4, 4);

      expect(result.destination.readBytes(1, 1)).toEqual(RED);
      expect(result.destination.readBytes(2, 1)).toEqual(GREEN);
      expect(result.destination.readBytes(1, 2)).toEqual(BLUE);
      expect(result.destination.readBytes(3, 3)).toEqual(WHITE);
    });

    it(`should interpolate horizontally on a 1.5x downscale [${backend.name}]`, async () => {
      const row: Rgba8[] = [[0, 0, 0, 255], [100, 40, 0, 255], [200, 80, 20, 255]];
      const source = rgba8Source(3, 1, x => row[x]);
      // Output x=1 maps to source 1.5, halfway between texels 1 and 2.
      const result = await runResize(backend, source, 2, 1);

      expectBytes(result.destination.readBytes(0, 0), [0, 0, 0, 255], backend.byteTolerance);
      expectBytes(result.destination.readBytes(1, 0), [150, 60, 10, 255], backend.byteTolerance);
    });
  });
});
