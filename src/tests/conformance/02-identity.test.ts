import { describe, it, expect } from 'vitest';
import { availableBackends, gradientTexel, rgba8Source, runResize } from './test-runner';

describe('Conformance: Identity Resize', () => {
  availableBackends.forEach(backend => {
    it(`should reproduce the source exactly [${backend.name}]`, async () => {
      const source = rgba8Source(6, 4, gradientTexel);
      const result = await runResize(backend, source, 6, 4);

      expect(Array.from(result.destination.data)).toEqual(Array.from(source.bytes));
    });

    it(`should keep colour under zero alpha on the NEAREST path [${backend.name}]`, async () => {
      // The transparency short-circuit belongs to BILINEAR only.
      const source = rgba8Source(2, 2, () => [200, 100, 50, 0]);
      const result = await runResize(backend, source, 2, 2);

      expect(result.destination.readBytes(0, 0)).toEqual([200, 100, 50, 0]);
      expect(result.destination.readBytes(1, 1)).toEqual([200, 100, 50, 0]);
    });
  });
});
