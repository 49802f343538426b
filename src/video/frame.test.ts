import { describe, it, expect } from 'vitest';
import { StorageTexture } from '../kernel/texture';
import { clampToMaxDimension, cloneFrame, createFrame, fitWithinAspect, frameFromTexture, frameToTexture, needsResize } from './frame';

describe('Video Frames', () => {
  it('should reject data that does not match the extent', () => {
    expect(() => createFrame(2, 2, new Uint8Array(15))).toThrow('Frame 2x2 expects 16 bytes, got 15');
  });

  it('should clone data but keep timing', () => {
    const frame = createFrame(1, 1, new Uint8Array([1, 2, 3, 4]), 2.5, 0.04);
    const copy = cloneFrame(frame);
    expect(copy).toEqual(frame);
    expect(copy.data).not.toBe(frame.data);
  });

  it('should only need a resize when dimensions differ', () => {
    const frame = createFrame(4, 2, new Uint8Array(32));
    expect(needsResize(frame, 4, 2)).toBe(false);
    expect(needsResize(frame, 4, 3)).toBe(true);
    expect(needsResize(frame, 2, 2)).toBe(true);
  });

  it('should convert to and from textures', () => {
    const frame = createFrame(1, 1, new Uint8Array([255, 0, 0, 255]), 1, 0.5);
    expect(frameToTexture(frame).load(0, 0)).toEqual([1, 0, 0, 1]);

    const out = frameFromTexture(new StorageTexture(1, 1, new Uint8Array([9, 8, 7, 6])), frame);
    expect(out).toEqual({ width: 1, height: 1, data: new Uint8Array([9, 8, 7, 6]), timestamp: 1, duration: 0.5 });
  });

  describe('fitWithinAspect', () => {
    it('should letterbox a wide source', () => {
      expect(fitWithinAspect({ width: 200, height: 100 }, { width: 50, height: 50 })).toEqual({ width: 50, height: 25 });
    });

    it('should pillarbox a tall source', () => {
      expect(fitWithinAspect({ width: 100, height: 200 }, { width: 50, height: 50 })).toEqual({ width: 25, height: 50 });
    });

    it('should truncate the constrained axis', () => {
      // 16:9 into 100x100 -> 100 x 56.25
      expect(fitWithinAspect({ width: 1920, height: 1080 }, { width: 100, height: 100 })).toEqual({ width: 100, height: 56 });
    });

    it('should keep at least one pixel on the constrained axis', () => {
      expect(fitWithinAspect({ width: 400, height: 2 }, { width: 100, height: 100 })).toEqual({ width: 100, height: 1 });
      expect(fitWithinAspect({ width: 2, height: 400 }, { width: 100, height: 100 })).toEqual({ width: 1, height: 100 });
    });

    it('should not grow an empty target axis', () => {
      expect(fitWithinAspect({ width: 64, height: 64 }, { width: 0, height: 10 })).toEqual({ width: 0, height: 1 });
    });

    it('should pass the target through for an empty source', () => {
      expect(fitWithinAspect({ width: 0, height: 10 }, { width: 40, height: 30 })).toEqual({ width: 40, height: 30 });
    });
  });

  describe('clampToMaxDimension', () => {
    it('should leave extents within the limit alone', () => {
      expect(clampToMaxDimension({ width: 800, height: 600 }, 1024)).toEqual({ width: 800, height: 600 });
    });

    it('should scale the longest side down to the limit', () => {
      expect(clampToMaxDimension({ width: 2048, height: 1024 }, 1024)).toEqual({ width: 1024, height: 512 });
      expect(clampToMaxDimension({ width: 101, height: 2000 }, 1000)).toEqual({ width: 50, height: 1000 });
    });
  });
});
