/**
 * @file frame.ts
 * @description Decoded RGBA8 video frames and the dimension math the frame resizer needs.
 */
import { SourceTexture, StorageTexture } from '../kernel/texture';
import type { Extent } from '../kernel/types';

export interface VideoFrame {
  readonly width: number;
  readonly height: number;
  // RGBA8, row-major, tightly packed.
  readonly data: Uint8Array;
  // Seconds.
  readonly timestamp: number;
  readonly duration: number;
}

export function createFrame(width: number, height: number, data: Uint8Array, timestamp = 0, duration = 0): VideoFrame {
  if (data.length !== width * height * 4) {
    throw new Error(`Frame ${width}x${height} expects ${width * height * 4} bytes, got ${data.length}`);
  }
  return { width, height, data, timestamp, duration };
}

/**
 * Copies a frame, keeping its timing. Resizing never hands back the caller's buffer.
 */
export function cloneFrame(frame: VideoFrame): VideoFrame {
  return { ...frame, data: frame.data.slice() };
}

export function needsResize(frame: VideoFrame, targetWidth: number, targetHeight: number): boolean {
  return frame.width !== targetWidth || frame.height !== targetHeight;
}

export function frameToTexture(frame: VideoFrame): SourceTexture {
  return SourceTexture.fromRgba8(frame.width, frame.height, frame.data);
}

/**
 * New frame with the resized pixels and the source frame's timing.
 */
export function frameFromTexture(texture: StorageTexture, timing: Pick<VideoFrame, 'timestamp' | 'duration'>): VideoFrame {
  return createFrame(texture.width, texture.height, texture.data, timing.timestamp, timing.duration);
}

// Truncated, but never below one pixel unless the target axis itself is empty.
const fitAxis = (value: number, limit: number): number => Math.min(limit, Math.max(1, Math.trunc(value)));

/**
 * Largest extent with the source's aspect ratio that fits inside the target.
 * Truncates the constrained axis, so the result can be one pixel short.
 */
export function fitWithinAspect(source: Extent, target: Extent): Extent {
  if (source.width === 0 || source.height === 0) return { ...target };
  const ratio = source.width / source.height;
  if (target.width / target.height > ratio) {
    // Height is the limiting factor
    return { width: fitAxis(target.height * ratio, target.width), height: target.height };
  }
  // Width is the limiting factor
  return { width: target.width, height: fitAxis(target.width / ratio, target.height) };
}

/**
 * Scales an extent down so neither side exceeds `maxDimension`, keeping its aspect ratio.
 */
export function clampToMaxDimension(extent: Extent, maxDimension: number): Extent {
  const largest = Math.max(extent.width, extent.height);
  if (largest <= maxDimension) return { ...extent };
  const scale = maxDimension / largest;
  return {
    width: Math.max(1, Math.floor(extent.width * scale)),
    height: Math.max(1, Math.floor(extent.height * scale))
  };
}
