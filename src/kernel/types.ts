// ------------------------------------------------------------------
// Texels
// ------------------------------------------------------------------
// A texel as sampled by the kernel: four float channels, RGBA order.
export type Texel = [number, number, number, number];

export const TRANSPARENT_BLACK: Readonly<Texel> = [0, 0, 0, 0];

// TextureFormat: storage formats understood by the host textures.
// Sources may be either; destinations are always RGBA8.
export enum TextureFormat {
  RGBA8 = 'rgba8',     // 8-bit normalized, matches 'rgba8unorm'
  RGBA32F = 'rgba32f'  // Full-float, matches 'rgba32float'
}

export const TextureFormatToGpu: Record<TextureFormat, GPUTextureFormat> = {
  [TextureFormat.RGBA8]: 'rgba8unorm',
  [TextureFormat.RGBA32F]: 'rgba32float'
};

export const BytesPerTexel: Record<TextureFormat, number> = {
  [TextureFormat.RGBA8]: 4,
  [TextureFormat.RGBA32F]: 16
};

// ------------------------------------------------------------------
// Kernel Parameters
// ------------------------------------------------------------------
// Laid out on the GPU as four f32 in declaration order (16 bytes).
export interface ResizeParams {
  readonly inputWidth: number;
  readonly inputHeight: number;
  readonly outputWidth: number;
  readonly outputHeight: number;
}

export interface ResampleThresholds {
  // NEAREST is chosen only when both scale factors are below this.
  readonly nearestScaleThreshold: number;
  // BILINEAR neighborhoods with every alpha below this write transparent black.
  readonly transparentAlphaThreshold: number;
}

export enum SampleStrategy {
  Nearest = 'nearest',
  Bilinear = 'bilinear'
}

export interface MappedCoordinate {
  srcX: number;
  srcY: number;
  scaleX: number;
  scaleY: number;
}

export interface Extent {
  width: number;
  height: number;
}

export type WorkgroupCount = [number, number, number];
