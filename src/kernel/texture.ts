import { BytesPerTexel, Texel, TextureFormat } from './types';

// ------------------------------------------------------------------
// Texture State
// ------------------------------------------------------------------
// Host-side stand-ins for the two kernel bindings. Both are row-major and
// tightly packed (no row padding); readback padding is stripped before data
// lands here.

const unormToFloat = (v: number) => v / 255;
const floatToUnorm = (v: number) => Math.round(Math.min(1, Math.max(0, v)) * 255);

/**
 * Read-only source texture (binding 0). Loads return four float channels
 * regardless of storage format, like `textureLoad` on a `texture_2d<f32>`.
 */
export class SourceTexture {
  readonly width: number;
  readonly height: number;
  readonly format: TextureFormat;
  private readonly data: Uint8Array | Float32Array;
  private loads = 0;

  private constructor(width: number, height: number, format: TextureFormat, data: Uint8Array | Float32Array) {
    const expected = width * height * 4;
    if (data.length !== expected) {
      throw new Error(`Runtime Error: ${format} texture ${width}x${height} expects ${expected} channels, got ${data.length}`);
    }
    this.width = width;
    this.height = height;
    this.format = format;
    this.data = data;
  }

  static fromRgba8(width: number, height: number, data: Uint8Array): SourceTexture {
    return new SourceTexture(width, height, TextureFormat.RGBA8, data);
  }

  static fromFloat32(width: number, height: number, data: Float32Array): SourceTexture {
    return new SourceTexture(width, height, TextureFormat.RGBA32F, data);
  }

  /**
   * Builds an RGBA32F texture from a row-major list of texels.
   */
  static fromTexels(width: number, height: number, texels: readonly Texel[]): SourceTexture {
    const data = new Float32Array(width * height * 4);
    texels.forEach((t, i) => data.set(t, i * 4));
    return SourceTexture.fromFloat32(width, height, data);
  }

  load(x: number, y: number): Texel {
    if (!Number.isInteger(x) || !Number.isInteger(y) || x < 0 || y < 0 || x >= this.width || y >= this.height) {
      throw new Error(`Runtime Error: texture load OOB (coords ${x},${y}, size ${this.width}x${this.height})`);
    }
    this.loads++;
    const i = (y * this.width + x) * 4;
    const d = this.data;
    if (this.format === TextureFormat.RGBA8) {
      return [unormToFloat(d[i]), unormToFloat(d[i + 1]), unormToFloat(d[i + 2]), unormToFloat(d[i + 3])];
    }
    return [d[i], d[i + 1], d[i + 2], d[i + 3]];
  }

  get loadCount(): number {
    return this.loads;
  }

  /** Raw bytes laid out for `writeTexture` with `bytesPerRow = width * bytesPerTexel`. */
  get bytes(): Uint8Array {
    return new Uint8Array(this.data.buffer, this.data.byteOffset, this.data.byteLength);
  }

  get bytesPerRow(): number {
    return this.width * BytesPerTexel[this.format];
  }
}

/**
 * Write-only destination texture (binding 1), fixed RGBA8 unorm.
 * Tracks how many times each texel was stored so coverage can be checked
 * after a dispatch.
 */
export class StorageTexture {
  readonly width: number;
  readonly height: number;
  readonly format = TextureFormat.RGBA8;
  readonly data: Uint8Array;
  private readonly writes: Uint32Array;

  constructor(width: number, height: number, data?: Uint8Array) {
    this.width = width;
    this.height = height;
    this.data = data ?? new Uint8Array(width * height * 4);
    if (this.data.length !== width * height * 4) {
      throw new Error(`Runtime Error: storage texture ${width}x${height} expects ${width * height * 4} bytes, got ${this.data.length}`);
    }
    this.writes = new Uint32Array(width * height);
    // Data handed in from a readback counts as written once.
    if (data) this.writes.fill(1);
  }

  store(x: number, y: number, texel: Readonly<Texel>) {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) {
      throw new Error(`Runtime Error: texture store OOB (coords ${x},${y}, size ${this.width}x${this.height})`);
    }
    const idx = y * this.width + x;
    if (this.writes[idx] > 0) {
      throw new Error(`Runtime Error: texel (${x},${y}) written more than once`);
    }
    this.writes[idx]++;
    const i = idx * 4;
    this.data[i] = floatToUnorm(texel[0]);
    this.data[i + 1] = floatToUnorm(texel[1]);
    this.data[i + 2] = floatToUnorm(texel[2]);
    this.data[i + 3] = floatToUnorm(texel[3]);
  }

  /** Reads back a stored texel as unorm bytes. */
  readBytes(x: number, y: number): [number, number, number, number] {
    const i = (y * this.width + x) * 4;
    return [this.data[i], this.data[i + 1], this.data[i + 2], this.data[i + 3]];
  }

  writeCount(x: number, y: number): number {
    return this.writes[y * this.width + x];
  }

  get totalWrites(): number {
    return this.writes.reduce((acc, n) => acc + n, 0);
  }

  get produced(): boolean {
    return this.width > 0 && this.height > 0;
  }
}
