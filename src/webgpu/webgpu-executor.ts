import { DEFAULT_GPU_TIMEOUT_MS } from '../constants';
import { consoleLogHandler, IResizeExecutor, LogHandler, ResizeResult } from '../kernel/executor';
import type { ResampleThresholdsInput } from '../kernel/schemas';
import { SourceTexture, StorageTexture } from '../kernel/texture';
import { ResampleThresholds, ResizeParams, TextureFormat, TextureFormatToGpu } from '../kernel/types';
import { assertResizeParams, resolveThresholds } from '../kernel/validator';
import { computeWorkgroupCount, paddedBytesPerRow, stripRowPadding, TaskQueue, withTimeout } from '../utils/dispatch-utils';
import { GpuCache } from './gpu-cache';
import { getSharedDevice } from './gpu-device';
import {
  generateResizeShader,
  OVERRIDE_NEAREST_SCALE_THRESHOLD,
  OVERRIDE_TRANSPARENT_ALPHA_THRESHOLD,
  RESIZE_BINDINGS
} from './wgsl-generator';

interface CachedTexture {
  width: number;
  height: number;
  format: TextureFormat;
  texture: GPUTexture;
}

interface CachedReadback {
  width: number;
  height: number;
  paddedRow: number;
  buffer: GPUBuffer;
}

export interface WebGpuResizeExecutorInit {
  device?: GPUDevice;
  thresholds?: ResampleThresholdsInput;
  timeoutMs?: number;
  logHandler?: LogHandler;
}

/**
 * Runs the resample kernel on a GPUDevice.
 *
 * Keeps the source texture, storage texture and readback buffer between calls
 * and only reallocates when dimensions (or the source format) change, so a
 * stream of equally sized frames reuses everything but the upload.
 * Dispatches ceil(w/16) x ceil(h/16) workgroups and strips the 256-byte row
 * padding from the readback. Calls are queued: the cached resources belong to
 * one resize at a time.
 */
export class WebGpuResizeExecutor implements IResizeExecutor {
  readonly name = 'WebGPU';
  readonly device: GPUDevice;
  readonly thresholds: ResampleThresholds;
  private readonly timeoutMs: number;
  private readonly logHandler: LogHandler;

  private pipeline: GPUComputePipeline | null = null;
  private inputTexture: CachedTexture | null = null;
  private outputTexture: CachedTexture | null = null;
  private readback: CachedReadback | null = null;
  private uniformBuffer: GPUBuffer | null = null;
  private readonly queue = new TaskQueue();

  constructor(device: GPUDevice, init: Omit<WebGpuResizeExecutorInit, 'device'> = {}) {
    this.device = device;
    this.thresholds = resolveThresholds(init.thresholds);
    this.timeoutMs = init.timeoutMs ?? DEFAULT_GPU_TIMEOUT_MS;
    this.logHandler = init.logHandler ?? consoleLogHandler;
  }

  /**
   * Acquires the shared device (unless one is given) and compiles the pipeline.
   */
  static async create(init: WebGpuResizeExecutorInit = {}): Promise<WebGpuResizeExecutor> {
    const device = init.device ?? await getSharedDevice();
    const executor = new WebGpuResizeExecutor(device, init);
    await executor.initialize();
    return executor;
  }

  async initialize(): Promise<void> {
    if (this.pipeline) return;
    const code = generateResizeShader({ thresholds: this.thresholds });
    this.pipeline = await GpuCache.getComputePipeline(this.device, code, {
      [OVERRIDE_NEAREST_SCALE_THRESHOLD]: this.thresholds.nearestScaleThreshold,
      [OVERRIDE_TRANSPARENT_ALPHA_THRESHOLD]: this.thresholds.transparentAlphaThreshold
    });
    this.logHandler('[WebGpuResizeExecutor] Pipeline ready', { ...this.thresholds });
  }

  resize(source: SourceTexture, outputWidth: number, outputHeight: number): Promise<ResizeResult> {
    return this.queue.run(() => this.runResize(source, outputWidth, outputHeight));
  }

  private async runResize(source: SourceTexture, outputWidth: number, outputHeight: number): Promise<ResizeResult> {
    const startTime = performance.now();
    const params: ResizeParams = {
      inputWidth: source.width,
      inputHeight: source.height,
      outputWidth,
      outputHeight
    };
    assertResizeParams(params);
    const workgroups = computeWorkgroupCount(outputWidth, outputHeight);

    // Zero-sized textures are invalid in WebGPU, and an empty grid writes nothing anyway.
    if (outputWidth === 0 || outputHeight === 0) {
      this.logHandler(`[WebGpuResizeExecutor] Empty output ${outputWidth}x${outputHeight}, nothing dispatched`);
      return {
        destination: new StorageTexture(outputWidth, outputHeight),
        produced: false,
        workgroups,
        backend: this.name,
        elapsedMs: performance.now() - startTime
      };
    }

    await this.initialize();
    const pipeline = this.pipeline;
    if (!pipeline) throw new Error('[WebGpuResizeExecutor] Pipeline failed to initialize');

    this.device.pushErrorScope('validation');

    const input = this.ensureInputTexture(source.width, source.height, source.format);
    this.device.queue.writeTexture(
      { texture: input.texture },
      new Uint8Array(source.bytes),
      { bytesPerRow: source.bytesPerRow, rowsPerImage: source.height },
      [source.width, source.height, 1]
    );

    const output = this.ensureOutputTexture(outputWidth, outputHeight);
    const readback = this.ensureReadback(outputWidth, outputHeight);
    const uniform = this.ensureUniformBuffer();
    this.device.queue.writeBuffer(uniform, 0, new Float32Array([
      params.inputWidth, params.inputHeight, params.outputWidth, params.outputHeight
    ]));

    const bindGroup = this.device.createBindGroup({
      label: 'resize',
      layout: pipeline.getBindGroupLayout(0),
      entries: [
        { binding: RESIZE_BINDINGS.source, resource: input.texture.createView() },
        { binding: RESIZE_BINDINGS.destination, resource: output.texture.createView() },
        { binding: RESIZE_BINDINGS.params, resource: { buffer: uniform } }
      ]
    });

    const encoder = this.device.createCommandEncoder({ label: 'resize' });
    const pass = encoder.beginComputePass({ label: 'resize' });
    pass.setPipeline(pipeline);
    pass.setBindGroup(0, bindGroup);
    pass.dispatchWorkgroups(...workgroups);
    pass.end();

    encoder.copyTextureToBuffer(
      { texture: output.texture },
      { buffer: readback.buffer, bytesPerRow: readback.paddedRow, rowsPerImage: outputHeight },
      [outputWidth, outputHeight, 1]
    );
    this.device.queue.submit([encoder.finish()]);

    const gpuError = await this.device.popErrorScope();
    if (gpuError) {
      throw new Error(`[WebGpuResizeExecutor] GPU validation error: ${gpuError.message}`);
    }

    let data: Uint8Array;
    try {
      await withTimeout(readback.buffer.mapAsync(GPUMapMode.READ), this.timeoutMs, '[WebGpuResizeExecutor] Readback');
      data = stripRowPadding(new Uint8Array(readback.buffer.getMappedRange()), outputWidth * 4, readback.paddedRow, outputHeight);
      readback.buffer.unmap();
    } catch (e) {
      // A buffer with a pending or failed map cannot be reused.
      readback.buffer.destroy();
      if (this.readback === readback) this.readback = null;
      throw e;
    }

    const elapsedMs = performance.now() - startTime;
    this.logHandler(`[WebGpuResizeExecutor] ${source.width}x${source.height} -> ${outputWidth}x${outputHeight} in ${elapsedMs.toFixed(1)}ms`, {
      workgroups
    });

    return {
      destination: new StorageTexture(outputWidth, outputHeight, data),
      produced: true,
      workgroups,
      backend: this.name,
      elapsedMs
    };
  }

  private ensureInputTexture(width: number, height: number, format: TextureFormat): CachedTexture {
    const cached = this.inputTexture;
    if (cached && cached.width === width && cached.height === height && cached.format === format) {
      return cached;
    }
    cached?.texture.destroy();
    const texture = this.device.createTexture({
      label: 'resize_input',
      size: [width, height, 1],
      format: TextureFormatToGpu[format],
      usage: GPUTextureUsage.TEXTURE_BINDING | GPUTextureUsage.COPY_DST
    });
    this.inputTexture = { width, height, format, texture };
    return this.inputTexture;
  }

  private ensureOutputTexture(width: number, height: number): CachedTexture {
    const cached = this.outputTexture;
    if (cached && cached.width === width && cached.height === height) {
      return cached;
    }
    cached?.texture.destroy();
    const texture = this.device.createTexture({
      label: 'resize_output',
      size: [width, height, 1],
      format: TextureFormatToGpu[TextureFormat.RGBA8],
      usage: GPUTextureUsage.STORAGE_BINDING | GPUTextureUsage.COPY_SRC
    });
    this.outputTexture = { width, height, format: TextureFormat.RGBA8, texture };
    return this.outputTexture;
  }

  private ensureReadback(width: number, height: number): CachedReadback {
    const cached = this.readback;
    if (cached && cached.width === width && cached.height === height) {
      return cached;
    }
    cached?.buffer.destroy();
    const paddedRow = paddedBytesPerRow(width * 4);
    const buffer = this.device.createBuffer({
      label: 'resize_readback',
      size: paddedRow * height,
      usage: GPUBufferUsage.COPY_DST | GPUBufferUsage.MAP_READ
    });
    this.readback = { width, height, paddedRow, buffer };
    return this.readback;
  }

  private ensureUniformBuffer(): GPUBuffer {
    if (!this.uniformBuffer) {
      this.uniformBuffer = this.device.createBuffer({
        label: 'resize_params',
        size: 16,
        usage: GPUBufferUsage.UNIFORM | GPUBufferUsage.COPY_DST
      });
    }
    return this.uniformBuffer;
  }

  /** Release all cached GPU resources. The device itself is shared and left alone. */
  destroy(): void {
    this.inputTexture?.texture.destroy();
    this.outputTexture?.texture.destroy();
    this.readback?.buffer.destroy();
    this.uniformBuffer?.destroy();
    this.inputTexture = null;
    this.outputTexture = null;
    this.readback = null;
    this.uniformBuffer = null;
    this.pipeline = null;
  }
}
