/**
 * @file frame-resizer.ts
 * @description Resizes decoded video frames for display, choosing between the GPU and CPU executors.
 *
 * @external-interactions
 * - Lazily acquires a `WebGpuResizeExecutor` (shared device) on the first frame that needs one.
 * - Logs through the injected `logHandler`; fallbacks go to `console.warn`.
 *
 * @pitfalls
 * - A GPU that fails to initialize is not retried for the lifetime of the resizer.
 *   A GPU that fails a single resize is kept; only that frame falls back.
 */
import { SMALL_FRAME_DIMENSION } from '../constants';
import { InterpretedExecutor } from '../interpreter/executor';
import { consoleLogHandler, IResizeExecutor, LogHandler, ResizeResult } from '../kernel/executor';
import type { Extent } from '../kernel/types';
import { cloneFrame, clampToMaxDimension, fitWithinAspect, frameFromTexture, frameToTexture, needsResize, VideoFrame } from '../video/frame';
import { WebGpuResizeExecutor, WebGpuResizeExecutorInit } from '../webgpu/webgpu-executor';
import { ResizeConfig, ResizeConfigInput, resolveResizeConfig } from './config';

export type GpuExecutorFactory = (init: WebGpuResizeExecutorInit) => Promise<IResizeExecutor>;

export interface FrameResizerInit {
  config?: Partial<ResizeConfigInput>;
  gpuFactory?: GpuExecutorFactory;
  logHandler?: LogHandler;
}

export interface FrameResizeResult {
  frame: VideoFrame;
  // Null when the frame already had the target size.
  backend: string | null;
  skipped: boolean;
  // False when the target has an empty axis and the frame holds no pixels.
  produced: boolean;
}

const defaultGpuFactory: GpuExecutorFactory = init => WebGpuResizeExecutor.create(init);

export class FrameResizer {
  readonly config: ResizeConfig;
  private readonly gpuFactory: GpuExecutorFactory;
  private readonly logHandler: LogHandler;
  private readonly cpu: InterpretedExecutor;
  // Nearest-only: targets with a short side gain nothing from blending.
  private readonly cpuNearest: InterpretedExecutor;

  private gpu: IResizeExecutor | null = null;
  private gpuPending: Promise<IResizeExecutor | null> | null = null;
  private gpuUnavailable = false;

  constructor(init: FrameResizerInit = {}) {
    this.config = resolveResizeConfig({ ...init.config, enableGpu: init.config?.enableGpu ?? false });
    this.gpuFactory = init.gpuFactory ?? defaultGpuFactory;
    this.logHandler = init.logHandler ?? consoleLogHandler;
    this.cpu = new InterpretedExecutor({ thresholds: this.config.thresholds, logHandler: this.logHandler });
    this.cpuNearest = new InterpretedExecutor({
      thresholds: { ...this.config.thresholds, nearestScaleThreshold: Number.MAX_VALUE },
      logHandler: this.logHandler
    });
  }

  /**
   * Output size for a frame shown in a `targetWidth` x `targetHeight` area.
   */
  targetExtent(frame: Pick<VideoFrame, 'width' | 'height'>, targetWidth: number, targetHeight: number): Extent {
    const target = { width: targetWidth, height: targetHeight };
    const fitted = this.config.maintainAspect ? fitWithinAspect(frame, target) : target;
    return clampToMaxDimension(fitted, this.config.maxFrameDimension);
  }

  async resizeFrame(frame: VideoFrame, targetWidth: number, targetHeight: number): Promise<FrameResizeResult> {
    const { width, height } = this.targetExtent(frame, targetWidth, targetHeight);

    if (!needsResize(frame, width, height)) {
      return { frame: cloneFrame(frame), backend: null, skipped: true, produced: width > 0 && height > 0 };
    }

    const source = frameToTexture(frame);
    const timing = { timestamp: frame.timestamp, duration: frame.duration };

    const toResult = (result: ResizeResult): FrameResizeResult => ({
      frame: frameFromTexture(result.destination, timing),
      backend: result.backend,
      skipped: false,
      produced: result.produced
    });

    if (width < SMALL_FRAME_DIMENSION || height < SMALL_FRAME_DIMENSION) {
      return toResult(await this.cpuNearest.resize(source, width, height));
    }

    const gpu = await this.acquireGpu();
    if (gpu) {
      try {
        return toResult(await gpu.resize(source, width, height));
      } catch (e) {
        const message = e instanceof Error ? e.message : String(e);
        console.warn(`[FrameResizer] GPU resize failed, falling back to CPU: ${message}`);
      }
    }

    return toResult(await this.cpu.resize(source, width, height));
  }

  private async acquireGpu(): Promise<IResizeExecutor | null> {
    if (!this.config.enableGpu || this.gpuUnavailable) return null;
    if (this.gpu) return this.gpu;
    if (!this.gpuPending) {
      this.gpuPending = this.gpuFactory({
        thresholds: this.config.thresholds,
        timeoutMs: this.config.gpuTimeoutMs,
        logHandler: this.logHandler
      }).then(
        executor => {
          this.gpu = executor;
          this.logHandler(`[FrameResizer] GPU executor ready (${executor.name})`);
          return executor;
        },
        (e: unknown) => {
          this.gpuUnavailable = true;
          const message = e instanceof Error ? e.message : String(e);
          console.warn(`[FrameResizer] GPU unavailable, using CPU: ${message}`);
          return null;
        }
      ).finally(() => {
        this.gpuPending = null;
      });
    }
    return this.gpuPending;
  }

  get usingGpu(): boolean {
    return this.gpu !== null;
  }

  destroy(): void {
    this.gpu?.destroy();
    this.gpu = null;
    this.cpu.destroy();
    this.cpuNearest.destroy();
  }
}
