import { consoleLogHandler, IResizeExecutor, LogHandler, ResizeResult } from '../kernel/executor';
import type { SourceTexture } from '../kernel/texture';
import type { ResampleThresholds } from '../kernel/types';
import type { ResampleThresholdsInput } from '../kernel/schemas';
import { resolveThresholds } from '../kernel/validator';
import { InterpretedExecutor } from '../interpreter/executor';

export interface MockResizeCall {
  inputWidth: number;
  inputHeight: number;
  outputWidth: number;
  outputHeight: number;
}

/**
 * A mock executor that doesn't require a real GPUDevice.
 * Records every call, and either fails on demand or answers through the interpreter,
 * so the frame resizer's GPU path and its fallbacks can be tested in isolation.
 */
export class MockGpuExecutor implements IResizeExecutor {
  readonly name = 'MockWebGPU';
  readonly thresholds: ResampleThresholds;
  readonly calls: MockResizeCall[] = [];
  destroyed = false;
  failWith: Error | null = null;
  private readonly fallback: InterpretedExecutor;
  private readonly logHandler: LogHandler;

  constructor(init: { thresholds?: ResampleThresholdsInput, logHandler?: LogHandler } = {}) {
    this.thresholds = resolveThresholds(init.thresholds);
    this.logHandler = init.logHandler ?? consoleLogHandler;
    this.fallback = new InterpretedExecutor({ thresholds: this.thresholds, logHandler: this.logHandler });
  }

  async resize(source: SourceTexture, outputWidth: number, outputHeight: number): Promise<ResizeResult> {
    this.calls.push({ inputWidth: source.width, inputHeight: source.height, outputWidth, outputHeight });
    this.logHandler(`[MockGpuExecutor] resize: ${source.width}x${source.height} -> ${outputWidth}x${outputHeight}`);
    if (this.failWith) throw this.failWith;
    const result = await this.fallback.resize(source, outputWidth, outputHeight);
    return { ...result, backend: this.name };
  }

  destroy(): void {
    this.destroyed = true;
  }
}
