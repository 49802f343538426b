import { WORKGROUP_SIZE } from '../constants';
import { consoleLogHandler, IResizeExecutor, LogHandler, ResizeResult } from '../kernel/executor';
import type { ResampleThresholdsInput } from '../kernel/schemas';
import { SourceTexture, StorageTexture } from '../kernel/texture';
import type { ResampleThresholds, ResizeParams, WorkgroupCount } from '../kernel/types';
import { assertResizeParams, resolveThresholds } from '../kernel/validator';
import { computeWorkgroupCount } from '../utils/dispatch-utils';
import { DispatchContext } from './context';
import { resampleTexel } from './ops';

/**
 * Reference executor. Emulates `dispatchWorkgroups` on the CPU: every
 * workgroup runs 16x16 invocations, each with its own global id, and each
 * invocation runs the kernel to completion before the next starts.
 */
export class InterpretedExecutor implements IResizeExecutor {
  readonly name = 'Interpreter';
  readonly thresholds: ResampleThresholds;
  private logHandler: LogHandler;

  constructor(init: { thresholds?: ResampleThresholdsInput, logHandler?: LogHandler } = {}) {
    this.thresholds = resolveThresholds(init.thresholds);
    this.logHandler = init.logHandler ?? consoleLogHandler;
  }

  createContext(source: SourceTexture, params: ResizeParams): DispatchContext {
    const destination = new StorageTexture(params.outputWidth, params.outputHeight);
    return new DispatchContext(source, destination, params, this.thresholds);
  }

  /**
   * Runs the kernel over an explicit grid. The grid may be larger than the
   * output; the Bounds Guard discards the excess.
   */
  dispatch(ctx: DispatchContext, workgroups: WorkgroupCount) {
    const [sx, sy, sz] = WORKGROUP_SIZE;
    ctx.logAction('dispatch', 'resize', { workgroups });

    for (let wz = 0; wz < workgroups[2]; wz++) {
      for (let wy = 0; wy < workgroups[1]; wy++) {
        for (let wx = 0; wx < workgroups[0]; wx++) {
          for (let lz = 0; lz < sz; lz++) {
            for (let ly = 0; ly < sy; ly++) {
              for (let lx = 0; lx < sx; lx++) {
                ctx.builtins.set('global_invocation_id', [wx * sx + lx, wy * sy + ly, wz * sz + lz]);
                this.executeInvocation(ctx);
              }
            }
          }
        }
      }
    }

    ctx.builtins.clear();
  }

  executeInvocation(ctx: DispatchContext) {
    const [x, y] = ctx.getBuiltin('global_invocation_id');
    const texel = resampleTexel(ctx.source, ctx.params, x, y, ctx.thresholds);
    if (texel === null) {
      ctx.discarded++;
      return;
    }
    ctx.destination.store(x, y, texel);
  }

  async resize(source: SourceTexture, outputWidth: number, outputHeight: number): Promise<ResizeResult> {
    const startTime = performance.now();
    const params: ResizeParams = {
      inputWidth: source.width,
      inputHeight: source.height,
      outputWidth,
      outputHeight
    };
    assertResizeParams(params);

    const ctx = this.createContext(source, params);
    const workgroups = computeWorkgroupCount(outputWidth, outputHeight);
    const produced = ctx.destination.produced;

    if (produced) {
      this.dispatch(ctx, workgroups);
    } else {
      this.logHandler(`[InterpretedExecutor] Empty output ${outputWidth}x${outputHeight}, nothing dispatched`);
    }

    const elapsedMs = performance.now() - startTime;
    this.logHandler(`[InterpretedExecutor] ${source.width}x${source.height} -> ${outputWidth}x${outputHeight} in ${elapsedMs.toFixed(1)}ms`, {
      workgroups,
      discarded: ctx.discarded
    });

    return {
      destination: ctx.destination,
      produced,
      workgroups,
      backend: this.name,
      elapsedMs
    };
  }

  destroy(): void {
    // Nothing held between dispatches.
  }
}
