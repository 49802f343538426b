export * from './constants';
export * from './kernel/types';
export { ResizeParamsSchema, ResampleThresholdsSchema } from './kernel/schemas';
export type { ResampleThresholdsInput } from './kernel/schemas';
export { SourceTexture, StorageTexture } from './kernel/texture';
export { consoleLogHandler } from './kernel/executor';
export type { IResizeExecutor, LogHandler, ResizeResult } from './kernel/executor';
export { assertResizeParams, resolveThresholds, validateResizeParams } from './kernel/validator';
export type { ParamValidationError } from './kernel/validator';

export {
  boundsGuard,
  compositeBilinear,
  mapCoordinate,
  resampleTexel,
  sampleBilinear,
  sampleNearest,
  selectStrategy
} from './interpreter/ops';
export { DispatchContext } from './interpreter/context';
export { InterpretedExecutor } from './interpreter/executor';

export { generateResizeShader, WgslGenerator, RESIZE_BINDINGS } from './webgpu/wgsl-generator';
export type { ResizeShaderOptions } from './webgpu/wgsl-generator';
export { getSharedDevice, resetSharedDevice } from './webgpu/gpu-device';
export { WebGpuResizeExecutor } from './webgpu/webgpu-executor';
export type { WebGpuResizeExecutorInit } from './webgpu/webgpu-executor';

export { computeWorkgroupCount, paddedBytesPerRow, stripRowPadding } from './utils/dispatch-utils';

export { clampToMaxDimension, cloneFrame, createFrame, fitWithinAspect, needsResize } from './video/frame';
export type { VideoFrame } from './video/frame';

export { loadResizeConfig, resolveResizeConfig } from './runtime/config';
export type { ResizeConfig } from './runtime/config';
export { FrameResizer } from './runtime/frame-resizer';
export type { FrameResizeResult, FrameResizerInit, GpuExecutorFactory } from './runtime/frame-resizer';
