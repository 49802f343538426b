import type { SourceTexture, StorageTexture } from './texture';
import type { ResampleThresholds, WorkgroupCount } from './types';

export type LogHandler = (message: string, payload?: Record<string, unknown>) => void;

export const consoleLogHandler: LogHandler = (message, payload) => {
  if (payload === undefined) console.log(message);
  else console.log(message, payload);
};

export interface ResizeResult {
  destination: StorageTexture;
  // False for zero-extent outputs: nothing was dispatched and the destination holds no content.
  produced: boolean;
  workgroups: WorkgroupCount;
  backend: string;
  elapsedMs: number;
}

/**
 * Interface for anything that can run the resample kernel over a whole image.
 * Lets the frame resizer stay decoupled from the GPU and CPU implementations.
 */
export interface IResizeExecutor {
  readonly name: string;
  readonly thresholds: ResampleThresholds;
  resize(source: SourceTexture, outputWidth: number, outputHeight: number): Promise<ResizeResult>;
  destroy(): void;
}
