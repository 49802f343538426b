/**
 * @file dispatch-utils.ts
 * @description Grid sizing, readback row padding and timeouts shared by both executors.
 */
import { COPY_BYTES_PER_ROW_ALIGNMENT, WORKGROUP_SIZE } from '../constants';
import type { WorkgroupCount } from '../kernel/types';

/**
 * Number of workgroups to launch so every output texel gets an invocation.
 * Rounds each axis up to the next multiple of the workgroup size.
 */
export function computeWorkgroupCount(width: number, height: number, workgroupSize: readonly [number, number, number] = WORKGROUP_SIZE): WorkgroupCount {
  return [
    Math.ceil(width / workgroupSize[0]),
    Math.ceil(height / workgroupSize[1]),
    1
  ];
}

export function paddedBytesPerRow(unpaddedBytesPerRow: number, alignment = COPY_BYTES_PER_ROW_ALIGNMENT): number {
  return Math.ceil(unpaddedBytesPerRow / alignment) * alignment;
}

/**
 * Copies `height` rows of `bytesPerRow` out of a buffer whose rows are
 * `paddedRow` bytes apart.
 */
export function stripRowPadding(padded: Uint8Array, bytesPerRow: number, paddedRow: number, height: number): Uint8Array {
  if (padded.length < paddedRow * (height - 1) + bytesPerRow) {
    throw new Error(`Runtime Error: readback buffer too small (${padded.length} bytes for ${height} rows of ${paddedRow})`);
  }
  if (bytesPerRow === paddedRow) {
    return padded.slice(0, bytesPerRow * height);
  }
  const out = new Uint8Array(bytesPerRow * height);
  for (let y = 0; y < height; y++) {
    const rowStart = y * paddedRow;
    out.set(padded.subarray(rowStart, rowStart + bytesPerRow), y * bytesPerRow);
  }
  return out;
}

/**
 * Rejects if `promise` has not settled within `ms`.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // The caller has moved on; a late rejection must not go unhandled.
      promise.catch((e: unknown) => console.warn(`${label} settled after timing out`, e));
      reject(new Error(`${label} timed out after ${ms}ms`));
    }, ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Runs async tasks one at a time, in submission order.
 * A failed task rejects its own caller and does not stop the queue.
 */
export class TaskQueue {
  private tail: Promise<unknown> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const next = this.tail.then(task, task);
    this.tail = next.catch(() => undefined);
    return next;
  }
}
