/// <reference types="@webgpu/types" />
import { GpuCache } from './gpu-cache';

/**
 * @file gpu-device.ts
 * @description Shared utility for getting the GPUDevice, supporting both browser and Node.js.
 */

let device: GPUDevice | null = null;

/**
 * Gets a shared GPUDevice.
 * In the browser, uses navigator.gpu.
 * In Node.js, dynamically imports the 'webgpu' package (Dawn bindings) and installs its globals.
 */
export async function getSharedDevice(): Promise<GPUDevice> {
  if (device) return device;

  let gpu: GPU;

  if (typeof navigator !== 'undefined' && navigator.gpu) {
    gpu = navigator.gpu;
  } else {
    const { create, globals } = await import('webgpu');
    if (typeof globalThis.GPUBufferUsage === 'undefined') {
      Object.assign(globalThis, globals);
    }
    gpu = create([]);
  }

  const adapter = await gpu.requestAdapter({ powerPreference: 'high-performance' })
    ?? await gpu.requestAdapter({ powerPreference: 'low-power', forceFallbackAdapter: true });
  if (!adapter) throw new Error('No WebGPU Adapter found');

  const acquired = await adapter.requestDevice({ label: 'texel-resample' });
  device = acquired;

  // Handle lost device
  acquired.lost.then((info) => {
    console.error(`WebGPU Device lost: ${info.message}`);
    if (device === acquired) device = null;
  }, (e: unknown) => {
    console.error('WebGPU Device lost handler failed', e);
  });

  return acquired;
}

/** Drops the cached device so the next call requests a fresh one. */
export function resetSharedDevice() {
  if (device) {
    GpuCache.clear(device);
    device.destroy();
  }
  device = null;
}
