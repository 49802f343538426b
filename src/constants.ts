/**
 * @file constants.ts
 * @description Global configuration constants for the resample kernel and its hosts.
 *
 * @external-interactions
 * - `NEAREST_SCALE_THRESHOLD` / `TRANSPARENT_ALPHA_THRESHOLD` are the defaults baked into
 *   the generated WGSL `override` declarations and used by the interpreter.
 * - `loadResizeConfig` (runtime/config.ts) lets the environment override most of these.
 *
 * @pitfalls
 * - `WORKGROUP_SIZE` is compiled into the shader. Changing it without regenerating the
 *   pipeline leaves the host computing the wrong workgroup count.
 */

// Both scale factors below this take the nearest-neighbor path.
export const NEAREST_SCALE_THRESHOLD = 1.2;
// A bilinear neighborhood whose four alphas are all below this writes transparent black.
export const TRANSPARENT_ALPHA_THRESHOLD = 0.01;

export const WORKGROUP_SIZE: readonly [number, number, number] = [16, 16, 1];

// WebGPU COPY_BYTES_PER_ROW_ALIGNMENT.
export const COPY_BYTES_PER_ROW_ALIGNMENT = 256;

export const DEFAULT_MAX_FRAME_DIMENSION = 1024;
export const DEFAULT_GPU_TIMEOUT_MS = 1000;

// Below this target size the host skips blending entirely.
export const SMALL_FRAME_DIMENSION = 32;
