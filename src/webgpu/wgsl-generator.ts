import { NEAREST_SCALE_THRESHOLD, TRANSPARENT_ALPHA_THRESHOLD, WORKGROUP_SIZE } from '../constants';
import type { ResampleThresholds } from '../kernel/types';

/**
 * WGSL Generator
 * Emits the resample compute shader. The thresholds are `override`
 * constants so a pipeline can change them without regenerating source.
 */

export interface ResizeShaderOptions {
  // Defaults written into the override declarations.
  thresholds?: ResampleThresholds;
}

export const RESIZE_BINDINGS = {
  source: 0,
  destination: 1,
  params: 2
} as const;

// Names of the pipeline-overridable constants.
export const OVERRIDE_NEAREST_SCALE_THRESHOLD = 'nearest_scale_threshold';
export const OVERRIDE_TRANSPARENT_ALPHA_THRESHOLD = 'transparent_alpha_threshold';

// WGSL float literals need a decimal point or exponent.
const formatFloat = (v: number): string => {
  if (!Number.isFinite(v)) throw new Error(`Cannot emit non-finite WGSL literal: ${v}`);
  const s = String(v);
  return /[.e]/.test(s) ? s : `${s}.0`;
};

export class WgslGenerator {
  compileResize(options: ResizeShaderOptions = {}): string {
    const [wx, wy, wz] = WORKGROUP_SIZE;
    const nearest = options.thresholds?.nearestScaleThreshold ?? NEAREST_SCALE_THRESHOLD;
    const alpha = options.thresholds?.transparentAlphaThreshold ?? TRANSPARENT_ALPHA_THRESHOLD;

    const lines: string[] = [];

    lines.push('struct ResizeParams {');
    lines.push('  input_width: f32,');
    lines.push('  input_height: f32,');
    lines.push('  output_width: f32,');
    lines.push('  output_height: f32,');
    lines.push('}');
    lines.push('');
    lines.push(`@group(0) @binding(${RESIZE_BINDINGS.source}) var source_texture: texture_2d<f32>;`);
    lines.push(`@group(0) @binding(${RESIZE_BINDINGS.destination}) var output_texture: texture_storage_2d<rgba8unorm, write>;`);
    lines.push(`@group(0) @binding(${RESIZE_BINDINGS.params}) var<uniform> params: ResizeParams;`);
    lines.push('');
    lines.push(`override ${OVERRIDE_NEAREST_SCALE_THRESHOLD}: f32 = ${formatFloat(nearest)};`);
    lines.push(`override ${OVERRIDE_TRANSPARENT_ALPHA_THRESHOLD}: f32 = ${formatFloat(alpha)};`);
    lines.push('');
    lines.push(`@compute @workgroup_size(${wx}, ${wy}, ${wz})`);
    lines.push(`fn main(@builtin(global_invocation_id) gid: vec3<u32>) {`);

    // Bounds Guard
    lines.push('  if (gid.x >= u32(params.output_width) || gid.y >= u32(params.output_height)) {');
    lines.push('    return;');
    lines.push('  }');
    lines.push('  let out_coord = vec2<i32>(gid.xy);');
    lines.push('');

    // Coordinate Mapper
    lines.push('  let scale_x = params.input_width / params.output_width;');
    lines.push('  let scale_y = params.input_height / params.output_height;');
    lines.push('  let src_x = f32(gid.x) * scale_x;');
    lines.push('  let src_y = f32(gid.y) * scale_y;');
    lines.push('  let max_coord = vec2<i32>(i32(params.input_width) - 1, i32(params.input_height) - 1);');
    lines.push('');

    // Strategy Selector + NEAREST
    lines.push(`  if (scale_x < ${OVERRIDE_NEAREST_SCALE_THRESHOLD} && scale_y < ${OVERRIDE_NEAREST_SCALE_THRESHOLD}) {`);
    lines.push('    let p = min(vec2<i32>(i32(src_x), i32(src_y)), max_coord);');
    lines.push('    textureStore(output_texture, out_coord, textureLoad(source_texture, p, 0));');
    lines.push('    return;');
    lines.push('  }');
    lines.push('');

    // BILINEAR sampler
    lines.push('  let p1 = min(vec2<i32>(i32(floor(src_x)), i32(floor(src_y))), max_coord);');
    lines.push('  let p2 = min(p1 + vec2<i32>(1, 1), max_coord);');
    lines.push('  let fx = src_x - f32(p1.x);');
    lines.push('  let fy = src_y - f32(p1.y);');
    lines.push('  let s00 = textureLoad(source_texture, vec2<i32>(p1.x, p1.y), 0);');
    lines.push('  let s10 = textureLoad(source_texture, vec2<i32>(p2.x, p1.y), 0);');
    lines.push('  let s01 = textureLoad(source_texture, vec2<i32>(p1.x, p2.y), 0);');
    lines.push('  let s11 = textureLoad(source_texture, vec2<i32>(p2.x, p2.y), 0);');
    lines.push('');

    // Compositor
    lines.push(`  let alphas = vec4<f32>(s00.a, s10.a, s01.a, s11.a);`);
    lines.push(`  if (all(alphas < vec4<f32>(${OVERRIDE_TRANSPARENT_ALPHA_THRESHOLD}))) {`);
    lines.push('    textureStore(output_texture, out_coord, vec4<f32>(0.0));');
    lines.push('    return;');
    lines.push('  }');
    lines.push('  let top = mix(s00, s10, fx);');
    lines.push('  let bottom = mix(s01, s11, fx);');
    lines.push('  textureStore(output_texture, out_coord, mix(top, bottom, fy));');
    lines.push('}');

    return lines.join('\n') + '\n';
  }
}

export const generateResizeShader = (options: ResizeShaderOptions = {}): string =>
  new WgslGenerator().compileResize(options);
