import { describe, it, expect } from 'vitest';
import { isCiEnvironment, loadResizeConfig, resolveResizeConfig } from './config';

describe('loadResizeConfig', () => {
  it('should fall back to the defaults', () => {
    expect(loadResizeConfig({})).toEqual({
      enableGpu: true,
      maintainAspect: true,
      maxFrameDimension: 1024,
      gpuTimeoutMs: 1000,
      thresholds: { nearestScaleThreshold: 1.2, transparentAlphaThreshold: 0.01 }
    });
  });

  it('should disable the GPU under CI unless forced on', () => {
    expect(loadResizeConfig({ CI: 'true' }).enableGpu).toBe(false);
    expect(loadResizeConfig({ GITLAB_CI: 'yes' }).enableGpu).toBe(false);
    expect(loadResizeConfig({ GITHUB_ACTIONS: 'true', RESAMPLE_ENABLE_GPU: '1' }).enableGpu).toBe(true);
  });

  it('should read every override from the environment', () => {
    const config = loadResizeConfig({
      RESAMPLE_ENABLE_GPU: 'false',
      RESAMPLE_MAINTAIN_ASPECT: 'FALSE',
      RESAMPLE_MAX_FRAME_DIMENSION: '512',
      RESAMPLE_GPU_TIMEOUT_MS: '250',
      RESAMPLE_NEAREST_SCALE_THRESHOLD: '2',
      RESAMPLE_TRANSPARENT_ALPHA_THRESHOLD: '0.5'
    });
    expect(config).toEqual({
      enableGpu: false,
      maintainAspect: false,
      maxFrameDimension: 512,
      gpuTimeoutMs: 250,
      thresholds: { nearestScaleThreshold: 2, transparentAlphaThreshold: 0.5 }
    });
  });

  it('should ignore empty variables', () => {
    expect(loadResizeConfig({ RESAMPLE_MAX_FRAME_DIMENSION: '' }).maxFrameDimension).toBe(1024);
  });

  it('should reject malformed values', () => {
    expect(() => loadResizeConfig({ RESAMPLE_ENABLE_GPU: 'maybe' }))
      .toThrow("Config Error: RESAMPLE_ENABLE_GPU must be true/false/1/0, got 'maybe'");
    expect(() => loadResizeConfig({ RESAMPLE_GPU_TIMEOUT_MS: 'soon' }))
      .toThrow("Config Error: RESAMPLE_GPU_TIMEOUT_MS must be a number, got 'soon'");
  });

  it('should reject values outside their range', () => {
    expect(() => loadResizeConfig({ RESAMPLE_MAX_FRAME_DIMENSION: '0' })).toThrow(/^Config Error: maxFrameDimension: /);
    expect(() => loadResizeConfig({ RESAMPLE_TRANSPARENT_ALPHA_THRESHOLD: '1.5' }))
      .toThrow(/^Config Error: thresholds\.transparentAlphaThreshold: /);
  });
});

describe('resolveResizeConfig', () => {
  it('should fill in defaults around explicit settings', () => {
    expect(resolveResizeConfig({ enableGpu: false, maxFrameDimension: 64 })).toEqual({
      enableGpu: false,
      maintainAspect: true,
      maxFrameDimension: 64,
      gpuTimeoutMs: 1000,
      thresholds: { nearestScaleThreshold: 1.2, transparentAlphaThreshold: 0.01 }
    });
  });
});

describe('isCiEnvironment', () => {
  it('should recognise common CI markers', () => {
    expect(isCiEnvironment({})).toBe(false);
    expect(isCiEnvironment({ CI: 'false' })).toBe(false);
    expect(isCiEnvironment({ GITHUB_ACTIONS: 'true' })).toBe(true);
  });
});
