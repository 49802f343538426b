export class GpuCache {
  // Per device: modules and pipelines cannot cross devices.
  private static shaderCache = new WeakMap<GPUDevice, Map<string, GPUShaderModule>>();
  private static pipelineCache = new WeakMap<GPUDevice, Map<string, GPUComputePipeline>>();

  private static cacheFor<T>(caches: WeakMap<GPUDevice, Map<string, T>>, device: GPUDevice): Map<string, T> {
    let cache = caches.get(device);
    if (!cache) {
      cache = new Map();
      caches.set(device, cache);
    }
    return cache;
  }

  static async getShaderModule(device: GPUDevice, code: string): Promise<GPUShaderModule> {
    const cache = this.cacheFor(this.shaderCache, device);
    const cached = cache.get(code);
    if (cached) return cached;
    const module = device.createShaderModule({ code });

    const info = await module.getCompilationInfo();
    if (info.messages.length > 0) {
      let hasError = false;
      const formatted = info.messages.map(m => {
        if (m.type === 'error') hasError = true;
        return `[${m.type.toUpperCase()}] line ${m.lineNum}:${m.linePos} - ${m.message}`;
      }).join('\n');

      if (hasError) {
        const lines = code.split('\n');
        const codeView = lines.map((l, i) => `${(i + 1).toString().padStart(4, ' ')}| ${l}`).join('\n');
        console.error(`[Shader Compilation Error]\n${formatted}\n[Source Code]\n${codeView}`);
        throw new Error(`Shader compilation failed:\n${formatted}`);
      }
      console.warn(`[Shader Compilation Warning]\n${formatted}`);
    }

    cache.set(code, module);
    return module;
  }

  /**
   * Pipelines are keyed by source and override constants together; the same
   * module with different thresholds is a different pipeline.
   */
  static async getComputePipeline(device: GPUDevice, code: string, constants: Record<string, number> = {}): Promise<GPUComputePipeline> {
    const key = `${code}\n${JSON.stringify(constants)}`;
    const cache = this.cacheFor(this.pipelineCache, device);
    const cached = cache.get(key);
    if (cached) return cached;
    const module = await this.getShaderModule(device, code);
    const pipeline = await device.createComputePipelineAsync({
      label: 'resize',
      layout: 'auto',
      compute: { module, entryPoint: 'main', constants }
    });
    cache.set(key, pipeline);
    return pipeline;
  }

  static clear(device: GPUDevice) {
    this.shaderCache.delete(device);
    this.pipelineCache.delete(device);
  }
}
