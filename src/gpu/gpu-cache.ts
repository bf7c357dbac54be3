/**
 * Compute pipelines keyed by device and WGSL source. Compilation diagnostics arrive
 * asynchronously and are only logged.
 */
export class GpuCache {
  private static pipelines = new WeakMap<GPUDevice, Map<string, GPUComputePipeline>>();

  static getComputePipeline(device: GPUDevice, code: string): GPUComputePipeline {
    let perDevice = this.pipelines.get(device);
    if (!perDevice) {
      perDevice = new Map();
      this.pipelines.set(device, perDevice);
    }
    const cached = perDevice.get(code);
    if (cached) return cached;

    const module = device.createShaderModule({ code });
    this.reportDiagnostics(module, code);
    const pipeline = device.createComputePipeline({
      layout: 'auto',
      compute: { module, entryPoint: 'main' }
    });
    perDevice.set(code, pipeline);
    return pipeline;
  }

  static clear() {
    this.pipelines = new WeakMap();
  }

  private static reportDiagnostics(module: GPUShaderModule, code: string) {
    module.getCompilationInfo()
      .then((info) => {
        if (info.messages.length === 0) return;
        let hasError = false;
        const formatted = info.messages.map(m => {
          if (m.type === 'error') hasError = true;
          return `[${m.type.toUpperCase()}] line ${m.lineNum}:${m.linePos} - ${m.message}`;
        }).join('\n');

        if (hasError) {
          console.error(`[Shader Compilation Error]\n${formatted}`);
          const codeView = code.split('\n').map((l, i) => `${(i + 1).toString().padStart(4, ' ')}| ${l}`).join('\n');
          console.error(`[Source Code]\n${codeView}`);
        } else {
          console.warn(`[Shader Compilation Warning]\n${formatted}`);
        }
      })
      .catch((e: unknown) => console.error('[Shader Compilation] Could not read compilation info', e));
  }
}
