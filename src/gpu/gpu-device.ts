/// <reference types="@webgpu/types" />
/**
 * @file gpu-device.ts
 * @description Acquires the GPUDevice the engine runs on.
 *
 * @pitfalls
 * - The engine never looks for a GPU itself. Hosts pass their `GPU` entry point
 *   (`navigator.gpu` in a browser, a native binding under Node).
 */

export interface GpuHandles {
  device: GPUDevice;
  queue: GPUQueue;
}

let shared: GpuHandles | null = null;

/**
 * Gets a shared device, requesting one from `gpu` on first use. A lost device is
 * forgotten so the next call requests a fresh one.
 */
export async function getSharedDevice(gpu: GPU, options?: GPURequestAdapterOptions): Promise<GpuHandles> {
  if (shared) return shared;

  const adapter = await gpu.requestAdapter(options);
  if (!adapter) throw new Error('No WebGPU Adapter found');
  const device = await adapter.requestDevice();
  const handles = { device, queue: device.queue };
  shared = handles;

  device.lost
    .then((info) => {
      console.error(`[GpuDevice] WebGPU device lost: ${info.message}`);
      if (shared === handles) shared = null;
    })
    .catch((e: unknown) => console.error('[GpuDevice] Device loss watcher failed', e));

  return handles;
}

export function resetSharedDevice(): void {
  shared = null;
}
