/**
 * @file execution-context.ts
 * @description Device, queue, texture pool and timing, passed into every Operation call.
 *
 * @pitfalls
 * - Textures allocated through `ensureTexture` belong to whichever owner is active. The
 *   engine scopes each node call with `withOwner` so deleting the node frees them.
 */
import { ENGINE_OWNER, GpuPool, type TextureOwner } from '../gpu/gpu-pool';
import { sameShape, type TextureHandle } from '../value/texture';

export interface TimeInfo {
  /** Seconds since playback started. */
  time: number;
  delta: number;
  frame: number;
}

export class ExecutionContext {
  readonly pool: GpuPool;
  private timeInfo: TimeInfo = { time: 0, delta: 0, frame: 0 };
  private owner: TextureOwner = ENGINE_OWNER;

  constructor(readonly device: GPUDevice, readonly queue: GPUQueue) {
    this.pool = new GpuPool(device, queue);
  }

  timing(): TimeInfo {
    return { ...this.timeInfo };
  }

  time(): number {
    return this.timeInfo.time;
  }

  setTiming(timing: TimeInfo): void {
    this.timeInfo = { ...timing };
  }

  currentOwner(): TextureOwner {
    return this.owner;
  }

  withOwner<R>(owner: TextureOwner, fn: () => R): R {
    const previous = this.owner;
    this.owner = owner;
    try {
      return fn();
    } finally {
      this.owner = previous;
    }
  }

  texture(handle: TextureHandle): GPUTexture | undefined {
    return this.pool.getTexture(handle.id);
  }

  /**
   * Allocates if unallocated, replaces in place if the shape changed, else no-op. Engine-owned
   * textures are never replaced; a reshaped handle pointing at one gets a fresh id instead.
   */
  ensureTexture(handle: TextureHandle): TextureHandle {
    const entry = handle.id === undefined ? undefined : this.pool.entry(handle.id);
    if (handle.id !== undefined && entry) {
      if (sameShape(entry.handle, handle)) return { ...handle };
      if (entry.owner.kind === 'node') return this.pool.replaceTexture(handle.id, handle);
    }
    const { id: _stale, ...shape } = handle;
    return this.pool.allocTexture(shape, this.owner);
  }
}
