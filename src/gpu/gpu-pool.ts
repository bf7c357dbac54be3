/**
 * @file gpu-pool.ts
 * @description Owns every GPU texture the engine hands out, keyed by a stable numeric id
 * and tagged with its owner.
 *
 * @external-interactions
 * - Values only ever carry ids. UI caches and downstream nodes key by id, so
 *   `replaceTexture` swaps the backing texture while keeping the id.
 *
 * @pitfalls
 * - There is no GC. Releasing is explicit and destroys the texture immediately; node
 *   deletion must call `releaseNodeTextures` or GPU memory leaks.
 * - System textures (ids below SYSTEM_TEXTURE_COUNT) are engine owned and never released.
 */
import { SYSTEM_TEXTURE_COUNT, TEXTURE_USAGE } from '../constants';
import { ValueError } from '../errors';
import { formatIndex, sameIndex, type NodeIndex } from '../graph/stable-graph';
import {
  byteSize,
  bytesPerPixel,
  gpuFormat,
  systemTextures,
  type TextureHandle,
  type TextureId,
} from '../value/texture';

export type TextureOwner =
  | { kind: 'engine' }
  | { kind: 'node'; node: NodeIndex };

export const ENGINE_OWNER: TextureOwner = { kind: 'engine' };

export function nodeOwner(node: NodeIndex): TextureOwner {
  return { kind: 'node', node };
}

export interface PoolEntry {
  texture: GPUTexture;
  handle: TextureHandle;
  owner: TextureOwner;
}

function usageFor(handle: TextureHandle): number {
  const usage = TEXTURE_USAGE.TEXTURE_BINDING | TEXTURE_USAGE.COPY_SRC | TEXTURE_USAGE.COPY_DST | TEXTURE_USAGE.RENDER_ATTACHMENT;
  // bgra8unorm storage needs an optional device feature
  return handle.format === 'bgra8' ? usage : usage | TEXTURE_USAGE.STORAGE_BINDING;
}

export class GpuPool {
  private readonly entries = new Map<TextureId, PoolEntry>();
  private nextId: TextureId = SYSTEM_TEXTURE_COUNT;

  constructor(private readonly device: GPUDevice, private readonly queue: GPUQueue) {
    for (const sys of systemTextures()) {
      const id = sys.handle.id ?? this.nextId++;
      this.entries.set(id, {
        texture: this.createWithData(sys.handle, sys.data, `system:${sys.name}`),
        handle: { ...sys.handle, id },
        owner: ENGINE_OWNER,
      });
    }
  }

  get size(): number {
    return this.entries.size;
  }

  ids(): TextureId[] {
    return [...this.entries.keys()];
  }

  getTexture(id: TextureId | undefined): GPUTexture | undefined {
    return id === undefined ? undefined : this.entries.get(id)?.texture;
  }

  entry(id: TextureId): PoolEntry | undefined {
    return this.entries.get(id);
  }

  owner(id: TextureId): TextureOwner | undefined {
    return this.entries.get(id)?.owner;
  }

  insertTexture(texture: GPUTexture, handle: TextureHandle, owner: TextureOwner): TextureHandle {
    const id = this.nextId++;
    const stored = { ...handle, id };
    this.entries.set(id, { texture, handle: stored, owner });
    return { ...stored };
  }

  allocTexture(handle: TextureHandle, owner: TextureOwner): TextureHandle {
    return this.insertTexture(this.create(handle, labelFor(owner)), handle, owner);
  }

  allocTextureWithData(handle: TextureHandle, data: BufferSource, owner: TextureOwner): TextureHandle {
    return this.insertTexture(this.createWithData(handle, data, labelFor(owner)), handle, owner);
  }

  /** Swaps in a texture of the new shape under the same id. The old texture is destroyed. */
  replaceTexture(id: TextureId, handle: TextureHandle): TextureHandle {
    const entry = this.entries.get(id);
    if (!entry) throw new ValueError('slotIndex', `No texture with id ${id}`);
    const texture = this.create(handle, labelFor(entry.owner));
    entry.texture.destroy();
    entry.texture = texture;
    entry.handle = { ...handle, id };
    return { ...entry.handle };
  }

  releaseTexture(id: TextureId): boolean {
    const entry = this.entries.get(id);
    if (!entry) return false;
    if (id < SYSTEM_TEXTURE_COUNT) {
      console.warn(`[GpuPool] Refusing to release system texture ${id}`);
      return false;
    }
    entry.texture.destroy();
    this.entries.delete(id);
    return true;
  }

  /** Releases every texture owned by `node`, returning how many went. */
  releaseNodeTextures(node: NodeIndex): number {
    let released = 0;
    for (const [id, entry] of [...this.entries]) {
      if (entry.owner.kind === 'node' && sameIndex(entry.owner.node, node)) {
        entry.texture.destroy();
        this.entries.delete(id);
        released++;
      }
    }
    if (released > 0) console.debug(`[GpuPool] Released ${released} texture(s) of node ${formatIndex(node)}`);
    return released;
  }

  /** Destroys everything, system textures included. The pool is unusable afterwards. */
  destroy(): void {
    for (const entry of this.entries.values()) entry.texture.destroy();
    this.entries.clear();
  }

  private create(handle: TextureHandle, label: string): GPUTexture {
    return this.device.createTexture({
      label,
      size: [handle.width, handle.height, 1],
      format: gpuFormat(handle.format),
      usage: usageFor(handle),
    });
  }

  private createWithData(handle: TextureHandle, data: BufferSource, label: string): GPUTexture {
    const expected = byteSize(handle);
    if (data.byteLength !== expected) {
      throw new ValueError(
        'textureData',
        `Texture data is ${data.byteLength} bytes, expected ${expected} for ${handle.width}x${handle.height} ${handle.format}`,
      );
    }
    const texture = this.create(handle, label);
    this.queue.writeTexture(
      { texture },
      data,
      { bytesPerRow: handle.width * bytesPerPixel(handle.format), rowsPerImage: handle.height },
      [handle.width, handle.height, 1],
    );
    return texture;
  }
}

function labelFor(owner: TextureOwner): string {
  return owner.kind === 'engine' ? 'engine' : `node:${formatIndex(owner.node)}`;
}
