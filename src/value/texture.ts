/**
 * @file texture.ts
 * @description Value-level texture handles. A handle carries the size and format a slot
 * wants; the GPU texture behind it lives in the pool under `id`.
 *
 * @pitfalls
 * - A handle without an `id` is unallocated. `ExecutionContext.ensureTexture` is the only
 *   thing that should turn it into an allocated one.
 */
import { DEFAULT_TEXTURE_SIZE } from '../constants';

export type TextureId = number;

export const TEXTURE_FORMATS = ['rgba8', 'rgba16', 'rgba32f', 'bgra8'] as const;
export type TextureFormat = typeof TEXTURE_FORMATS[number];

export interface TextureHandle {
  id?: TextureId;
  width: number;
  height: number;
  format: TextureFormat;
}

const GPU_FORMATS: Record<TextureFormat, GPUTextureFormat> = {
  rgba8: 'rgba8unorm',
  rgba16: 'rgba16uint',
  rgba32f: 'rgba32float',
  bgra8: 'bgra8unorm',
};

const BYTES_PER_PIXEL: Record<TextureFormat, number> = {
  rgba8: 4,
  rgba16: 8,
  rgba32f: 16,
  bgra8: 4,
};

export function gpuFormat(format: TextureFormat): GPUTextureFormat {
  return GPU_FORMATS[format];
}

export function bytesPerPixel(format: TextureFormat): number {
  return BYTES_PER_PIXEL[format];
}

export function byteSize(handle: TextureHandle): number {
  return handle.width * handle.height * bytesPerPixel(handle.format);
}

export function textureHandle(
  width: number = DEFAULT_TEXTURE_SIZE.width,
  height: number = DEFAULT_TEXTURE_SIZE.height,
  format: TextureFormat = 'rgba8',
): TextureHandle {
  return { width, height, format };
}

export function sameShape(a: TextureHandle, b: TextureHandle): boolean {
  return a.width === b.width && a.height === b.height && a.format === b.format;
}

export function isTextureFormat(value: string): value is TextureFormat {
  return TEXTURE_FORMATS.some(f => f === value);
}

// System textures. Their ids are fixed and they are owned by the engine.

export const SPECK: TextureHandle = { id: 0, width: 1, height: 1, format: 'rgba8' };
export const FLECK: TextureHandle = { id: 1, width: 1, height: 1, format: 'rgba8' };
export const TRANSPARENT_SPECK: TextureHandle = { id: 2, width: 1, height: 1, format: 'rgba8' };
/** 2x2 black/magenta checker, used where a texture is missing. */
export const CHECK: TextureHandle = { id: 3, width: 2, height: 2, format: 'rgba8' };

export interface SystemTexture {
  name: string;
  handle: TextureHandle;
  data: Uint8Array;
}

export function systemTextures(): SystemTexture[] {
  return [
    { name: 'speck', handle: SPECK, data: new Uint8Array([0, 0, 0, 255]) },
    { name: 'fleck', handle: FLECK, data: new Uint8Array([255, 255, 255, 255]) },
    { name: 'transparent-speck', handle: TRANSPARENT_SPECK, data: new Uint8Array([0, 0, 0, 0]) },
    {
      name: 'check',
      handle: CHECK,
      data: new Uint8Array([
        0, 0, 0, 255, 255, 0, 255, 255,
        255, 0, 255, 255, 0, 0, 0, 255,
      ]),
    },
  ];
}
