/**
 * @file constants.ts
 * @description Engine-wide limits and GPU flag values.
 *
 * @pitfalls
 * - The usage flags mirror `GPUTextureUsage` / `GPUBufferUsage`. Those globals only
 *   exist inside a WebGPU host, so the engine carries its own copies to run headless.
 */

export const HISTORY_MAX_SIZE = 100;

/** Ids 0..SYSTEM_TEXTURE_COUNT-1 are reserved for the built-in default textures. */
export const SYSTEM_TEXTURE_COUNT = 4;

export const DEFAULT_TEXTURE_SIZE = {
  width: 512,
  height: 512
};

export const MAX_TEXTURE_DIMENSION = 8192;

export const TEXTURE_USAGE = {
  COPY_SRC: 0x01,
  COPY_DST: 0x02,
  TEXTURE_BINDING: 0x04,
  STORAGE_BINDING: 0x08,
  RENDER_ATTACHMENT: 0x10,
} as const;

export const BUFFER_USAGE = {
  COPY_DST: 0x08,
  UNIFORM: 0x40,
} as const;

export const SHADER_WORKGROUP_SIZE = 8;
