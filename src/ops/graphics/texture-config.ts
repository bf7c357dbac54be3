import { MAX_TEXTURE_DIMENSION } from '../../constants';
import type { SignatureRegistry } from '../../registry/signature';
import { TEXTURE_FORMATS, type TextureFormat } from '../../value/texture';
import { NULL_VALUE, unwrapValue, type Value } from '../../value/value';

export interface TextureSize {
  width: number;
  height: number;
}

/** Declares the `width`/`height` config pair shared by texture generators. */
export function addSizeConfig(reg: SignatureRegistry, size = 512): void {
  for (const name of ['width', 'height']) {
    reg.addConfig('i32', name)
      .meta({ kind: 'intRange', min: 1, max: MAX_TEXTURE_DIMENSION })
      .default({ type: 'i32', value: size })
      .interactive(false);
  }
}

export function addFormatConfig(reg: SignatureRegistry): void {
  reg.addConfig('i32', 'format')
    .meta({ kind: 'intEnum', options: TEXTURE_FORMATS })
    .interactive(false);
}

function clampDimension(value: number): number {
  return Math.min(Math.max(Math.trunc(value), 1), MAX_TEXTURE_DIMENSION);
}

export function readSize(config: readonly Value[], widthSlot: number): TextureSize {
  return {
    width: clampDimension(unwrapValue(config[widthSlot] ?? NULL_VALUE, 'i32') ?? 1),
    height: clampDimension(unwrapValue(config[widthSlot + 1] ?? NULL_VALUE, 'i32') ?? 1),
  };
}

export function readFormat(config: readonly Value[], slot: number): TextureFormat {
  const index = unwrapValue(config[slot] ?? NULL_VALUE, 'i32') ?? 0;
  return TEXTURE_FORMATS[index] ?? 'rgba8';
}
