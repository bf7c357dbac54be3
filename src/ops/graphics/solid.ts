/**
 * @file solid.ts
 * @description Fills its output texture with one colour.
 *
 * @pitfalls
 * - The output is sized from config. Changing width/height reconfigures the node and the
 *   engine replaces the texture in place under the same id.
 */
import { BaseOperation } from '../../registry/operation';
import type { SignatureRegistry } from '../../registry/signature';
import type { ExecutionContext } from '../../runtime/execution-context';
import { bytesPerPixel, textureHandle, type TextureHandle } from '../../value/texture';
import { outputAt, readInput, type Inputs, type Outputs, type Value } from '../../value/value';
import { addFormatConfig, addSizeConfig, readFormat, readSize } from './texture-config';

export type Rgba = [number, number, number, number];

function unit(c: number): number {
  return Math.min(Math.max(c, 0), 1);
}

/** Pixel data for `handle` filled with `color` (components in 0..1). */
export function solidPixels(handle: TextureHandle, color: Rgba): BufferSource {
  const count = handle.width * handle.height;
  const [r, g, b, a] = color.map(unit);
  switch (handle.format) {
    case 'rgba8':
    case 'bgra8': {
      const px = (handle.format === 'bgra8' ? [b, g, r, a] : [r, g, b, a]).map(c => Math.round(c * 255));
      const data = new Uint8Array(count * 4);
      for (let i = 0; i < count; i++) data.set(px, i * 4);
      return data;
    }
    case 'rgba16': {
      const px = [r, g, b, a].map(c => Math.round(c * 65535));
      const data = new Uint16Array(count * 4);
      for (let i = 0; i < count; i++) data.set(px, i * 4);
      return data;
    }
    case 'rgba32f': {
      const data = new Float32Array(count * 4);
      for (let i = 0; i < count; i++) data.set([r, g, b, a], i * 4);
      return data;
    }
  }
}

export class SolidOp extends BaseOperation {
  static readonly library = 'graphics';
  static readonly operator = 'solid';
  static readonly label = 'Solid Colour';

  static build(): SolidOp {
    return new SolidOp();
  }

  setup(_ctx: ExecutionContext, reg: SignatureRegistry): void {
    addSizeConfig(reg);
    addFormatConfig(reg);
    for (const name of ['red', 'green', 'blue', 'alpha']) {
      reg.addInput('f32', name)
        .meta({ kind: 'floatRange', min: 0, max: 1, step: 0.01 })
        .default({ type: 'f32', value: name === 'alpha' ? 1 : 0 });
    }
  }

  override configure(_ctx: ExecutionContext, config: readonly Value[], reg: SignatureRegistry): void {
    const { width, height } = readSize(config, 0);
    const format = readFormat(config, 2);
    reg.clearOutputs();
    reg.addOutput('texture', 'image')
      .meta({ kind: 'texture', format })
      .default({ type: 'texture', value: textureHandle(width, height, format) });
  }

  execute(ctx: ExecutionContext, inputs: Inputs, outputs: Outputs): void {
    const handle = outputAt(outputs, 0).get('texture');
    const texture = ctx.texture(handle);
    if (!texture) throw new Error(`Output texture ${handle.id ?? '(unallocated)'} is not in the pool`);
    const color: Rgba = [
      readInput(inputs, 0, 'f32'),
      readInput(inputs, 1, 'f32'),
      readInput(inputs, 2, 'f32'),
      readInput(inputs, 3, 'f32'),
    ];
    ctx.queue.writeTexture(
      { texture },
      solidPixels(handle, color),
      { bytesPerRow: handle.width * bytesPerPixel(handle.format), rowsPerImage: handle.height },
      [handle.width, handle.height, 1],
    );
  }
}
