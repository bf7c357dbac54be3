import { BaseOperation } from '../../registry/operation';
import type { SignatureRegistry } from '../../registry/signature';
import type { ExecutionContext } from '../../runtime/execution-context';
import { textureHandle } from '../../value/texture';

/** Holds a texture the host uploads with `Engine.uploadTexture`. */
export class ImageOp extends BaseOperation {
  static readonly library = 'core';
  static readonly operator = 'image';
  static readonly label = 'Image';

  static build(): ImageOp {
    return new ImageOp();
  }

  setup(_ctx: ExecutionContext, reg: SignatureRegistry): void {
    reg.addOutput('texture', 'image')
      .meta({ kind: 'texture' })
      .default({ type: 'texture', value: textureHandle(1, 1) });
  }

  execute(): void { }
}
