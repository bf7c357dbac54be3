import { BaseOperation } from '../../registry/operation';
import type { SignatureRegistry } from '../../registry/signature';
import type { ExecutionContext } from '../../runtime/execution-context';
import { cloneValue, inputValue, NULL_VALUE, outputAt, unwrapValue, type Inputs, type Outputs, type Value } from '../../value/value';

export const INPUT_KINDS = ['f32', 'i32', 'bool', 'string'] as const;
export type InputKind = typeof INPUT_KINDS[number];

/**
 * A graph parameter. The stored value of input slot 0 is what the host edits through
 * `Engine.editGraphInput`; it is passed straight through to the output.
 */
export class InputOp extends BaseOperation {
  static readonly library = 'core';
  static readonly operator = 'input';
  static readonly label = 'Input';

  static build(): InputOp {
    return new InputOp();
  }

  private kind: InputKind = 'f32';

  get valueKind(): InputKind {
    return this.kind;
  }

  setup(_ctx: ExecutionContext, reg: SignatureRegistry): void {
    reg.addConfig('i32', 'kind')
      .meta({ kind: 'intEnum', options: INPUT_KINDS })
      .tooltip('Type of value this input provides');
  }

  override configure(_ctx: ExecutionContext, config: readonly Value[], reg: SignatureRegistry): void {
    const index = unwrapValue(config[0] ?? NULL_VALUE, 'i32') ?? 0;
    this.kind = INPUT_KINDS[index] ?? 'f32';
    reg.clearInputs();
    reg.clearOutputs();
    reg.addInput(this.kind, 'value').onNodeBody();
    reg.addOutput(this.kind, 'value');
  }

  execute(_ctx: ExecutionContext, inputs: Inputs, outputs: Outputs): void {
    outputAt(outputs, 0).set(cloneValue(inputValue(inputs, 0)));
  }
}
