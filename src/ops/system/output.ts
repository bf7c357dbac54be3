import { BaseOperation } from '../../registry/operation';
import type { SignatureRegistry } from '../../registry/signature';
import type { ExecutionContext } from '../../runtime/execution-context';
import type { ValueType } from '../../value/value';

/**
 * A graph result. Accepts anything and takes on the type of whatever is connected, so
 * `Engine.result` reports a typed value.
 */
export class OutputOp extends BaseOperation {
  static readonly library = 'core';
  static readonly operator = 'output';
  static readonly label = 'Output';

  static build(): OutputOp {
    return new OutputOp();
  }

  setup(_ctx: ExecutionContext, reg: SignatureRegistry): void {
    reg.addInput('any', 'value');
  }

  execute(): void { }

  override onEdgeConnected(slot: number, connectedType: ValueType, reg: SignatureRegistry): void {
    const def = reg.input(slot);
    if (!def) return;
    def.valueType = connectedType;
    def.extended = { kind: 'none' };
  }

  override onEdgeDisconnected(slot: number, _connectedType: ValueType, reg: SignatureRegistry): void {
    const def = reg.input(slot);
    if (def) def.valueType = 'any';
  }
}
