import { BaseOperation } from '../../registry/operation';
import type { SignatureRegistry } from '../../registry/signature';
import type { ExecutionContext } from '../../runtime/execution-context';
import { outputAt, type Inputs, type Outputs } from '../../value/value';

/** Publishes the context's clock. Stateful, so the graph never settles while one exists. */
export class TimeOp extends BaseOperation {
  static readonly library = 'core';
  static readonly operator = 'time';
  static readonly label = 'Time';

  static build(): TimeOp {
    return new TimeOp();
  }

  override isStateful(): boolean {
    return true;
  }

  setup(_ctx: ExecutionContext, reg: SignatureRegistry): void {
    reg.addOutput('f32', 'time').tooltip('Seconds since playback started');
    reg.addOutput('f32', 'delta');
    reg.addOutput('i32', 'frame');
  }

  execute(ctx: ExecutionContext, _inputs: Inputs, outputs: Outputs): void {
    const { time, delta, frame } = ctx.timing();
    outputAt(outputs, 0).put('f32', time);
    outputAt(outputs, 1).put('f32', delta);
    outputAt(outputs, 2).put('i32', frame);
  }
}
