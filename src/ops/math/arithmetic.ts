import { BaseOperation } from '../../registry/operation';
import type { SignatureRegistry } from '../../registry/signature';
import type { ExecutionContext } from '../../runtime/execution-context';
import { NULL_VALUE, outputAt, readInput, unwrapValue, type Inputs, type Outputs, type Value } from '../../value/value';

export const ARITH_OPS = ['add', 'subtract', 'multiply', 'power', 'log', 'divide', 'min', 'max', 'abs'] as const;
export type ArithOp = typeof ARITH_OPS[number];

// Input names follow the operation so the node body reads naturally.
const OPERANDS: Record<ArithOp, readonly string[]> = {
  add: ['augend', 'addend'],
  subtract: ['minuend', 'subtrahend'],
  multiply: ['multiplicand', 'multiplier'],
  power: ['base', 'exponent'],
  log: ['value', 'base'],
  divide: ['dividend', 'divisor'],
  min: ['a', 'b'],
  max: ['a', 'b'],
  abs: ['value'],
};

export function applyArith(op: ArithOp, a: number, b: number): number {
  switch (op) {
    case 'add': return a + b;
    case 'subtract': return a - b;
    case 'multiply': return a * b;
    case 'power': return Math.pow(a, b);
    case 'log': return Math.log(a) / Math.log(b);
    case 'divide': return a / b;
    case 'min': return Math.min(a, b);
    case 'max': return Math.max(a, b);
    case 'abs': return Math.abs(a);
  }
}

export class ArithmeticOp extends BaseOperation {
  static readonly library = 'math';
  static readonly operator = 'arithmetic';
  static readonly label = 'Arithmetic';

  static build(): ArithmeticOp {
    return new ArithmeticOp();
  }

  private op: ArithOp = 'add';

  get operation(): ArithOp {
    return this.op;
  }

  setup(_ctx: ExecutionContext, reg: SignatureRegistry): void {
    reg.addConfig('i32', 'operation')
      .meta({ kind: 'intEnum', options: ARITH_OPS })
      .onNodeBody();
  }

  override configure(_ctx: ExecutionContext, config: readonly Value[], reg: SignatureRegistry): void {
    const index = unwrapValue(config[0] ?? NULL_VALUE, 'i32') ?? 0;
    this.op = ARITH_OPS[index] ?? 'add';
    reg.clearInputs();
    for (const name of OPERANDS[this.op]) reg.addInput('f32', name);
    reg.clearOutputs();
    reg.addOutput('f32', 'result');
  }

  execute(_ctx: ExecutionContext, inputs: Inputs, outputs: Outputs): void {
    const a = readInput(inputs, 0, 'f32');
    const b = inputs.length > 1 ? readInput(inputs, 1, 'f32') : 0;
    outputAt(outputs, 0).put('f32', applyArith(this.op, a, b));
  }
}
