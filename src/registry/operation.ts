/**
 * @file operation.ts
 * @description The contract every node kind implements, and the static factory side that
 * lets the engine build one by `(library, operator)` name.
 *
 * @external-interactions
 * - `setup`/`configure` declare slots on the node's `SignatureRegistry`.
 * - `execute` reads inputs and writes outputs; GPU work goes through the context.
 *
 * @pitfalls
 * - `configure` may run many times. Operations that re-declare inputs or outputs must clear
 *   the list they rebuild first.
 * - Edge hooks run after the edge change has already been committed; throwing from them is
 *   logged, not propagated.
 */
import type { ExecutionContext } from '../runtime/execution-context';
import type { Inputs, Outputs, Value, ValueType } from '../value/value';
import type { SignatureRegistry } from './signature';

export interface OpPath {
  library: string;
  operator: string;
}

export function formatOpPath(path: OpPath): string {
  return `${path.library}/${path.operator}`;
}

export function samePath(a: OpPath, b: OpPath): boolean {
  return a.library === b.library && a.operator === b.operator;
}

export interface Operation {
  /** Whether repeated execution has side effects even when nothing upstream changed. */
  isStateful(): boolean;
  setup(ctx: ExecutionContext, reg: SignatureRegistry): void;
  configure(ctx: ExecutionContext, config: readonly Value[], reg: SignatureRegistry): void;
  execute(ctx: ExecutionContext, inputs: Inputs, outputs: Outputs): void;
  teardown(ctx: ExecutionContext): void;
  onEdgeConnected(slot: number, connectedType: ValueType, reg: SignatureRegistry): void;
  onEdgeDisconnected(slot: number, connectedType: ValueType, reg: SignatureRegistry): void;
}

export interface OperationFactory {
  readonly library: string;
  readonly operator: string;
  readonly label: string;
  build(): Operation;
}

/** No-op defaults for the optional parts of the contract. */
export abstract class BaseOperation implements Operation {
  isStateful(): boolean {
    return false;
  }

  abstract setup(ctx: ExecutionContext, reg: SignatureRegistry): void;

  configure(_ctx: ExecutionContext, _config: readonly Value[], _reg: SignatureRegistry): void { }

  abstract execute(ctx: ExecutionContext, inputs: Inputs, outputs: Outputs): void;

  teardown(_ctx: ExecutionContext): void { }

  onEdgeConnected(_slot: number, _connectedType: ValueType, _reg: SignatureRegistry): void { }

  onEdgeDisconnected(_slot: number, _connectedType: ValueType, _reg: SignatureRegistry): void { }
}
