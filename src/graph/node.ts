/**
 * @file node.ts
 * @description Runtime wrapper around one Operation: its record, signature, output values,
 * buffered incoming values and dirty flag.
 *
 * @external-interactions
 * - The engine drives the lifecycle: `setup` once, `configure` on every config change,
 *   `execute` per pass, `teardown` on delete.
 *
 * @pitfalls
 * - `editInput`/`editConfig`/`editOutput` are the only paths that change stored values.
 *   They run the caller's closure against an immer draft; untouched cells keep their
 *   reference, so only cells the closure wrote are compared and possibly committed.
 * - `configure` does not look at edges. Dropping edges that no longer type-check is the
 *   engine's job.
 */
import { createDraft, finishDraft, setAutoFreeze } from 'immer';
import { SYSTEM_TEXTURE_COUNT } from '../constants';
import { NoConfigSlotError, NoInputSlotError, NoOutputSlotError, ValueError } from '../errors';
import type { OpPath, Operation } from '../registry/operation';
import { SignatureRegistry } from '../registry/signature';
import { slotDefaultValue, type SlotDef } from '../registry/slot';
import type { ExecutionContext } from '../runtime/execution-context';
import type { TextureId } from '../value/texture';
import {
  canCastTo,
  castValue,
  cloneValue,
  NULL_VALUE,
  ValueMut,
  valuesEqual,
  type Value,
  type ValueRef,
} from '../value/value';
import { DirtyFlag } from './dirty-flag';

setAutoFreeze(false);

export type Position = [number, number];

export interface NodeRecord {
  id: number;
  path: OpPath;
  label?: string;
  position: Position;
  inputValues: Value[];
  configValues: Value[];
}

export function snapshotRecord(record: NodeRecord): NodeRecord {
  return {
    id: record.id,
    path: { ...record.path },
    label: record.label,
    position: [record.position[0], record.position[1]],
    inputValues: record.inputValues.map(cloneValue),
    configValues: record.configValues.map(cloneValue),
  };
}

export type ConnectProbe = 'ok' | 'noSourceSlot' | 'noSinkSlot' | 'incompatible';

export interface SlotChange {
  slot: number;
  oldValue: Value;
  newValue: Value;
}

export interface EditResult<R> {
  result: R;
  changes: SlotChange[];
}

export type SlotEditor<R> = (value: ValueMut, def: SlotDef) => R;
export type AllSlotsEditor<R> = (values: ValueMut[], defs: readonly SlotDef[]) => R;

/** Called when a saved value no longer fits its slot and was reset. */
export type DriftHandler = (list: 'inputs' | 'config', def: SlotDef, saved: Value) => void;

function coerce(value: Value, def: SlotDef): Value {
  if (def.valueType === 'any') return value;
  const cast = castValue(value, def.valueType);
  if (!cast) throw ValueError.typeMismatch(def.valueType, value.type);
  return cast;
}

function reconcile(
  stored: readonly Value[],
  defs: readonly SlotDef[],
  onDrift?: (def: SlotDef, saved: Value) => void,
): Value[] {
  return defs.map((def, i) => {
    const prev = stored[i];
    if (prev === undefined) return slotDefaultValue(def);
    if (def.valueType === 'any') return prev;
    const cast = castValue(prev, def.valueType);
    if (cast) return cast;
    onDrift?.(def, prev);
    return slotDefaultValue(def);
  });
}

interface AppliedEdit<R> extends EditResult<R> {
  values: Value[];
}

function applyEdit<R>(values: Value[], defs: readonly SlotDef[], fn: (views: ValueMut[]) => R): AppliedEdit<R> {
  const draft = createDraft(values);
  const result = fn(draft.map((_, i) => new ValueMut(draft, i)));
  const next: Value[] = finishDraft(draft);

  const changes: SlotChange[] = [];
  const committed = values.slice();
  next.forEach((edited, slot) => {
    const before = values[slot];
    const def = defs[slot];
    if (edited === before || before === undefined || def === undefined) return;
    const coerced = coerce(edited, def);
    if (valuesEqual(before, coerced)) return;
    committed[slot] = coerced;
    changes.push({ slot, oldValue: cloneValue(before), newValue: cloneValue(coerced) });
  });
  return { result, changes, values: changes.length > 0 ? committed : values };
}

export class Node {
  readonly signature = new SignatureRegistry();
  readonly dirty = new DirtyFlag();
  private outputValues: Value[] = [];
  private incoming: (Value | undefined)[] = [];

  constructor(readonly record: NodeRecord, readonly operation: Operation) {
    this.dirty.set();
  }

  get id(): number {
    return this.record.id;
  }

  get path(): OpPath {
    return this.record.path;
  }

  isStateful(): boolean {
    return this.operation.isStateful();
  }

  input(slot: number): Value | undefined {
    return this.record.inputValues[slot];
  }

  config(slot: number): Value | undefined {
    return this.record.configValues[slot];
  }

  output(slot: number): Value | undefined {
    return this.outputValues[slot];
  }

  outputs(): readonly Value[] {
    return this.outputValues;
  }

  incomingValue(slot: number): Value | undefined {
    return this.incoming[slot];
  }

  /** The value `execute` would read for an input: the connected one if any, else the stored one. */
  effectiveInput(slot: number): Value | undefined {
    return this.incoming[slot] ?? this.record.inputValues[slot];
  }

  setup(ctx: ExecutionContext): void {
    this.signature.clear();
    this.operation.setup(ctx, this.signature);
    this.signature.validateUniqueNames();
    this.record.configValues = reconcile(this.record.configValues, this.signature.config);
    this.syncInputs();
    this.syncOutputs(this.outputValues);
    this.dirty.set();
  }

  /**
   * Re-derives the signature from the current config values. Returns the texture ids held by
   * output slots that no longer exist, for the caller to release.
   */
  configure(ctx: ExecutionContext): TextureId[] {
    const before = this.outputValues;
    this.operation.configure(ctx, this.record.configValues, this.signature);
    this.signature.validateUniqueNames();
    this.syncInputs();
    const dropped = this.syncOutputs(before);
    this.dirty.set();
    return dropped;
  }

  /** Overlays a saved record: label and position, then config, then inputs. */
  restore(ctx: ExecutionContext, saved: NodeRecord, onDrift?: DriftHandler): TextureId[] {
    this.record.label = saved.label;
    this.record.position = [saved.position[0], saved.position[1]];
    this.record.configValues = reconcile(saved.configValues, this.signature.config, (def, v) => onDrift?.('config', def, v));
    const dropped = this.configure(ctx);
    this.record.inputValues = reconcile(saved.inputValues, this.signature.inputs, (def, v) => onDrift?.('inputs', def, v));
    return dropped;
  }

  teardown(ctx: ExecutionContext): void {
    this.operation.teardown(ctx);
  }

  /** Re-aligns stored and buffered inputs with the declared inputs. */
  syncInputs(): void {
    const defs = this.signature.inputs;
    this.record.inputValues = reconcile(this.record.inputValues, defs);
    this.incoming = defs.map((def, i) => {
      const buffered = this.incoming[i];
      return buffered && castValue(buffered, def.valueType);
    });
  }

  private syncOutputs(previous: readonly Value[]): TextureId[] {
    const outputs = this.signature.outputs.map((def, i) => {
      const prev = previous[i];
      const fresh = slotDefaultValue(def);
      if (fresh.type === 'texture') {
        if (fresh.value.id === undefined && prev?.type === 'texture' && prev.value.id !== undefined && prev.value.id >= SYSTEM_TEXTURE_COUNT) {
          fresh.value.id = prev.value.id;
        }
        return fresh;
      }
      return prev !== undefined && prev.type === fresh.type ? prev : fresh;
    });

    const kept = new Set(outputs.flatMap(v => (v.type === 'texture' && v.value.id !== undefined ? [v.value.id] : [])));
    const dropped = previous.flatMap(v =>
      v.type === 'texture' && v.value.id !== undefined && v.value.id >= SYSTEM_TEXTURE_COUNT && !kept.has(v.value.id)
        ? [v.value.id]
        : []);

    this.outputValues = outputs;
    return dropped;
  }

  editInput<R>(slot: number, fn: SlotEditor<R>): EditResult<R> {
    const def = this.signature.input(slot);
    if (!def) throw new NoInputSlotError(slot);
    const edit = applyEdit(this.record.inputValues, this.signature.inputs, views => fn(viewAt(views, slot), def));
    this.record.inputValues = this.commit(edit);
    return edit;
  }

  editAllInputs<R>(fn: AllSlotsEditor<R>): EditResult<R> {
    const edit = applyEdit(this.record.inputValues, this.signature.inputs, views => fn(views, this.signature.inputs));
    this.record.inputValues = this.commit(edit);
    return edit;
  }

  editConfig<R>(slot: number, fn: SlotEditor<R>): EditResult<R> {
    const def = this.signature.configSlot(slot);
    if (!def) throw new NoConfigSlotError(slot);
    const edit = applyEdit(this.record.configValues, this.signature.config, views => fn(viewAt(views, slot), def));
    this.record.configValues = this.commit(edit);
    return edit;
  }

  editAllConfigs<R>(fn: AllSlotsEditor<R>): EditResult<R> {
    const edit = applyEdit(this.record.configValues, this.signature.config, views => fn(views, this.signature.config));
    this.record.configValues = this.commit(edit);
    return edit;
  }

  editOutput<R>(slot: number, fn: SlotEditor<R>): EditResult<R> {
    const def = this.signature.output(slot);
    if (!def) throw new NoOutputSlotError(slot);
    const edit = applyEdit(this.outputValues, this.signature.outputs, views => fn(viewAt(views, slot), def));
    this.outputValues = this.commit(edit);
    return edit;
  }

  /** Writes an output without marking the node dirty. Used for texture bookkeeping. */
  setOutputValue(slot: number, value: Value): void {
    const def = this.signature.output(slot);
    if (!def) throw new NoOutputSlotError(slot);
    this.outputValues[slot] = coerce(value, def);
  }

  /**
   * Runs the operation. Inputs prefer the connected value over the stored one. Outputs are
   * committed and dirty cleared only if the operation returns normally.
   */
  execute(ctx: ExecutionContext): void {
    const inputs: ValueRef[] = this.signature.inputs.map((_, i) => this.effectiveInput(i) ?? NULL_VALUE);
    const work = this.outputValues.map(cloneValue);
    this.operation.execute(ctx, inputs, work.map((_, i) => new ValueMut(work, i)));
    this.outputValues = this.signature.outputs.map((def, i) => coerce(work[i] ?? NULL_VALUE, def));
    this.dirty.clear();
  }

  probeConnect(sink: Node, fromSlot: number, toSlot: number): ConnectProbe {
    const source = this.signature.output(fromSlot);
    if (!source) return 'noSourceSlot';
    const target = sink.signature.input(toSlot);
    if (!target) return 'noSinkSlot';
    return canCastTo(source.valueType, target.valueType) ? 'ok' : 'incompatible';
  }

  /** Buffers an upstream value, cast to the input's type. False if the cast is impossible. */
  pushIncoming(slot: number, value: ValueRef): boolean {
    const def = this.signature.input(slot);
    if (!def) return false;
    const cast = castValue(value, def.valueType);
    if (!cast) return false;
    if (!valuesEqual(this.incoming[slot], cast)) {
      this.incoming[slot] = cast;
      this.dirty.set();
    }
    return true;
  }

  clearIncoming(slot: number): void {
    if (this.incoming[slot] === undefined) return;
    this.incoming[slot] = undefined;
    this.dirty.set();
  }

  private commit(edit: AppliedEdit<unknown>): Value[] {
    if (edit.changes.length > 0) this.dirty.set();
    return edit.values;
  }
}

function viewAt(views: ValueMut[], slot: number): ValueMut {
  const view = views[slot];
  if (!view) throw ValueError.slotIndex(slot, views.length);
  return view;
}
