import { DuplicateSlotNameError, type SlotList } from '../errors';
import type { ValueType } from '../value/value';
import { makeSlot, SlotBuilder, type SlotDef } from './slot';

export type TypedSlotDef<T extends ValueType> = SlotDef & { valueType: T };

/** A slot found by name whose declared type is `T`. `builder` edits it in place. */
export interface SlotLookup<T extends ValueType> {
  index: number;
  def: TypedSlotDef<T>;
  builder: SlotBuilder<T>;
}

/**
 * Ordered input, output and config slot lists of one node. Rebuilt by the operation on
 * every setup/configure; names must stay unique within each list.
 */
export class SignatureRegistry {
  readonly inputs: SlotDef[] = [];
  readonly outputs: SlotDef[] = [];
  readonly config: SlotDef[] = [];

  addInput<T extends ValueType>(valueType: T, name: string): SlotBuilder<T> {
    return this.push(this.inputs, valueType, name);
  }

  addOutput<T extends ValueType>(valueType: T, name: string): SlotBuilder<T> {
    return this.push(this.outputs, valueType, name);
  }

  addConfig<T extends ValueType>(valueType: T, name: string): SlotBuilder<T> {
    return this.push(this.config, valueType, name);
  }

  input(index: number): SlotDef | undefined {
    return this.inputs[index];
  }

  output(index: number): SlotDef | undefined {
    return this.outputs[index];
  }

  configSlot(index: number): SlotDef | undefined {
    return this.config[index];
  }

  inputByName<T extends ValueType>(name: string, type: T): SlotLookup<T> | undefined {
    return lookup(this.inputs, name, type);
  }

  outputByName<T extends ValueType>(name: string, type: T): SlotLookup<T> | undefined {
    return lookup(this.outputs, name, type);
  }

  configByName<T extends ValueType>(name: string, type: T): SlotLookup<T> | undefined {
    return lookup(this.config, name, type);
  }

  clearInputs(): void {
    this.inputs.length = 0;
  }

  clearOutputs(): void {
    this.outputs.length = 0;
  }

  clear(): void {
    this.inputs.length = 0;
    this.outputs.length = 0;
    this.config.length = 0;
  }

  validateUniqueNames(): void {
    checkUnique(this.inputs, 'inputs');
    checkUnique(this.outputs, 'outputs');
    checkUnique(this.config, 'config');
  }

  private push<T extends ValueType>(list: SlotDef[], valueType: T, name: string): SlotBuilder<T> {
    const def = makeSlot(valueType, name);
    list.push(def);
    return new SlotBuilder<T>(def);
  }
}

function hasType<T extends ValueType>(def: SlotDef, type: T): def is TypedSlotDef<T> {
  return def.valueType === type;
}

/** Undefined when no slot has that name or the slot is declared with another type. */
function lookup<T extends ValueType>(list: SlotDef[], name: string, type: T): SlotLookup<T> | undefined {
  const index = list.findIndex(s => s.name === name);
  const def = list[index];
  if (!def || !hasType(def, type)) return undefined;
  return { index, def, builder: new SlotBuilder<T>(def) };
}

function checkUnique(list: SlotDef[], which: SlotList): void {
  const seen = new Set<string>();
  for (const slot of list) {
    if (seen.has(slot.name)) throw new DuplicateSlotNameError(slot.name, which);
    seen.add(slot.name);
  }
}
