/**
 * @file value.ts
 * @description Tagged slot values, their type discriminants and the cast rules between them.
 *
 * @pitfalls
 * - `null` is the discriminant-less value: it reports as `any`, but it never casts to
 *   anything, `any` included. An `any` slot may hold a concrete value, never a substitute.
 * - f32 -> i32 truncates toward zero and saturates at the i32 range.
 */
import { ValueError } from '../errors';
import { textureHandle, type TextureHandle } from './texture';

export interface ValueTypeMap {
  i32: number;
  f32: number;
  bool: boolean;
  string: string;
  texture: TextureHandle;
}

export type ConcreteType = keyof ValueTypeMap;
export type ValueType = ConcreteType | 'any';

export const VALUE_TYPES: readonly ValueType[] = ['i32', 'f32', 'bool', 'string', 'texture', 'any'];

export type Value =
  | { type: 'i32'; value: number }
  | { type: 'f32'; value: number }
  | { type: 'bool'; value: boolean }
  | { type: 'string'; value: string }
  | { type: 'texture'; value: TextureHandle }
  | { type: 'null' };

export const NULL_VALUE: Value = { type: 'null' };

/** Read-only view handed to `Operation.execute` for each input. */
export type ValueRef = Readonly<Value>;
export type Inputs = readonly ValueRef[];
export type Outputs = ValueMut[];

export function discriminant(value: ValueRef): ValueType {
  return value.type === 'null' ? 'any' : value.type;
}

function isNumeric(type: ValueType): boolean {
  return type === 'i32' || type === 'f32';
}

export function canCastTo(from: ValueType, to: ValueType): boolean {
  if (from === to || from === 'any' || to === 'any') return true;
  return isNumeric(from) && isNumeric(to);
}

const I32_MIN = -2147483648;
const I32_MAX = 2147483647;

export function toI32(x: number): number {
  if (Number.isNaN(x)) return 0;
  return Math.trunc(Math.min(Math.max(x, I32_MIN), I32_MAX));
}

export function cloneValue(value: ValueRef): Value {
  if (value.type === 'texture') return { type: 'texture', value: { ...value.value } };
  return { ...value };
}

export function castValue(value: ValueRef, to: ValueType): Value | undefined {
  if (value.type === 'null') return undefined;
  if (to === 'any' || value.type === to) return cloneValue(value);
  if (value.type === 'i32' && to === 'f32') return { type: 'f32', value: value.value };
  if (value.type === 'f32' && to === 'i32') return { type: 'i32', value: toI32(value.value) };
  return undefined;
}

function sameNumber(a: number, b: number): boolean {
  return a === b || (Number.isNaN(a) && Number.isNaN(b));
}

export function valuesEqual(a: ValueRef | undefined, b: ValueRef | undefined): boolean {
  if (a === undefined || b === undefined) return a === b;
  switch (a.type) {
    case 'null':
      return b.type === 'null';
    case 'i32':
    case 'f32':
      return b.type === a.type && sameNumber(a.value, b.value);
    case 'bool':
      return b.type === 'bool' && a.value === b.value;
    case 'string':
      return b.type === 'string' && a.value === b.value;
    case 'texture':
      return b.type === 'texture'
        && a.value.id === b.value.id
        && a.value.width === b.value.width
        && a.value.height === b.value.height
        && a.value.format === b.value.format;
  }
}

export function defaultValue(type: ValueType): Value {
  switch (type) {
    case 'i32': return { type: 'i32', value: 0 };
    case 'f32': return { type: 'f32', value: 0 };
    case 'bool': return { type: 'bool', value: false };
    case 'string': return { type: 'string', value: '' };
    case 'texture': return { type: 'texture', value: textureHandle() };
    case 'any': return { type: 'null' };
  }
}

export function formatValue(value: ValueRef): string {
  switch (value.type) {
    case 'i32': return String(value.value);
    case 'f32': return value.value.toFixed(3);
    case 'bool': return value.value ? 'true' : 'false';
    case 'string': return value.value;
    case 'texture': return `texture(${value.value.id ?? 'unallocated'})`;
    case 'null': return 'null';
  }
}

const UNWRAP: { [K in ConcreteType]: (value: ValueRef) => ValueTypeMap[K] | undefined } = {
  i32: v => (v.type === 'i32' ? v.value : undefined),
  f32: v => (v.type === 'f32' ? v.value : undefined),
  bool: v => (v.type === 'bool' ? v.value : undefined),
  string: v => (v.type === 'string' ? v.value : undefined),
  texture: v => (v.type === 'texture' ? v.value : undefined),
};

const WRAP: { [K in ConcreteType]: (raw: ValueTypeMap[K]) => Value } = {
  i32: value => ({ type: 'i32', value: toI32(value) }),
  f32: value => ({ type: 'f32', value }),
  bool: value => ({ type: 'bool', value }),
  string: value => ({ type: 'string', value }),
  texture: value => ({ type: 'texture', value }),
};

export function unwrapValue<T extends ConcreteType>(value: ValueRef, type: T): ValueTypeMap[T] | undefined {
  return UNWRAP[type](value);
}

export function makeValue<T extends ConcreteType>(type: T, raw: ValueTypeMap[T]): Value {
  return WRAP[type](raw);
}

export function readInput<T extends ConcreteType>(inputs: Inputs, index: number, type: T): ValueTypeMap[T] {
  const value = inputValue(inputs, index);
  const raw = unwrapValue(value, type);
  if (raw === undefined) throw ValueError.typeMismatch(type, value.type);
  return raw;
}

export function inputValue(inputs: Inputs, index: number): ValueRef {
  const value = inputs[index];
  if (value === undefined) throw ValueError.slotIndex(index, inputs.length);
  return value;
}

/**
 * Mutable view over one cell of a value list. Editors and `execute` write through it;
 * the owner compares the cell before and after to decide whether anything changed.
 */
export class ValueMut {
  constructor(private readonly cells: Value[], readonly index: number) { }

  get value(): Value {
    const value = this.cells[this.index];
    if (value === undefined) throw ValueError.slotIndex(this.index, this.cells.length);
    return value;
  }

  set(value: Value): void {
    if (this.index >= this.cells.length) throw ValueError.slotIndex(this.index, this.cells.length);
    this.cells[this.index] = value;
  }

  get<T extends ConcreteType>(type: T): ValueTypeMap[T] {
    const current = this.value;
    const raw = unwrapValue(current, type);
    if (raw === undefined) throw ValueError.typeMismatch(type, current.type);
    return raw;
  }

  put<T extends ConcreteType>(type: T, raw: ValueTypeMap[T]): void {
    this.set(makeValue(type, raw));
  }

  update<T extends ConcreteType>(type: T, fn: (raw: ValueTypeMap[T]) => ValueTypeMap[T]): void {
    this.put(type, fn(this.get(type)));
  }
}

export function outputAt(outputs: Outputs, index: number): ValueMut {
  const out = outputs[index];
  if (!out) throw ValueError.slotIndex(index, outputs.length);
  return out;
}
