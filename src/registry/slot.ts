/**
 * @file slot.ts
 * @description Slot definitions and the builder operations use to declare them.
 *
 * @pitfalls
 * - `MetadataFor<T>` ties extended metadata to the slot type. Declaring a float range on a
 *   texture slot is a compile error, not a runtime check.
 * - `onNodeBody` is a layout hint, but front ends rely on it to place widgets.
 */
import type { TextureFormat } from '../value/texture';
import { castValue, cloneValue, defaultValue, type Value, type ValueType } from '../value/value';
import { ValueError } from '../errors';

export type StringKind = 'plain' | 'wgsl' | 'path';

export interface NoMetadata { kind: 'none' }
export interface FloatRangeMetadata { kind: 'floatRange'; min: number; max: number; step?: number }
export interface AngleMetadata { kind: 'angle' }
export interface IntRangeMetadata { kind: 'intRange'; min: number; max: number }
export interface IntEnumMetadata { kind: 'intEnum'; options: readonly string[] }
export interface BooleanMetadata { kind: 'boolean' }
export interface StringMetadata { kind: 'string'; stringKind: StringKind; multiLine: boolean }
export interface TextureMetadata {
  kind: 'texture';
  format?: TextureFormat;
  /** Input slot whose connected texture dictates this output's dimensions. */
  matchInput?: number;
}

export type ExtendedMetadata =
  | NoMetadata
  | FloatRangeMetadata
  | AngleMetadata
  | IntRangeMetadata
  | IntEnumMetadata
  | BooleanMetadata
  | StringMetadata
  | TextureMetadata;

interface MetadataByType {
  i32: NoMetadata | IntRangeMetadata | IntEnumMetadata;
  f32: NoMetadata | FloatRangeMetadata | AngleMetadata;
  bool: NoMetadata | BooleanMetadata;
  string: NoMetadata | StringMetadata;
  texture: NoMetadata | TextureMetadata;
  any: NoMetadata;
}

export type MetadataFor<T extends ValueType> = MetadataByType[T];

export interface CommonMetadata {
  tooltip?: string;
  interactive: boolean;
  enabled: boolean;
  visible: boolean;
  onNodeBody: boolean;
}

export interface SlotDef {
  valueType: ValueType;
  name: string;
  extended: ExtendedMetadata;
  common: CommonMetadata;
  defaultOverride?: Value;
}

export function defaultCommonMetadata(): CommonMetadata {
  return { interactive: true, enabled: true, visible: true, onNodeBody: false };
}

export function slotDefaultValue(def: SlotDef): Value {
  if (def.defaultOverride) return cloneValue(def.defaultOverride);
  const value = defaultValue(def.valueType);
  if (value.type === 'texture' && def.extended.kind === 'texture' && def.extended.format) {
    value.value.format = def.extended.format;
  }
  return value;
}

/**
 * Chained builder over a slot that has already been pushed into its list.
 */
export class SlotBuilder<T extends ValueType> {
  constructor(readonly def: SlotDef) { }

  meta(extended: MetadataFor<T>): this {
    this.def.extended = extended;
    return this;
  }

  default(value: Value): this {
    const cast = castValue(value, this.def.valueType);
    if (!cast) throw ValueError.typeMismatch(this.def.valueType, value.type);
    this.def.defaultOverride = cast;
    return this;
  }

  tooltip(text: string): this {
    this.def.common.tooltip = text;
    return this;
  }

  interactive(on: boolean): this {
    this.def.common.interactive = on;
    return this;
  }

  enabled(on: boolean): this {
    this.def.common.enabled = on;
    return this;
  }

  visible(on: boolean): this {
    this.def.common.visible = on;
    return this;
  }

  onNodeBody(on = true): this {
    this.def.common.onNodeBody = on;
    return this;
  }
}

export function makeSlot(valueType: ValueType, name: string): SlotDef {
  return { valueType, name, extended: { kind: 'none' }, common: defaultCommonMetadata() };
}
