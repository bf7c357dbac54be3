import { describe, it, expect } from 'vitest';
import { ValueError } from '../errors';
import {
  canCastTo,
  castValue,
  defaultValue,
  formatValue,
  makeValue,
  readInput,
  toI32,
  unwrapValue,
  ValueMut,
  valuesEqual,
  type Value,
} from './value';
import { byteSize, CHECK, isTextureFormat, systemTextures, textureHandle } from './texture';

describe('Value casting', () => {
  it('allows identity, any, and numeric casts only', () => {
    expect(canCastTo('f32', 'f32')).toBe(true);
    expect(canCastTo('i32', 'f32')).toBe(true);
    expect(canCastTo('f32', 'i32')).toBe(true);
    expect(canCastTo('texture', 'any')).toBe(true);
    expect(canCastTo('any', 'bool')).toBe(true);
    expect(canCastTo('bool', 'i32')).toBe(false);
    expect(canCastTo('string', 'texture')).toBe(false);
  });

  it('truncates and saturates when narrowing to i32', () => {
    expect(toI32(2.9)).toBe(2);
    expect(toI32(-2.9)).toBe(-2);
    expect(toI32(1e12)).toBe(2147483647);
    expect(toI32(-1e12)).toBe(-2147483648);
    expect(toI32(Number.NaN)).toBe(0);
  });

  it('casts between numeric types and refuses the rest', () => {
    expect(castValue({ type: 'i32', value: 3 }, 'f32')).toEqual({ type: 'f32', value: 3 });
    expect(castValue({ type: 'f32', value: 3.7 }, 'i32')).toEqual({ type: 'i32', value: 3 });
    expect(castValue({ type: 'bool', value: true }, 'string')).toBeUndefined();
    expect(castValue({ type: 'null' }, 'any')).toBeUndefined();
  });

  it('returns a copy when the cast is an identity', () => {
    const original: Value = { type: 'texture', value: textureHandle(4, 4) };
    const cast = castValue(original, 'texture');
    expect(cast).toEqual(original);
    expect(cast).not.toBe(original);
  });
});

describe('Value equality and defaults', () => {
  it('treats NaN as equal to itself', () => {
    expect(valuesEqual({ type: 'f32', value: Number.NaN }, { type: 'f32', value: Number.NaN })).toBe(true);
  });

  it('distinguishes numeric types with the same number', () => {
    expect(valuesEqual({ type: 'f32', value: 1 }, { type: 'i32', value: 1 })).toBe(false);
  });

  it('compares textures by id and shape', () => {
    const a: Value = { type: 'texture', value: { id: 5, width: 2, height: 2, format: 'rgba8' } };
    const b: Value = { type: 'texture', value: { id: 6, width: 2, height: 2, format: 'rgba8' } };
    expect(valuesEqual(a, a)).toBe(true);
    expect(valuesEqual(a, b)).toBe(false);
    expect(valuesEqual(a, undefined)).toBe(false);
  });

  it('gives each type its zero value', () => {
    expect(defaultValue('i32')).toEqual({ type: 'i32', value: 0 });
    expect(defaultValue('string')).toEqual({ type: 'string', value: '' });
    expect(defaultValue('any')).toEqual({ type: 'null' });
    expect(defaultValue('texture')).toEqual({ type: 'texture', value: { width: 512, height: 512, format: 'rgba8' } });
  });

  it('formats values for display', () => {
    expect(formatValue({ type: 'f32', value: 1.5 })).toBe('1.500');
    expect(formatValue({ type: 'bool', value: false })).toBe('false');
    expect(formatValue({ type: 'texture', value: textureHandle() })).toBe('texture(unallocated)');
    expect(formatValue({ type: 'texture', value: CHECK })).toBe('texture(3)');
  });
});

describe('Typed slot access', () => {
  it('unwraps only the matching type', () => {
    expect(unwrapValue({ type: 'bool', value: true }, 'bool')).toBe(true);
    expect(unwrapValue({ type: 'bool', value: true }, 'f32')).toBeUndefined();
  });

  it('truncates when building an i32', () => {
    expect(makeValue('i32', 7.8)).toEqual({ type: 'i32', value: 7 });
  });

  it('reads inputs by type and reports mismatches', () => {
    const inputs: Value[] = [{ type: 'f32', value: 2 }];
    expect(readInput(inputs, 0, 'f32')).toBe(2);
    expect(() => readInput(inputs, 0, 'string')).toThrow('Expected a value of type string, got f32');
    expect(() => readInput(inputs, 3, 'f32')).toThrow(ValueError);
  });

  it('writes through a ValueMut view', () => {
    const cells: Value[] = [{ type: 'i32', value: 1 }];
    const view = new ValueMut(cells, 0);
    view.update('i32', n => n + 41);
    expect(cells[0]).toEqual({ type: 'i32', value: 42 });
    expect(() => view.get('bool')).toThrow(ValueError);
    expect(() => new ValueMut(cells, 1).set({ type: 'i32', value: 0 })).toThrow(ValueError);
  });
});

describe('Texture handles', () => {
  it('sizes data by format', () => {
    expect(byteSize(textureHandle(2, 3, 'rgba8'))).toBe(24);
    expect(byteSize(textureHandle(2, 3, 'rgba32f'))).toBe(96);
  });

  it('recognises format names', () => {
    expect(isTextureFormat('bgra8')).toBe(true);
    expect(isTextureFormat('rgb8')).toBe(false);
  });

  it('ships data matching every system texture', () => {
    for (const { handle, data } of systemTextures()) {
      expect(data.byteLength).toBe(byteSize(handle));
    }
    expect(systemTextures().map(t => t.handle.id)).toEqual([0, 1, 2, 3]);
  });
});
