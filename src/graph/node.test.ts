import { describe, it, expect, beforeEach, vi } from 'vitest';
import { DuplicateSlotNameError, NoInputSlotError, ValueError } from '../errors';
import { InputOp } from '../ops';
import { BaseOperation, type Operation } from '../registry/operation';
import type { SignatureRegistry } from '../registry/signature';
import { ExecutionContext } from '../runtime/execution-context';
import { createMockGpu } from '../tests/mock-gpu';
import { textureHandle } from '../value/texture';
import { NULL_VALUE, outputAt, unwrapValue, type Inputs, type Outputs, type Value } from '../value/value';
import { Node, type NodeRecord } from './node';

class FailingOp extends BaseOperation {
  setup(_ctx: ExecutionContext, reg: SignatureRegistry): void {
    reg.addOutput('f32', 'x');
  }

  execute(_ctx: ExecutionContext, _inputs: Inputs, outputs: Outputs): void {
    outputAt(outputs, 0).put('f32', 5);
    throw new Error('boom');
  }
}

class TexturesOp extends BaseOperation {
  setup(_ctx: ExecutionContext, reg: SignatureRegistry): void {
    reg.addConfig('i32', 'count').default({ type: 'i32', value: 2 });
  }

  override configure(_ctx: ExecutionContext, config: readonly Value[], reg: SignatureRegistry): void {
    const count = unwrapValue(config[0] ?? NULL_VALUE, 'i32') ?? 0;
    reg.clearOutputs();
    for (let i = 0; i < count; i++) reg.addOutput('texture', `t${i}`);
  }

  execute(): void { }
}

class ClashingOp extends BaseOperation {
  setup(_ctx: ExecutionContext, reg: SignatureRegistry): void {
    reg.addInput('f32', 'value');
    reg.addInput('i32', 'value');
  }

  execute(): void { }
}

describe('Node', () => {
  let ctx: ExecutionContext;

  beforeEach(() => {
    const gpu = createMockGpu();
    ctx = new ExecutionContext(gpu.device, gpu.queue);
  });

  function makeNode(op: Operation): Node {
    const record: NodeRecord = {
      id: 1,
      path: { library: 'test', operator: 'node' },
      position: [0, 0],
      inputValues: [],
      configValues: [],
    };
    const node = new Node(record, op);
    node.setup(ctx);
    node.configure(ctx);
    return node;
  }

  it('derives its slots and default values on setup', () => {
    const node = makeNode(new InputOp());
    expect(node.signature.inputs.map(s => [s.name, s.valueType])).toEqual([['value', 'f32']]);
    expect(node.config(0)).toEqual({ type: 'i32', value: 0 });
    expect(node.input(0)).toEqual({ type: 'f32', value: 0 });
    expect(node.output(0)).toEqual({ type: 'f32', value: 0 });
    expect(node.dirty.isSet()).toBe(true);
  });

  it('rejects duplicate slot names', () => {
    const node = new Node({ id: 2, path: { library: 'test', operator: 'clash' }, position: [0, 0], inputValues: [], configValues: [] }, new ClashingOp());
    expect(() => node.setup(ctx)).toThrow(DuplicateSlotNameError);
  });

  describe('editing', () => {
    it('records nothing when the value is unchanged', () => {
      const node = makeNode(new InputOp());
      node.dirty.clear();
      const edit = node.editInput(0, v => v.put('f32', 0));
      expect(edit.changes).toEqual([]);
      expect(node.dirty.isSet()).toBe(false);
    });

    it('commits a change and marks dirty', () => {
      const node = makeNode(new InputOp());
      node.dirty.clear();
      const edit = node.editInput(0, v => {
        v.put('f32', 3);
        return 'done';
      });
      expect(edit.result).toBe('done');
      expect(edit.changes).toEqual([{ slot: 0, oldValue: { type: 'f32', value: 0 }, newValue: { type: 'f32', value: 3 } }]);
      expect(node.input(0)).toEqual({ type: 'f32', value: 3 });
      expect(node.dirty.isSet()).toBe(true);
    });

    it('casts a numeric write to the slot type', () => {
      const node = makeNode(new InputOp());
      node.editInput(0, v => v.put('i32', 2));
      expect(node.input(0)).toEqual({ type: 'f32', value: 2 });
    });

    it('rejects a write of the wrong type without committing', () => {
      const node = makeNode(new InputOp());
      expect(() => node.editInput(0, v => v.put('string', 'x'))).toThrow(ValueError);
      expect(node.input(0)).toEqual({ type: 'f32', value: 0 });
    });

    it('reports a missing slot', () => {
      const node = makeNode(new InputOp());
      expect(() => node.editInput(4, () => undefined)).toThrow(NoInputSlotError);
    });

    it('edits several slots at once', () => {
      const node = makeNode(new TexturesOp());
      const edit = node.editAllConfigs((values, defs) => {
        values[0]?.put('i32', 1);
        return defs.length;
      });
      expect(edit.result).toBe(1);
      expect(edit.changes).toHaveLength(1);
    });
  });

  describe('configure', () => {
    it('casts stored inputs to the new type where possible', () => {
      const node = makeNode(new InputOp());
      node.editInput(0, v => v.put('f32', 3.7));
      node.editConfig(0, v => v.put('i32', 1));
      node.configure(ctx);
      expect(node.signature.input(0)?.valueType).toBe('i32');
      expect(node.input(0)).toEqual({ type: 'i32', value: 3 });
    });

    it('resets stored inputs that no longer fit', () => {
      const node = makeNode(new InputOp());
      node.editInput(0, v => v.put('f32', 3));
      node.editConfig(0, v => v.put('i32', 3));
      node.configure(ctx);
      expect(node.input(0)).toEqual({ type: 'string', value: '' });
    });

    it('keeps texture ids of surviving outputs and returns the dropped ones', () => {
      const node = makeNode(new TexturesOp());
      node.setOutputValue(0, { type: 'texture', value: { ...textureHandle(), id: 8 } });
      node.setOutputValue(1, { type: 'texture', value: { ...textureHandle(), id: 9 } });
      node.editConfig(0, v => v.put('i32', 1));
      expect(node.configure(ctx)).toEqual([9]);
      expect(node.output(0)).toEqual({ type: 'texture', value: { id: 8, width: 512, height: 512, format: 'rgba8' } });
    });
  });

  describe('restore', () => {
    it('overlays a saved record and reports drift', () => {
      const node = makeNode(new InputOp());
      const onDrift = vi.fn();
      node.restore(ctx, {
        id: 1,
        path: { library: 'core', operator: 'input' },
        label: 'speed',
        position: [10, 20],
        inputValues: [{ type: 'f32', value: 0.5 }],
        configValues: [{ type: 'string', value: 'f32' }],
      }, onDrift);

      expect(node.record.label).toBe('speed');
      expect(node.record.position).toEqual([10, 20]);
      expect(node.config(0)).toEqual({ type: 'i32', value: 0 });
      expect(node.input(0)).toEqual({ type: 'f32', value: 0.5 });
      expect(onDrift).toHaveBeenCalledTimes(1);
      expect(onDrift.mock.calls[0]?.[0]).toBe('config');
    });
  });

  describe('execute', () => {
    it('prefers the incoming value over the stored one', () => {
      const node = makeNode(new InputOp());
      node.editInput(0, v => v.put('f32', 1));
      node.execute(ctx);
      expect(node.output(0)).toEqual({ type: 'f32', value: 1 });
      expect(node.dirty.isSet()).toBe(false);

      expect(node.pushIncoming(0, { type: 'i32', value: 9 })).toBe(true);
      expect(node.dirty.isSet()).toBe(true);
      node.execute(ctx);
      expect(node.output(0)).toEqual({ type: 'f32', value: 9 });
    });

    it('keeps outputs and dirty when the operation throws', () => {
      const node = makeNode(new FailingOp());
      expect(() => node.execute(ctx)).toThrow('boom');
      expect(node.output(0)).toEqual({ type: 'f32', value: 0 });
      expect(node.dirty.isSet()).toBe(true);
    });
  });

  describe('incoming values', () => {
    it('refuses values that cannot be cast', () => {
      const node = makeNode(new InputOp());
      expect(node.pushIncoming(0, { type: 'string', value: 'x' })).toBe(false);
      expect(node.incomingValue(0)).toBeUndefined();
    });

    it('does not mark dirty when the buffered value is unchanged', () => {
      const node = makeNode(new InputOp());
      node.pushIncoming(0, { type: 'f32', value: 2 });
      node.dirty.clear();
      node.pushIncoming(0, { type: 'f32', value: 2 });
      expect(node.dirty.isSet()).toBe(false);
      node.clearIncoming(0);
      expect(node.dirty.isSet()).toBe(true);
      expect(node.effectiveInput(0)).toEqual({ type: 'f32', value: 0 });
    });

    it('probes connections without changing anything', () => {
      const a = makeNode(new InputOp());
      const b = makeNode(new InputOp());
      expect(a.probeConnect(b, 0, 0)).toBe('ok');
      expect(a.probeConnect(b, 1, 0)).toBe('noSourceSlot');
      expect(a.probeConnect(b, 0, 1)).toBe('noSinkSlot');
      b.editConfig(0, v => v.put('i32', 2));
      b.configure(ctx);
      expect(a.probeConnect(b, 0, 0)).toBe('incompatible');
    });
  });
});
