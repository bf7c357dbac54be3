import { describe, it, expect } from 'vitest';
import { ARITH_OPS } from '../../ops/math/arithmetic';
import { buildDiamond, createEngine, findById, kinds, setGraphInput } from '../harness';

describe('Engine undo/redo', () => {
  it('has nothing to undo on a fresh engine', () => {
    const { engine } = createEngine();
    expect(engine.canUndo()).toBe(false);
    expect(engine.undo()).toBe(false);
    expect(engine.redo()).toBe(false);
  });

  it('undoes and redoes node creation', () => {
    const { engine } = createEngine();
    const node = engine.instanceNode('core', 'input', [3, 4]);
    const id = engine.getNode(node).id;

    engine.undo();
    expect(engine.nodeCount).toBe(0);
    expect(engine.canRedo()).toBe(true);

    engine.redo();
    expect(engine.nodeCount).toBe(1);
    const fresh = findById(engine, id);
    expect(fresh && engine.getNode(fresh).record.position).toEqual([3, 4]);
  });

  it('restores a deleted node with its edges and config', () => {
    const { engine } = createEngine();
    const { add } = buildDiamond(engine);
    engine.editNodeConfig(add, 0, v => v.put('i32', ARITH_OPS.indexOf('multiply')));
    const id = engine.getNode(add).id;
    engine.deleteNode(add);

    engine.undo();
    engine.undo();
    engine.undo();
    engine.undo();

    const restored = findById(engine, id);
    expect(restored).toBeDefined();
    if (!restored) return;
    expect(engine.getNode(restored).config(0)).toEqual({ type: 'i32', value: 2 });
    expect(engine.edgeCount).toBe(3);
    expect(engine.edges().filter(e => e.to.slot === restored.slot || e.from.slot === restored.slot)).toHaveLength(3);
  });

  it('redoes a delete against the recreated node', () => {
    const { engine } = createEngine();
    const { add } = buildDiamond(engine);
    const id = engine.getNode(add).id;
    engine.deleteNode(add);
    for (let i = 0; i < 4; i++) engine.undo();
    expect(findById(engine, id)).toBeDefined();

    for (let i = 0; i < 4; i++) engine.redo();
    expect(findById(engine, id)).toBeUndefined();
    expect(engine.edgeCount).toBe(0);
    expect(engine.nodeCount).toBe(3);
  });

  it('round-trips an input edit', () => {
    const { engine } = createEngine();
    const input = engine.instanceNode('core', 'input');
    setGraphInput(engine, input, 5);

    engine.undo();
    expect(engine.getNode(input).input(0)).toEqual({ type: 'f32', value: 0 });
    engine.redo();
    expect(engine.getNode(input).input(0)).toEqual({ type: 'f32', value: 5 });
  });

  it('treats a slider drag as one step', () => {
    const { engine } = createEngine();
    const input = engine.instanceNode('core', 'input');
    setGraphInput(engine, input, 1);
    setGraphInput(engine, input, 2);
    setGraphInput(engine, input, 3);

    engine.undo();
    expect(engine.getNode(input).input(0)).toEqual({ type: 'f32', value: 0 });
    expect(engine.nodeCount).toBe(1);
  });

  it('restores the position from before a run of moves', () => {
    const { engine } = createEngine();
    const node = engine.instanceNode('core', 'input', [0, 0]);
    engine.setNodePosition(node, [10, 0]);
    engine.setNodePosition(node, [20, 0]);
    engine.setNodePosition(node, [30, 0]);

    engine.undo();
    expect(engine.getNode(node).record.position).toEqual([0, 0]);
    engine.undo();
    expect(engine.nodeCount).toBe(0);
  });

  it('restores the signature before the edge a config edit dropped', () => {
    const { engine } = createEngine();
    const input = engine.instanceNode('core', 'input');
    const add = engine.instanceNode('math', 'arithmetic');
    engine.connect(input, 0, add, 0);
    engine.editNodeConfig(input, 0, v => v.put('i32', 3));
    expect(engine.edgeCount).toBe(0);

    engine.undo();
    expect(engine.getNode(input).signature.output(0)?.valueType).toBe('f32');
    engine.undo();
    expect(engine.edgeCount).toBe(1);
  });

  it('round-trips labels', () => {
    const { engine } = createEngine();
    const node = engine.instanceNode('core', 'comment');
    engine.setLabel(node, 'note');
    engine.undo();
    expect(engine.getNode(node).record.label).toBeUndefined();
    engine.redo();
    expect(engine.getNode(node).record.label).toBe('note');
  });

  it('sends replayed mutations to the sink without recording them', () => {
    const { engine, messages } = createEngine();
    const a = engine.instanceNode('core', 'input');
    const add = engine.instanceNode('math', 'arithmetic');
    engine.connect(a, 0, add, 0);
    messages.length = 0;

    engine.undo();
    expect(kinds(messages)).toEqual(['disconnect', 'graphDirtied']);
    expect(engine.canRedo()).toBe(true);
    engine.undo();
    engine.undo();
    expect(engine.canUndo()).toBe(false);
  });

  it('clears redo after a fresh edit', () => {
    const { engine } = createEngine();
    const input = engine.instanceNode('core', 'input');
    setGraphInput(engine, input, 1);
    engine.undo();
    engine.setLabel(input, 'x');
    expect(engine.canRedo()).toBe(false);
  });

  it('forgets the oldest steps past the history size', () => {
    const { engine } = createEngine({ historySize: 2 });
    engine.instanceNode('core', 'input');
    engine.instanceNode('core', 'input');
    engine.instanceNode('core', 'input');
    expect(engine.undo()).toBe(true);
    expect(engine.undo()).toBe(true);
    expect(engine.undo()).toBe(false);
    expect(engine.nodeCount).toBe(1);
  });
});
