import { describe, it, expect } from 'vitest';
import type { NodeRecord } from '../graph/node';
import { dirtiesGraph, History, invertMutation, type Mutation } from './history';

const n0 = { slot: 0, generation: 0 };
const n1 = { slot: 1, generation: 0 };

function move(from: number, to: number, node = n0): Mutation {
  return { kind: 'moveNode', node, oldPosition: [from, 0], newPosition: [to, 0] };
}

function setInput(oldValue: number, newValue: number, slot = 0): Mutation {
  return { kind: 'setInput', node: n0, slot, oldValue: { type: 'f32', value: oldValue }, newValue: { type: 'f32', value: newValue } };
}

describe('History', () => {
  it('coalesces consecutive moves of one node', () => {
    const history = new History();
    history.push(move(0, 10));
    history.push(move(10, 20));
    history.push(move(20, 30));
    expect(history.undoDepth).toBe(1);
    expect(history.undo()).toEqual({ kind: 'moveNode', node: n0, oldPosition: [30, 0], newPosition: [0, 0] });
  });

  it('keeps moves of different nodes apart', () => {
    const history = new History();
    history.push(move(0, 10, n0));
    history.push(move(0, 10, n1));
    expect(history.undoDepth).toBe(2);
  });

  it('coalesces edits of the same slot only', () => {
    const history = new History();
    history.push(setInput(0, 1));
    history.push(setInput(1, 2));
    history.push(setInput(5, 6, 1));
    expect(history.entries()).toEqual([setInput(0, 2), setInput(5, 6, 1)]);
  });

  it('redoes the original mutation', () => {
    const history = new History();
    history.push(setInput(0, 1));
    history.undo();
    expect(history.canRedo()).toBe(true);
    expect(history.redo()).toEqual(setInput(0, 1));
    expect(history.canRedo()).toBe(false);
    expect(history.undoDepth).toBe(1);
  });

  it('clears redo on a new push', () => {
    const history = new History();
    history.push(setInput(0, 1));
    history.undo();
    history.push(move(0, 5));
    expect(history.canRedo()).toBe(false);
  });

  it('drops the oldest entries past its size', () => {
    const history = new History(2);
    history.push({ kind: 'setLabel', node: n0, newLabel: 'a' });
    history.push({ kind: 'setLabel', node: n0, oldLabel: 'a', newLabel: 'b' });
    history.push({ kind: 'setLabel', node: n0, oldLabel: 'b', newLabel: 'c' });
    expect(history.undoDepth).toBe(2);
    expect(history.entries()[0]).toEqual({ kind: 'setLabel', node: n0, oldLabel: 'a', newLabel: 'b' });
  });

  it('stores copies, not the pushed objects', () => {
    const history = new History();
    const m = setInput(0, 1);
    history.push(m);
    if (m.kind === 'setInput') m.newValue = { type: 'f32', value: 99 };
    expect(history.entries()[0]).toEqual(setInput(0, 1));
  });

  it('remaps node handles in both stacks', () => {
    const history = new History();
    const fresh = { slot: 0, generation: 1 };
    history.push({ kind: 'connect', from: n0, fromSlot: 0, to: n1, toSlot: 0 });
    history.push(move(0, 5));
    history.undo();
    history.remapNode(n0, fresh);
    expect(history.entries()).toEqual([{ kind: 'connect', from: fresh, fromSlot: 0, to: n1, toSlot: 0 }]);
    expect(history.redo()).toEqual(move(0, 5, fresh));
  });
});

describe('Mutation helpers', () => {
  it('inverts structural mutations', () => {
    const record: NodeRecord = { id: 3, path: { library: 'core', operator: 'input' }, position: [0, 0], inputValues: [], configValues: [] };
    expect(invertMutation({ kind: 'createNode', node: n0, record }).kind).toBe('deleteNode');
    expect(invertMutation({ kind: 'deleteNode', node: n0, record }).kind).toBe('createNode');
    expect(invertMutation({ kind: 'connect', from: n0, fromSlot: 0, to: n1, toSlot: 1 }))
      .toEqual({ kind: 'disconnect', from: n0, fromSlot: 0, to: n1, toSlot: 1 });
  });

  it('swaps old and new sides', () => {
    expect(invertMutation(setInput(1, 2))).toEqual(setInput(2, 1));
    expect(invertMutation({ kind: 'setLabel', node: n0, newLabel: 'x' })).toEqual({ kind: 'setLabel', node: n0, oldLabel: 'x', newLabel: undefined });
  });

  it('classifies dirtying mutations', () => {
    expect(dirtiesGraph(setInput(0, 1))).toBe(true);
    expect(dirtiesGraph({ kind: 'disconnect', from: n0, fromSlot: 0, to: n1, toSlot: 0 })).toBe(true);
    expect(dirtiesGraph(move(0, 1))).toBe(false);
    expect(dirtiesGraph({ kind: 'setLabel', node: n0 })).toBe(false);
  });
});
