/**
 * @file history.ts
 * @description Graph mutations, informational events, and the bounded undo/redo log.
 *
 * @external-interactions
 * - `Engine.emit` pushes every recorded mutation here.
 * - `undo`/`redo` hand back the mutation the engine must replay.
 *
 * @pitfalls
 * - Stacks are bounded. Past `maxSize` the oldest entries are dropped silently.
 * - Entries refer to nodes by index. When undo/redo recreates a node under a fresh index,
 *   `remapNode` must be called or later entries point at nothing.
 */
import { HISTORY_MAX_SIZE } from '../constants';
import type { NodeRecord, Position } from '../graph/node';
import { snapshotRecord } from '../graph/node';
import { sameIndex, type NodeIndex } from '../graph/stable-graph';
import { cloneValue, type Value } from '../value/value';

export interface EdgeEndpoints {
  from: NodeIndex;
  fromSlot: number;
  to: NodeIndex;
  toSlot: number;
}

export type Mutation =
  | { kind: 'createNode'; node: NodeIndex; record: NodeRecord }
  | { kind: 'deleteNode'; node: NodeIndex; record: NodeRecord }
  | ({ kind: 'connect' } & EdgeEndpoints)
  | ({ kind: 'disconnect' } & EdgeEndpoints)
  | { kind: 'setConfig'; node: NodeIndex; slot: number; oldValue: Value; newValue: Value }
  | { kind: 'setInput'; node: NodeIndex; slot: number; oldValue: Value; newValue: Value }
  | { kind: 'moveNode'; node: NodeIndex; oldPosition: Position; newPosition: Position }
  | { kind: 'setLabel'; node: NodeIndex; oldLabel?: string; newLabel?: string };

export type GraphEvent =
  | { kind: 'executionStarted' }
  | { kind: 'executionCompleted' }
  | { kind: 'nodeExecuted'; node: NodeIndex }
  | { kind: 'nodeFailed'; node: NodeIndex; error: string }
  | { kind: 'graphDirtied' };

export type Message =
  | { kind: 'mutation'; mutation: Mutation }
  | { kind: 'event'; event: GraphEvent };

export type MessageSink = (message: Message) => void;

export function dirtiesGraph(m: Mutation): boolean {
  switch (m.kind) {
    case 'connect':
    case 'disconnect':
    case 'deleteNode':
    case 'setConfig':
    case 'setInput':
      return true;
    case 'createNode':
    case 'moveNode':
    case 'setLabel':
      return false;
  }
}

function mapNodes(m: Mutation, f: (n: NodeIndex) => NodeIndex): Mutation {
  switch (m.kind) {
    case 'createNode':
    case 'deleteNode':
      return { ...m, node: f(m.node), record: snapshotRecord(m.record) };
    case 'connect':
    case 'disconnect':
      return { ...m, from: f(m.from), to: f(m.to) };
    case 'setConfig':
    case 'setInput':
      return { ...m, node: f(m.node), oldValue: cloneValue(m.oldValue), newValue: cloneValue(m.newValue) };
    case 'moveNode':
      return { ...m, node: f(m.node), oldPosition: [...m.oldPosition], newPosition: [...m.newPosition] };
    case 'setLabel':
      return { ...m, node: f(m.node) };
  }
}

export function cloneMutation(m: Mutation): Mutation {
  return mapNodes(m, n => n);
}

export function invertMutation(m: Mutation): Mutation {
  const c = cloneMutation(m);
  switch (c.kind) {
    case 'createNode':
      return { ...c, kind: 'deleteNode' };
    case 'deleteNode':
      return { ...c, kind: 'createNode' };
    case 'connect':
      return { ...c, kind: 'disconnect' };
    case 'disconnect':
      return { ...c, kind: 'connect' };
    case 'setConfig':
    case 'setInput':
      return { ...c, oldValue: c.newValue, newValue: c.oldValue };
    case 'moveNode':
      return { ...c, oldPosition: c.newPosition, newPosition: c.oldPosition };
    case 'setLabel':
      return { ...c, oldLabel: c.newLabel, newLabel: c.oldLabel };
  }
}

/** Folds `next` into `prev` when both target the same slot (or node, for moves). */
function coalesce(prev: Mutation, next: Mutation): boolean {
  if (prev.kind === 'setInput' && next.kind === 'setInput'
    || prev.kind === 'setConfig' && next.kind === 'setConfig') {
    if (!sameIndex(prev.node, next.node) || prev.slot !== next.slot) return false;
    prev.newValue = cloneValue(next.newValue);
    return true;
  }
  if (prev.kind === 'moveNode' && next.kind === 'moveNode') {
    if (!sameIndex(prev.node, next.node)) return false;
    prev.newPosition = [...next.newPosition];
    return true;
  }
  return false;
}

export class History {
  private readonly undoStack: Mutation[] = [];
  private readonly redoStack: Mutation[] = [];

  constructor(readonly maxSize: number = HISTORY_MAX_SIZE) { }

  get undoDepth(): number {
    return this.undoStack.length;
  }

  get redoDepth(): number {
    return this.redoStack.length;
  }

  canUndo(): boolean {
    return this.undoStack.length > 0;
  }

  canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  push(mutation: Mutation): void {
    this.redoStack.length = 0;
    const last = this.undoStack.at(-1);
    if (last && coalesce(last, mutation)) return;
    this.undoStack.push(cloneMutation(mutation));
    if (this.undoStack.length > this.maxSize) {
      this.undoStack.splice(0, this.undoStack.length - this.maxSize);
    }
  }

  /** Moves the newest entry to the redo stack and returns the mutation that reverses it. */
  undo(): Mutation | undefined {
    const mutation = this.undoStack.pop();
    if (!mutation) return undefined;
    this.redoStack.push(mutation);
    return invertMutation(mutation);
  }

  redo(): Mutation | undefined {
    const mutation = this.redoStack.pop();
    if (!mutation) return undefined;
    this.undoStack.push(mutation);
    return cloneMutation(mutation);
  }

  clear(): void {
    this.undoStack.length = 0;
    this.redoStack.length = 0;
  }

  remapNode(stale: NodeIndex, fresh: NodeIndex): void {
    const swap = (n: NodeIndex) => (sameIndex(n, stale) ? fresh : n);
    for (const stack of [this.undoStack, this.redoStack]) {
      stack.forEach((m, i) => {
        stack[i] = mapNodes(m, swap);
      });
    }
  }

  entries(): readonly Mutation[] {
    return this.undoStack;
  }
}
