import { vi } from 'vitest';
import { Engine, type EngineOptions } from '../engine/engine';
import type { NodeIndex } from '../graph/stable-graph';
import type { Message } from '../state/history';
import { createMockGpu } from './mock-gpu';

export function createEngine(options?: EngineOptions) {
  vi.spyOn(console, 'info').mockImplementation(() => { });
  const gpu = createMockGpu();
  const messages: Message[] = [];
  const engine = Engine.init({ device: gpu.device, onMessage: m => messages.push(m), options });
  return { gpu, engine, messages };
}

/** Mutation or event kind of each message, in order. */
export function kinds(messages: readonly Message[]): string[] {
  return messages.map(m => (m.kind === 'mutation' ? m.mutation.kind : m.event.kind));
}

export function executedNodes(messages: readonly Message[]): NodeIndex[] {
  return messages.flatMap(m => (m.kind === 'event' && m.event.kind === 'nodeExecuted' ? [m.event.node] : []));
}

export function setGraphInput(engine: Engine, index: NodeIndex, value: number): void {
  engine.editGraphInput(index, v => v.put('f32', value));
}

export function findById(engine: Engine, id: number): NodeIndex | undefined {
  return engine.nodeIndices().find(i => engine.getNode(i).id === id);
}

/** Input A, Input B, Add(A, B), Output. */
export function buildDiamond(engine: Engine) {
  const a = engine.instanceNode('core', 'input', [0, 0]);
  const b = engine.instanceNode('core', 'input', [0, 100]);
  const add = engine.instanceNode('math', 'arithmetic', [200, 50]);
  const out = engine.instanceNode('core', 'output', [400, 50]);
  engine.connect(a, 0, add, 0);
  engine.connect(b, 0, add, 1);
  engine.connect(add, 0, out, 0);
  return { a, b, add, out };
}
