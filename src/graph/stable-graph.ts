/**
 * @file stable-graph.ts
 * @description Arena-backed directed graph. Removing a node or edge never renumbers the
 * others; a freed slot is reused under a bumped generation so stale handles miss.
 *
 * @pitfalls
 * - Handles are plain objects. Compare them with `sameIndex`, not `===`.
 * - Edge queries scan the edge arena. Graphs are interactive-editing sized.
 */
import { MinHeap } from '../utils/min-heap';

export interface NodeIndex {
  readonly slot: number;
  readonly generation: number;
}

export interface EdgeIndex {
  readonly slot: number;
  readonly generation: number;
}

export type Direction = 'incoming' | 'outgoing';

export interface EdgeRef<E> {
  id: EdgeIndex;
  source: NodeIndex;
  target: NodeIndex;
  weight: E;
}

interface Cell<T> {
  generation: number;
  value?: T;
}

interface StoredEdge<E> {
  source: NodeIndex;
  target: NodeIndex;
  weight: E;
}

export function sameIndex(a: NodeIndex | EdgeIndex, b: NodeIndex | EdgeIndex): boolean {
  return a.slot === b.slot && a.generation === b.generation;
}

export function formatIndex(index: NodeIndex | EdgeIndex): string {
  return `${index.slot}v${index.generation}`;
}

export class StableGraph<N, E> {
  private readonly nodeCells: Cell<N>[] = [];
  private readonly edgeCells: Cell<StoredEdge<E>>[] = [];
  private readonly freeNodes: number[] = [];
  private readonly freeEdges: number[] = [];
  private liveNodes = 0;
  private liveEdges = 0;

  get nodeCount(): number {
    return this.liveNodes;
  }

  get edgeCount(): number {
    return this.liveEdges;
  }

  addNode(weight: N): NodeIndex {
    this.liveNodes++;
    return claim(this.nodeCells, this.freeNodes, weight);
  }

  /** Removes the node and every edge touching it. */
  removeNode(index: NodeIndex): N | undefined {
    const cell = this.live(this.nodeCells, index);
    if (!cell) return undefined;
    for (const edge of this.edges(index)) this.removeEdge(edge.id);
    const weight = cell.value;
    release(cell, this.freeNodes, index.slot);
    this.liveNodes--;
    return weight;
  }

  contains(index: NodeIndex): boolean {
    return this.live(this.nodeCells, index) !== undefined;
  }

  nodeWeight(index: NodeIndex): N | undefined {
    return this.live(this.nodeCells, index)?.value;
  }

  nodeIndices(): NodeIndex[] {
    const out: NodeIndex[] = [];
    this.nodeCells.forEach((cell, slot) => {
      if (cell.value !== undefined) out.push({ slot, generation: cell.generation });
    });
    return out;
  }

  addEdge(source: NodeIndex, target: NodeIndex, weight: E): EdgeIndex | undefined {
    if (!this.contains(source) || !this.contains(target)) return undefined;
    this.liveEdges++;
    return claim(this.edgeCells, this.freeEdges, { source, target, weight });
  }

  removeEdge(index: EdgeIndex): E | undefined {
    const cell = this.live(this.edgeCells, index);
    if (!cell?.value) return undefined;
    const weight = cell.value.weight;
    release(cell, this.freeEdges, index.slot);
    this.liveEdges--;
    return weight;
  }

  edge(index: EdgeIndex): EdgeRef<E> | undefined {
    const stored = this.live(this.edgeCells, index)?.value;
    return stored ? { id: index, ...stored } : undefined;
  }

  edgeRefs(): EdgeRef<E>[] {
    const out: EdgeRef<E>[] = [];
    this.edgeCells.forEach((cell, slot) => {
      if (cell.value) out.push({ id: { slot, generation: cell.generation }, ...cell.value });
    });
    return out;
  }

  edgesDirected(node: NodeIndex, direction: Direction): EdgeRef<E>[] {
    return this.edgeRefs().filter(e => sameIndex(direction === 'incoming' ? e.target : e.source, node));
  }

  edges(node: NodeIndex): EdgeRef<E>[] {
    return this.edgeRefs().filter(e => sameIndex(e.source, node) || sameIndex(e.target, node));
  }

  edgesConnecting(source: NodeIndex, target: NodeIndex): EdgeRef<E>[] {
    return this.edgeRefs().filter(e => sameIndex(e.source, source) && sameIndex(e.target, target));
  }

  /** Whether `to` is reachable from `from` along edge direction. A node reaches itself. */
  hasPath(from: NodeIndex, to: NodeIndex): boolean {
    if (!this.contains(from) || !this.contains(to)) return false;
    const seen = new Set<number>();
    const stack = [from];
    for (let next = stack.pop(); next; next = stack.pop()) {
      if (sameIndex(next, to)) return true;
      if (seen.has(next.slot)) continue;
      seen.add(next.slot);
      for (const e of this.edgesDirected(next, 'outgoing')) stack.push(e.target);
    }
    return false;
  }

  /**
   * Kahn's algorithm; among ready nodes the lowest slot goes first so the order is
   * deterministic. Returns undefined if the graph has a cycle.
   */
  toposort(): NodeIndex[] | undefined {
    const indegree = new Map<number, number>();
    const nodes = this.nodeIndices();
    for (const n of nodes) indegree.set(n.slot, 0);
    const edges = this.edgeRefs();
    for (const e of edges) indegree.set(e.target.slot, (indegree.get(e.target.slot) ?? 0) + 1);

    const ready = new MinHeap<NodeIndex>();
    for (const n of nodes) {
      if (indegree.get(n.slot) === 0) ready.push(n, n.slot);
    }

    const order: NodeIndex[] = [];
    for (let next = ready.pop(); next; next = ready.pop()) {
      order.push(next);
      for (const e of edges) {
        if (!sameIndex(e.source, next)) continue;
        const remaining = (indegree.get(e.target.slot) ?? 0) - 1;
        indegree.set(e.target.slot, remaining);
        if (remaining === 0) ready.push(e.target, e.target.slot);
      }
    }
    return order.length === nodes.length ? order : undefined;
  }

  private live<T>(cells: Cell<T>[], index: NodeIndex | EdgeIndex): Cell<T> | undefined {
    const cell = cells[index.slot];
    if (!cell || cell.value === undefined || cell.generation !== index.generation) return undefined;
    return cell;
  }
}

function claim<T>(cells: Cell<T>[], free: number[], value: T): { slot: number; generation: number } {
  const slot = free.pop();
  if (slot !== undefined) {
    const cell = cells[slot];
    if (cell) {
      cell.value = value;
      return { slot, generation: cell.generation };
    }
  }
  cells.push({ generation: 0, value });
  return { slot: cells.length - 1, generation: 0 };
}

function release<T>(cell: Cell<T>, free: number[], slot: number): void {
  cell.value = undefined;
  cell.generation++;
  free.push(slot);
}
