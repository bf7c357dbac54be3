/**
 * @file engine.ts
 * @description Owns the graph, the operator registry, the execution context and the undo
 * history, and exposes every mutation, query and execution entry point.
 *
 * @external-interactions
 * - Every recorded change leaves through `emit`: it goes into History, then to the message
 *   sink, followed by a `graphDirtied` event when the change affects results.
 * - Front ends are expected to mirror their display graph from the message stream.
 *
 * @pitfalls
 * - Mutating calls validate before they commit. `execute` is the exception: a failing node
 *   is logged and the pass goes on.
 * - `execute` runs every node. Dirty flags only feed `isDirty`, which tells the host a pass
 *   is due.
 * - Compound calls (delete, replacing connect, config edits) batch their dirty signal, so a
 *   caller sees one trailing `graphDirtied` per call.
 * - Undo/redo replays through the public mutators with recording switched off. Recreated
 *   nodes get fresh indices; History is remapped to match.
 */
import { z } from 'zod';
import { HISTORY_MAX_SIZE } from '../constants';
import {
  CreatesLoopError,
  DuplicateOperationTypeError,
  EdgeNotFoundError,
  errorMessage,
  IncompatibleTypesError,
  InputHasConnectionError,
  NodeNotFoundError,
  NoInputSlotError,
  NoOutputSlotError,
  NotInputNodeError,
  NotTextureSlotError,
  UnknownOperationTypeError,
} from '../errors';
import { nodeOwner } from '../gpu/gpu-pool';
import { parseDocument, type GraphDocument } from '../graph/document';
import type { DirtyFlag } from '../graph/dirty-flag';
import {
  Node,
  snapshotRecord,
  type AllSlotsEditor,
  type DriftHandler,
  type NodeRecord,
  type Position,
  type SlotChange,
  type SlotEditor,
} from '../graph/node';
import {
  formatIndex,
  sameIndex,
  StableGraph,
  type EdgeIndex,
  type EdgeRef,
  type NodeIndex,
} from '../graph/stable-graph';
import { BUILTIN_OPERATIONS, InputOp, OutputOp } from '../ops';
import { OperationRegistry, type OperatorEntry } from '../registry/op-registry';
import {
  formatOpPath,
  samePath,
  type OpPath,
  type Operation,
  type OperationFactory,
} from '../registry/operation';
import { ExecutionContext, type TimeInfo } from '../runtime/execution-context';
import {
  dirtiesGraph,
  History,
  type EdgeEndpoints,
  type GraphEvent,
  type Message,
  type MessageSink,
  type Mutation,
} from '../state/history';
import { textureHandle, type TextureFormat, type TextureHandle, type TextureId } from '../value/texture';
import { canCastTo, cloneValue, formatValue, type Value } from '../value/value';

export const EngineOptionsSchema = z.object({
  historySize: z.number().int().positive().default(HISTORY_MAX_SIZE),
  registerBuiltins: z.boolean().default(true),
});

export type EngineOptions = z.input<typeof EngineOptionsSchema>;

export interface EngineInit {
  device: GPUDevice;
  /** Defaults to `device.queue`. */
  queue?: GPUQueue;
  onMessage?: MessageSink;
  options?: EngineOptions;
}

export interface Edge {
  sourceSlot: number;
  sinkSlot: number;
}

export interface GraphEdge extends EdgeEndpoints {
  id: EdgeIndex;
}

export interface TextureUpload {
  width: number;
  height: number;
  format?: TextureFormat;
  data: BufferSource;
}

export type OperationClass<T extends Operation> = new (...args: never[]) => T;

const INPUT_PATH: OpPath = { library: InputOp.library, operator: InputOp.operator };
const OUTPUT_PATH: OpPath = { library: OutputOp.library, operator: OutputOp.operator };

export class Engine {
  private readonly graph = new StableGraph<Node, Edge>();
  private readonly registry = new OperationRegistry();
  private nextId = 0;
  private replaying = false;
  private batchDepth = 0;
  private pendingDirty = false;

  private constructor(
    readonly ctx: ExecutionContext,
    private readonly history: History,
    private sink: MessageSink | undefined,
  ) { }

  static init(init: EngineInit): Engine {
    const options = EngineOptionsSchema.parse(init.options ?? {});
    const ctx = new ExecutionContext(init.device, init.queue ?? init.device.queue);
    const engine = new Engine(ctx, new History(options.historySize), init.onMessage);
    if (options.registerBuiltins) {
      for (const factory of BUILTIN_OPERATIONS) engine.registerOp(factory);
    }
    console.info(`[Engine] Initialised with ${ctx.pool.size} system textures and ${engine.registry.categories().length} operator libraries`);
    return engine;
  }

  setMessageSink(sink: MessageSink | undefined): void {
    this.sink = sink;
  }

  // ------------------------------------------------------------------
  // Discovery
  // ------------------------------------------------------------------

  registerOp(factory: OperationFactory): void {
    this.registry.register(factory);
  }

  nodeCategories(): string[] {
    return this.registry.categories();
  }

  iterCategory(library: string): OperatorEntry[] {
    return this.registry.iterCategory(library);
  }

  operatorLabel(path: OpPath): string | undefined {
    return this.registry.label(path);
  }

  // ------------------------------------------------------------------
  // Node lifecycle
  // ------------------------------------------------------------------

  instanceNode(library: string, operator: string, position: Position = [0, 0]): NodeIndex {
    const path = { library, operator };
    return this.insertNode(path, this.registry.build(path), position);
  }

  /**
   * Adds a node built from `factory`, registering the factory if its path is new. Throws if
   * another factory already owns the path.
   */
  addNode(factory: OperationFactory, position: Position = [0, 0]): NodeIndex {
    const path = { library: factory.library, operator: factory.operator };
    const registered = this.registry.factory(path);
    if (!registered) this.registry.register(factory);
    else if (registered !== factory) throw new DuplicateOperationTypeError(path.library, path.operator);
    return this.insertNode(path, factory.build(), position);
  }

  deleteNode(index: NodeIndex): NodeRecord {
    const node = this.requireNode(index);
    return this.batch(() => {
      for (const edge of this.graph.edges(index)) this.removeEdge(edge, index);
      const record = snapshotRecord(node.record);
      try {
        this.ctx.withOwner(nodeOwner(index), () => node.teardown(this.ctx));
      } catch (e) {
        console.error(`[Engine] Teardown of ${this.describe(node)} failed: ${errorMessage(e)}`);
      }
      this.ctx.pool.releaseNodeTextures(index);
      this.graph.removeNode(index);
      this.emit({ kind: 'deleteNode', node: index, record });
      return record;
    });
  }

  // ------------------------------------------------------------------
  // Edges
  // ------------------------------------------------------------------

  connect(from: NodeIndex, fromSlot: number, to: NodeIndex, toSlot: number): EdgeIndex {
    const source = this.requireNode(from);
    const sink = this.requireNode(to);
    const probe = source.probeConnect(sink, fromSlot, toSlot);
    const sourceDef = source.signature.output(fromSlot);
    const sinkDef = sink.signature.input(toSlot);
    if (probe === 'noSourceSlot' || !sourceDef) throw new NoOutputSlotError(fromSlot);
    if (probe === 'noSinkSlot' || !sinkDef) throw new NoInputSlotError(toSlot);
    if (probe === 'incompatible') throw new IncompatibleTypesError(sourceDef.valueType, sinkDef.valueType);
    if (this.graph.hasPath(to, from)) throw new CreatesLoopError();

    const existing = this.incomingEdge(to, toSlot);
    if (existing && sameIndex(existing.source, from) && existing.weight.sourceSlot === fromSlot) {
      return existing.id;
    }

    return this.batch(() => {
      if (existing) this.removeEdge(existing);
      const id = this.graph.addEdge(from, to, { sourceSlot: fromSlot, sinkSlot: toSlot });
      if (!id) throw new NodeNotFoundError(formatIndex(to));
      const connectedType = sourceDef.valueType;
      this.runEdgeHook(sink, () => sink.operation.onEdgeConnected(toSlot, connectedType, sink.signature));
      const current = source.output(fromSlot);
      if (current) sink.pushIncoming(toSlot, current);
      sink.dirty.set();
      this.syncOutputTextures(to, sink);
      this.emit({ kind: 'connect', from, fromSlot, to, toSlot });
      return id;
    });
  }

  disconnect(from: NodeIndex, fromSlot: number, to: NodeIndex, toSlot: number): void {
    this.requireNode(from);
    this.requireNode(to);
    const edge = this.graph.edgesConnecting(from, to)
      .find(e => e.weight.sourceSlot === fromSlot && e.weight.sinkSlot === toSlot);
    if (!edge) throw new EdgeNotFoundError();
    this.batch(() => this.removeEdge(edge));
  }

  // ------------------------------------------------------------------
  // Cosmetic edits
  // ------------------------------------------------------------------

  setNodePosition(index: NodeIndex, position: Position): void {
    const node = this.requireNode(index);
    const oldPosition = node.record.position;
    if (oldPosition[0] === position[0] && oldPosition[1] === position[1]) return;
    const newPosition: Position = [position[0], position[1]];
    node.record.position = newPosition;
    this.emit({ kind: 'moveNode', node: index, oldPosition: [oldPosition[0], oldPosition[1]], newPosition });
  }

  /** An empty label clears it. */
  setLabel(index: NodeIndex, label: string | undefined): void {
    const node = this.requireNode(index);
    const newLabel = label === '' ? undefined : label;
    const oldLabel = node.record.label;
    if (oldLabel === newLabel) return;
    node.record.label = newLabel;
    this.emit({ kind: 'setLabel', node: index, oldLabel, newLabel });
  }

  // ------------------------------------------------------------------
  // Value edits
  // ------------------------------------------------------------------

  /** Edits the value a `core/input` node provides. */
  editGraphInput<R>(index: NodeIndex, fn: SlotEditor<R>): R {
    const node = this.requireNode(index);
    if (!samePath(node.path, INPUT_PATH)) throw new NotInputNodeError();
    if (this.incomingEdge(index, 0)) throw new InputHasConnectionError();
    return this.editNodeInput(index, 0, fn);
  }

  editNodeInput<R>(index: NodeIndex, slot: number, fn: SlotEditor<R>): R {
    const node = this.requireNode(index);
    const edit = node.editInput(slot, fn);
    this.recordInputChanges(index, edit.changes);
    return edit.result;
  }

  editAllNodeInputs<R>(index: NodeIndex, fn: AllSlotsEditor<R>): R {
    const node = this.requireNode(index);
    const edit = node.editAllInputs(fn);
    this.recordInputChanges(index, edit.changes);
    return edit.result;
  }

  /** Edits one config value and, if it changed, reconfigures the node. */
  editNodeConfig<R>(index: NodeIndex, slot: number, fn: SlotEditor<R>): R {
    const node = this.requireNode(index);
    const previous = node.record.configValues;
    const edit = node.editConfig(slot, fn);
    this.applyConfigChanges(index, node, previous, edit.changes);
    return edit.result;
  }

  editAllNodeConfigs<R>(index: NodeIndex, fn: AllSlotsEditor<R>): R {
    const node = this.requireNode(index);
    const previous = node.record.configValues;
    const edit = node.editAllConfigs(fn);
    this.applyConfigChanges(index, node, previous, edit.changes);
    return edit.result;
  }

  /**
   * Uploads pixels into a texture output. The new texture is allocated before the old one is
   * released, so a bad upload leaves the node untouched.
   */
  uploadTexture(index: NodeIndex, slot: number, upload: TextureUpload): TextureHandle {
    const node = this.requireNode(index);
    const def = node.signature.output(slot);
    if (!def) throw new NoOutputSlotError(slot);
    if (def.valueType !== 'texture') throw new NotTextureSlotError(slot);

    const handle = textureHandle(upload.width, upload.height, upload.format ?? 'rgba8');
    const allocated = this.ctx.pool.allocTextureWithData(handle, upload.data, nodeOwner(index));
    const previous = node.output(slot);
    if (previous?.type === 'texture' && previous.value.id !== undefined) {
      this.releaseOwned(index, [previous.value.id]);
    }
    node.editOutput(slot, out => out.put('texture', allocated));
    this.markGraphDirty();
    return { ...allocated };
  }

  // ------------------------------------------------------------------
  // Queries
  // ------------------------------------------------------------------

  hasNode(index: NodeIndex): boolean {
    return this.graph.contains(index);
  }

  getNode(index: NodeIndex): Node {
    return this.requireNode(index);
  }

  get nodeCount(): number {
    return this.graph.nodeCount;
  }

  get edgeCount(): number {
    return this.graph.edgeCount;
  }

  nodeIndices(): NodeIndex[] {
    return this.graph.nodeIndices();
  }

  edges(): GraphEdge[] {
    return this.graph.edgeRefs().map(e => ({
      id: e.id,
      from: e.source,
      fromSlot: e.weight.sourceSlot,
      to: e.target,
      toSlot: e.weight.sinkSlot,
    }));
  }

  /** The node's operation, if it is an instance of `cls`. */
  operation<T extends Operation>(index: NodeIndex, cls: OperationClass<T>): T | undefined {
    const op = this.requireNode(index).operation;
    return op instanceof cls ? op : undefined;
  }

  inputs(): NodeIndex[] {
    return this.nodesOfPath(INPUT_PATH);
  }

  outputs(): NodeIndex[] {
    return this.nodesOfPath(OUTPUT_PATH);
  }

  /** The value reaching the i-th `core/output` node, in node-index order. */
  result(i: number): Value | undefined {
    const index = this.outputs()[i];
    if (!index) return undefined;
    return this.graph.nodeWeight(index)?.effectiveInput(0);
  }

  results(): Value[] {
    return this.outputs().flatMap(index => {
      const value = this.graph.nodeWeight(index)?.effectiveInput(0);
      return value ? [value] : [];
    });
  }

  getTexture(handle: TextureHandle): GPUTexture | undefined {
    return this.ctx.texture(handle);
  }

  /** True while any node needs to run: dirty, or stateful and so never settled. */
  isDirty(): boolean {
    return this.graph.nodeIndices().some(i => {
      const node = this.graph.nodeWeight(i);
      return node !== undefined && (node.dirty.isSet() || node.isStateful());
    });
  }

  /** Flag handle a background producer can set from another thread. */
  dirtyHandle(index: NodeIndex): DirtyFlag {
    return this.requireNode(index).dirty;
  }

  timing(): TimeInfo {
    return this.ctx.timing();
  }

  setTiming(timing: TimeInfo): void {
    this.ctx.setTiming(timing);
  }

  // ------------------------------------------------------------------
  // Execution
  // ------------------------------------------------------------------

  /**
   * Runs every node in dependency order, pushing each node's outputs into its dependants'
   * incoming buffers. Texture producers redraw in place under the same id, so a pass never
   * skips a node whose inputs compare equal. A node that throws keeps its last outputs, stays
   * dirty, and still reports `nodeExecuted` after its `nodeFailed`.
   */
  execute(): void {
    this.emitEvent({ kind: 'executionStarted' });
    const order = this.graph.toposort();
    if (!order) {
      console.error('[Engine] Graph contains a cycle; nothing was executed');
    }
    for (const index of order ?? []) {
      const node = this.graph.nodeWeight(index);
      if (!node) continue;
      let failed = false;
      try {
        this.syncOutputTextures(index, node);
        this.ctx.withOwner(nodeOwner(index), () => node.execute(this.ctx));
      } catch (e) {
        failed = true;
        const error = errorMessage(e);
        console.error(`[Engine] ${this.describe(node)} failed: ${error}`);
        this.emitEvent({ kind: 'nodeFailed', node: index, error });
      }
      this.emitEvent({ kind: 'nodeExecuted', node: index });
      if (!failed) this.propagate(index, node);
    }
    this.emitEvent({ kind: 'executionCompleted' });
  }

  // ------------------------------------------------------------------
  // History
  // ------------------------------------------------------------------

  canUndo(): boolean {
    return this.history.canUndo();
  }

  canRedo(): boolean {
    return this.history.canRedo();
  }

  undo(): boolean {
    const mutation = this.history.undo();
    if (!mutation) return false;
    this.replay(mutation);
    return true;
  }

  redo(): boolean {
    const mutation = this.history.redo();
    if (!mutation) return false;
    this.replay(mutation);
    return true;
  }

  // ------------------------------------------------------------------
  // Documents
  // ------------------------------------------------------------------

  toDocument(): GraphDocument {
    const nodes = this.graph.nodeIndices().flatMap(i => {
      const node = this.graph.nodeWeight(i);
      return node ? [snapshotRecord(node.record)] : [];
    });
    for (const record of nodes) {
      record.inputValues = record.inputValues.map(dropTextureId);
      record.configValues = record.configValues.map(dropTextureId);
    }
    const edges = this.graph.edgeRefs().flatMap(e => {
      const from = this.graph.nodeWeight(e.source);
      const to = this.graph.nodeWeight(e.target);
      if (!from || !to) return [];
      return [{ from: from.id, fromSlot: e.weight.sourceSlot, to: to.id, toSlot: e.weight.sinkSlot }];
    });
    return { version: 1, nodes, edges };
  }

  /**
   * Replaces the graph with a saved document. Every operator must be registered; edges that
   * no longer fit are dropped and logged. History starts empty afterwards.
   */
  loadDocument(input: unknown): void {
    const doc = parseDocument(input);
    const missing = doc.nodes.find(n => !this.registry.has(n.path));
    if (missing) throw new UnknownOperationTypeError(missing.path.library, missing.path.operator);

    this.replaying = true;
    try {
      this.batch(() => {
        for (const index of this.graph.nodeIndices()) this.deleteNode(index);
        const byId = new Map<number, NodeIndex>();
        for (const record of doc.nodes) {
          const saved = { ...record, inputValues: record.inputValues.map(dropTextureId), configValues: record.configValues.map(dropTextureId) };
          byId.set(record.id, this.insertNode(record.path, this.registry.build(record.path), record.position, saved));
        }
        for (const e of doc.edges) {
          const from = byId.get(e.from);
          const to = byId.get(e.to);
          if (!from || !to) continue;
          try {
            this.connect(from, e.fromSlot, to, e.toSlot);
          } catch (err) {
            console.warn(`[Engine] Dropped saved edge #${e.from}:${e.fromSlot} -> #${e.to}:${e.toSlot}: ${errorMessage(err)}`);
          }
        }
      });
    } finally {
      this.replaying = false;
    }
    this.history.clear();
    console.info(`[Engine] Loaded document with ${this.nodeCount} nodes and ${this.edgeCount} edges`);
  }

  /** Tears down every node and destroys all GPU textures, system ones included. */
  dispose(): void {
    for (const index of this.graph.nodeIndices()) {
      const node = this.graph.nodeWeight(index);
      try {
        node?.teardown(this.ctx);
      } catch (e) {
        console.error(`[Engine] Teardown failed during dispose: ${errorMessage(e)}`);
      }
      this.graph.removeNode(index);
    }
    this.ctx.pool.destroy();
    this.history.clear();
  }

  // ------------------------------------------------------------------
  // Internals
  // ------------------------------------------------------------------

  private requireNode(index: NodeIndex): Node {
    const node = this.graph.nodeWeight(index);
    if (!node) throw new NodeNotFoundError(formatIndex(index));
    return node;
  }

  private describe(node: Node): string {
    return `${formatOpPath(node.path)} #${node.id}${node.record.label ? ` (${node.record.label})` : ''}`;
  }

  private nodesOfPath(path: OpPath): NodeIndex[] {
    return this.graph.nodeIndices().filter(i => {
      const node = this.graph.nodeWeight(i);
      return node !== undefined && samePath(node.path, path);
    });
  }

  private incomingEdge(to: NodeIndex, slot: number): EdgeRef<Edge> | undefined {
    return this.graph.edgesDirected(to, 'incoming').find(e => e.weight.sinkSlot === slot);
  }

  private insertNode(path: OpPath, operation: Operation, position: Position, saved?: NodeRecord): NodeIndex {
    const id = saved?.id ?? this.nextId;
    this.nextId = Math.max(this.nextId, id + 1);
    const node = new Node(
      { id, path: { ...path }, position: [position[0], position[1]], inputValues: [], configValues: [] },
      operation,
    );
    node.setup(this.ctx);
    if (saved) node.restore(this.ctx, saved, this.driftLogger(path, id));
    else node.configure(this.ctx);

    const index = this.graph.addNode(node);
    this.syncOutputTextures(index, node);
    this.emit({ kind: 'createNode', node: index, record: snapshotRecord(node.record) });
    return index;
  }

  private driftLogger(path: OpPath, id: number): DriftHandler {
    return (list, def, saved) => {
      console.warn(`[Engine] ${formatOpPath(path)} #${id}: saved ${list} value ${formatValue(saved)} does not fit "${def.name}" (${def.valueType}); reset to default`);
    };
  }

  private recreate(record: NodeRecord, stale: NodeIndex): void {
    const fresh = this.insertNode(record.path, this.registry.build(record.path), record.position, record);
    if (!sameIndex(fresh, stale)) this.history.remapNode(stale, fresh);
  }

  /** `target` names a node being deleted; its textures are not re-synced. */
  private removeEdge(edge: EdgeRef<Edge>, deleting?: NodeIndex): void {
    const source = this.graph.nodeWeight(edge.source);
    const sink = this.graph.nodeWeight(edge.target);
    this.graph.removeEdge(edge.id);
    if (sink) {
      const { sinkSlot, sourceSlot } = edge.weight;
      const connectedType = source?.signature.output(sourceSlot)?.valueType ?? 'any';
      sink.clearIncoming(sinkSlot);
      this.runEdgeHook(sink, () => sink.operation.onEdgeDisconnected(sinkSlot, connectedType, sink.signature));
      if (!deleting || !sameIndex(deleting, edge.target)) this.syncOutputTextures(edge.target, sink);
    }
    this.emit({
      kind: 'disconnect',
      from: edge.source,
      fromSlot: edge.weight.sourceSlot,
      to: edge.target,
      toSlot: edge.weight.sinkSlot,
    });
  }

  private runEdgeHook(node: Node, hook: () => void): void {
    try {
      hook();
      node.signature.validateUniqueNames();
      node.syncInputs();
    } catch (e) {
      console.error(`[Engine] Edge hook of ${this.describe(node)} failed: ${errorMessage(e)}`);
    }
  }

  private recordInputChanges(index: NodeIndex, changes: SlotChange[]): void {
    if (changes.length === 0) return;
    this.batch(() => {
      for (const c of changes) {
        this.emit({ kind: 'setInput', node: index, slot: c.slot, oldValue: c.oldValue, newValue: c.newValue });
      }
    });
  }

  /**
   * Reconfigures after a config edit. If configure throws, the previous config is put back
   * and the node reconfigured under it before rethrowing; no edge has been touched by then.
   */
  private applyConfigChanges(index: NodeIndex, node: Node, previous: Value[], changes: SlotChange[]): void {
    if (changes.length === 0) return;
    const dropped = this.configureOrRestore(index, node, previous);
    this.batch(() => {
      this.releaseOwned(index, dropped);
      this.dropInvalidEdges(index, node);
      this.syncOutputTextures(index, node);
      for (const c of changes) {
        this.emit({ kind: 'setConfig', node: index, slot: c.slot, oldValue: c.oldValue, newValue: c.newValue });
      }
    });
  }

  private configureOrRestore(index: NodeIndex, node: Node, previous: Value[]): TextureId[] {
    try {
      return this.ctx.withOwner(nodeOwner(index), () => node.configure(this.ctx));
    } catch (e) {
      node.record.configValues = previous;
      this.ctx.withOwner(nodeOwner(index), () => node.configure(this.ctx));
      throw e;
    }
  }

  private dropInvalidEdges(index: NodeIndex, node: Node): void {
    for (const edge of this.graph.edges(index)) {
      const source = this.graph.nodeWeight(edge.source);
      const sink = this.graph.nodeWeight(edge.target);
      const from = source?.signature.output(edge.weight.sourceSlot);
      const to = sink?.signature.input(edge.weight.sinkSlot);
      if (!from || !to || !canCastTo(from.valueType, to.valueType)) {
        console.debug(`[Engine] Dropping edge that no longer type-checks after reconfiguring ${this.describe(node)}`);
        this.removeEdge(edge);
      }
    }
  }

  private releaseOwned(index: NodeIndex, ids: TextureId[]): void {
    for (const id of ids) {
      const owner = this.ctx.pool.owner(id);
      if (owner?.kind === 'node' && sameIndex(owner.node, index)) this.ctx.pool.releaseTexture(id);
    }
  }

  /**
   * Makes sure every texture output is backed by a pool texture of the right shape. Outputs
   * with `matchInput` follow the size of the texture connected to that input.
   */
  private syncOutputTextures(index: NodeIndex, node: Node): void {
    this.ctx.withOwner(nodeOwner(index), () => {
      node.signature.outputs.forEach((def, slot) => {
        const current = node.output(slot);
        if (def.valueType !== 'texture' || current?.type !== 'texture') return;
        let wanted = current.value;
        if (def.extended.kind === 'texture' && def.extended.matchInput !== undefined) {
          const driver = node.incomingValue(def.extended.matchInput);
          if (driver?.type === 'texture') {
            wanted = { ...wanted, width: driver.value.width, height: driver.value.height };
          }
        }
        node.setOutputValue(slot, { type: 'texture', value: this.ctx.ensureTexture(wanted) });
      });
    });
  }

  private propagate(index: NodeIndex, node: Node): void {
    for (const edge of this.graph.edgesDirected(index, 'outgoing')) {
      const sink = this.graph.nodeWeight(edge.target);
      const value = node.output(edge.weight.sourceSlot);
      if (!sink || !value) continue;
      if (!sink.pushIncoming(edge.weight.sinkSlot, cloneValue(value))) {
        console.warn(`[Engine] Could not deliver ${formatValue(value)} to input ${edge.weight.sinkSlot} of ${this.describe(sink)}`);
      }
    }
  }

  private replay(mutation: Mutation): void {
    this.replaying = true;
    try {
      this.apply(mutation);
    } finally {
      this.replaying = false;
    }
  }

  private apply(m: Mutation): void {
    switch (m.kind) {
      case 'createNode':
        this.recreate(m.record, m.node);
        return;
      case 'deleteNode':
        this.deleteNode(m.node);
        return;
      case 'connect':
        this.connect(m.from, m.fromSlot, m.to, m.toSlot);
        return;
      case 'disconnect':
        this.disconnect(m.from, m.fromSlot, m.to, m.toSlot);
        return;
      case 'setConfig':
        this.editNodeConfig(m.node, m.slot, v => v.set(cloneValue(m.newValue)));
        return;
      case 'setInput':
        this.editNodeInput(m.node, m.slot, v => v.set(cloneValue(m.newValue)));
        return;
      case 'moveNode':
        this.setNodePosition(m.node, m.newPosition);
        return;
      case 'setLabel':
        this.setLabel(m.node, m.newLabel);
        return;
    }
  }

  private emit(mutation: Mutation): void {
    if (!this.replaying) this.history.push(mutation);
    this.send({ kind: 'mutation', mutation });
    if (dirtiesGraph(mutation)) this.markGraphDirty();
  }

  private emitEvent(event: GraphEvent): void {
    this.send({ kind: 'event', event });
  }

  private markGraphDirty(): void {
    if (this.batchDepth > 0) {
      this.pendingDirty = true;
      return;
    }
    this.emitEvent({ kind: 'graphDirtied' });
  }

  private send(message: Message): void {
    if (!this.sink) return;
    try {
      this.sink(message);
    } catch (e) {
      console.error(`[Engine] Message sink threw: ${errorMessage(e)}`);
    }
  }

  private batch<R>(fn: () => R): R {
    this.batchDepth++;
    try {
      return fn();
    } finally {
      this.batchDepth--;
      if (this.batchDepth === 0 && this.pendingDirty) {
        this.pendingDirty = false;
        this.emitEvent({ kind: 'graphDirtied' });
      }
    }
  }
}

function dropTextureId(value: Value): Value {
  if (value.type !== 'texture') return cloneValue(value);
  const { id: _session, ...shape } = value.value;
  return { type: 'texture', value: shape };
}
