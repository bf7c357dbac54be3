/**
 * Atomic boolean over a SharedArrayBuffer. Handles can be rebuilt on a worker from
 * `buffer`, so background producers can flag a node without touching the graph.
 */
export class DirtyFlag {
  private readonly cell: Int32Array;

  constructor(readonly buffer: SharedArrayBuffer = new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT)) {
    this.cell = new Int32Array(buffer);
  }

  static fromBuffer(buffer: SharedArrayBuffer): DirtyFlag {
    return new DirtyFlag(buffer);
  }

  set(): void {
    Atomics.store(this.cell, 0, 1);
  }

  clear(): void {
    Atomics.store(this.cell, 0, 0);
  }

  isSet(): boolean {
    return Atomics.load(this.cell, 0) === 1;
  }

  /** Clears the flag and reports whether it was set. */
  take(): boolean {
    return Atomics.exchange(this.cell, 0, 0) === 1;
  }
}
