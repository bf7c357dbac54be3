export interface HeapItem<T> {
  item: T;
  priority: number;
}

export class MinHeap<T> {
  private items: HeapItem<T>[] = [];

  push(item: T, priority: number) {
    this.items.push({ item, priority });
    this.bubbleUp(this.items.length - 1);
  }

  pop(): T | undefined {
    const root = this.items[0];
    const last = this.items.pop();
    if (root === undefined || last === undefined) return undefined;
    if (this.items.length > 0) {
      this.items[0] = last;
      this.bubbleDown(0);
    }
    return root.item;
  }

  size(): number {
    return this.items.length;
  }

  private priorityAt(index: number): number {
    return this.items[index]?.priority ?? Infinity;
  }

  private bubbleUp(index: number) {
    while (index > 0) {
      const parentIndex = Math.floor((index - 1) / 2);
      if (this.priorityAt(index) >= this.priorityAt(parentIndex)) break;
      this.swap(index, parentIndex);
      index = parentIndex;
    }
  }

  private bubbleDown(index: number) {
    const length = this.items.length;

    while (true) {
      const leftChildIndex = 2 * index + 1;
      const rightChildIndex = 2 * index + 2;
      let smallest = index;

      if (leftChildIndex < length && this.priorityAt(leftChildIndex) < this.priorityAt(smallest)) {
        smallest = leftChildIndex;
      }
      if (rightChildIndex < length && this.priorityAt(rightChildIndex) < this.priorityAt(smallest)) {
        smallest = rightChildIndex;
      }

      if (smallest === index) break;
      this.swap(index, smallest);
      index = smallest;
    }
  }

  private swap(i: number, j: number) {
    const a = this.items[i];
    const b = this.items[j];
    if (a === undefined || b === undefined) return;
    this.items[i] = b;
    this.items[j] = a;
  }
}
