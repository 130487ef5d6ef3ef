import type { VertexId } from "../graph/model.js";

export interface QueueEntry {
  readonly vertex: VertexId;
  readonly priority: number;
}

/**
 * Binary min-heap keyed by {@link QueueEntry.priority}. Several entries may
 * carry the same vertex; callers decide what to do with stale ones.
 */
export class MinHeap {
  private readonly data: QueueEntry[] = [];

  get size(): number {
    return this.data.length;
  }

  isEmpty(): boolean {
    return this.data.length === 0;
  }

  push(entry: QueueEntry): void {
    this.data.push(entry);
    this.bubbleUp(this.data.length - 1);
  }

  pop(): QueueEntry | undefined {
    const min = this.data[0];
    const last = this.data.pop();
    if (min === undefined || last === undefined) {
      return undefined;
    }
    if (this.data.length > 0) {
      this.data[0] = last;
      this.bubbleDown(0);
    }
    return min;
  }

  private priorityAt(index: number): number {
    return this.data[index]?.priority ?? Number.POSITIVE_INFINITY;
  }

  private swap(first: number, second: number): void {
    const a = this.data[first];
    const b = this.data[second];
    if (a === undefined || b === undefined) {
      return;
    }
    this.data[first] = b;
    this.data[second] = a;
  }

  private bubbleUp(index: number): void {
    while (index > 0) {
      const parent = Math.floor((index - 1) / 2);
      if (this.priorityAt(parent) <= this.priorityAt(index)) {
        break;
      }
      this.swap(parent, index);
      index = parent;
    }
  }

  private bubbleDown(index: number): void {
    const length = this.data.length;
    while (true) {
      let smallest = index;
      const left = 2 * index + 1;
      const right = 2 * index + 2;
      if (left < length && this.priorityAt(left) < this.priorityAt(smallest)) {
        smallest = left;
      }
      if (right < length && this.priorityAt(right) < this.priorityAt(smallest)) {
        smallest = right;
      }
      if (smallest === index) {
        break;
      }
      this.swap(index, smallest);
      index = smallest;
    }
  }
}
