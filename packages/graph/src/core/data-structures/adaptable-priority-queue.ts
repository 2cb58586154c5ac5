/**
 * Adaptable priority queue.
 *
 * A binary min-heap whose entries know their own array slot. `add` hands
 * back that entry as a handle, and the handle can later be used to change
 * the entry's key or pull it out of the middle of the heap in O(log n),
 * without searching for it.
 *
 * Invariant: for every live entry, `heap[entry.position] === entry`.
 * Every swap rewrites the position of both entries it moves.
 */

import { GraphError } from "@routegraph/contracts";

export type KeyCompare<K> = (a: K, b: K) => number;

export const compareNumbers: KeyCompare<number> = (a, b) => a - b;

/**
 * Caller-side view of a queue entry. Valid until the entry is removed by
 * `removeMin`, `remove` or `clear`; after that `attached` is false and the
 * queue rejects it.
 */
export interface QueueHandle<K, V> {
  readonly key: K;
  readonly value: V;
  /** Current slot in the heap array, -1 once detached. */
  readonly position: number;
  readonly attached: boolean;
}

const DETACHED = -1;

class HeapEntry<K, V> implements QueueHandle<K, V> {
  constructor(
    public key: K,
    readonly value: V,
    public position: number,
  ) {}

  get attached(): boolean {
    return this.position !== DETACHED;
  }
}

export class AdaptablePriorityQueue<K, V> implements Iterable<QueueHandle<K, V>> {
  private readonly heap: HeapEntry<K, V>[] = [];
  private readonly compare: KeyCompare<K>;

  constructor(compare: KeyCompare<K>) {
    this.compare = compare;
  }

  get size(): number {
    return this.heap.length;
  }

  get isEmpty(): boolean {
    return this.heap.length === 0;
  }

  add(key: K, value: V): QueueHandle<K, V> {
    const entry = new HeapEntry(key, value, this.heap.length);
    this.heap.push(entry);
    this.bubbleUp(entry.position);
    return entry;
  }

  /**
   * @throws {GraphError} QUEUE_EMPTY
   */
  min(): QueueHandle<K, V> {
    const root = this.heap[0];
    if (root === undefined) {
      throw GraphError.queueEmpty("AdaptablePriorityQueue.min");
    }
    return root;
  }

  /**
   * Detach and return the entry with the smallest key.
   *
   * @throws {GraphError} QUEUE_EMPTY
   */
  removeMin(): QueueHandle<K, V> {
    if (this.heap.length === 0) {
      throw GraphError.queueEmpty("AdaptablePriorityQueue.removeMin");
    }
    return this.detachAt(0);
  }

  /**
   * Change the key of a live entry and restore heap order in whichever
   * direction the change requires. An equal key leaves the heap untouched.
   *
   * @throws {GraphError} INVALID_HANDLE
   */
  updateKey(handle: QueueHandle<K, V>, newKey: K): void {
    const entry = this.resolve(handle, "AdaptablePriorityQueue.updateKey");
    const order = this.compare(newKey, entry.key);
    if (order === 0) return;

    entry.key = newKey;
    if (order < 0) {
      this.bubbleUp(entry.position);
    } else {
      this.bubbleDown(entry.position);
    }
  }

  /**
   * Detach an arbitrary entry.
   *
   * @throws {GraphError} INVALID_HANDLE
   */
  remove(handle: QueueHandle<K, V>): QueueHandle<K, V> {
    const entry = this.resolve(handle, "AdaptablePriorityQueue.remove");
    return this.detachAt(entry.position);
  }

  /**
   * @throws {GraphError} INVALID_HANDLE
   */
  getKey(handle: QueueHandle<K, V>): K {
    return this.resolve(handle, "AdaptablePriorityQueue.getKey").key;
  }

  /**
   * Detach every entry. Handles issued before the call become invalid.
   */
  clear(): void {
    for (const entry of this.heap) {
      entry.position = DETACHED;
    }
    this.heap.length = 0;
  }

  /** Live handles in heap-array order (not sorted). */
  *[Symbol.iterator](): Iterator<QueueHandle<K, V>> {
    yield* this.heap;
  }

  private resolve(
    handle: QueueHandle<K, V>,
    operation: string,
  ): HeapEntry<K, V> {
    const entry = this.heap[handle.position];
    if (entry === undefined || entry !== handle) {
      throw GraphError.invalidHandle(operation);
    }
    return entry;
  }

  /**
   * Move the entry at `index` to the last slot and pop it. The entry that
   * took its place is sifted once: up if it is smaller than its new parent,
   * otherwise down.
   */
  private detachAt(index: number): HeapEntry<K, V> {
    const last = this.heap.length - 1;
    this.swap(index, last);

    const removed = this.heap.pop();
    if (removed === undefined) {
      throw GraphError.queueEmpty("AdaptablePriorityQueue.detach");
    }
    removed.position = DETACHED;

    if (index < this.heap.length) {
      if (index > 0 && this.lessThanParent(index)) {
        this.bubbleUp(index);
      } else {
        this.bubbleDown(index);
      }
    }
    return removed;
  }

  private lessThanParent(index: number): boolean {
    const entry = this.heap[index];
    const parent = this.heap[(index - 1) >> 1];
    if (entry === undefined || parent === undefined) return false;
    return this.compare(entry.key, parent.key) < 0;
  }

  private swap(i: number, j: number): void {
    if (i === j) return;
    const a = this.heap[i];
    const b = this.heap[j];
    if (a === undefined || b === undefined) return;

    this.heap[i] = b;
    this.heap[j] = a;
    b.position = i;
    a.position = j;
  }

  private bubbleUp(startIndex: number): void {
    let index = startIndex;
    while (index > 0 && this.lessThanParent(index)) {
      const parent = (index - 1) >> 1;
      this.swap(index, parent);
      index = parent;
    }
  }

  private bubbleDown(startIndex: number): void {
    let index = startIndex;

    while (true) {
      const left = index * 2 + 1;
      const right = left + 1;
      const entry = this.heap[index];
      const leftEntry = this.heap[left];
      if (entry === undefined || leftEntry === undefined) break;

      // Single child: compare against it. Otherwise the smaller of the two.
      let child = left;
      let childEntry = leftEntry;
      const rightEntry = this.heap[right];
      if (
        rightEntry !== undefined &&
        this.compare(rightEntry.key, leftEntry.key) < 0
      ) {
        child = right;
        childEntry = rightEntry;
      }

      if (this.compare(entry.key, childEntry.key) <= 0) break;

      this.swap(index, child);
      index = child;
    }
  }
}
