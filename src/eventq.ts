// Copyright 2018-2024 the Deno authors. All rights reserved. MIT license.

// Modified version of @std/data-structures@^0.221.0
// Min-heap ordered by a caller-supplied comparator; equal elements
// come out in no particular order, so callers needing stability
// must encode it in the comparator.

/** Compares its two arguments for ascending order using JavaScript's built in comparison operators. */
export function ascend<T>(a: T, b: T): -1 | 0 | 1 {
  return a < b ? -1 : a > b ? 1 : 0;
}

function getParentIndex(index: number) {
  return Math.floor((index + 1) / 2) - 1;
}

export class BinaryHeap<T> implements Iterable<T> {
  #data: T[] = [];

  constructor(private compare: (a: T, b: T) => number) {}

  get length(): number {
    return this.#data.length;
  }

  /** Smallest value, or undefined if empty. */
  peek(): T | undefined {
    return this.#data[0];
  }

  /** Removes and returns the smallest value, or undefined if empty. */
  pop(): T | undefined {
    const size = this.#data.length - 1;
    if (size < 0) return undefined;
    this.#swap(0, size);
    const first = this.#data.pop();
    this.#siftDown(0);
    return first;
  }

  push(...values: T[]): number {
    for (const value of values) {
      this.#data.push(value);
      this.#siftUp(this.#data.length - 1);
    }
    return this.#data.length;
  }

  isEmpty(): boolean {
    return this.#data.length === 0;
  }

  /** Pops values in ascending order until empty. */
  *drain(): IterableIterator<T> {
    let value = this.pop();
    while (value !== undefined) {
      yield value;
      value = this.pop();
    }
  }

  *[Symbol.iterator](): IterableIterator<T> {
    yield* this.drain();
  }

  #siftUp(index: number) {
    let parent = getParentIndex(index);
    while (index > 0 && this.#less(index, parent)) {
      this.#swap(parent, index);
      index = parent;
      parent = getParentIndex(index);
    }
  }

  #siftDown(index: number) {
    const size = this.#data.length;
    let parent = index;
    let left = 2 * parent + 1;
    while (left < size) {
      const right = left + 1;
      const child = right < size && this.#less(right, left) ? right : left;
      if (!this.#less(child, parent)) break;
      this.#swap(parent, child);
      parent = child;
      left = 2 * parent + 1;
    }
  }

  #less(a: number, b: number): boolean {
    return this.compare(this.#at(a), this.#at(b)) < 0;
  }

  #at(index: number): T {
    const value = this.#data[index];
    if (value === undefined) throw new RangeError(`heap index ${index} out of range`);
    return value;
  }

  #swap(a: number, b: number) {
    const aValue = this.#at(a);
    this.#data[a] = this.#at(b);
    this.#data[b] = aValue;
  }
}
