// Min-heap ordering used by the A* open set

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { MinHeap } from "../pathfinding/open_set.js";

describe("MinHeap", () => {
  it("pops values in ascending order", () => {
    const heap = new MinHeap<number>((a, b) => a < b);
    for (const value of [5, 1, 4, 1, 3, 9, 2]) heap.push(value);

    const popped: number[] = [];
    while (heap.size > 0) {
      const value = heap.pop();
      if (value !== undefined) popped.push(value);
    }

    assert.deepEqual(popped, [1, 1, 2, 3, 4, 5, 9]);
    assert.equal(heap.pop(), undefined);
  });

  it("orders records with a custom comparator", () => {
    const heap = new MinHeap<{ f: number; id: string }>((a, b) => a.f < b.f);
    heap.push({ f: 3.5, id: "c" });
    heap.push({ f: 1.25, id: "a" });
    heap.push({ f: 2, id: "b" });

    assert.equal(heap.pop()?.id, "a");
    assert.equal(heap.pop()?.id, "b");
    assert.equal(heap.size, 1);
  });

  it("returns undefined once drained", () => {
    const heap = new MinHeap<number>((a, b) => a < b);
    heap.push(2);
    heap.push(1);
    assert.equal(heap.pop(), 1);
    assert.equal(heap.pop(), 2);
    assert.equal(heap.size, 0);
    assert.equal(heap.pop(), undefined);
  });
});
