import { describe, it, expect } from "vitest";
import { PriorityQueue } from "./priority-queue.js";

function drain<T>(queue: PriorityQueue<T>): T[] {
  const out: T[] = [];
  for (let item = queue.pop(); item !== undefined; item = queue.pop()) out.push(item);
  return out;
}

describe("PriorityQueue", () => {
  it("pops in ascending priority order", () => {
    const queue = new PriorityQueue<number>((n) => n);
    for (const n of [5, 1, 4, 2, 3, 0.5]) queue.push(n);

    expect(drain(queue)).toEqual([0.5, 1, 2, 3, 4, 5]);
  });

  it("returns undefined when empty", () => {
    const queue = new PriorityQueue<number>((n) => n);
    expect(queue.pop()).toBeUndefined();
    expect(queue.peek()).toBeUndefined();
    expect(queue.isEmpty()).toBe(true);
  });

  it("keeps every item with an equal priority", () => {
    const queue = new PriorityQueue<{ id: string; distance: number }>((e) => e.distance);
    queue.push({ id: "a", distance: 2 });
    queue.push({ id: "b", distance: 1 });
    queue.push({ id: "c", distance: 2 });
    queue.push({ id: "d", distance: 1 });

    const popped = drain(queue);
    expect(popped.map((e) => e.distance)).toEqual([1, 1, 2, 2]);
    expect(popped.map((e) => e.id).sort()).toEqual(["a", "b", "c", "d"]);
  });

  it("peeks without removing", () => {
    const queue = new PriorityQueue<number>((n) => n);
    queue.push(3);
    queue.push(1);

    expect(queue.peek()).toBe(1);
    expect(queue.size).toBe(2);
  });

  it("stays ordered when pushes and pops interleave", () => {
    const queue = new PriorityQueue<number>((n) => n);
    queue.push(10);
    queue.push(4);
    expect(queue.pop()).toBe(4);
    queue.push(7);
    queue.push(1);
    queue.push(12);
    expect(queue.pop()).toBe(1);
    expect(drain(queue)).toEqual([7, 10, 12]);
  });

  it("clear empties the queue", () => {
    const queue = new PriorityQueue<number>((n) => n);
    queue.push(1);
    queue.push(2);
    queue.clear();

    expect(queue.size).toBe(0);
    expect(queue.pop()).toBeUndefined();
  });
});
