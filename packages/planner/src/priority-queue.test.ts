import { describe, it, expect } from "vitest";
import { PriorityQueue } from "./priority-queue.js";

describe("PriorityQueue", () => {
  it("pops in comparator order", () => {
    const queue = new PriorityQueue<number>((a, b) => a - b);
    for (const n of [5, 1, 4, 2, 3, 0]) queue.push(n);
    const out: number[] = [];
    for (let n = queue.pop(); n !== undefined; n = queue.pop()) out.push(n);
    expect(out).toEqual([0, 1, 2, 3, 4, 5]);
  });

  it("breaks ties with a secondary key", () => {
    const queue = new PriorityQueue<{ p: number; seq: number }>((a, b) => a.p - b.p || a.seq - b.seq);
    queue.push({ p: 1, seq: 2 });
    queue.push({ p: 1, seq: 0 });
    queue.push({ p: 0, seq: 3 });
    queue.push({ p: 1, seq: 1 });
    expect([queue.pop(), queue.pop(), queue.pop(), queue.pop()].map((e) => e?.seq)).toEqual([3, 0, 1, 2]);
  });

  it("reports size and peeks without removing", () => {
    const queue = new PriorityQueue<string>((a, b) => a.localeCompare(b));
    expect(queue.pop()).toBeUndefined();
    queue.push("b");
    queue.push("a");
    expect(queue.peek()).toBe("a");
    expect(queue.size).toBe(2);
  });
});
