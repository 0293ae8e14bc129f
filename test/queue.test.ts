import { expect, test } from "vitest";
import { Customer } from "../src/customer.ts";
import { PriorityQueue } from "../src/queue.ts";

test("Priority customers leave first, FCFS within each class", () => {
    const queue = new PriorityQueue();
    const r1 = new Customer(1, "regular", 0);
    const r2 = new Customer(2, "regular", 1);
    const p3 = new Customer(3, "priority", 2);
    const p4 = new Customer(4, "priority", 3);
    [r1, r2, p3, p4].forEach(c => queue.enqueue(c));
    expect(queue.length).toBe(4);
    expect(queue.lengthOf("priority")).toBe(2);
    expect(queue.lengthOf("regular")).toBe(2);
    const order: number[] = [];
    for(let c = queue.dequeueNext(); c !== undefined; c = queue.dequeueNext()) order.push(c.id);
    expect(order).toEqual([3, 4, 1, 2]);
    expect(queue.isEmpty()).toBe(true);
    expect(queue.dequeueNext()).toBeUndefined();
});

test("Waiting snapshots list each class head first", () => {
    const queue = new PriorityQueue();
    queue.enqueue(new Customer(1, "regular", 0));
    queue.enqueue(new Customer(2, "priority", 1));
    queue.enqueue(new Customer(3, "regular", 2));
    expect(queue.waiting("regular").map(c => c.id)).toEqual([1, 3]);
    expect(queue.waiting("priority").map(c => c.id)).toEqual([2]);
    queue.waiting("regular").pop();
    expect(queue.lengthOf("regular")).toBe(2);
});
