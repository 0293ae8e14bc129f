import Denque from "denque";
import type { Customer, CustomerClass } from "./customer.ts";

/**
 * Waiting line with strict class precedence: priority customers are
 * always dequeued before regular ones, FCFS within each class.
 */
export class PriorityQueue {
    #q: Record<CustomerClass, Denque<Customer>> = {
        priority: new Denque<Customer>(),
        regular: new Denque<Customer>(),
    };

    enqueue(customer: Customer) {
        this.#q[customer.customerClass].push(customer);
    }

    dequeueNext(): Customer | undefined {
        return this.#q.priority.shift() ?? this.#q.regular.shift();
    }

    get length(): number {
        return this.#q.priority.length + this.#q.regular.length;
    }

    lengthOf(customerClass: CustomerClass): number {
        return this.#q[customerClass].length;
    }

    isEmpty(): boolean {
        return this.length === 0;
    }

    /** Snapshot of one class's line, head first. */
    waiting(customerClass: CustomerClass): Customer[] {
        return this.#q[customerClass].toArray();
    }
}
