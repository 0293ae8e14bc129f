import type { EventClock } from "./clock.ts";
import { Customer, type CustomerClass } from "./customer.ts";
import type { PriorityQueue } from "./queue.ts";
import type { VariateSource } from "./random.ts";
import type { Server } from "./server.ts";
import type { StatisticsCollector } from "./stats.ts";

/** Poisson arrival stream; each arrival is independently a priority customer with probability `priorityFraction`. */
export class ArrivalProcess {
    #nextId = 0;

    constructor(
        private readonly clock: EventClock,
        private readonly queue: PriorityQueue,
        private readonly server: Server,
        private readonly stats: StatisticsCollector,
        private readonly variates: VariateSource,
        readonly arrivalRate: number,
        readonly priorityFraction: number,
    ) {
        this.clock.scheduleArrival(this.clock.now + this.variates.nextInterarrival(this.arrivalRate));
    }

    arrive(): Customer {
        const now = this.clock.now;
        const customerClass: CustomerClass = this.variates.nextUniform() < this.priorityFraction ? "priority" : "regular";
        const customer = new Customer(++this.#nextId, customerClass, now);
        this.stats.recordArrival(customer);
        this.queue.enqueue(customer);
        this.clock.scheduleArrival(now + this.variates.nextInterarrival(this.arrivalRate));
        this.server.tryServe();
        return customer;
    }
}
