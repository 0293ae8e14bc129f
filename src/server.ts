import type { EventClock } from "./clock.ts";
import type { Customer } from "./customer.ts";
import { InvariantViolation } from "./errors.ts";
import type { PriorityQueue } from "./queue.ts";
import type { VariateSource } from "./random.ts";
import type { StatisticsCollector } from "./stats.ts";

/** Single non-preemptive, work-conserving server. */
export class Server {
    #current: Customer | undefined;

    constructor(
        private readonly clock: EventClock,
        private readonly queue: PriorityQueue,
        private readonly stats: StatisticsCollector,
        private readonly variates: VariateSource,
        readonly serviceRate: number,
    ) {}

    get busy(): boolean {
        return this.#current !== undefined;
    }

    get currentCustomer(): Customer | undefined {
        return this.#current;
    }

    /** Starts serving the next waiting customer if idle. Returns the customer taken into service. */
    tryServe(): Customer | undefined {
        if(this.busy) return;
        const customer = this.queue.dequeueNext();
        if(customer === undefined) return;
        const now = this.clock.now;
        customer.startService(now);
        this.#current = customer;
        this.clock.scheduleDeparture(now + this.variates.nextServiceTime(this.serviceRate), customer);
        return customer;
    }

    complete(customer: Customer) {
        if(this.#current !== customer) throw new InvariantViolation(`customer ${customer.id} is not in service`);
        customer.depart(this.clock.now);
        this.stats.record(customer);
        this.#current = undefined;
        this.tryServe();
    }
}
