import { BinaryHeap, ascend } from "./eventq.ts";
import type { Customer } from "./customer.ts";
import { InvariantViolation } from "./errors.ts";

export type ArrivalEvent = {kind: "arrival", time: number, seq: number};
export type DepartureEvent = {kind: "departure", time: number, seq: number, customer: Customer};
export type Event = ArrivalEvent | DepartureEvent;

// a departing customer frees the server before a simultaneous arrival is considered
const KIND_ORDER: Record<Event["kind"], number> = {departure: 0, arrival: 1};

export function compareEvents(a: Event, b: Event): number {
    return ascend(a.time, b.time) || ascend(KIND_ORDER[a.kind], KIND_ORDER[b.kind]) || ascend(a.seq, b.seq);
}

/** Simulated time and the time-ordered pending events. */
export class EventClock {
    #now: number;
    #seq = 0;
    #pending = new BinaryHeap<Event>(compareEvents);

    constructor(start = 0) {
        this.#now = start;
    }

    get now(): number {
        return this.#now;
    }

    get pending(): number {
        return this.#pending.length;
    }

    scheduleArrival(time: number): ArrivalEvent {
        const event: ArrivalEvent = {kind: "arrival", time: this.#check(time), seq: this.#seq++};
        this.#pending.push(event);
        return event;
    }

    scheduleDeparture(time: number, customer: Customer): DepartureEvent {
        const event: DepartureEvent = {kind: "departure", time: this.#check(time), seq: this.#seq++, customer};
        this.#pending.push(event);
        return event;
    }

    peek(): Event | undefined {
        return this.#pending.peek();
    }

    /** Removes the earliest pending event and moves the clock to its time. */
    advance(): Event | undefined {
        const event = this.#pending.pop();
        if(event !== undefined) this.#now = event.time;
        return event;
    }

    /** Moves the clock forward without processing anything. */
    stopAt(time: number) {
        this.#now = this.#check(time);
    }

    #check(time: number): number {
        if(!(time >= this.#now)) throw new InvariantViolation(`cannot schedule at ${time}, clock is at ${this.#now}`);
        return time;
    }
}
