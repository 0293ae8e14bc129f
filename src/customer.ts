import { InvariantViolation } from "./errors.ts";

export type CustomerClass = "priority" | "regular";

export class Customer {
    readonly id: number;
    readonly customerClass: CustomerClass;
    readonly arrivalTime: number;
    #serviceStartTime: number | undefined;
    #departureTime: number | undefined;

    constructor(id: number, customerClass: CustomerClass, arrivalTime: number) {
        this.id = id;
        this.customerClass = customerClass;
        this.arrivalTime = arrivalTime;
    }

    get serviceStartTime(): number | undefined {
        return this.#serviceStartTime;
    }

    get departureTime(): number | undefined {
        return this.#departureTime;
    }

    /** Time from arrival to departure, once departed. */
    get residenceTime(): number | undefined {
        return this.#departureTime === undefined ? undefined : this.#departureTime - this.arrivalTime;
    }

    get waitingTime(): number | undefined {
        return this.#serviceStartTime === undefined ? undefined : this.#serviceStartTime - this.arrivalTime;
    }

    startService(time: number) {
        if(this.#serviceStartTime !== undefined) throw new InvariantViolation(`customer ${this.id} already in service`);
        if(time < this.arrivalTime) throw new InvariantViolation(`customer ${this.id} served before arrival`);
        this.#serviceStartTime = time;
    }

    depart(time: number) {
        if(this.#serviceStartTime === undefined) throw new InvariantViolation(`customer ${this.id} departs without service`);
        if(this.#departureTime !== undefined) throw new InvariantViolation(`customer ${this.id} already departed`);
        if(time < this.#serviceStartTime) throw new InvariantViolation(`customer ${this.id} departs before service start`);
        this.#departureTime = time;
    }
}
