import type { Customer, CustomerClass } from "./customer.ts";
import { InvariantViolation } from "./errors.ts";

export interface ClassStatistics {
    /** All arrivals during the run, warm-up included. */
    arrivals: number;
    /** Departures after the warm-up boundary. */
    completed: number;
    totalResidenceTime: number;
    meanResidenceTime: number | undefined;
    maxResidenceTime: number | undefined;
    totalWaitingTime: number;
    meanWaitingTime: number | undefined;
}

export interface ResidenceSnapshot {
    meanPriority: number | undefined;
    meanRegular: number | undefined;
}

type Accumulator = {arrivals: number, completed: number, residence: number, waiting: number, max: number};

export class StatisticsCollector {
    readonly warmup: number;
    #acc: Record<CustomerClass, Accumulator> = {
        priority: {arrivals: 0, completed: 0, residence: 0, waiting: 0, max: 0},
        regular: {arrivals: 0, completed: 0, residence: 0, waiting: 0, max: 0},
    };

    constructor(warmup: number) {
        this.warmup = warmup;
    }

    recordArrival(customer: Customer) {
        this.#acc[customer.customerClass].arrivals += 1;
    }

    /** Counts a departed customer, unless it left at or before the warm-up boundary. */
    record(customer: Customer) {
        const {departureTime, residenceTime, waitingTime} = customer;
        if(departureTime === undefined || residenceTime === undefined || waitingTime === undefined) {
            throw new InvariantViolation(`customer ${customer.id} recorded before departure`);
        }
        if(departureTime <= this.warmup) return;
        const acc = this.#acc[customer.customerClass];
        acc.completed += 1;
        acc.residence += residenceTime;
        acc.waiting += waitingTime;
        acc.max = Math.max(acc.max, residenceTime);
    }

    snapshot(): ResidenceSnapshot {
        return {
            meanPriority: this.classStatistics("priority").meanResidenceTime,
            meanRegular: this.classStatistics("regular").meanResidenceTime,
        };
    }

    classStatistics(customerClass: CustomerClass): ClassStatistics {
        const acc = this.#acc[customerClass];
        const sampled = acc.completed > 0;
        return {
            arrivals: acc.arrivals,
            completed: acc.completed,
            totalResidenceTime: acc.residence,
            meanResidenceTime: sampled ? acc.residence / acc.completed : undefined,
            maxResidenceTime: sampled ? acc.max : undefined,
            totalWaitingTime: acc.waiting,
            meanWaitingTime: sampled ? acc.waiting / acc.completed : undefined,
        };
    }

    all(): Record<CustomerClass, ClassStatistics> {
        return {priority: this.classStatistics("priority"), regular: this.classStatistics("regular")};
    }
}
