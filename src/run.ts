import { ArrivalProcess } from "./arrivals.ts";
import { EventClock, type Event } from "./clock.ts";
import type { Customer, CustomerClass } from "./customer.ts";
import { parseRunConfig, type RunConfig, type RunOptions } from "./config.ts";
import { InvariantViolation } from "./errors.ts";
import { customerLog, type CustomerLog } from "./logs.ts";
import { PriorityQueue } from "./queue.ts";
import { RandomVariateSource, type VariateSource } from "./random.ts";
import { Server } from "./server.ts";
import { StatisticsCollector, type ClassStatistics } from "./stats.ts";

export type RunState = "initialized" | "running" | "completed";

export interface SimulationResult {
    meanResidenceTimePriority: number | undefined;
    meanResidenceTimeRegular: number | undefined;
}

export interface RunReport extends SimulationResult {
    config: RunConfig;
    classes: Record<CustomerClass, ClassStatistics>;
    events: number;
    finalTime: number;
}

export interface RunHooks {
    /** Replaces the seeded source built from `config.seed`. */
    variates?: VariateSource;
    /** Keep a log entry for every customer who arrived. */
    recordCustomers?: boolean;
    /** Called after each dispatched event. */
    onEvent?: (event: Event, run: SimulationRun) => void;
}

/** One independent run for a fixed configuration; owns every piece of mutable state. */
export class SimulationRun {
    readonly config: RunConfig;
    readonly clock = new EventClock();
    readonly queue = new PriorityQueue();
    readonly stats: StatisticsCollector;
    readonly server: Server;
    readonly arrivals: ArrivalProcess;

    #state: RunState = "initialized";
    #events = 0;
    #customers: Customer[] | undefined;
    #onEvent: RunHooks["onEvent"];

    constructor(options: RunOptions, hooks: RunHooks = {}) {
        this.config = parseRunConfig(options);
        const {arrivalRate, serviceRate, priorityFraction, warmup, seed} = this.config;
        const variates = hooks.variates ?? new RandomVariateSource(seed);
        this.#customers = hooks.recordCustomers ? [] : undefined;
        this.#onEvent = hooks.onEvent;
        this.stats = new StatisticsCollector(warmup);
        this.server = new Server(this.clock, this.queue, this.stats, variates, serviceRate);
        this.arrivals = new ArrivalProcess(this.clock, this.queue, this.server, this.stats, variates, arrivalRate, priorityFraction);
    }

    get state(): RunState {
        return this.#state;
    }

    get events(): number {
        return this.#events;
    }

    run(): RunReport {
        if(this.#state !== "initialized") throw new InvariantViolation(`run is already ${this.#state}`);
        this.#state = "running";
        const {horizon} = this.config;
        let next = this.clock.peek();
        while(next !== undefined && next.time <= horizon){
            const event = this.clock.advance();
            if(event === undefined) break;
            this.#dispatch(event);
            this.#events += 1;
            this.#onEvent?.(event, this);
            next = this.clock.peek();
        }
        this.clock.stopAt(horizon);
        this.#state = "completed";
        return this.result();
    }

    result(): RunReport {
        if(this.#state !== "completed") throw new InvariantViolation(`run is ${this.#state}, not completed`);
        const {meanPriority, meanRegular} = this.stats.snapshot();
        return {
            meanResidenceTimePriority: meanPriority,
            meanResidenceTimeRegular: meanRegular,
            config: this.config,
            classes: this.stats.all(),
            events: this.#events,
            finalTime: this.clock.now,
        };
    }

    /** Log of every customer who arrived, in arrival order. Empty unless `recordCustomers` was set. */
    customerLogs(): CustomerLog[] {
        return (this.#customers ?? []).map(customerLog);
    }

    #dispatch(event: Event) {
        if(event.kind === "arrival"){
            const customer = this.arrivals.arrive();
            this.#customers?.push(customer);
        }
        else {
            this.server.complete(event.customer);
        }
    }
}

export function runSimulation(
    arrivalRate: number,
    serviceRate: number,
    priorityFraction: number,
    horizonMinutes: number,
    warmupMinutes: number,
    seed: number,
): SimulationResult {
    const run = new SimulationRun({arrivalRate, serviceRate, priorityFraction, horizon: horizonMinutes, warmup: warmupMinutes, seed});
    const {meanResidenceTimePriority, meanResidenceTimeRegular} = run.run();
    return {meanResidenceTimePriority, meanResidenceTimeRegular};
}
