import { parseSweepConfig, type SweepOptions } from "./config.ts";
import { generatorSeed } from "./random.ts";
import { ConfigurationError } from "./errors.ts";
import { runSimulation } from "./run.ts";

export interface SweepRow {
    arrivalRate: number;
    priorityFraction: number;
    meanPriority: number | undefined;
    meanRegular: number | undefined;
}

export type AcceptancePolicy =
    | {kind: "mm1Multiple", multiple: number}
    | {kind: "absolute", maxRegular: number}
    | {kind: "ratio", maxRatio: number};

/** `count` evenly spaced values from `start` to `stop`, both included. */
export function fractionGrid(start: number, stop: number, count: number): number[] {
    if(!Number.isInteger(count) || count < 1) throw new ConfigurationError("count must be a positive integer", ["count"]);
    if(count === 1) return [start];
    const step = (stop - start) / (count - 1);
    return Array.from({length: count}, (_, i) => i === count - 1 ? stop : start + i * step);
}

/** Seed of the `index`-th run of a sweep, kept inside the generator's seed range. */
export function runSeed(baseSeed: number, index: number): number {
    return generatorSeed(baseSeed + index);
}

/** Runs every (arrival rate, fraction) pair, each with its own seed, rates outermost. */
export function runSweep(options: SweepOptions, onRun?: (row: SweepRow, index: number) => void): SweepRow[] {
    const config = parseSweepConfig(options);
    const rows: SweepRow[] = [];
    for(const arrivalRate of config.arrivalRates){
        for(const priorityFraction of config.fractions){
            const index = rows.length;
            const result = runSimulation(arrivalRate, config.serviceRate, priorityFraction, config.horizon, config.warmup, runSeed(config.seed, index));
            const row: SweepRow = {
                arrivalRate,
                priorityFraction,
                meanPriority: result.meanResidenceTimePriority,
                meanRegular: result.meanResidenceTimeRegular,
            };
            rows.push(row);
            onRun?.(row, index);
        }
    }
    return rows;
}

/** M/M/1 mean residence time 1/(μ-λ), undefined when the queue is unstable. */
export function mm1ResidenceTime(arrivalRate: number, serviceRate: number): number | undefined {
    return arrivalRate < serviceRate ? 1 / (serviceRate - arrivalRate) : undefined;
}

export function isAcceptable(row: SweepRow, policy: AcceptancePolicy, serviceRate: number): boolean {
    const {meanPriority, meanRegular} = row;
    if(meanPriority === undefined || meanRegular === undefined) return false;
    switch(policy.kind){
        case "mm1Multiple": {
            const baseline = mm1ResidenceTime(row.arrivalRate, serviceRate);
            return baseline !== undefined && meanRegular < policy.multiple * baseline;
        }
        case "absolute":
            return meanRegular < policy.maxRegular;
        case "ratio":
            return meanRegular / meanPriority < policy.maxRatio;
    }
}

/** Row with the largest acceptable fraction for `arrivalRate`, if any. */
export function recommendFraction(rows: SweepRow[], arrivalRate: number, policy: AcceptancePolicy, serviceRate: number): SweepRow | undefined {
    let best: SweepRow | undefined;
    for(const row of rows){
        if(row.arrivalRate !== arrivalRate || !isAcceptable(row, policy, serviceRate)) continue;
        if(best === undefined || row.priorityFraction > best.priorityFraction) best = row;
    }
    return best;
}
