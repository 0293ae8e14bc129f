export type { CustomerClass } from "./src/customer.ts";
export type { Event, ArrivalEvent, DepartureEvent } from "./src/clock.ts";
export type { VariateSource, Uniform } from "./src/random.ts";
export type { ClassStatistics, ResidenceSnapshot } from "./src/stats.ts";
export type { RunState, SimulationResult, RunReport, RunHooks } from "./src/run.ts";
export type { RunConfig, RunOptions, SweepConfig, SweepOptions } from "./src/config.ts";
export type { CustomerLog } from "./src/logs.ts";
export type { SweepRow, AcceptancePolicy } from "./src/sweep.ts";
export type { ResidencePoint } from "./src/vega.ts";
export type { TestOutcome } from "./src/analysis.ts";

export { Customer } from "./src/customer.ts";
export { EventClock, compareEvents } from "./src/clock.ts";
export { RandomVariateSource, expovariate, generatorSeed, positiveExpovariate } from "./src/random.ts";
export { PriorityQueue } from "./src/queue.ts";
export { Server } from "./src/server.ts";
export { ArrivalProcess } from "./src/arrivals.ts";
export { StatisticsCollector } from "./src/stats.ts";
export { SimulationRun, runSimulation } from "./src/run.ts";
export { ConfigurationError, InvariantViolation } from "./src/errors.ts";

export {
    RunConfigSchema,
    SweepConfigSchema,
    parseRunConfig,
    parseSweepConfig,
    SERVICE_RATE,
    HORIZON,
    WARMUP,
    SEED,
} from "./src/config.ts";

export {
    fractionGrid,
    runSweep,
    runSeed,
    mm1ResidenceTime,
    isAcceptable,
    recommendFraction,
} from "./src/sweep.ts";

export {
    formatMean,
    formatRatio,
    formatRecommendation,
    toCsv,
    writeResultsSync,
} from "./src/report.ts";

export {
    customerLog,
    normalize,
    queueLengthHistogram,
    serverHistogram,
} from "./src/logs.ts";

export {
    residenceSeries,
    residenceChart,
    chart,
    vconcat,
    hconcat,
} from "./src/vega.ts";

export {replicate, replicationMeans, analyzeSamples} from "./src/analysis.ts";
