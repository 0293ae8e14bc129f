import ttest2 from "@stdlib/stats-ttest2";
import anova1 from "@stdlib/stats-anova1";
import type { RunOptions } from "./config.ts";
import { SimulationRun, type RunReport } from "./run.ts";

export interface TestOutcome {
    method: string;
    pValue: number;
    rejected: boolean;
    /** Human-readable table produced by the test. */
    summary: string;
}

/** One run per seed; every other parameter is shared. */
export function replicate(options: Omit<RunOptions, "seed">, seeds: number[]): RunReport[] {
    return seeds.map(seed => new SimulationRun({...options, seed}).run());
}

/** Per-seed means of one class; replications without samples are left out. */
export function replicationMeans(reports: RunReport[], cls: "priority" | "regular"): number[] {
    const means: number[] = [];
    for(const r of reports){
        const mean = cls === "priority" ? r.meanResidenceTimePriority : r.meanResidenceTimeRegular;
        if(mean !== undefined) means.push(mean);
    }
    return means;
}

/**
 * Compares groups of replicated means: two-sample t-test for two
 * groups, one-way ANOVA for more. Nothing to compare below two groups.
 */
export function analyzeSamples(samples: number[][], alpha = 0.05): TestOutcome | undefined {
    if(samples.length < 2) return undefined;
    if(samples.length === 2){
        const t = ttest2(samples[0], samples[1], {alpha});
        return {method: t.method, pValue: t.pValue, rejected: t.rejected, summary: t.print()};
    }
    const titles = samples.map((_, i) => `Scenario ${i+1}`);
    const obs = samples.flat();
    const lbl = samples.flatMap((s, i) => s.map(() => titles[i]));
    const a = anova1(obs, lbl, {alpha});
    return {method: a.method, pValue: a.pValue, rejected: a.rejected, summary: a.print()};
}
