/*
Replicated runs.

Runs the high utilization scenario with several seeds for a few priority
fractions and checks whether the regular customers' mean residence time
differs between fractions.
*/

import { analyzeSamples, formatMean, replicate, replicationMeans } from "../../mod.ts";

const ARRIVAL_RATE = 0.95
const FRACTIONS = [0.2, 0.5, 0.8]
const SEEDS = [11, 12, 13, 14, 15, 16, 17, 18]
const SIM_TIME = 20000
const WARM_UP_TIME = 2000

const samples = FRACTIONS.map(priorityFraction => {
    const reports = replicate({arrivalRate: ARRIVAL_RATE, priorityFraction, horizon: SIM_TIME, warmup: WARM_UP_TIME}, SEEDS);
    const regular = replicationMeans(reports, "regular");
    const priority = replicationMeans(reports, "priority");
    console.log(`f=${priorityFraction}: regular ${regular.map(m => formatMean(m)).join(" ")}`);
    console.log(`f=${priorityFraction}: priority ${priority.map(m => formatMean(m)).join(" ")}`);
    return regular;
});

const outcome = analyzeSamples(samples);
if(outcome === undefined) console.log("nothing to compare");
else {
    console.log(outcome.summary);
    console.log(`${outcome.method}: p=${outcome.pValue.toPrecision(3)} ${outcome.rejected ? "(fractions differ)" : "(no significant difference)"}`);
}
