/*
Priority fraction sweep.

Scenario:
  A single attraction serves one customer at a time. A fraction of the
  arriving customers hold a priority pass and always enter service ahead
  of regular customers, though nobody already in service is interrupted.

  For a low and a high utilization, the fraction of priority customers is
  swept from 0 to 0.95, and the largest fraction that keeps regular
  customers within 2.5 times the plain M/M/1 residence time is recommended.

Writes fastpass_results.csv and fastpass_results.vl.json to the working directory.
*/

import { writeFileSync } from "node:fs";
import {
    chart,
    formatMean,
    formatRecommendation,
    fractionGrid,
    recommendFraction,
    residenceChart,
    runSweep,
    writeResultsSync,
    type AcceptancePolicy,
} from "../../mod.ts";

const ARRIVAL_RATES = [0.5, 0.95]   // Low and high utilization
const SERVICE_RATE = 1.0            // One customer per minute
const SIM_TIME = 50000              // Simulated minutes per run
const WARM_UP_TIME = 5000           // Minutes left out of the statistics
const SEED = 42

const policy: AcceptancePolicy = {kind: "mm1Multiple", multiple: 2.5};
const fractions = fractionGrid(0, 0.95, 20);

const rows = runSweep(
    {arrivalRates: ARRIVAL_RATES, fractions, serviceRate: SERVICE_RATE, horizon: SIM_TIME, warmup: WARM_UP_TIME, seed: SEED},
    row => console.log(`λ=${row.arrivalRate} f=${row.priorityFraction.toFixed(2)}: priority ${formatMean(row.meanPriority)}, regular ${formatMean(row.meanRegular)}`),
);

for(const arrivalRate of ARRIVAL_RATES){
    console.log();
    const best = recommendFraction(rows, arrivalRate, policy, SERVICE_RATE);
    formatRecommendation(arrivalRate, best).forEach(line => console.log(line));
}

writeResultsSync(rows, "fastpass_results.csv");
const charts = ARRIVAL_RATES.map(rate => residenceChart(rows, rate, SERVICE_RATE, rate === 0.95 ? 100 : undefined));
writeFileSync("fastpass_results.vl.json", JSON.stringify(chart(...charts), null, 2));
