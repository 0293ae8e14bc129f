import { expect, test } from "vitest";
import type { SweepRow } from "../src/sweep.ts";
import { chart, hconcat, residenceChart, residenceSeries, vconcat } from "../src/vega.ts";

const rows: SweepRow[] = [
    {arrivalRate: 0.5, priorityFraction: 0, meanPriority: undefined, meanRegular: 1.9},
    {arrivalRate: 0.5, priorityFraction: 0.5, meanPriority: 1.6, meanRegular: 2.3},
    {arrivalRate: 0.95, priorityFraction: 0.5, meanPriority: 2.8, meanRegular: 58},
];

test("residenceSeries keeps one arrival rate and skips missing means", () => {
    expect(residenceSeries(rows, 0.5)).toEqual([
        {fraction: 0, cls: "regular", residence: 1.9},
        {fraction: 0.5, cls: "priority", residence: 1.6},
        {fraction: 0.5, cls: "regular", residence: 2.3},
    ]);
});

test("residenceChart draws the M/M/1 baseline for a stable queue", () => {
    expect(residenceChart(rows, 0.5, 1)).toMatchObject({
        title: {text: "Residence Times vs. Priority Fraction (λ=0.5)", subtitle: "M/M/1 Time: 2.00"},
        layer: [
            {data: {values: residenceSeries(rows, 0.5)}, mark: {type: "line"}},
            {data: {values: [{baseline: 2}]}, mark: {type: "rule"}},
        ],
    });
});

test("residenceChart without baseline and with a clamped axis", () => {
    expect(residenceChart(rows, 1, 1, 100)).toMatchObject({
        title: {subtitle: "M/M/1 baseline undefined"},
        layer: [{encoding: {y: {field: "residence", scale: {domain: [0, 100], clamp: true}}}}],
    });
});

test("Composition helpers", () => {
    const a = {mark: "line"};
    const b = {mark: "bar"};
    expect(chart(a, b)).toEqual({"$schema": "https://vega.github.io/schema/vega-lite/v5.json", vconcat: [a, b]});
    expect(vconcat(a)).toEqual({vconcat: [a]});
    expect(hconcat(a, b)).toEqual({hconcat: [a, b]});
});
