import type { CustomerClass } from "./customer.ts";
import { mm1ResidenceTime, type SweepRow } from "./sweep.ts";

const SCHEMA = "https://vega.github.io/schema/vega-lite/v5.json";

export interface ResidencePoint {
    fraction: number;
    cls: CustomerClass;
    residence: number;
}

/** Long-form points for one arrival rate; rows without samples for a class are skipped. */
export function residenceSeries(rows: SweepRow[], arrivalRate: number): ResidencePoint[] {
    return rows
        .filter(r => r.arrivalRate === arrivalRate)
        .flatMap(r => {
            const points: ResidencePoint[] = [];
            if(r.meanPriority !== undefined) points.push({fraction: r.priorityFraction, cls: "priority", residence: r.meanPriority});
            if(r.meanRegular !== undefined) points.push({fraction: r.priorityFraction, cls: "regular", residence: r.meanRegular});
            return points;
        });
}

/** Residence time against priority fraction, both classes, with the M/M/1 baseline when the queue is stable. */
export function residenceChart(rows: SweepRow[], arrivalRate: number, serviceRate: number, yMax?: number): object {
    const baseline = mm1ResidenceTime(arrivalRate, serviceRate);
    const y: Record<string, unknown> = {"field": "residence", "type": "quantitative", "title": "Average Residence Time (minutes)"};
    if(yMax !== undefined) y["scale"] = {"domain": [0, yMax], "clamp": true};
    const layers: object[] = [{
        "data": {"values": residenceSeries(rows, arrivalRate)},
        "mark": {"type": "line", "point": true, "tooltip": true},
        "encoding": {
            "x": {"field": "fraction", "type": "quantitative", "title": "Priority Fraction (f)"},
            y,
            "color": {"field": "cls", "type": "nominal", "title": "Customers"}
        }
    }];
    if(baseline !== undefined){
        layers.push({
            "data": {"values": [{"baseline": baseline}]},
            "mark": {"type": "rule", "strokeDash": [4, 4], "color": "green"},
            "encoding": {"y": {"field": "baseline", "type": "quantitative"}}
        });
    }
    return {
        "title": {
            "text": `Residence Times vs. Priority Fraction (λ=${arrivalRate})`,
            "subtitle": baseline === undefined ? "M/M/1 baseline undefined" : `M/M/1 Time: ${baseline.toFixed(2)}`
        },
        "width": 600,
        "layer": layers
    };
}

export function chart(...charts: object[]): object {
    return {
        "$schema": SCHEMA,
        "vconcat": charts
    };
}

export function vconcat(...charts: object[]): object {
    return {
        "vconcat": charts
    };
}

export function hconcat(...charts: object[]): object {
    return {
        "hconcat": charts
    };
}
