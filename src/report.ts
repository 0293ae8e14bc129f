import { writeFileSync } from "node:fs";
import type { SweepRow } from "./sweep.ts";

export function formatMean(mean: number | undefined, digits = 2): string {
    return mean === undefined ? "N/A" : mean.toFixed(digits);
}

export function formatRatio(regular: number | undefined, priority: number | undefined): string {
    if(regular === undefined || priority === undefined || priority === 0) return "N/A";
    return (regular / priority).toFixed(2);
}

export function formatRecommendation(arrivalRate: number, row: SweepRow | undefined): string[] {
    const lines = [`Results for λ=${arrivalRate}:`];
    if(row === undefined){
        lines.push("No good operating point found under the criteria.");
        return lines;
    }
    lines.push(
        `Recommended priority fraction: ${row.priorityFraction.toFixed(2)}`,
        `  - Priority residence time: ${formatMean(row.meanPriority)} minutes`,
        `  - Regular residence time: ${formatMean(row.meanRegular)} minutes`,
        `  - Regular/Priority time ratio: ${formatRatio(row.meanRegular, row.meanPriority)}`,
    );
    return lines;
}

const CSV_HEADER = "arrivalRate,priorityFraction,meanPriority,meanRegular";

/** Undefined means are written as empty cells. */
export function toCsv(rows: SweepRow[]): string {
    const cell = (v: number | undefined) => v === undefined ? "" : String(v);
    return [CSV_HEADER, ...rows.map(r => [r.arrivalRate, r.priorityFraction, r.meanPriority, r.meanRegular].map(cell).join(","))].join("\n");
}

export function writeResultsSync(rows: SweepRow[], fname: string) {
    writeFileSync(fname, toCsv(rows) + "\n");
}
