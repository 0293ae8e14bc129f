import { z } from "zod";
import { ConfigurationError } from "./errors.ts";

export const SERVICE_RATE = 1.0;    // customers per minute
export const HORIZON = 50000;       // simulated minutes
export const WARMUP = 5000;         // minutes excluded from statistics
export const SEED = 42;

// largest Mersenne Twister seed; other integers are wrapped onto [1, MAX_SEED]
export const MAX_SEED = 0xffffffff;

const rate = (name: string) => z.number().finite(`${name} must be finite`).positive(`${name} must be positive`);
const seed = z.number().int("seed must be an integer").safe("seed must be a safe integer");

export const RunConfigSchema = z.object({
    arrivalRate: rate("arrivalRate"),
    serviceRate: rate("serviceRate").default(SERVICE_RATE),
    priorityFraction: z.number().min(0, "priorityFraction must be >= 0").lt(1, "priorityFraction must be < 1"),
    horizon: rate("horizon").default(HORIZON),
    warmup: z.number().finite().min(0, "warmup must be >= 0").default(WARMUP),
    seed: seed.default(SEED),
}).refine(
    (c) => c.warmup < c.horizon,
    {message: "warmup must be < horizon", path: ["warmup"]},
);

export const SweepConfigSchema = z.object({
    arrivalRates: z.array(rate("arrivalRate")).min(1, "at least one arrival rate is required"),
    fractions: z.array(z.number().min(0).lt(1, "fractions must be < 1")).min(1, "at least one fraction is required"),
    serviceRate: rate("serviceRate").default(SERVICE_RATE),
    horizon: rate("horizon").default(HORIZON),
    warmup: z.number().finite().min(0, "warmup must be >= 0").default(WARMUP),
    seed: seed.default(SEED),
}).refine(
    (c) => c.warmup < c.horizon,
    {message: "warmup must be < horizon", path: ["warmup"]},
);

export type RunConfig = Readonly<z.output<typeof RunConfigSchema>>;
export type RunOptions = z.input<typeof RunConfigSchema>;
export type SweepConfig = Readonly<z.output<typeof SweepConfigSchema>>;
export type SweepOptions = z.input<typeof SweepConfigSchema>;

export function parseRunConfig(input: RunOptions): RunConfig {
    return parse(RunConfigSchema, input);
}

export function parseSweepConfig(input: SweepOptions): SweepConfig {
    return parse(SweepConfigSchema, input);
}

function parse<S extends z.ZodTypeAny>(schema: S, input: z.input<S>): z.output<S> {
    const parsed = schema.safeParse(input);
    if(!parsed.success) {
        const issues = parsed.error.issues;
        const fields = issues.map(issue => issue.path.join("."));
        const message = issues.map(issue => `${issue.path.join(".") || "config"}: ${issue.message}`).join("; ");
        throw new ConfigurationError(message, fields);
    }
    return parsed.data;
}
