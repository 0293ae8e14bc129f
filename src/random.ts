import randu from "@stdlib/random-base-randu";
import { MAX_SEED } from "./config.ts";
import { InvariantViolation } from "./errors.ts";

/** Source of the random quantities a run consumes. */
export interface VariateSource {
    nextInterarrival(arrivalRate: number): number;
    nextServiceTime(serviceRate: number): number;
    /** Uniform on [0, 1), used for the class draw. */
    nextUniform(): number;
}

export type Uniform = () => number;

/**
 * Exponential durations over a seeded Mersenne Twister stream.
 * Each run owns exactly one instance.
 */
export class RandomVariateSource implements VariateSource {
    readonly seed: number;
    #random: Uniform;

    constructor(seed: number) {
        this.seed = seed;
        this.#random = randu.factory({name: "mt19937", seed: generatorSeed(seed)});
    }

    nextInterarrival(arrivalRate: number): number {
        return this.#positive(arrivalRate);
    }

    nextServiceTime(serviceRate: number): number {
        return this.#positive(serviceRate);
    }

    nextUniform(): number {
        return this.#random();
    }

    #positive(rate: number): number {
        return positiveExpovariate(rate, this.#random);
    }
}

/** Maps any integer onto the generator's seed range [1, MAX_SEED]. */
export function generatorSeed(seed: number): number {
    return ((seed % MAX_SEED) + MAX_SEED) % MAX_SEED || MAX_SEED;
}

/** Exponential draw that redraws zeros. */
export function positiveExpovariate(rate: number, random: Uniform): number {
    let duration = expovariate(rate, random);
    // only a zero uniform maps to zero
    while(duration === 0) duration = expovariate(rate, random);
    if(!(duration > 0)) throw new InvariantViolation(`non-positive duration ${duration} drawn for rate ${rate}`);
    return duration;
}

export function expovariate(lambda: number, random: Uniform = Math.random): number {
    return -Math.log(1 - random()) / lambda;
}
