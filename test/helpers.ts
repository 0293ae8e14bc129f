import type { VariateSource } from "../src/random.ts";

/**
 * Plays back fixed durations. Once the arrival script runs out the next
 * arrival is pushed far beyond any test horizon.
 */
export class ScriptedVariates implements VariateSource {
    #interarrivals: number[];
    #services: number[];
    #uniforms: number[];

    constructor(interarrivals: number[], services: number[], uniforms: number[] = []) {
        this.#interarrivals = [...interarrivals];
        this.#services = [...services];
        this.#uniforms = [...uniforms];
    }

    nextInterarrival(_arrivalRate: number): number {
        return this.#interarrivals.shift() ?? 1e9;
    }

    nextServiceTime(_serviceRate: number): number {
        const service = this.#services.shift();
        if(service === undefined) throw new Error("service script exhausted");
        return service;
    }

    nextUniform(): number {
        return this.#uniforms.shift() ?? 0.99;
    }
}
