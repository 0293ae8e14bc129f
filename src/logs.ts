import type { Customer, CustomerClass } from "./customer.ts";

export interface CustomerLog {
    cid: number,        // customer id
    cls: CustomerClass, // customer class
    aT: number,         // arrival timestamp
    sT?: number,        // service start timestamp
    dT?: number,        // departure timestamp
}

export function customerLog(customer: Customer): CustomerLog {
    const log: CustomerLog = {cid: customer.id, cls: customer.customerClass, aT: customer.arrivalTime};
    if(customer.serviceStartTime !== undefined) log.sT = customer.serviceStartTime;
    if(customer.departureTime !== undefined) log.dT = customer.departureTime;
    return log;
}

export function normalize(x: number[]): number[] {
    const total = x.reduce((p, c) => p + c, 0);
    if(total === 0) throw new RangeError("Cannot normalize if the sum is zero");
    return x.map(v => v / total);
}

/**
 * Time spent at each waiting-line length after `from`: entry `n` is the
 * simulated time during which exactly `n` customers were waiting.
 * Pass `until` (usually the horizon) to account for the tail after the last change.
 */
export function queueLengthHistogram(log: CustomerLog[], from = 0, until?: number, cls?: CustomerClass): number[] {
    const moves: {t: number, v: number}[] = [];
    for(const c of log){
        if(cls !== undefined && c.cls !== cls) continue;
        moves.push({t: c.aT, v: 1});
        if(c.sT !== undefined) moves.push({t: c.sT, v: -1});
    }
    return _composeMoves(moves, from, until);
}

/** Entry 0 is idle time, entry 1 busy time. */
export function serverHistogram(log: CustomerLog[], from = 0, until?: number): number[] {
    const moves: {t: number, v: number}[] = [];
    for(const c of log){
        if(c.sT !== undefined) moves.push({t: c.sT, v: 1});
        if(c.dT !== undefined) moves.push({t: c.dT, v: -1});
    }
    return _composeMoves(moves, from, until);
}

export function _composeMoves(moves: {t: number, v: number}[], from: number, until?: number): number[] {
    const cumul: number[] = [];
    const add = (level: number, time: number) => {
        while(cumul.length <= level) cumul.push(0);
        cumul[level] += time;
    };
    moves.sort((a, b) => a.t - b.t);
    let ct = 0, cv = 0;
    for(const {t, v} of moves){
        if(t > from) add(cv, t - Math.max(ct, from));
        ct = t; cv += v;
    }
    if(until !== undefined && until > Math.max(ct, from)) add(cv, until - Math.max(ct, from));
    return cumul;
}
