import { expect, test } from "vitest";
import { Customer } from "../src/customer.ts";
import { _composeMoves, customerLog, normalize, queueLengthHistogram, serverHistogram, type CustomerLog } from "../src/logs.ts";

test("normalize works", () => {
    expect(normalize([1, 2, 3, 4])).toEqual([0.1, 0.2, 0.3, 0.4]);
    expect(() => normalize([0, 0])).toThrow(RangeError);
});

test("customerLog keeps only the timestamps already set", () => {
    const waiting = new Customer(4, "priority", 1.25);
    expect(customerLog(waiting)).toEqual({cid: 4, cls: "priority", aT: 1.25});
    const served = new Customer(5, "regular", 2);
    served.startService(3);
    served.depart(4.5);
    expect(customerLog(served)).toEqual({cid: 5, cls: "regular", aT: 2, sT: 3, dT: 4.5});
});

test("queueLengthHistogram", () => {
    const input: CustomerLog[] = [
        {cid: 1, cls: "regular", aT: 0, sT: 2},
        {cid: 2, cls: "priority", aT: 1},
    ];
    expect(queueLengthHistogram(input)).toEqual([0, 1, 1]);
    expect(queueLengthHistogram(input, 0, 4)).toEqual([0, 3, 1]);
    expect(queueLengthHistogram(input, 0, 4, "priority")).toEqual([1, 3]);
});

test("serverHistogram splits idle and busy time", () => {
    const input: CustomerLog[] = [
        {cid: 1, cls: "regular", aT: 0, sT: 0, dT: 2},
        {cid: 2, cls: "regular", aT: 1, sT: 2, dT: 3.5},
    ];
    expect(serverHistogram(input, 0, 5)).toEqual([1.5, 3.5]);
});

test("_composeMoves simple cases", () => {
    expect(_composeMoves([
        {t:0, v:1}, {t:1, v:-1},
    ], 0)).toEqual([0, 1]);
    expect(_composeMoves([
        {t:0, v:1}, {t:1, v:-1},
        {t:2, v:1}, {t:3, v:-1},
    ], 0)).toEqual([1, 2]);
});

test("_composeMoves simple cases, with from", () => {
    expect(_composeMoves([
        {t:0, v:1}, {t:1, v:-1},
    ], 0.5)).toEqual([0, 0.5]);
    expect(_composeMoves([
        {t:0, v:1}, {t:1, v:-1},
        {t:2, v:1}, {t:3, v:-1},
    ], 2)).toEqual([0, 1]);
});

test("_composeMoves overlap", () => {
    expect(_composeMoves([
        {t:0, v:1}, {t:2, v:-1},
        {t:1, v:1}, {t:4, v:-1},
    ], 0)).toEqual([0, 3, 1]);
    expect(_composeMoves([
        {t:1, v:1}, {t:4, v:-1},
        {t:2, v:1}, {t:4, v:-1},
        {t:3, v:1}, {t:4, v:-1},
    ], 0)).toEqual([1, 1, 1, 1]);
    // same as previous, but shuffled
    expect(_composeMoves([
        {t:4, v:-1}, {t:4, v:-1},
        {t:4, v:-1}, {t:3, v:1},
        {t:2, v:1}, {t:1, v:1},
    ], 0)).toEqual([1, 1, 1, 1]);
});

test("_composeMoves overlap, with from and until", () => {
    expect(_composeMoves([
        {t:0, v:1}, {t:2, v:-1},
        {t:1, v:1}, {t:4, v:-1},
    ], 1.5)).toEqual([0, 2, 0.5]);
    expect(_composeMoves([
        {t:1, v:1}, {t:4, v:-1},
        {t:2, v:1}, {t:4, v:-1},
        {t:3, v:1}, {t:4, v:-1},
    ], 1.5, 6)).toEqual([2, 0.5, 1, 1]);
});
