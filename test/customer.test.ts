import { expect, test } from "vitest";
import { Customer } from "../src/customer.ts";
import { InvariantViolation } from "../src/errors.ts";

test("Residence and waiting times follow the recorded timestamps", () => {
    const customer = new Customer(1, "priority", 2);
    expect(customer.residenceTime).toBeUndefined();
    expect(customer.waitingTime).toBeUndefined();
    customer.startService(3.5);
    expect(customer.waitingTime).toBe(1.5);
    expect(customer.residenceTime).toBeUndefined();
    customer.depart(6);
    expect(customer.serviceStartTime).toBe(3.5);
    expect(customer.departureTime).toBe(6);
    expect(customer.residenceTime).toBe(4);
});

test("Timestamps are set once and in order", () => {
    const early = new Customer(1, "regular", 5);
    expect(() => early.startService(4)).toThrow(InvariantViolation);
    expect(() => early.depart(6)).toThrow(InvariantViolation);

    const twice = new Customer(2, "regular", 0);
    twice.startService(1);
    expect(() => twice.startService(2)).toThrow(InvariantViolation);
    expect(() => twice.depart(0.5)).toThrow(InvariantViolation);
    twice.depart(3);
    expect(() => twice.depart(4)).toThrow(InvariantViolation);
});
