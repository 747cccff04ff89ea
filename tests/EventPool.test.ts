import { describe, expect, it } from "vitest";
import { EventPool } from "../src/EventPool";
import { Signal } from "../src/utils/Signal";

describe("EventPool", () => {
  it("hands back a released signal, cleared", () => {
    const pool = new EventPool(4);
    const first = pool.acquire();
    first.set();
    pool.release(first);

    const second = pool.acquire();
    expect(second).toBe(first);
    expect(second.isSet).toBe(false);
    expect(pool.stats()).toEqual({ idle: 0, inUse: 1, allocated: 1, reused: 1, discarded: 0 });
  });

  it("never holds more idle signals than its capacity", () => {
    const pool = new EventPool(2);
    const signals = [pool.acquire(), pool.acquire(), pool.acquire()];
    for (const signal of signals) pool.release(signal);

    expect(pool.stats()).toEqual({ idle: 2, inUse: 0, allocated: 3, reused: 0, discarded: 1 });
  });

  it("ignores double release and foreign signals", () => {
    const pool = new EventPool(4);
    const signal = pool.acquire();
    pool.release(signal);
    pool.release(signal);
    pool.release(new Signal());

    expect(pool.stats().idle).toBe(1);
  });

  it("drops a signal that still has a waiter", async () => {
    const pool = new EventPool(4);
    const signal = pool.acquire();
    const waiting = signal.wait();
    pool.release(signal);

    expect(pool.stats()).toMatchObject({ idle: 0, discarded: 1 });
    signal.set();
    await expect(waiting).resolves.toBeUndefined();
  });

  it("does not hand the same signal to two holders", () => {
    const pool = new EventPool(8);
    const held = new Set<Signal>();
    for (let i = 0; i < 5; i++) held.add(pool.acquire());
    expect(held.size).toBe(5);
  });

  it("rejects a negative capacity", () => {
    expect(() => new EventPool(-1)).toThrow(RangeError);
  });
});
