import { describe, expect, it } from "vitest";
import { EventPool } from "../src/EventPool";
import { FlowControlManager } from "../src/FlowControlManager";
import { ClientDisconnectedError, ConfigError } from "../src/utils/HttpError";

function manager(pool = new EventPool(10)): FlowControlManager {
  return new FlowControlManager(pool, { highWaterMark: 100, lowWaterMark: 20 });
}

describe("FlowControlManager", () => {
  it("pauses above the high mark and resumes at the low mark", () => {
    const flow = manager();
    flow.bytesQueued(100);
    expect(flow.isPaused).toBe(false);

    flow.bytesQueued(1);
    expect(flow.isPaused).toBe(true);

    flow.bytesFlushed(60);
    expect(flow.isPaused).toBe(true);

    flow.bytesFlushed(21);
    expect(flow.bufferedBytes).toBe(20);
    expect(flow.isPaused).toBe(false);
    expect(flow.stats()).toEqual({ pauses: 1, resumes: 1 });
  });

  it("counts one pause per episode however often it is asked", () => {
    const flow = manager();
    flow.pause();
    flow.pause();
    flow.resume();
    flow.resume();
    expect(flow.stats()).toEqual({ pauses: 1, resumes: 1 });
  });

  it("holds drain() until the buffer falls to the low mark", async () => {
    const flow = manager();
    flow.bytesQueued(150);

    let drained = false;
    const waiting = flow.drain().then(() => {
      drained = true;
    });
    await Promise.resolve();
    expect(drained).toBe(false);

    flow.bytesFlushed(130);
    await waiting;
    expect(drained).toBe(true);
  });

  it("fails pending drains once closed", async () => {
    const flow = manager();
    flow.bytesQueued(150);
    const waiting = flow.drain();

    flow.close();
    await expect(waiting).rejects.toBeInstanceOf(ClientDisconnectedError);
    await expect(flow.resumed()).resolves.toBe(false);
  });

  it("resolves waitFlushed when every queued byte is out", async () => {
    const flow = manager();
    flow.bytesQueued(10);
    const waiting = flow.waitFlushed();
    flow.bytesFlushed(10);
    await expect(waiting).resolves.toBeUndefined();
  });

  it("returns its signals to the pool", () => {
    const pool = new EventPool(10);
    const flow = manager(pool);
    flow.bytesQueued(101);
    flow.bytesFlushed(101);
    flow.bytesQueued(101);

    expect(pool.stats()).toMatchObject({ allocated: 1, reused: 1, inUse: 1 });
  });

  it("rejects a low mark that is not below the high mark", () => {
    expect(
      () => new FlowControlManager(new EventPool(), { highWaterMark: 10, lowWaterMark: 10 })
    ).toThrow(ConfigError);
  });
});
