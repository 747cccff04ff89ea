import { describe, expect, it } from "vitest";
import { ServerState } from "../src/ServerState";

const connection = () => ({ shutdown: () => {}, forceClose: () => {} });

describe("ServerState", () => {
  it("caches the date header for the current second", () => {
    let now = Date.UTC(2024, 0, 2, 3, 4, 5, 100);
    const state = new ServerState({ now: () => now });

    expect(state.currentDateHeader()).toBe("Tue, 02 Jan 2024 03:04:05 GMT");
    now += 800;
    expect(state.currentDateHeader()).toBe("Tue, 02 Jan 2024 03:04:05 GMT");
    now += 200;
    expect(state.currentDateHeader()).toBe("Tue, 02 Jan 2024 03:04:06 GMT");
  });

  it("builds default headers in order", () => {
    const state = new ServerState({
      now: () => Date.UTC(2024, 0, 2, 3, 4, 5),
      headers: [["x-served-by", "test"]],
    });
    expect(state.defaultHeaders()).toEqual([
      ["server", "portico"],
      ["date", "Tue, 02 Jan 2024 03:04:05 GMT"],
      ["x-served-by", "test"],
    ]);
    expect(new ServerState({ serverHeader: false, dateHeader: false }).defaultHeaders()).toEqual([]);
  });

  it("resolves whenIdle when the last connection closes", async () => {
    const state = new ServerState();
    const a = connection();
    const b = connection();
    state.connectionOpened(a);
    state.connectionOpened(b);
    expect(state.activeConnections).toBe(2);

    let idle = false;
    const waiting = state.whenIdle().then(() => {
      idle = true;
    });

    state.connectionClosed(a);
    await Promise.resolve();
    expect(idle).toBe(false);

    state.connectionClosed(b);
    await waiting;
    expect(idle).toBe(true);
    expect(state.activeConnections).toBe(0);
  });

  it("does not count a connection closed twice", () => {
    const state = new ServerState();
    const a = connection();
    state.connectionOpened(a);
    state.connectionClosed(a);
    state.connectionClosed(a);
    expect(state.activeConnections).toBe(0);
  });

  it("tells listeners the running request total", () => {
    const state = new ServerState();
    const seen: number[] = [];
    const stop = state.onRequestCompleted((total) => seen.push(total));

    state.requestCompleted();
    state.requestCompleted();
    stop();
    state.requestCompleted();

    expect(seen).toEqual([1, 2]);
    expect(state.totalRequests).toBe(3);
  });
});
