import * as net from "net";
import { afterEach, describe, expect, it, vi } from "vitest";
import { LifecycleState } from "../src/enums";
import { Server, ServerDeps } from "../src/Server";
import { Application, ServerOptions } from "../src/types";
import { StartupError } from "../src/utils/HttpError";
import { FakeSocket } from "./helpers/FakeSocket";
import { pathApp, silentLogger, textResponse, tick } from "./helpers/setup";

const listeners: net.Server[] = [];

// never bound: connections are handed in directly
function idleListener(): net.Server {
  const listener = net.createServer({ pauseOnConnect: true, allowHalfOpen: true });
  listeners.push(listener);
  return listener;
}

function createServer(
  app: Application,
  options: ServerOptions = {},
  deps: ServerDeps = {}
): Server {
  return new Server(
    app,
    { dateHeader: false, logLevel: "silent", ...options },
    { logger: silentLogger, ...deps }
  );
}

function gatedApp(): { app: Application; open: () => void } {
  let open: () => void = () => {};
  const ready = new Promise<void>((resolve) => {
    open = resolve;
  });
  const app: Application = async (request, receive, send) => {
    await ready;
    await pathApp(request, receive, send);
  };
  return { app, open };
}

afterEach(() => {
  for (const listener of listeners.splice(0)) {
    listener.removeAllListeners();
  }
});

describe("Server", () => {
  it("lets three in-flight exchanges finish on shutdown", async () => {
    const { app, open } = gatedApp();
    const shutdownHook = vi.fn(async () => {});
    const server = createServer(app, {}, { lifespan: { shutdown: shutdownHook } });
    await server.start(idleListener());

    const sockets = [1, 2, 3].map((n) => {
      const socket = new FakeSocket();
      server.handleConnection(socket);
      socket.feed(`GET /${n} HTTP/1.1\r\n\r\n`);
      return socket;
    });

    await tick(10);
    expect(server.serverState.activeConnections).toBe(3);

    const stopping = server.stop();
    expect(server.state).toBe(LifecycleState.STOPPING);

    open();
    await stopping;

    expect(server.state).toBe(LifecycleState.STOPPED);
    expect(server.serverState.activeConnections).toBe(0);
    expect(sockets.map((socket) => socket.output)).toEqual([
      textResponse("200 OK", "/1\n", ["connection: close"]),
      textResponse("200 OK", "/2\n", ["connection: close"]),
      textResponse("200 OK", "/3\n", ["connection: close"]),
    ]);
    expect(shutdownHook).toHaveBeenCalledTimes(1);
  });

  it("closes idle keep-alive connections right away on shutdown", async () => {
    const server = createServer(pathApp);
    await server.start(idleListener());

    const socket = new FakeSocket();
    server.handleConnection(socket);
    socket.feed("GET / HTTP/1.1\r\n\r\n");
    await tick(10);

    await server.stop();

    expect(socket.output).toBe(textResponse("200 OK", "/\n"));
    expect(socket.destroyed).toBe(true);
  });

  it("force-closes connections still busy after the grace period", async () => {
    const shutdownHook = vi.fn(async () => {});
    const server = createServer(
      () => new Promise<void>(() => {}),
      { gracefulShutdownTimeoutMs: 30, disconnectGraceMs: 10 },
      { lifespan: { shutdown: shutdownHook } }
    );
    await server.start(idleListener());

    const socket = new FakeSocket();
    server.handleConnection(socket);
    socket.feed("GET / HTTP/1.1\r\n\r\n");
    await tick(10);

    await server.stop();

    expect(socket.destroyed).toBe(true);
    expect(server.serverState.activeConnections).toBe(0);
    expect(shutdownHook).toHaveBeenCalledTimes(1);
  });

  it("raises StartupError when the startup hook fails", async () => {
    const failure = new Error("database unreachable");
    const server = createServer(pathApp, {}, {
      lifespan: {
        startup: async () => {
          throw failure;
        },
      },
    });

    const starting = server.start(idleListener());
    await expect(starting).rejects.toBeInstanceOf(StartupError);
    await expect(starting).rejects.toMatchObject({ cause: failure });
    expect(server.state).toBe(LifecycleState.STOPPED);
  });

  it("raises StartupError when the startup hook hangs", async () => {
    const server = createServer(pathApp, { lifespanTimeoutMs: 20 }, {
      lifespan: { startup: () => new Promise<void>(() => {}) },
    });

    await expect(server.start(idleListener())).rejects.toThrow("Application startup timed out");
    expect(server.state).toBe(LifecycleState.STOPPED);
  });

  it("stops right away when shutdown was requested during startup", async () => {
    let finishStartup: () => void = () => {};
    const server = createServer(pathApp, {}, {
      lifespan: {
        startup: () =>
          new Promise<void>((resolve) => {
            finishStartup = resolve;
          }),
      },
    });

    const starting = server.start(idleListener());
    expect(server.state).toBe(LifecycleState.STARTING);

    server.requestShutdown();
    finishStartup();
    await starting;

    expect(server.state).toBe(LifecycleState.STOPPED);
    expect(server.shouldExit).toBe(true);
  });

  it("refuses to start twice", async () => {
    const server = createServer(pathApp);
    await server.start(idleListener());
    await expect(server.start(idleListener())).rejects.toBeInstanceOf(StartupError);
    await server.stop();
  });

  it("turns away connections before it is serving", () => {
    const server = createServer(pathApp);
    const socket = new FakeSocket();
    server.handleConnection(socket);
    expect(socket.destroyed).toBe(true);
    expect(server.serverState.activeConnections).toBe(0);
  });

  it("shuts down after the request limit", async () => {
    const server = createServer(pathApp, { limitMaxRequests: 2 });
    await server.start(idleListener());

    const socket = new FakeSocket();
    server.handleConnection(socket);
    socket.feed("GET /a HTTP/1.1\r\n\r\nGET /b HTTP/1.1\r\n\r\n");

    await vi.waitFor(() => expect(server.state).toBe(LifecycleState.STOPPED));

    expect(server.serverState.totalRequests).toBe(2);
    expect(socket.output).toBe(textResponse("200 OK", "/a\n") + textResponse("200 OK", "/b\n"));
  });

  it("stops on SIGTERM and puts the signal handlers back", async () => {
    const server = createServer(pathApp);
    const before = process.listenerCount("SIGTERM");

    const serving = server.serve(idleListener());
    await vi.waitFor(() => expect(server.state).toBe(LifecycleState.SERVING));
    expect(process.listenerCount("SIGTERM")).toBe(before + 1);

    server.handleExit("SIGTERM");
    await serving;

    expect(server.state).toBe(LifecycleState.STOPPED);
    expect(process.listenerCount("SIGTERM")).toBe(before);
  });

  it("skips the wait and the shutdown hook on a second SIGINT", async () => {
    const shutdownHook = vi.fn(async () => {});
    const server = createServer(
      () => new Promise<void>(() => {}),
      { disconnectGraceMs: 10 },
      { lifespan: { shutdown: shutdownHook } }
    );
    const serving = server.serve(idleListener());
    await vi.waitFor(() => expect(server.state).toBe(LifecycleState.SERVING));

    const socket = new FakeSocket();
    server.handleConnection(socket);
    socket.feed("GET / HTTP/1.1\r\n\r\n");
    await tick(10);

    server.handleExit("SIGINT");
    await tick(10);
    expect(server.state).toBe(LifecycleState.STOPPING);

    server.handleExit("SIGINT");
    await serving;

    expect(socket.destroyed).toBe(true);
    expect(shutdownHook).not.toHaveBeenCalled();
  });

  it("calls notify on its interval until stopped", async () => {
    const callback = vi.fn();
    const server = createServer(pathApp, { notify: { callback, intervalMs: 10 } });
    await server.start(idleListener());

    await vi.waitFor(() => expect(callback).toHaveBeenCalled());
    await server.stop();

    const calls = callback.mock.calls.length;
    await tick(30);
    expect(callback).toHaveBeenCalledTimes(calls);
  });
});
