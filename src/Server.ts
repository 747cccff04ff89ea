import * as net from "net";
import { resolveConfig } from "./config";
import { ConnectionHandler } from "./ConnectionHandler";
import { LifecycleState } from "./enums";
import { ServerState } from "./ServerState";
import {
  Application,
  LifespanHooks,
  ServerConfig,
  ServerOptions,
  TransportSocket,
} from "./types";
import { StartupError } from "./utils/HttpError";
import { createLogger, Logger } from "./utils/logger";
import { Signal } from "./utils/Signal";
import { TIMED_OUT, withTimeout } from "./utils/timeout";

const HANDLED_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

export type ServerDeps = {
  logger?: Logger;
  lifespan?: LifespanHooks;
};

/**
 * Lifecycle controller: startup hook, listening, and a shutdown that waits
 * on the last connection closing instead of polling for it.
 */
export class Server {
  readonly config: ServerConfig;
  readonly serverState: ServerState;

  private readonly app: Application;
  private readonly logger: Logger;
  private readonly lifespan: LifespanHooks;
  private readonly shutdownSignal = new Signal();
  private lifecycle = LifecycleState.NOT_STARTED;
  private listener: net.Server | null = null;
  private stopping: Promise<void> | null = null;
  private serving = false;
  private forceExit = false;
  private notifyTimer: NodeJS.Timeout | null = null;
  private detachRequestListener: (() => void) | null = null;

  constructor(app: Application, options: ServerOptions = {}, deps: ServerDeps = {}) {
    this.app = app;
    this.config = resolveConfig(options);
    this.logger = deps.logger ?? createLogger({ level: this.config.logLevel });
    this.lifespan = deps.lifespan ?? {};
    this.serverState = new ServerState({
      eventPoolCapacity: this.config.eventPoolCapacity,
      serverHeader: this.config.serverHeader,
      dateHeader: this.config.dateHeader,
      headers: this.config.headers,
    });
  }

  get state(): LifecycleState {
    return this.lifecycle;
  }

  get shouldExit(): boolean {
    return this.shutdownSignal.isSet;
  }

  address(): net.AddressInfo | string | null {
    return this.listener?.address() ?? null;
  }

  /**
   * Runs the startup hook, then listens. When `listener` is given the server
   * adopts it as is (already bound, or never bound at all) instead of
   * creating and binding its own.
   */
  async start(listener?: net.Server): Promise<void> {
    if (this.lifecycle !== LifecycleState.NOT_STARTED) {
      throw new StartupError(`Cannot start a server that is ${this.lifecycle}`);
    }
    this.lifecycle = LifecycleState.STARTING;
    this.logger.info({ pid: process.pid }, "[started_server_process]");

    await this.runStartupHook();

    this.listener =
      listener ?? net.createServer({ pauseOnConnect: true, noDelay: true, allowHalfOpen: true });
    this.listener.on("connection", (socket: net.Socket) => this.handleConnection(socket));

    if (!listener) {
      await this.listen(this.listener);
    }

    this.listener.on("error", (error: Error) => {
      this.logger.error({ err: error }, "[listener_error]");
    });

    this.watchLimits();
    this.lifecycle = LifecycleState.SERVING;

    // shutdown was requested while starting and serve() is not there to see it
    if (this.shutdownSignal.isSet && !this.serving) {
      await this.stop();
    }
  }

  /** start(), wait for a shutdown request, stop(). */
  async serve(listener?: net.Server): Promise<void> {
    this.serving = true;
    this.captureSignals();
    try {
      await this.start(listener);
      await this.shutdownSignal.wait();
      await this.stop();
    } finally {
      this.serving = false;
      this.restoreSignals();
    }
    this.logger.info({ pid: process.pid }, "[finished_server_process]");
  }

  requestShutdown(): void {
    if (this.shutdownSignal.isSet) return;
    this.shutdownSignal.set();

    // nobody is parked in serve() to act on it
    if (!this.serving && this.lifecycle === LifecycleState.SERVING) {
      this.stop().catch((error: unknown) => {
        this.logger.error({ err: error }, "[shutdown_failed]");
      });
    }
  }

  stop(): Promise<void> {
    this.stopping ??= this.shutdown();
    return this.stopping;
  }

  handleExit = (signal: NodeJS.Signals): void => {
    if (this.shutdownSignal.isSet && signal === "SIGINT") {
      this.logger.warn("[force_exit]");
      this.forceExit = true;
      for (const connection of this.serverState.connections) {
        connection.forceClose();
      }
      return;
    }
    this.logger.info({ signal }, "[shutdown_signal]");
    this.requestShutdown();
  };

  handleConnection(socket: TransportSocket): void {
    if (this.lifecycle !== LifecycleState.SERVING) {
      socket.destroy();
      return;
    }

    const handler = new ConnectionHandler({
      socket,
      app: this.app,
      state: this.serverState,
      config: this.config,
      logger: this.logger,
    });

    handler.serve().catch((error: unknown) => {
      this.logger.error({ err: error }, "[error_while_serving_client]");
    });
  }

  private async runStartupHook(): Promise<void> {
    if (!this.lifespan.startup) return;

    let result: void | typeof TIMED_OUT;
    try {
      result = await withTimeout(this.lifespan.startup(), this.config.lifespanTimeoutMs);
    } catch (error) {
      this.lifecycle = LifecycleState.STOPPED;
      this.logger.error({ err: error }, "[application_startup_failed]");
      throw new StartupError("Application startup failed", { cause: error });
    }

    if (result === TIMED_OUT) {
      this.lifecycle = LifecycleState.STOPPED;
      this.logger.error({ timeoutMs: this.config.lifespanTimeoutMs }, "[application_startup_failed]");
      throw new StartupError("Application startup timed out");
    }
  }

  private async listen(listener: net.Server): Promise<void> {
    const { host, port, backlog } = this.config;

    try {
      await new Promise<void>((resolve, reject) => {
        listener.once("error", reject);
        listener.listen({ host, port, backlog }, () => {
          listener.off("error", reject);
          resolve();
        });
      });
    } catch (error) {
      this.logger.error({ err: error, host, port }, "[listen_failed]");
      await this.runShutdownHook();
      this.lifecycle = LifecycleState.STOPPED;
      throw new StartupError(`Could not listen on ${host}:${port}`, { cause: error });
    }

    const address = listener.address();
    if (address && typeof address === "object") {
      const hostText = address.family === "IPv6" ? `[${address.address}]` : address.address;
      this.logger.info(
        { url: `http://${hostText}:${address.port}` },
        "[listening] (Press CTRL+C to quit)"
      );
    }
  }

  private watchLimits(): void {
    const { limitMaxRequests, notify } = this.config;

    if (limitMaxRequests !== null) {
      this.detachRequestListener = this.serverState.onRequestCompleted((total) => {
        if (total >= limitMaxRequests && !this.shutdownSignal.isSet) {
          this.logger.warn({ limit: limitMaxRequests }, "[max_requests_exceeded]");
          this.requestShutdown();
        }
      });
    }

    if (notify) {
      this.notifyTimer = setInterval(() => {
        Promise.resolve()
          .then(notify.callback)
          .catch((error: unknown) => {
            this.logger.error({ err: error }, "[notify_failed]");
          });
      }, notify.intervalMs);
      this.notifyTimer.unref();
    }
  }

  private async shutdown(): Promise<void> {
    if (this.lifecycle === LifecycleState.NOT_STARTED || this.lifecycle === LifecycleState.STOPPED) {
      this.lifecycle = LifecycleState.STOPPED;
      return;
    }

    this.lifecycle = LifecycleState.STOPPING;
    this.shutdownSignal.set();
    this.logger.info("[shutting_down]");

    if (this.notifyTimer) {
      clearInterval(this.notifyTimer);
      this.notifyTimer = null;
    }
    this.detachRequestListener?.();
    this.detachRequestListener = null;

    const listenerClosed = this.closeListener();

    for (const connection of this.serverState.connections) {
      connection.shutdown();
    }

    if (this.serverState.activeConnections > 0 && !this.forceExit) {
      this.logger.info(
        { connections: this.serverState.activeConnections },
        "[waiting_for_connections]"
      );
      const drained = await withTimeout(
        this.serverState.whenIdle(),
        this.config.gracefulShutdownTimeoutMs
      );
      if (drained === TIMED_OUT) {
        this.logger.error(
          { connections: this.serverState.activeConnections },
          "[graceful_shutdown_timeout] closing remaining connections"
        );
        for (const connection of this.serverState.connections) {
          connection.forceClose();
        }
      }
    }
    await this.serverState.whenIdle();
    await listenerClosed;

    if (!this.forceExit) {
      await this.runShutdownHook();
    }

    this.lifecycle = LifecycleState.STOPPED;
  }

  private closeListener(): Promise<void> {
    const listener = this.listener;
    if (!listener || !listener.listening) return Promise.resolve();

    return new Promise<void>((resolve) => {
      listener.close((error?: Error) => {
        if (error) this.logger.warn({ err: error }, "[listener_close_failed]");
        resolve();
      });
    });
  }

  private async runShutdownHook(): Promise<void> {
    if (!this.lifespan.shutdown) return;

    try {
      const result = await withTimeout(this.lifespan.shutdown(), this.config.lifespanTimeoutMs);
      if (result === TIMED_OUT) {
        this.logger.error({ timeoutMs: this.config.lifespanTimeoutMs }, "[application_shutdown_timeout]");
      }
    } catch (error) {
      this.logger.error({ err: error }, "[application_shutdown_failed]");
    }
  }

  private captureSignals(): void {
    for (const signal of HANDLED_SIGNALS) {
      process.on(signal, this.handleExit);
    }
  }

  private restoreSignals(): void {
    for (const signal of HANDLED_SIGNALS) {
      process.off(signal, this.handleExit);
    }
  }
}
