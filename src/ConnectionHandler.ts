import { FlowControlManager } from "./FlowControlManager";
import { BodyFraming, ConnectionEvent, ConnectionState, HttpStatusCode } from "./enums";
import { ChunkedDecoder } from "./http/chunked";
import { nextState } from "./http/connectionState";
import { encodeErrorResponse } from "./http/encoder";
import { cutMessage, PeerInfo } from "./http/parser";
import { RequestResponseCycle } from "./RequestResponseCycle";
import { ServerState } from "./ServerState";
import {
  Application,
  BodySource,
  CycleOutcome,
  DynBuf,
  RequestFraming,
  RequestHead,
  ServerConfig,
  TransportSocket,
} from "./types";
import { bufPush, bufTake, createBuf } from "./utils/DynBuf";
import { ClientDisconnectedError, HttpError } from "./utils/HttpError";
import { Logger } from "./utils/logger";
import { Signal } from "./utils/Signal";

export type ConnectionHandlerOptions = {
  socket: TransportSocket;
  app: Application;
  state: ServerState;
  config: ServerConfig;
  logger: Logger;
};

type ReadResult = "data" | "eof" | "closed" | "interrupted";

type BodyReader = BodySource & {
  readonly done: boolean;
  finished: () => Promise<void>;
  abandon: () => void;
};

type CycleEntry = {
  cycle: RequestResponseCycle;
  body: BodyReader;
  settled: Promise<void>;
};

let connectionCounter = 0;

// answers every request with 503 while the server is over its connection limit
const serviceUnavailable: Application = async (_request, _receive, send) => {
  const body = Buffer.from("Service Unavailable\n");
  await send({
    type: "start",
    status: HttpStatusCode.SERVICE_UNAVAILABLE,
    headers: [
      ["content-type", "text/plain; charset=utf-8"],
      ["content-length", String(body.length)],
      ["connection", "close"],
    ],
  });
  await send({ type: "body", data: body });
};

/**
 * Drives one accepted socket: reads request heads, runs one
 * {@link RequestResponseCycle} per request (with at most one pipelined
 * request queued behind the active one) and decides when the connection
 * closes.
 *
 * The socket stays paused unless somebody is waiting for bytes, so a slow
 * application naturally stops inbound reads.
 */
export class ConnectionHandler {
  readonly id: number;
  readonly flow: FlowControlManager;

  private readonly socket: TransportSocket;
  private readonly app: Application;
  private readonly serverState: ServerState;
  private readonly config: ServerConfig;
  private readonly logger: Logger;
  private readonly peer: PeerInfo;
  private readonly buffer: DynBuf = createBuf();
  private readonly cycles: CycleEntry[] = [];
  private readonly closedSignal = new Signal();

  private state = ConnectionState.IDLE;
  private reader: Signal | null = null;
  private ended = false;
  private error: Error | null = null;
  private closing = false;
  private shuttingDown = false;
  private failing = false;
  private readingBody: BodyReader | null = null;
  private timer: NodeJS.Timeout | null = null;

  constructor(options: ConnectionHandlerOptions) {
    this.id = ++connectionCounter;
    this.socket = options.socket;
    this.app = options.app;
    this.serverState = options.state;
    this.config = options.config;
    this.peer = {
      remoteAddress: options.socket.remoteAddress ?? null,
      remotePort: options.socket.remotePort ?? null,
    };
    this.logger = options.logger.child({
      connectionId: this.id,
      remote: `${this.peer.remoteAddress ?? "unknown"}:${this.peer.remotePort ?? 0}`,
    });
    this.flow = new FlowControlManager(options.state.eventPool, {
      highWaterMark: options.config.highWaterMark,
      lowWaterMark: options.config.lowWaterMark,
    });

    this.socket.on("data", (data: Buffer) => {
      this.socket.pause();
      if (this.closing) return;
      bufPush(this.buffer, data);
      this.wakeReader();
    });

    this.socket.on("end", () => {
      this.ended = true;
      this.wakeReader();
    });

    this.socket.on("error", (error: Error) => {
      this.logger.debug({ err: error }, "[socket_error]");
      this.error = error;
      this.wakeReader();
    });

    this.socket.on("close", () => this.onTransportClosed());

    this.socket.pause();
    this.serverState.connectionOpened(this);
    this.logger.debug("[new_connection]");
  }

  get connectionState(): ConnectionState {
    return this.state;
  }

  get pendingCycles(): number {
    return this.cycles.length;
  }

  whenClosed(): Promise<void> {
    return this.closedSignal.wait();
  }

  /**
   * Reads and answers requests until the connection is done. Never rejects:
   * every failure ends in a response or a closed socket.
   */
  async serve(): Promise<void> {
    try {
      while (!this.closing && !this.shuttingDown && !this.failing) {
        // keep at most one pipelined request waiting behind the active one
        while (this.cycles.length >= 2) {
          await this.cycles[0].settled;
        }
        if (this.closing || this.shuttingDown || this.failing) break;

        const head = await this.readHead();
        if (!head) break;

        const entry = this.startCycle(head);
        await this.consumeBody(entry);
      }

      while (this.cycles.length > 0) {
        await this.cycles[0].settled;
      }
      if (!this.failing) this.close();
    } catch (error) {
      this.handleReadFailure(error);
    }
  }

  /** Finish the exchange in flight, start no other, then close. */
  shutdown(): void {
    if (this.shuttingDown || this.closing) return;
    this.shuttingDown = true;

    const [front, ...queued] = this.cycles;
    if (!front) {
      this.close();
      return;
    }

    front.cycle.denyKeepAlive();
    for (const entry of queued) {
      entry.cycle.disconnect();
    }
    this.wakeReader();
  }

  forceClose(): void {
    this.abort("forced close");
  }

  // CycleHost

  write(data: Buffer): void {
    if (this.socket.destroyed || this.socket.writableEnded) return;

    this.flow.bytesQueued(data.length);
    this.socket.write(data, (error?: Error | null) => {
      this.flow.bytesFlushed(data.length);
      if (error) {
        this.error = error;
        this.abort("write failed");
      }
    });
  }

  responseStarted(cycle: RequestResponseCycle): void {
    if (this.cycles[0]?.cycle === cycle) {
      this.dispatch(ConnectionEvent.RESPONSE_STARTED);
    }
  }

  abort(reason: string): void {
    if (this.state === ConnectionState.CLOSED) return;
    this.logger.debug({ reason }, "[connection_aborted]");
    this.beginClosing();
    this.socket.destroy();
  }

  private startCycle(head: RequestHead): CycleEntry {
    const previous = this.cycles.length > 0 ? this.cycles[this.cycles.length - 1].settled : null;
    const body = this.bodyReader(head.framing);

    const cycle = new RequestResponseCycle({
      head,
      body,
      host: this,
      state: this.serverState,
      logger: this.logger,
      previous,
      disconnectGraceMs: this.config.disconnectGraceMs,
    });

    const entry: CycleEntry = { cycle, body, settled: Promise.resolve() };
    this.cycles.push(entry);
    if (this.cycles.length === 1) {
      this.dispatch(ConnectionEvent.HEAD_COMPLETE);
    }

    entry.settled = this.execute(entry);
    return entry;
  }

  private async execute(entry: CycleEntry): Promise<void> {
    const limit = this.config.limitConcurrency;
    const app =
      limit !== null && this.serverState.activeConnections > limit ? serviceUnavailable : this.app;

    let outcome: CycleOutcome;
    try {
      outcome = await entry.cycle.run(app);
    } catch (error) {
      this.logger.error({ err: error }, "[cycle_failed]");
      this.abort("cycle failed");
      outcome = { kind: "error", keepAlive: false, status: null, error };
    }

    this.onCycleComplete(entry, outcome);
  }

  private onCycleComplete(entry: CycleEntry, outcome: CycleOutcome): void {
    const idx = this.cycles.indexOf(entry);
    if (idx >= 0) this.cycles.splice(idx, 1);

    this.logger.debug(
      {
        method: entry.cycle.request.method,
        path: entry.cycle.request.path,
        status: outcome.status,
        outcome: outcome.kind,
      },
      "[request_done]"
    );

    // a queued exchange only ends early when it was given up on
    if (idx !== 0) return;

    this.dispatch(ConnectionEvent.RESPONSE_COMPLETE);

    if (this.closing || this.failing) return;

    if (!outcome.keepAlive || this.shuttingDown) {
      this.close();
      return;
    }

    if (this.cycles.length > 0) {
      this.dispatch(ConnectionEvent.NEXT_CYCLE);
    } else if (this.buffer.length > 0) {
      this.dispatch(ConnectionEvent.DATA_RECEIVED);
    }
    this.armTimer();
  }

  private async readHead(): Promise<RequestHead | null> {
    for (;;) {
      if (this.shuttingDown) return null;

      const head = cutMessage(this.buffer, this.config.maxHeaderBytes, this.peer);
      if (head) return head;

      if (this.buffer.length > 0) {
        this.dispatch(ConnectionEvent.DATA_RECEIVED);
      }

      const result = await this.readMore();
      if (result === "closed") return null;
      if (result === "eof") {
        if (this.buffer.length === 0 || this.error) return null;
        throw new HttpError(HttpStatusCode.BAD_REQUEST, "Unexpected EOF");
      }
    }
  }

  // the reader loop does not parse the next head until this body is consumed
  private async consumeBody(entry: CycleEntry): Promise<void> {
    if (entry.body.done) return;

    await Promise.race([entry.body.finished(), entry.settled]);

    if (entry.body.done || this.closing) return;

    // the application answered without reading everything
    let leftover = await entry.body.read();
    while (leftover !== null) {
      leftover = await entry.body.read();
    }
  }

  private async readMoreBody(body: BodyReader): Promise<void> {
    this.readingBody = body;
    let result: ReadResult;
    try {
      result = await this.readMore();
    } finally {
      this.readingBody = null;
    }

    if (result === "closed") throw new ClientDisconnectedError();
    if (result === "eof") {
      if (!this.error) {
        this.protocolError(new HttpError(HttpStatusCode.BAD_REQUEST, "Unexpected EOF"), body);
      }
      throw new ClientDisconnectedError();
    }
  }

  private bodyReader(framing: RequestFraming): BodyReader {
    const signal = this.serverState.eventPool.acquire();
    let done = false;
    let released = false;

    const settle = (): void => {
      if (released) return;
      released = true;
      signal.set();
      this.serverState.eventPool.release(signal);
    };
    const finish = (): null => {
      done = true;
      settle();
      return null;
    };

    let next: () => Buffer | null;
    if (framing.kind === BodyFraming.CHUNKED) {
      const decoder = new ChunkedDecoder();
      next = () => {
        const data = decoder.next(this.buffer);
        if (data === null && decoder.done) return finish();
        return data;
      };
    } else {
      let remain = framing.kind === BodyFraming.CONTENT_LENGTH ? framing.length : 0;
      next = () => {
        if (remain === 0) return finish();
        if (this.buffer.length === 0) return null;
        const consume = Math.min(this.buffer.length, remain);
        remain -= consume;
        return bufTake(this.buffer, consume);
      };
      if (remain === 0) finish();
    }

    const reader: BodyReader = {
      get done() {
        return done;
      },
      // a released signal may already belong to somebody else
      finished: () => (released ? Promise.resolve() : signal.wait()),
      abandon: settle,
      read: async (): Promise<Buffer | null> => {
        for (;;) {
          if (done) return null;
          // nothing more reaches the application while writes are backed up
          if (!(await this.flow.resumed())) throw new ClientDisconnectedError();
          if (this.closing || this.failing) throw new ClientDisconnectedError();

          let data: Buffer | null;
          try {
            data = next();
          } catch (error) {
            if (!(error instanceof HttpError)) throw error;
            settle();
            this.protocolError(error, reader);
            throw new ClientDisconnectedError();
          }

          if (data !== null || done) return data;
          await this.readMoreBody(reader);
        }
      },
    };
    return reader;
  }

  private async readMore(): Promise<ReadResult> {
    if (!(await this.flow.resumed()) || this.closing) return "closed";
    if (this.ended || this.error) return "eof";

    const signal = this.serverState.eventPool.acquire();
    const before = this.buffer.length;
    this.reader = signal;
    this.armTimer();
    this.socket.resume();

    await signal.wait();

    this.reader = null;
    this.serverState.eventPool.release(signal);
    this.clearTimer();

    if (this.closing || this.failing) return "closed";
    if (this.buffer.length > before) return "data";
    if (this.ended || this.error) return "eof";
    return "interrupted";
  }

  private wakeReader(): void {
    this.reader?.set();
  }

  private armTimer(): void {
    this.clearTimer();
    if (!this.reader || this.closing || this.failing) return;

    if (this.readingBody || this.state === ConnectionState.READING_REQUEST) {
      this.timer = setTimeout(() => this.onRequestTimeout(), this.config.requestTimeoutMs);
    } else if (this.state === ConnectionState.IDLE && this.buffer.length === 0) {
      this.timer = setTimeout(() => this.onKeepAliveTimeout(), this.config.keepAliveTimeoutMs);
    }
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private onKeepAliveTimeout(): void {
    this.timer = null;
    this.logger.debug("[keep_alive_timeout]");
    this.close();
  }

  private onRequestTimeout(): void {
    this.timer = null;
    this.logger.info({ timeoutMs: this.config.requestTimeoutMs }, "[request_timeout]");
    this.failRequest(
      new HttpError(HttpStatusCode.REQUEST_TIMEOUT, "Request Timeout"),
      this.readingBody ?? undefined
    );
  }

  private protocolError(error: HttpError, body?: BodyReader): void {
    if (this.closing || this.failing) return;
    this.logger.info({ status: error.statusCode, reason: error.message }, "[protocol_error]");
    this.failRequest(error, body);
  }

  /**
   * Stops reading for good. Requests parsed before the failing one still get
   * their responses, in order; the error response follows them. `body` names
   * the request whose body broke; without it the failure is in a new head.
   */
  private failRequest(error: HttpError, body?: BodyReader): void {
    if (this.closing || this.failing) return;
    this.failing = true;
    this.clearTimer();

    const owner = body ? this.cycles.findIndex((entry) => entry.body === body) : this.cycles.length;
    const ahead = this.cycles.slice(0, Math.max(owner, 0));
    for (const { cycle } of this.cycles.slice(ahead.length)) {
      cycle.disconnect();
    }
    this.wakeReader();

    if (ahead.length === 0) {
      this.respondAndClose(error);
      return;
    }

    this.respondAfter(ahead, error).catch((failure: unknown) => {
      this.logger.error({ err: failure }, "[error_while_serving_client]");
      this.abort("internal error");
    });
  }

  private async respondAfter(ahead: CycleEntry[], error: HttpError): Promise<void> {
    for (const entry of ahead) {
      await entry.settled;
    }
    if (this.closing) return;

    // one of them already ended the connection
    if (!ahead.every(({ cycle }) => cycle.result?.keepAlive === true)) {
      this.close();
      return;
    }
    this.respondAndClose(error);
  }

  // an error response is only possible while no response is half written
  private respondAndClose(error: HttpError): void {
    const streaming = this.cycles.some(
      ({ cycle }) => cycle.isResponseStarted && !cycle.isResponseComplete
    );
    if (streaming) {
      this.abort(error.message);
      return;
    }

    for (const { cycle } of this.cycles) {
      cycle.disconnect();
    }
    this.write(
      encodeErrorResponse(error.statusCode, this.serverState.defaultHeaders(), error.message)
    );
    this.close();
  }

  private handleReadFailure(error: unknown): void {
    if (error instanceof HttpError) {
      this.protocolError(error);
    } else if (!(error instanceof ClientDisconnectedError)) {
      this.logger.error({ err: error }, "[error_while_serving_client]");
      this.abort("internal error");
    }
  }

  // graceful close: queued bytes are flushed before the socket goes away
  private close(): void {
    if (this.closing) return;
    this.beginClosing();
    this.socket.end(() => this.socket.destroy());
  }

  private beginClosing(): void {
    if (this.closing) return;
    this.closing = true;
    this.dispatch(ConnectionEvent.CLOSE);
    this.clearTimer();
    for (const { cycle, body } of this.cycles) {
      cycle.disconnect();
      body.abandon();
    }
    this.wakeReader();
  }

  private onTransportClosed(): void {
    if (this.state === ConnectionState.CLOSED) return;

    this.closing = true;
    this.clearTimer();
    this.flow.close();
    for (const { cycle, body } of this.cycles) {
      cycle.disconnect();
      body.abandon();
    }
    this.wakeReader();
    this.dispatch(ConnectionEvent.TRANSPORT_CLOSED);
    this.serverState.connectionClosed(this);
    this.closedSignal.set();
    this.logger.debug("[connection_closed]");
  }

  private dispatch(event: ConnectionEvent): void {
    const next = nextState(this.state, event);
    if (next !== null) {
      this.state = next;
    }
  }
}
