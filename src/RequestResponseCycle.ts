import { FlowControlManager } from "./FlowControlManager";
import { BodyFraming, HttpMethods, HttpStatusCode } from "./enums";
import {
  BODYLESS_STATUS_CODES,
  CONTINUE_RESPONSE,
  HTTP_CONNECTION_HEADER,
  HTTP_CONTENT_LENGTH_HEADER,
  HTTP_TRANSFER_ENCODING_HEADER,
} from "./global";
import {
  encodeChunk,
  encodeErrorResponse,
  encodeHTTPResp,
  LAST_CHUNK,
  normalizeResponseHeaders,
} from "./http/encoder";
import { fieldGet, fieldTokens } from "./http/parser";
import { ServerState } from "./ServerState";
import {
  Application,
  BodySource,
  CycleOutcome,
  HeaderList,
  HTTPReq,
  RequestBodyEvent,
  RequestHead,
  ResponseEvent,
} from "./types";
import { ClientDisconnectedError, ResponseContractError } from "./utils/HttpError";
import { Logger } from "./utils/logger";
import { Signal } from "./utils/Signal";

/** What a cycle needs from the connection that owns it. */
export type CycleHost = {
  readonly flow: FlowControlManager;
  write: (data: Buffer) => void;
  responseStarted: (cycle: RequestResponseCycle) => void;
  abort: (reason: string) => void;
};

export type CycleOptions = {
  head: RequestHead;
  body: BodySource;
  host: CycleHost;
  state: ServerState;
  logger: Logger;
  // settles once the previous exchange on the connection is done writing
  previous: Promise<void> | null;
  disconnectGraceMs: number;
};

type AppResult = { error: unknown } | null;

/**
 * One request/response exchange. Owns the ordering rules of the response
 * (start exactly once, then body, then nothing) and produces exactly one
 * {@link CycleOutcome}.
 */
export class RequestResponseCycle {
  readonly request: HTTPReq;

  private readonly head: RequestHead;
  private readonly body: BodySource;
  private readonly host: CycleHost;
  private readonly state: ServerState;
  private readonly logger: Logger;
  private readonly disconnectGraceMs: number;
  private readonly disconnectSignal: Signal;
  private readonly turn: Promise<void>;

  private keepAliveAllowed: boolean;
  private writable: boolean;
  private disconnected = false;
  private started = false;
  private completed = false;
  private bodyEnded = false;
  private continueSent = false;
  private status: number | null = null;
  private chunked = false;
  private bodyAllowed = true;
  private expectedLength: number | null = null;
  private written = 0;
  private violation: ResponseContractError | null = null;
  private outcome: CycleOutcome | null = null;
  private graceTimer: NodeJS.Timeout | null = null;

  constructor(options: CycleOptions) {
    this.head = options.head;
    this.request = options.head.request;
    this.body = options.body;
    this.host = options.host;
    this.state = options.state;
    this.logger = options.logger;
    this.disconnectGraceMs = options.disconnectGraceMs;
    this.keepAliveAllowed = options.head.keepAlive;
    this.disconnectSignal = options.state.eventPool.acquire();

    if (options.previous) {
      this.writable = false;
      this.turn = options.previous.then(() => {
        this.writable = true;
      });
    } else {
      this.writable = true;
      this.turn = Promise.resolve();
    }
  }

  get keepAlive(): boolean {
    return this.keepAliveAllowed;
  }

  get isDisconnected(): boolean {
    return this.disconnected;
  }

  get isResponseStarted(): boolean {
    return this.started;
  }

  get isResponseComplete(): boolean {
    return this.completed;
  }

  get result(): CycleOutcome | null {
    return this.outcome;
  }

  async run(app: Application): Promise<CycleOutcome> {
    const appTask = this.invoke(app);
    const result = await Promise.race([appTask, this.abandonAfterGrace()]);

    if (result === "abandoned") {
      this.logger.warn(
        { graceMs: this.disconnectGraceMs, path: this.request.path },
        "[application_ignored_disconnect]"
      );
      return this.finish("disconnect");
    }

    const error = result?.error ?? this.violation;

    if (this.disconnected || error instanceof ClientDisconnectedError) {
      this.logger.debug({ path: this.request.path }, "[client_disconnected]");
      this.disconnect();
      return this.finish("disconnect");
    }

    if (error) {
      this.logger.error({ err: error, path: this.request.path }, "[application_error]");
      return this.fail(error);
    }

    if (!this.started) {
      const err = new ResponseContractError("Application returned without starting a response");
      this.logger.error({ err, path: this.request.path }, "[application_error]");
      return this.fail(err);
    }

    if (!this.completed) {
      const err = new ResponseContractError("Application returned without completing the response");
      this.logger.error({ err, path: this.request.path }, "[application_error]");
      return this.fail(err);
    }

    return this.finish("complete");
  }

  // the transport is gone or the connection gave up on this exchange
  disconnect(): void {
    if (this.disconnected) return;
    this.disconnected = true;
    this.keepAliveAllowed = false;
    if (!this.outcome) {
      this.disconnectSignal.set();
    }
  }

  // shutdown: answer this request, then close
  denyKeepAlive(): void {
    this.keepAliveAllowed = false;
  }

  receive = async (): Promise<RequestBodyEvent> => {
    if (this.disconnected) return { type: "disconnect" };
    if (this.bodyEnded) return { type: "end" };

    if (
      this.head.expectContinue &&
      this.head.framing.kind !== BodyFraming.NONE &&
      !this.continueSent &&
      !this.started &&
      this.writable
    ) {
      this.continueSent = true;
      this.host.write(CONTINUE_RESPONSE);
    }

    try {
      const data = await this.body.read();
      if (data === null) {
        this.bodyEnded = true;
        return { type: "end" };
      }
      return { type: "chunk", data };
    } catch (error) {
      if (error instanceof ClientDisconnectedError) {
        this.disconnect();
        return { type: "disconnect" };
      }
      throw error;
    }
  };

  send = async (event: ResponseEvent): Promise<void> => {
    if (this.violation) throw this.violation;
    if (this.disconnected) throw new ClientDisconnectedError();

    switch (event.type) {
      case "start": {
        if (this.started) {
          throw this.breach("Response already started");
        }
        if (!Number.isInteger(event.status) || event.status < 200 || event.status > 599) {
          throw this.breach(`Invalid response status: ${event.status}`);
        }
        let headers: HeaderList;
        try {
          headers = normalizeResponseHeaders(event.headers ?? []);
        } catch (error) {
          if (error instanceof ResponseContractError) throw this.breach(error.message);
          throw error;
        }

        await this.waitTurn();
        await this.host.flow.drain();
        this.startResponse(event.status, headers);
        return;
      }
      case "body": {
        if (!this.started) {
          throw this.breach("Response body sent before response start");
        }
        if (this.completed) {
          throw this.breach("Response already completed");
        }
        const data =
          typeof event.data === "string" ? Buffer.from(event.data) : event.data ?? Buffer.alloc(0);
        const more = event.more ?? false;

        await this.host.flow.drain();
        this.writeBody(data, more);

        if (!more) {
          await this.host.flow.waitFlushed();
        }
        return;
      }
      default: {
        const unknown: never = event;
        throw this.breach(`Unexpected response message: ${JSON.stringify(unknown)}`);
      }
    }
  };

  private async invoke(app: Application): Promise<AppResult> {
    try {
      await app(this.request, this.receive, this.send);
      return null;
    } catch (error) {
      return { error };
    }
  }

  private abandonAfterGrace(): Promise<"abandoned"> {
    return this.disconnectSignal.wait().then(
      () =>
        new Promise<"abandoned">((resolve) => {
          if (this.outcome) return;
          this.graceTimer = setTimeout(() => resolve("abandoned"), this.disconnectGraceMs);
        })
    );
  }

  private async waitTurn(): Promise<void> {
    if (!this.writable) {
      await Promise.race([this.turn, this.disconnectSignal.wait()]);
    }
    if (this.disconnected) throw new ClientDisconnectedError();
  }

  private breach(message: string): ResponseContractError {
    this.violation ??= new ResponseContractError(message);
    return this.violation;
  }

  private startResponse(status: number, appHeaders: HeaderList): void {
    const version = this.request.version;
    const headers: HeaderList = [];
    const appNames = new Set(appHeaders.map(([name]) => name));

    for (const header of this.state.defaultHeaders()) {
      if (!appNames.has(header[0])) headers.push(header);
    }
    headers.push(...appHeaders);

    const lengthText = fieldGet(appHeaders, HTTP_CONTENT_LENGTH_HEADER);
    if (lengthText !== null) {
      if (!/^\d+$/.test(lengthText)) {
        throw this.breach(`Invalid content-length: ${lengthText}`);
      }
      this.expectedLength = Number(lengthText);
    }

    const codings = fieldTokens(appHeaders, HTTP_TRANSFER_ENCODING_HEADER);
    if (fieldTokens(appHeaders, HTTP_CONNECTION_HEADER).includes("close")) {
      this.keepAliveAllowed = false;
    }

    this.bodyAllowed =
      this.request.method !== HttpMethods.HEAD && !BODYLESS_STATUS_CODES.includes(status);

    if (this.bodyAllowed && codings.length > 0) {
      this.chunked = codings[codings.length - 1] === "chunked";
      if (!this.chunked) this.keepAliveAllowed = false;
    } else if (this.bodyAllowed && this.expectedLength === null) {
      if (version === "1.1") {
        this.chunked = true;
        headers.push([HTTP_TRANSFER_ENCODING_HEADER, "chunked"]);
      } else {
        // body runs until the connection closes
        this.keepAliveAllowed = false;
      }
    }

    if (!appNames.has(HTTP_CONNECTION_HEADER)) {
      if (!this.keepAliveAllowed) {
        headers.push([HTTP_CONNECTION_HEADER, "close"]);
      } else if (version === "1.0") {
        headers.push([HTTP_CONNECTION_HEADER, "keep-alive"]);
      }
    }

    this.started = true;
    this.status = status;
    this.host.responseStarted(this);
    this.host.write(encodeHTTPResp(status, headers));
  }

  private writeBody(data: Buffer, more: boolean): void {
    if (this.bodyAllowed) {
      if (this.expectedLength !== null && this.written + data.length > this.expectedLength) {
        throw this.breach("Response body longer than content-length");
      }
      if (!more && this.expectedLength !== null && this.written + data.length < this.expectedLength) {
        throw this.breach("Response body shorter than content-length");
      }

      this.written += data.length;

      if (this.chunked) {
        if (data.length > 0) this.host.write(encodeChunk(data));
        if (!more) this.host.write(LAST_CHUNK);
      } else if (data.length > 0) {
        this.host.write(data);
      }
    }

    if (!more) {
      this.completed = true;
    }
  }

  private async fail(error: unknown): Promise<CycleOutcome> {
    this.keepAliveAllowed = false;

    if (this.started) {
      this.host.abort("response framing compromised");
      return this.finish("error", error);
    }

    try {
      await this.waitTurn();
      await this.host.flow.drain();
      this.started = true;
      this.status = HttpStatusCode.SERVER_ERROR;
      this.host.responseStarted(this);
      this.host.write(
        encodeErrorResponse(HttpStatusCode.SERVER_ERROR, this.state.defaultHeaders())
      );
      this.completed = true;
      await this.host.flow.waitFlushed();
    } catch (writeError) {
      if (!(writeError instanceof ClientDisconnectedError)) throw writeError;
      this.disconnect();
      return this.finish("disconnect");
    }

    return this.finish("error", error);
  }

  private finish(kind: CycleOutcome["kind"], error?: unknown): CycleOutcome {
    if (this.outcome) return this.outcome;

    if (this.graceTimer) {
      clearTimeout(this.graceTimer);
      this.graceTimer = null;
    }

    this.outcome = {
      kind,
      keepAlive: kind === "complete" && this.keepAliveAllowed && !this.disconnected,
      status: this.status,
      ...(error === undefined ? {} : { error }),
    };

    // wake anything still racing against a disconnect, then recycle
    this.disconnectSignal.set();
    this.state.eventPool.release(this.disconnectSignal);

    if (kind !== "disconnect") {
      this.state.requestCompleted();
    }

    return this.outcome;
  }
}
