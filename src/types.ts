import type { Duplex } from "stream";
import type { LevelWithSilent } from "pino";
import { BodyFraming } from "./enums";

export type DynBuf = {
  data: Buffer;
  length: number;
};

// header names are lower-cased on the way in; values are latin1 text
export type HeaderList = Array<[string, string]>;

export type HttpVersion = "1.0" | "1.1";

export type HTTPReq = {
  method: string;
  target: string;
  path: string;
  query: string;
  version: HttpVersion;
  headers: HeaderList;
  remoteAddress: string | null;
  remotePort: number | null;
};

export type RequestFraming =
  | { kind: BodyFraming.NONE }
  | { kind: BodyFraming.CONTENT_LENGTH; length: number }
  | { kind: BodyFraming.CHUNKED };

export type RequestHead = {
  request: HTTPReq;
  framing: RequestFraming;
  keepAlive: boolean;
  expectContinue: boolean;
};

export type RequestBodyEvent =
  | { type: "chunk"; data: Buffer }
  | { type: "end" }
  | { type: "disconnect" };

export type ResponseStart = {
  type: "start";
  status: number;
  headers?: HeaderList;
};

export type ResponseBody = {
  type: "body";
  data?: Buffer | string;
  more?: boolean;
};

export type ResponseEvent = ResponseStart | ResponseBody;

export type Receive = () => Promise<RequestBodyEvent>;
export type Send = (event: ResponseEvent) => Promise<void>;

export type Application = (
  request: HTTPReq,
  receive: Receive,
  send: Send
) => Promise<void>;

export type LifespanHooks = {
  startup?: () => Promise<void>;
  shutdown?: () => Promise<void>;
};

export type NotifyOptions = {
  callback: () => Promise<void> | void;
  intervalMs: number;
};

export type ServerConfig = {
  host: string;
  port: number;
  backlog: number;
  highWaterMark: number;
  lowWaterMark: number;
  eventPoolCapacity: number;
  keepAliveTimeoutMs: number;
  requestTimeoutMs: number;
  disconnectGraceMs: number;
  gracefulShutdownTimeoutMs: number;
  lifespanTimeoutMs: number;
  maxHeaderBytes: number;
  limitConcurrency: number | null;
  limitMaxRequests: number | null;
  serverHeader: boolean;
  dateHeader: boolean;
  headers: HeaderList;
  notify: NotifyOptions | null;
  logLevel: LevelWithSilent;
};

export type ServerOptions = Partial<ServerConfig>;

// net.Socket satisfies this; tests hand in a plain Duplex
export type TransportSocket = Duplex & {
  remoteAddress?: string;
  remotePort?: number;
};

export type CycleOutcomeKind = "complete" | "error" | "disconnect";

export type CycleOutcome = {
  kind: CycleOutcomeKind;
  keepAlive: boolean;
  status: number | null;
  error?: unknown;
};

export type BodySource = {
  // null marks the end of the body
  read: () => Promise<Buffer | null>;
};
