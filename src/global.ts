import { STATUS_CODES } from "http";
import { ServerConfig } from "./types";

export const SERVER_NAME = "portico";

export const DEFAULT_SERVER_CONFIG: ServerConfig = {
  host: "127.0.0.1",
  port: 3000,
  backlog: 2048,
  highWaterMark: 64 * 1024,
  lowWaterMark: 16 * 1024,
  eventPoolCapacity: 1000,
  keepAliveTimeoutMs: 5_000,
  requestTimeoutMs: 30_000,
  disconnectGraceMs: 5_000,
  gracefulShutdownTimeoutMs: 30_000,
  lifespanTimeoutMs: 10_000,
  //headers limit set to 8KB as Apache servers
  maxHeaderBytes: 8 * 1024,
  limitConcurrency: null,
  limitMaxRequests: null,
  serverHeader: true,
  dateHeader: true,
  headers: [],
  notify: null,
  logLevel: "info",
};

export const CRLF = "\r\n";
export const HTTP_HEADERS_END_CHARS = `${CRLF}${CRLF}`;
export const HTTP_REQUEST_LINE_SEPARATOR = " ";
export const HTTP_HEADERS_END_CHARS_LENGTH = HTTP_HEADERS_END_CHARS.length;

export const HTTP_CONTENT_LENGTH_HEADER = "content-length";
export const HTTP_TRANSFER_ENCODING_HEADER = "transfer-encoding";
export const HTTP_CONNECTION_HEADER = "connection";
export const HTTP_EXPECT_HEADER = "expect";

// chunk-size line plus extensions, and the trailer section
export const MAX_CHUNK_SIZE_LINE_LENGTH = 1024;
export const MAX_TRAILER_LENGTH = 8 * 1024;

// 1.x response rule: these never carry a body
export const BODYLESS_STATUS_CODES = [204, 304];

export const CONTINUE_RESPONSE = Buffer.from(`HTTP/1.1 100 Continue${CRLF}${CRLF}`);

// token chars from RFC 9110 section 5.6.2
export const HTTP_TOKEN_REGEX = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;

export function reasonPhrase(statusCode: number): string {
  return STATUS_CODES[statusCode] ?? "Unknown";
}
