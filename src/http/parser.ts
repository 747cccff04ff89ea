import { BodyFraming, HttpStatusCode } from "../enums";
import {
  CRLF,
  HTTP_CONNECTION_HEADER,
  HTTP_CONTENT_LENGTH_HEADER,
  HTTP_EXPECT_HEADER,
  HTTP_HEADERS_END_CHARS,
  HTTP_HEADERS_END_CHARS_LENGTH,
  HTTP_REQUEST_LINE_SEPARATOR,
  HTTP_TOKEN_REGEX,
  HTTP_TRANSFER_ENCODING_HEADER,
} from "../global";
import {
  DynBuf,
  HeaderList,
  HTTPReq,
  HttpVersion,
  RequestFraming,
  RequestHead,
} from "../types";
import { bufPop, bufView } from "../utils/DynBuf";
import { HttpError } from "../utils/HttpError";

export type PeerInfo = {
  remoteAddress: string | null;
  remotePort: number | null;
};

const NO_PEER: PeerInfo = { remoteAddress: null, remotePort: null };

const CRLF_BYTES = Buffer.from(CRLF);

/**
 * Cuts one complete request head off the front of `buffer`. Returns null
 * when the terminating empty line has not arrived yet.
 */
export function cutMessage(
  buffer: DynBuf,
  maxHeaderBytes: number,
  peer: PeerInfo = NO_PEER
): null | RequestHead {
  skipEmptyLines(buffer);

  const idx = bufView(buffer).indexOf(HTTP_HEADERS_END_CHARS);

  if (idx < 0) {
    if (buffer.length >= maxHeaderBytes) {
      throw new HttpError(HttpStatusCode.HEADER_FIELDS_TOO_LARGE, "Headers are too large");
    }
    return null;
  }

  if (idx + HTTP_HEADERS_END_CHARS_LENGTH > maxHeaderBytes) {
    throw new HttpError(HttpStatusCode.HEADER_FIELDS_TOO_LARGE, "Headers are too large");
  }

  const head = bufView(buffer).toString("latin1", 0, idx);
  bufPop(buffer, idx + HTTP_HEADERS_END_CHARS_LENGTH);

  return parseRequestHead(head, peer);
}

// a client may send stray CRLFs between pipelined requests
function skipEmptyLines(buffer: DynBuf): void {
  let skip = 0;
  while (
    buffer.length - skip >= CRLF_BYTES.length &&
    buffer.data[skip] === CRLF_BYTES[0] &&
    buffer.data[skip + 1] === CRLF_BYTES[1]
  ) {
    skip += CRLF_BYTES.length;
  }
  if (skip > 0) bufPop(buffer, skip);
}

export function parseRequestHead(head: string, peer: PeerInfo = NO_PEER): RequestHead {
  const lines = head.split(CRLF);

  const [method, target, version] = parseRequestLine(lines[0]);
  const headers = parseHeaderLines(lines.slice(1));
  const [path, query] = splitTarget(target);

  const request: HTTPReq = {
    method,
    target,
    path,
    query,
    version,
    headers,
    remoteAddress: peer.remoteAddress,
    remotePort: peer.remotePort,
  };

  return {
    request,
    framing: requestFraming(headers),
    keepAlive: wantsKeepAlive(version, headers),
    expectContinue:
      version === "1.1" &&
      fieldGet(headers, HTTP_EXPECT_HEADER)?.toLowerCase() === "100-continue",
  };
}

export function parseRequestLine(line: string): [string, string, HttpVersion] {
  const parts = line.split(HTTP_REQUEST_LINE_SEPARATOR);
  if (parts.length !== 3) {
    throw new HttpError(HttpStatusCode.BAD_REQUEST, "Malformed request line");
  }

  const [method, target, protocol] = parts;

  if (!HTTP_TOKEN_REGEX.test(method)) {
    throw new HttpError(HttpStatusCode.BAD_REQUEST, "Invalid method");
  }
  if (target.length === 0 || /[\x00-\x20\x7f]/.test(target)) {
    throw new HttpError(HttpStatusCode.BAD_REQUEST, "Invalid request target");
  }

  const match = /^HTTP\/(\d)\.(\d)$/.exec(protocol);
  if (!match) {
    throw new HttpError(HttpStatusCode.BAD_REQUEST, "Invalid protocol version");
  }

  const version = `${match[1]}.${match[2]}`;
  if (version !== "1.0" && version !== "1.1") {
    throw new HttpError(
      HttpStatusCode.VERSION_NOT_SUPPORTED,
      `HTTP/${version} is not supported`
    );
  }

  return [method, target, version];
}

function parseHeaderLines(lines: string[]): HeaderList {
  const headers: HeaderList = [];

  for (const line of lines) {
    if (line.startsWith(" ") || line.startsWith("\t")) {
      throw new HttpError(HttpStatusCode.BAD_REQUEST, "Obsolete line folding");
    }

    const colon = line.indexOf(":");
    if (colon <= 0) {
      throw new HttpError(HttpStatusCode.BAD_REQUEST, "Malformed header line");
    }

    const name = line.slice(0, colon);
    if (!HTTP_TOKEN_REGEX.test(name)) {
      throw new HttpError(HttpStatusCode.BAD_REQUEST, "Invalid header name");
    }

    const value = line.slice(colon + 1).trim();
    if (/[\x00\r\n]/.test(value)) {
      throw new HttpError(HttpStatusCode.BAD_REQUEST, "Invalid header value");
    }

    headers.push([name.toLowerCase(), value]);
  }

  return headers;
}

function splitTarget(target: string): [string, string] {
  let pathAndQuery = target;

  // absolute-form, as proxies send it
  if (!target.startsWith("/") && target !== "*") {
    try {
      const url = new URL(target);
      pathAndQuery = `${url.pathname}${url.search}`;
    } catch {
      throw new HttpError(HttpStatusCode.BAD_REQUEST, "Invalid request target");
    }
  }

  const idx = pathAndQuery.indexOf("?");
  if (idx < 0) return [pathAndQuery, ""];
  return [pathAndQuery.slice(0, idx), pathAndQuery.slice(idx + 1)];
}

export function fieldGet(headers: HeaderList, key: string): null | string {
  const lower = key.toLowerCase();
  for (const [name, value] of headers) {
    if (name === lower) return value;
  }
  return null;
}

// every comma-separated element of every occurrence of `key`
export function fieldTokens(headers: HeaderList, key: string): string[] {
  const lower = key.toLowerCase();
  const tokens: string[] = [];
  for (const [name, value] of headers) {
    if (name !== lower) continue;
    for (const token of value.split(",")) {
      const trimmed = token.trim().toLowerCase();
      if (trimmed) tokens.push(trimmed);
    }
  }
  return tokens;
}

export function requestFraming(headers: HeaderList): RequestFraming {
  const codings = fieldTokens(headers, HTTP_TRANSFER_ENCODING_HEADER);
  const lengths = fieldTokens(headers, HTTP_CONTENT_LENGTH_HEADER);

  if (codings.length > 0) {
    if (lengths.length > 0) {
      throw new HttpError(
        HttpStatusCode.BAD_REQUEST,
        "Both Content-Length and Transfer-Encoding present"
      );
    }
    if (codings[codings.length - 1] !== "chunked") {
      throw new HttpError(HttpStatusCode.BAD_REQUEST, "Final transfer coding must be chunked");
    }
    if (codings.length > 1) {
      throw new HttpError(
        HttpStatusCode.NOT_IMPLEMENTED,
        `Unsupported transfer coding: ${codings.slice(0, -1).join(", ")}`
      );
    }
    return { kind: BodyFraming.CHUNKED };
  }

  if (lengths.length > 0) {
    const [first] = lengths;
    if (!/^\d+$/.test(first) || lengths.some((len) => len !== first)) {
      throw new HttpError(HttpStatusCode.BAD_REQUEST, "Invalid content length");
    }
    const length = Number(first);
    if (!Number.isSafeInteger(length)) {
      throw new HttpError(HttpStatusCode.PAYLOAD_TOO_LARGE, "Content length too large");
    }
    return length === 0
      ? { kind: BodyFraming.NONE }
      : { kind: BodyFraming.CONTENT_LENGTH, length };
  }

  return { kind: BodyFraming.NONE };
}

export function wantsKeepAlive(version: HttpVersion, headers: HeaderList): boolean {
  const options = fieldTokens(headers, HTTP_CONNECTION_HEADER);
  if (options.includes("close")) return false;
  if (version === "1.1") return true;
  return options.includes("keep-alive");
}
