import { CRLF, HTTP_TOKEN_REGEX, reasonPhrase } from "../global";
import { HeaderList } from "../types";
import { ResponseContractError } from "../utils/HttpError";

export const LAST_CHUNK = Buffer.from(`0${CRLF}${CRLF}`);

export function encodeHTTPResp(status: number, headers: HeaderList): Buffer {
  const lines = [`HTTP/1.1 ${status} ${reasonPhrase(status)}`];

  for (const [name, value] of headers) {
    lines.push(`${name}: ${value}`);
  }

  return Buffer.from(`${lines.join(CRLF)}${CRLF}${CRLF}`, "latin1");
}

export function encodeChunk(data: Buffer): Buffer {
  return Buffer.concat([
    Buffer.from(`${data.length.toString(16)}${CRLF}`),
    data,
    Buffer.from(CRLF),
  ]);
}

// lower-cases names; rejects anything that could split the response
export function normalizeResponseHeaders(headers: HeaderList): HeaderList {
  return headers.map(([name, value]) => {
    if (!HTTP_TOKEN_REGEX.test(name)) {
      throw new ResponseContractError(`Invalid response header name: ${JSON.stringify(name)}`);
    }
    const text = String(value);
    // header bytes go out as latin1
    if (/[\x00\r\n]|[^\x00-\xff]/.test(text)) {
      throw new ResponseContractError(`Invalid value for response header ${name}`);
    }
    return [name.toLowerCase(), text];
  });
}

/**
 * A complete plain-text response that always closes the connection; used
 * when the server itself answers (400, 408, 500, 503, ...).
 */
export function encodeErrorResponse(
  status: number,
  defaultHeaders: HeaderList,
  message: string = reasonPhrase(status)
): Buffer {
  const body = Buffer.from(`${message}\n`);
  const head = encodeHTTPResp(status, [
    ...defaultHeaders,
    ["content-type", "text/plain; charset=utf-8"],
    ["content-length", String(body.length)],
    ["connection", "close"],
  ]);
  return Buffer.concat([head, body]);
}
