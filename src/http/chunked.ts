import { HttpStatusCode } from "../enums";
import { CRLF, MAX_CHUNK_SIZE_LINE_LENGTH, MAX_TRAILER_LENGTH } from "../global";
import { DynBuf } from "../types";
import { bufPop, bufTake, bufView } from "../utils/DynBuf";
import { HttpError } from "../utils/HttpError";

// 4\r\nHTTP\r\n5\r\nserve\r\n0\r\n\r\n
export type ChunkedState =
  | { tag: "SIZE" }
  | { tag: "DATA"; remaining: number }
  | { tag: "DATA_END" }
  | { tag: "TRAILER"; seen: number }
  | { tag: "DONE" };

/**
 * Incremental decoder for `Transfer-Encoding: chunked` request bodies.
 * It consumes bytes from the connection buffer in place and never looks
 * past the terminating empty line, so pipelined bytes stay put.
 */
export class ChunkedDecoder {
  private state: ChunkedState = { tag: "SIZE" };

  get done(): boolean {
    return this.state.tag === "DONE";
  }

  get current(): ChunkedState["tag"] {
    return this.state.tag;
  }

  /**
   * Returns the next piece of body data, or null when `buffer` holds nothing
   * more to hand out (check {@link done} to tell end-of-body from need-more).
   */
  next(buffer: DynBuf): Buffer | null {
    for (;;) {
      switch (this.state.tag) {
        case "SIZE": {
          const line = takeLine(buffer, MAX_CHUNK_SIZE_LINE_LENGTH);
          if (line === null) return null;
          const size = parseChunkSize(line);
          this.state = size === 0 ? { tag: "TRAILER", seen: 0 } : { tag: "DATA", remaining: size };
          break;
        }
        case "DATA": {
          if (buffer.length === 0) return null;
          const consume = Math.min(buffer.length, this.state.remaining);
          const data = bufTake(buffer, consume);
          const remaining = this.state.remaining - consume;
          this.state = remaining === 0 ? { tag: "DATA_END" } : { tag: "DATA", remaining };
          return data;
        }
        case "DATA_END": {
          if (buffer.length < CRLF.length) return null;
          if (bufView(buffer).toString("latin1", 0, CRLF.length) !== CRLF) {
            throw new HttpError(HttpStatusCode.BAD_REQUEST, "Missing CRLF after chunk data");
          }
          bufPop(buffer, CRLF.length);
          this.state = { tag: "SIZE" };
          break;
        }
        case "TRAILER": {
          const line = takeLine(buffer, MAX_TRAILER_LENGTH - this.state.seen);
          if (line === null) return null;
          if (line.length === 0) {
            this.state = { tag: "DONE" };
            return null;
          }
          // trailer fields are read and dropped
          this.state = { tag: "TRAILER", seen: this.state.seen + line.length + CRLF.length };
          break;
        }
        case "DONE":
          return null;
      }
    }
  }
}

function takeLine(buffer: DynBuf, limit: number): string | null {
  const idx = bufView(buffer).indexOf(CRLF);
  if (idx < 0) {
    if (buffer.length > limit) {
      throw new HttpError(HttpStatusCode.HEADER_FIELDS_TOO_LARGE, "Chunk framing line too long");
    }
    return null;
  }
  if (idx > limit) {
    throw new HttpError(HttpStatusCode.HEADER_FIELDS_TOO_LARGE, "Chunk framing line too long");
  }
  const line = bufView(buffer).toString("latin1", 0, idx);
  bufPop(buffer, idx + CRLF.length);
  return line;
}

function parseChunkSize(line: string): number {
  const sizeText = line.split(";")[0].trim();
  // twelve hex digits is 256 TiB, well inside a safe integer
  if (!/^[0-9a-fA-F]{1,12}$/.test(sizeText)) {
    throw new HttpError(HttpStatusCode.BAD_REQUEST, "Invalid chunk size");
  }
  return parseInt(sizeText, 16);
}
