import { Duplex } from "stream";

type WriteCallback = (error?: Error | null) => void;

/**
 * In-process stand-in for a TCP socket. Whatever the server writes is kept
 * in `written`; `feed` plays bytes sent by the client.
 */
export class FakeSocket extends Duplex {
  remoteAddress = "127.0.0.1";
  remotePort = 50000;

  readonly written: Buffer[] = [];
  private readonly deferWrites: boolean;
  private pending: WriteCallback[] = [];

  constructor(options: { deferWrites?: boolean } = {}) {
    super({ allowHalfOpen: true });
    this.deferWrites = options.deferWrites ?? false;
  }

  get output(): string {
    return Buffer.concat(this.written).toString("latin1");
  }

  feed(data: string | Buffer): void {
    this.push(typeof data === "string" ? Buffer.from(data, "latin1") : data);
  }

  endInput(): void {
    this.push(null);
  }

  // with deferWrites, completes the write the server is blocked on
  flushWrites(): void {
    const pending = this.pending;
    this.pending = [];
    for (const callback of pending) callback();
  }

  _read(): void {}

  _write(chunk: Buffer, _encoding: BufferEncoding, callback: WriteCallback): void {
    this.written.push(chunk);
    if (this.deferWrites) {
      this.pending.push(callback);
    } else {
      callback();
    }
  }
}
