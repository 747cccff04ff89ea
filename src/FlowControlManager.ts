import { EventPool } from "./EventPool";
import { ConfigError, ClientDisconnectedError } from "./utils/HttpError";
import { Signal } from "./utils/Signal";

export type FlowControlOptions = {
  highWaterMark: number;
  lowWaterMark: number;
};

export type FlowControlStats = {
  pauses: number;
  resumes: number;
};

/**
 * Per-connection backpressure. Counts the bytes handed to the socket but not
 * yet flushed; above `highWaterMark` both inbound reads and response writes
 * wait in {@link drain} until the count falls to `lowWaterMark`.
 */
export class FlowControlManager {
  readonly highWaterMark: number;
  readonly lowWaterMark: number;

  private buffered = 0;
  private paused = false;
  private closed = false;
  private resumeSignal: Signal | null = null;
  private flushedSignal: Signal | null = null;
  private pauses = 0;
  private resumes = 0;

  constructor(private readonly pool: EventPool, options: FlowControlOptions) {
    if (options.lowWaterMark < 0 || options.lowWaterMark >= options.highWaterMark) {
      throw new ConfigError(
        `lowWaterMark (${options.lowWaterMark}) must be below highWaterMark (${options.highWaterMark})`
      );
    }
    this.highWaterMark = options.highWaterMark;
    this.lowWaterMark = options.lowWaterMark;
  }

  get isPaused(): boolean {
    return this.paused;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get bufferedBytes(): number {
    return this.buffered;
  }

  bytesQueued(length: number): void {
    this.buffered += length;
    if (this.buffered > this.highWaterMark) {
      this.pause();
    }
  }

  // the transport's write callback fired: this much left the process
  bytesFlushed(length: number): void {
    this.buffered = Math.max(0, this.buffered - length);
    if (this.buffered <= this.lowWaterMark) {
      this.resume();
    }
    if (this.buffered === 0 && this.flushedSignal) {
      this.settle("flushedSignal");
    }
  }

  pause(): void {
    if (this.paused || this.closed) return;
    this.paused = true;
    this.pauses++;
    this.resumeSignal = this.pool.acquire();
  }

  resume(): void {
    if (!this.paused) return;
    this.paused = false;
    this.resumes++;
    this.settle("resumeSignal");
  }

  // false once the connection is closed
  async resumed(): Promise<boolean> {
    if (this.paused && this.resumeSignal) {
      await this.resumeSignal.wait();
    }
    return !this.closed;
  }

  async drain(): Promise<void> {
    if (!(await this.resumed())) {
      throw new ClientDisconnectedError();
    }
  }

  async waitFlushed(): Promise<void> {
    if (this.closed) throw new ClientDisconnectedError();
    if (this.buffered === 0) return;

    this.flushedSignal ??= this.pool.acquire();
    await this.flushedSignal.wait();

    if (this.closed) throw new ClientDisconnectedError();
  }

  // wakes every waiter; they observe `closed` and fail
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.paused = false;
    this.settle("resumeSignal");
    this.settle("flushedSignal");
  }

  stats(): FlowControlStats {
    return { pauses: this.pauses, resumes: this.resumes };
  }

  private settle(key: "resumeSignal" | "flushedSignal"): void {
    const signal = this[key];
    if (!signal) return;
    this[key] = null;
    signal.set();
    this.pool.release(signal);
  }
}
