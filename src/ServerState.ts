import { EventPool } from "./EventPool";
import { DEFAULT_SERVER_CONFIG, SERVER_NAME } from "./global";
import { HeaderList } from "./types";
import { Signal } from "./utils/Signal";

export type ServerStateOptions = {
  eventPoolCapacity?: number;
  serverHeader?: boolean;
  dateHeader?: boolean;
  headers?: HeaderList;
  now?: () => number;
};

/** Anything the server can count and ask to shut down. */
export type TrackedConnection = {
  shutdown: () => void;
  forceClose: () => void;
};

/**
 * State shared by every connection of one server: counters, the connection
 * set, the event pool and the cached `date` header value. It is passed to
 * each handler explicitly and only ever touched from the event loop.
 */
export class ServerState {
  readonly eventPool: EventPool;
  readonly connections = new Set<TrackedConnection>();

  private served = 0;
  private cachedDate: string | null = null;
  private cachedDateSecond = 0;
  private idleSignal: Signal | null = null;
  private readonly requestListeners: Array<(total: number) => void> = [];
  private readonly now: () => number;
  private readonly serverHeader: boolean;
  private readonly dateHeader: boolean;
  private readonly extraHeaders: HeaderList;

  constructor(options: ServerStateOptions = {}) {
    this.eventPool = new EventPool(
      options.eventPoolCapacity ?? DEFAULT_SERVER_CONFIG.eventPoolCapacity
    );
    this.now = options.now ?? (() => Date.now());
    this.serverHeader = options.serverHeader ?? true;
    this.dateHeader = options.dateHeader ?? true;
    this.extraHeaders = options.headers ?? [];
  }

  get activeConnections(): number {
    return this.connections.size;
  }

  get totalRequests(): number {
    return this.served;
  }

  connectionOpened(connection: TrackedConnection): void {
    this.connections.add(connection);
  }

  connectionClosed(connection: TrackedConnection): void {
    if (!this.connections.delete(connection)) return;

    if (this.connections.size === 0 && this.idleSignal) {
      const signal = this.idleSignal;
      this.idleSignal = null;
      signal.set();
      this.eventPool.release(signal);
    }
  }

  requestCompleted(): void {
    this.served++;
    for (const listener of this.requestListeners) {
      listener(this.served);
    }
  }

  onRequestCompleted(listener: (total: number) => void): () => void {
    this.requestListeners.push(listener);
    return () => {
      const idx = this.requestListeners.indexOf(listener);
      if (idx >= 0) this.requestListeners.splice(idx, 1);
    };
  }

  // resolves the moment the last tracked connection reports closed
  whenIdle(): Promise<void> {
    if (this.connections.size === 0) {
      return Promise.resolve();
    }
    this.idleSignal ??= this.eventPool.acquire();
    return this.idleSignal.wait();
  }

  currentDateHeader(): string {
    const second = Math.floor(this.now() / 1000);

    if (this.cachedDate === null || second !== this.cachedDateSecond) {
      this.cachedDate = new Date(second * 1000).toUTCString();
      this.cachedDateSecond = second;
    }

    return this.cachedDate;
  }

  defaultHeaders(): HeaderList {
    const headers: HeaderList = [];
    if (this.serverHeader) {
      headers.push(["server", SERVER_NAME]);
    }
    if (this.dateHeader) {
      headers.push(["date", this.currentDateHeader()]);
    }
    return headers.concat(this.extraHeaders);
  }
}
