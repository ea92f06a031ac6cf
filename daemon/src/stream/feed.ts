import { watch } from "chokidar";
import type { FastifyBaseLogger } from "fastify";
import type { PulseConfig } from "../config.js";
import { toReportJson } from "../sessions/scanner.js";
import type { ScanReport } from "../sessions/types.js";

/** The slice of a `ws` WebSocket the feed relies on. */
export interface FeedSocket {
  readonly readyState: number;
  readonly OPEN: number;
  send(data: string): void;
  ping(): void;
  terminate(): void;
  close(code?: number, reason?: string): void;
  on(event: "pong" | "close", listener: () => void): unknown;
  on(event: "error", listener: (err: Error) => void): unknown;
}

/** Starts watching `dir`; returns a function that stops it. */
export type WatchFn = (
  dir: string,
  onFile: (path: string) => void,
  onError: (err: unknown) => void,
) => () => Promise<void>;

export type FeedLogger = Pick<FastifyBaseLogger, "info" | "warn" | "debug" | "error">;

interface Subscriber {
  socket: FeedSocket;
  missedPongs: number;
}

const watchWithChokidar: WatchFn = (dir, onFile, onError) => {
  const watcher = watch(dir, {
    ignoreInitial: true,
    depth: 1,
    persistent: true,
  });
  watcher.on("add", onFile);
  watcher.on("change", onFile);
  watcher.on("error", onError);
  return () => watcher.close();
};

/**
 * Pushes fresh scan reports to WebSocket subscribers.
 *
 * Holds sockets and timers only; every push runs a full `scan()`.
 * File events are coalesced over `debounceMs`, and a periodic refresh
 * covers sessions that go idle without touching their log.
 */
export class RealtimeFeed {
  private log: FeedLogger;
  private streamConfig: PulseConfig["stream"];
  private projectsDir: string;
  private scanner: { scan(): ScanReport };
  private watchFn: WatchFn;
  private subscribers = new Map<FeedSocket, Subscriber>();
  private stopWatching: (() => Promise<void>) | null = null;
  private refreshTimer: ReturnType<typeof setInterval> | null = null;
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
  private pushTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(
    config: PulseConfig,
    scanner: { scan(): ScanReport },
    log: FeedLogger,
    watchFn: WatchFn = watchWithChokidar,
  ) {
    this.log = log;
    this.streamConfig = config.stream;
    this.projectsDir = config.scanner.projectsDir;
    this.scanner = scanner;
    this.watchFn = watchFn;
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  start(): void {
    this.stopWatching = this.watchFn(
      this.projectsDir,
      (path) => this.onFileEvent(path),
      (err) => this.log.warn({ err }, "Projects directory watcher error"),
    );

    this.refreshTimer = setInterval(
      () => this.push(),
      this.streamConfig.refreshIntervalMs,
    );
    this.heartbeatTimer = setInterval(
      () => this.heartbeat(),
      this.streamConfig.heartbeatSeconds * 1000,
    );

    this.log.info({ projectsDir: this.projectsDir }, "Realtime feed started");
  }

  async stop(): Promise<void> {
    if (this.refreshTimer) clearInterval(this.refreshTimer);
    if (this.heartbeatTimer) clearInterval(this.heartbeatTimer);
    if (this.pushTimer) clearTimeout(this.pushTimer);
    this.refreshTimer = null;
    this.heartbeatTimer = null;
    this.pushTimer = null;

    for (const socket of this.subscribers.keys()) {
      socket.close(1001, "Server shutting down");
    }
    this.subscribers.clear();

    if (this.stopWatching) {
      const stopWatching = this.stopWatching;
      this.stopWatching = null;
      await stopWatching();
    }
  }

  /** Register a socket and send it the current report straight away. */
  subscribe(socket: FeedSocket): void {
    const subscriber: Subscriber = { socket, missedPongs: 0 };
    this.subscribers.set(socket, subscriber);

    socket.on("pong", () => {
      subscriber.missedPongs = 0;
    });
    socket.on("close", () => {
      this.subscribers.delete(socket);
    });
    socket.on("error", (err) => {
      this.log.warn({ err }, "Stream socket error");
      this.subscribers.delete(socket);
    });

    const payload = this.render();
    if (payload !== null) this.send(socket, payload);
    this.log.debug({ subscribers: this.subscribers.size }, "Stream subscriber added");
  }

  /** Called for every add/change under the projects directory. */
  onFileEvent(path: string): void {
    if (!path.endsWith(".jsonl")) return;
    if (this.pushTimer) return;

    this.pushTimer = setTimeout(() => {
      this.pushTimer = null;
      this.push();
    }, this.streamConfig.debounceMs);
  }

  private push(): void {
    if (this.subscribers.size === 0) return;

    const payload = this.render();
    if (payload === null) return;
    for (const socket of this.subscribers.keys()) {
      this.send(socket, payload);
    }
  }

  private render(): string | null {
    try {
      return JSON.stringify(toReportJson(this.scanner.scan()));
    } catch (err) {
      this.log.error({ err }, "Scan failed, dropping push");
      return null;
    }
  }

  private send(socket: FeedSocket, payload: string): void {
    if (socket.readyState !== socket.OPEN) return;
    socket.send(payload);
  }

  // Ping every socket; a pong resets the counter, too many misses terminate
  private heartbeat(): void {
    for (const [socket, subscriber] of this.subscribers) {
      if (socket.readyState !== socket.OPEN) {
        this.subscribers.delete(socket);
        continue;
      }

      subscriber.missedPongs++;
      if (subscriber.missedPongs > this.streamConfig.maxMissedPongs) {
        this.log.warn(
          { missedPongs: subscriber.missedPongs },
          "Too many missed pongs, closing",
        );
        this.subscribers.delete(socket);
        socket.terminate();
        continue;
      }
      socket.ping();
    }
  }
}
