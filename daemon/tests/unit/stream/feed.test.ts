import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from "vitest";
import { RealtimeFeed, type FeedSocket, type WatchFn } from "../../../src/stream/feed.js";
import type { ScanReport } from "../../../src/sessions/types.js";
import { fakeLogger, testConfig } from "../../helpers.js";

class FakeSocket implements FeedSocket {
  readonly OPEN = 1;
  readyState = 1;
  sent: string[] = [];
  pings = 0;
  terminated = false;
  closedWith: { code?: number; reason?: string } | null = null;
  private listeners = new Map<string, Array<(err: Error) => void>>();

  send(data: string): void {
    this.sent.push(data);
  }

  ping(): void {
    this.pings++;
  }

  terminate(): void {
    this.terminated = true;
    this.readyState = 3;
  }

  close(code?: number, reason?: string): void {
    this.closedWith = { code, reason };
    this.readyState = 3;
  }

  on(event: "pong" | "close", listener: () => void): this;
  on(event: "error", listener: (err: Error) => void): this;
  on(event: string, listener: (err: Error) => void): this {
    const list = this.listeners.get(event) ?? [];
    list.push(listener);
    this.listeners.set(event, list);
    return this;
  }

  emit(event: string, err: Error = new Error(event)): void {
    for (const listener of this.listeners.get(event) ?? []) listener(err);
  }
}

const REPORT: ScanReport = {
  timestamp: "2026-03-01T12:00:00.000Z",
  activeSessions: [],
  waitingCount: 2,
  processingCount: 1,
  projectsWithWaiting: ["proj"],
};

const noopWatch: WatchFn = () => async () => {};

describe("RealtimeFeed", () => {
  let scanner: { scan: Mock<() => ScanReport> };
  let log: ReturnType<typeof fakeLogger>;
  let feed: RealtimeFeed;

  beforeEach(() => {
    vi.useFakeTimers();
    scanner = { scan: vi.fn<() => ScanReport>(() => REPORT) };
    log = fakeLogger();
    feed = new RealtimeFeed(testConfig("/tmp/none"), scanner, log, noopWatch);
  });

  afterEach(async () => {
    await feed.stop();
    vi.useRealTimers();
  });

  it("should send the current report on subscribe", () => {
    const socket = new FakeSocket();
    feed.subscribe(socket);

    expect(feed.subscriberCount).toBe(1);
    expect(socket.sent).toHaveLength(1);
    expect(JSON.parse(socket.sent[0])).toEqual({
      timestamp: "2026-03-01T12:00:00.000Z",
      active_sessions: [],
      waiting_count: 2,
      processing_count: 1,
      projects_with_waiting: ["proj"],
    });
  });

  it("should coalesce file events into one push", () => {
    const socket = new FakeSocket();
    feed.subscribe(socket);

    feed.onFileEvent("/p/-a/s1.jsonl");
    feed.onFileEvent("/p/-a/s1.jsonl");
    feed.onFileEvent("/p/-b/s2.jsonl");
    vi.advanceTimersByTime(250);

    expect(scanner.scan).toHaveBeenCalledTimes(2);
    expect(socket.sent).toHaveLength(2);
  });

  it("should ignore events for non-log files", () => {
    feed.subscribe(new FakeSocket());
    feed.onFileEvent("/p/-a/notes.txt");
    vi.advanceTimersByTime(1000);

    expect(scanner.scan).toHaveBeenCalledTimes(1);
  });

  it("should refresh on an interval once started, only with subscribers", async () => {
    const stopWatching = vi.fn(async () => {});
    const watchFn: WatchFn = vi.fn(() => stopWatching);
    feed = new RealtimeFeed(testConfig("/tmp/none"), scanner, log, watchFn);
    feed.start();

    expect(watchFn).toHaveBeenCalledWith("/tmp/none", expect.any(Function), expect.any(Function));

    vi.advanceTimersByTime(5000);
    expect(scanner.scan).not.toHaveBeenCalled();

    const socket = new FakeSocket();
    feed.subscribe(socket);
    vi.advanceTimersByTime(5000);
    expect(socket.sent).toHaveLength(2);

    await feed.stop();
    expect(stopWatching).toHaveBeenCalledTimes(1);
    expect(socket.closedWith).toEqual({ code: 1001, reason: "Server shutting down" });
    expect(feed.subscriberCount).toBe(0);
  });

  it("should push when the watcher reports a log change", () => {
    let onFile: (path: string) => void = () => {};
    const watchFn: WatchFn = (_dir, fileListener) => {
      onFile = fileListener;
      return async () => {};
    };
    feed = new RealtimeFeed(testConfig("/tmp/none"), scanner, log, watchFn);
    feed.start();
    const socket = new FakeSocket();
    feed.subscribe(socket);

    onFile("/tmp/none/-a/s1.jsonl");
    vi.advanceTimersByTime(250);

    expect(socket.sent).toHaveLength(2);
  });

  it("should terminate sockets that stop answering pings", () => {
    feed.start();
    const socket = new FakeSocket();
    feed.subscribe(socket);

    vi.advanceTimersByTime(30_000 * 3);
    expect(socket.pings).toBe(3);
    expect(socket.terminated).toBe(false);

    vi.advanceTimersByTime(30_000);
    expect(socket.terminated).toBe(true);
    expect(feed.subscriberCount).toBe(0);
  });

  it("should keep sockets that answer pings", () => {
    feed.start();
    const socket = new FakeSocket();
    feed.subscribe(socket);

    for (let i = 0; i < 6; i++) {
      vi.advanceTimersByTime(30_000);
      socket.emit("pong");
    }

    expect(socket.pings).toBe(6);
    expect(socket.terminated).toBe(false);
  });

  it("should drop a subscriber when its socket closes", () => {
    const socket = new FakeSocket();
    feed.subscribe(socket);
    socket.emit("close");

    expect(feed.subscriberCount).toBe(0);
  });

  it("should log socket errors and drop the subscriber", () => {
    const socket = new FakeSocket();
    feed.subscribe(socket);
    socket.emit("error", new Error("reset"));

    expect(feed.subscriberCount).toBe(0);
    expect(log.warn).toHaveBeenCalledWith({ err: new Error("reset") }, "Stream socket error");
  });

  it("should log a failed scan and keep the socket", () => {
    scanner.scan.mockImplementation(() => {
      throw new Error("disk gone");
    });
    const socket = new FakeSocket();
    feed.subscribe(socket);

    expect(socket.sent).toEqual([]);
    expect(feed.subscriberCount).toBe(1);
    expect(log.error).toHaveBeenCalledWith({ err: new Error("disk gone") }, "Scan failed, dropping push");
  });

  it("should not send to sockets that are no longer open", () => {
    const socket = new FakeSocket();
    socket.readyState = 2;
    feed.subscribe(socket);

    expect(socket.sent).toEqual([]);
  });
});
