import Fastify from "fastify";
import type { FastifyInstance, FastifyServerOptions } from "fastify";
import fastifyWebsocket from "@fastify/websocket";
import type { PulseConfig } from "./config.js";
import { createAuthHook } from "./auth.js";
import { registerCors } from "./cors.js";
import { SessionScanner } from "./sessions/scanner.js";
import { RealtimeFeed } from "./stream/feed.js";
import type { WatchFn } from "./stream/feed.js";
import { registerStatusRoutes } from "./routes/status.js";
import { registerRealtimeRoutes } from "./routes/realtime.js";

export interface BuildOptions {
  logger?: FastifyServerOptions["logger"];
  /** Clock override for the scanner, in epoch milliseconds */
  now?: () => number;
  watchFn?: WatchFn;
}

export interface PulseApp {
  app: FastifyInstance;
  scanner: SessionScanner;
  feed: RealtimeFeed;
}

export async function buildApp(
  config: PulseConfig,
  options: BuildOptions = {},
): Promise<PulseApp> {
  const app = Fastify({ logger: options.logger ?? false });
  const log = app.log;

  await app.register(fastifyWebsocket);

  registerCors(app, `http://localhost:${config.port}`);
  app.addHook("onRequest", createAuthHook(config));

  const scanner = new SessionScanner(
    { ...config.scanner, now: options.now },
    log.child({ module: "scanner" }),
  );
  const feed = new RealtimeFeed(
    config,
    scanner,
    log.child({ module: "feed" }),
    options.watchFn,
  );

  registerStatusRoutes(app, config, feed);
  registerRealtimeRoutes(app, config, scanner, feed);

  return { app, scanner, feed };
}
