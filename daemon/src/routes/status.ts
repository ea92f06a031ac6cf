import type { FastifyInstance } from "fastify";
import { existsSync } from "node:fs";
import type { PulseConfig } from "../config.js";
import type { RealtimeFeed } from "../stream/feed.js";

const VERSION = "0.1.0";

export function registerStatusRoutes(
  app: FastifyInstance,
  config: PulseConfig,
  feed: RealtimeFeed,
): void {
  app.get("/api/status", async () => {
    return {
      version: VERSION,
      projectsDir: config.scanner.projectsDir,
      projectsDirExists: existsSync(config.scanner.projectsDir),
      activeThresholdSeconds: config.scanner.activeThresholdSeconds,
      idleThresholdSeconds: config.scanner.idleThresholdSeconds,
      streamSubscribers: feed.subscriberCount,
      uptime: process.uptime(),
    };
  });
}
