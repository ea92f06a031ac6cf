import type { FastifyInstance } from "fastify";
import type { PulseConfig } from "../config.js";
import { isAuthorized } from "../auth.js";
import { toReportJson } from "../sessions/scanner.js";
import type { SessionScanner } from "../sessions/scanner.js";
import type { RealtimeFeed } from "../stream/feed.js";

export function registerRealtimeRoutes(
  app: FastifyInstance,
  config: PulseConfig,
  scanner: SessionScanner,
  feed: RealtimeFeed,
): void {
  // GET /api/realtime: one fresh scan per request
  app.get("/api/realtime", async (request, reply) => {
    try {
      return toReportJson(scanner.scan());
    } catch (err) {
      request.log.error({ err }, "Realtime scan failed");
      reply.code(500);
      return {
        error: "SCAN_FAILED",
        message: "Could not scan session logs",
        action: "Check the daemon log for details",
      };
    }
  });

  // WS /api/realtime/stream: pushes the same report on change
  app.get<{ Querystring: { token?: string } }>(
    "/api/realtime/stream",
    {
      websocket: true,
      schema: {
        querystring: {
          type: "object",
          properties: { token: { type: "string" } },
        },
      },
    },
    (socket, request) => {
      // Browsers cannot set headers on a WS handshake, so the key rides in the query
      if (!isAuthorized(config, request.query.token)) {
        request.log.warn({ ip: request.ip }, "Unauthorized stream connection attempt");
        socket.close(4401, "Unauthorized");
        return;
      }
      feed.subscribe(socket);
    },
  );
}
