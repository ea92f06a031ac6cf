import type { FastifyRequest, FastifyReply } from "fastify";
import type { PulseConfig } from "./config.js";
import { timingSafeEqual } from "node:crypto";

/** Timing-safe PSK comparison. */
export function verifyPsk(psk: string, expected: string): boolean {
  const a = Buffer.from(psk, "utf-8");
  const b = Buffer.from(expected, "utf-8");
  if (a.length !== b.length) return false;
  return timingSafeEqual(a, b);
}

/** True when `token` is acceptable for this config. An empty PSK disables auth. */
export function isAuthorized(config: PulseConfig, token: string | undefined): boolean {
  if (!config.auth.psk) return true;
  if (!token) return false;
  return verifyPsk(token, config.auth.psk);
}

export function createAuthHook(config: PulseConfig) {
  return async function authenticate(
    request: FastifyRequest,
    reply: FastifyReply,
  ): Promise<FastifyReply | undefined> {
    if (!config.auth.psk) return;

    // Status is public, preflights carry no credentials, and the stream
    // checks its own ?token= query param
    if (request.method === "OPTIONS") return;
    const path = request.url.split("?")[0];
    if (path === "/api/status") return;
    if (path === "/api/realtime/stream") return;

    const authHeader = request.headers.authorization;
    if (!authHeader?.startsWith("Bearer ")) {
      reply.code(401).send({
        error: "UNAUTHORIZED",
        message: "Missing or invalid Authorization header",
        action: "Include 'Authorization: Bearer <psk>' header",
      });
      return reply;
    }

    if (!isAuthorized(config, authHeader.slice(7))) {
      request.log.warn({ ip: request.ip }, "Failed authentication attempt");
      reply.code(401).send({
        error: "UNAUTHORIZED",
        message: "Invalid pre-shared key",
        action: "Check auth.psk in the daemon config",
      });
      return reply;
    }
  };
}
