import type { FastifyInstance } from "fastify";

/** Only the dashboard served from this daemon's own origin may read responses. */
export function registerCors(app: FastifyInstance, origin: string): void {
  app.addHook("onSend", async (_request, reply, payload) => {
    reply.header("Access-Control-Allow-Origin", origin);
    return payload;
  });

  app.options("*", async (_request, reply) => {
    reply
      .code(204)
      .header("Access-Control-Allow-Methods", "GET, OPTIONS")
      .header("Access-Control-Allow-Headers", "Content-Type, Authorization");
    return reply.send();
  });
}
