import { loadConfig } from "./config.js";
import { buildApp } from "./app.js";

async function main(): Promise<void> {
  const config = loadConfig();

  const { app, feed } = await buildApp(config, {
    logger: {
      level: process.env.LOG_LEVEL ?? "info",
      transport:
        process.env.NODE_ENV !== "production"
          ? { target: "pino-pretty", options: { colorize: true } }
          : undefined,
    },
  });
  const log = app.log;

  if (!config.auth.psk && config.host !== "127.0.0.1" && config.host !== "localhost") {
    log.warn({ host: config.host }, "Listening beyond localhost without auth.psk set");
  }

  feed.start();

  await app.listen({ port: config.port, host: config.host });
  log.info(
    {
      port: config.port,
      host: config.host,
      projectsDir: config.scanner.projectsDir,
    },
    "Session monitor started",
  );

  const shutdown = async (signal: string): Promise<void> => {
    log.info({ signal }, "Shutting down...");
    await feed.stop();
    await app.close();
    process.exit(0);
  };

  const onSignal = (signal: string): void => {
    shutdown(signal).catch((err) => {
      log.error({ err }, "Shutdown failed");
      process.exit(1);
    });
  };

  process.on("SIGINT", () => onSignal("SIGINT"));
  process.on("SIGTERM", () => onSignal("SIGTERM"));
}

main().catch((err) => {
  console.error("Fatal error starting daemon:", err);
  process.exit(1);
});
