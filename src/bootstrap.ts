import type { Server } from "node:http";

import { config } from "./config";
import { MemoryFacade } from "./facade";
import { logger } from "./logger";
import { createApp, startServer } from "./server";

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
    server.closeIdleConnections();
  });
}

async function bootstrap(): Promise<void> {
  const facade = new MemoryFacade({ agentsDir: config.agentsDir, settingsPath: config.settingsPath, logger });
  const app = createApp({ facade, agentsDir: config.agentsDir, settingsPath: config.settingsPath, logger });
  const server = await startServer(app, { host: config.host, port: config.port }, logger);

  let stopping = false;
  const shutdown = async (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, "shutting down");

    const force = setTimeout(() => {
      logger.error("shutdown grace period elapsed, exiting");
      process.exit(1);
    }, config.shutdownGraceMs);
    force.unref();

    try {
      await closeServer(server);
      await app.close();
      logger.info("shutdown complete");
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, "shutdown failed");
      process.exit(1);
    }
  };

  process.on("SIGINT", (signal) => void shutdown(signal));
  process.on("SIGTERM", (signal) => void shutdown(signal));
}

bootstrap().catch((error: unknown) => {
  logger.fatal({ err: error }, "bootstrap failed");
  process.exit(1);
});
