import dotenv from "dotenv";
dotenv.config();

import { createServer } from "http";
import { createApp } from "./index";
import { loadConfig } from "./config/env";
import { bootstrapContext } from "./context";
import { logger } from "./utils/logger";

const main = async () => {
  const config = loadConfig();

  const { context, close } = await bootstrapContext(config);
  const httpServer = createServer(createApp(context));

  const shutdown = async (signal: string) => {
    logger.warn(`Received ${signal}. Shutting down gracefully...`);
    try {
      await new Promise<void>((resolve, reject) => {
        httpServer.close((err) => (err ? reject(err) : resolve()));
      });
      await close();
      logger.info("Shutdown complete.");
      process.exit(0);
    } catch (err) {
      logger.error("Shutdown error:", err);
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("unhandledRejection", (reason) => {
    logger.error("Unhandled Promise Rejection:", reason);
  });

  httpServer.listen(config.port, "0.0.0.0", () => {
    logger.info(`Server running on port ${config.port} (${config.nodeEnv}, ${config.storage.driver} storage)`);
  });
};

main().catch((err) => {
  logger.error("Failed to start server:", err);
  process.exit(1);
});
