import http from "http";
import { env } from "./shared/config/env";
import { initSentry } from "./observability/sentry";
import { logger } from "./shared/logger";
import { connectMongo, disconnectMongo } from "./db/mongoose";
import { buildApp } from "./api/server";
import { container } from "./shared/bootstrap";

initSentry();

async function start() {
  try {
    await connectMongo();

    const app = buildApp({ announcementService: container.resolve("announcementService") });
    const httpServer = http.createServer(app);

    httpServer.listen(env.PORT, () => {
      logger.info({ msg: "API listening", port: env.PORT, env: env.NODE_ENV });
    });

    const shutdown = (signal: NodeJS.Signals) => {
      logger.info({ msg: "Shutting down", signal });
      httpServer.close(() => {
        disconnectMongo()
          .then(() => process.exit(0))
          .catch((err) => {
            logger.error({ msg: "Mongo disconnect failed", err });
            process.exit(1);
          });
      });
    };
    process.once("SIGTERM", shutdown);
    process.once("SIGINT", shutdown);
  } catch (err) {
    logger.fatal({ msg: "Failed to start server", err });
    process.exit(1);
  }
}

process.on("unhandledRejection", (reason) => {
  logger.error({ msg: "unhandledRejection", reason });
});

process.on("uncaughtException", (err) => {
  logger.fatal({ msg: "uncaughtException", err });
  process.exit(1);
});

void start();
