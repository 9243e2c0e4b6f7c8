import express from "express";
import helmet from "helmet";
import cors from "cors";
import compression from "compression";
import pinoHttp from "pino-http";
import { nanoid } from "nanoid";
import { logger } from "../shared/logger";
import { corsOrigins } from "../shared/config/env";
import { requestContext } from "../shared/middleware/requestContext";
import { envelope } from "../shared/middleware/envelope";
import { errorHandler } from "../shared/middleware/errorHandler";
import { healthRouter } from "./routes/health";
import { metricsRouter, apiRequestDuration } from "./routes/metrics";
import { createAnnouncementsRouter } from "./routes/announcements";
import type { AnnouncementService } from "../services/announcementService";

export interface AppDeps {
  announcementService: AnnouncementService;
}

export function buildApp(deps: AppDeps) {
  const app = express();

  app.disable("x-powered-by");
  app.use(helmet());
  app.use(
    cors({
      origin: corsOrigins(),
      credentials: true,
      methods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
      allowedHeaders: ["Content-Type", "X-Request-ID"],
    })
  );
  app.use(compression());
  app.use(requestContext);

  app.use(
    pinoHttp({
      logger,
      genReqId: (_req, res) => {
        const header = res.getHeader("X-Request-ID");
        return typeof header === "string" ? header : nanoid(12);
      },
      customProps: (req) => ({ route: req.url }),
    })
  );

  app.use(envelope);

  // after envelope: parse failures reach errorHandler with res.fail in place
  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: true, limit: "1mb" }));

  app.use((req, res, next) => {
    const start = process.hrtime.bigint();
    res.on("finish", () => {
      const durationSeconds = Number(process.hrtime.bigint() - start) / 1e9;
      const routeLabel =
        (req.baseUrl ? `${req.baseUrl}${req.route?.path || ""}` : req.route?.path) ||
        req.originalUrl ||
        "unknown";
      apiRequestDuration
        .labels(req.method, routeLabel, String(res.statusCode))
        .observe(durationSeconds);
    });
    next();
  });

  app.use(healthRouter);
  app.use(metricsRouter);

  app.use("/announcements", createAnnouncementsRouter(deps.announcementService));

  app.use((req, res) => {
    res.fail("ROUTE_NOT_FOUND", `Route ${req.originalUrl} not found`, { status: 404 });
  });

  app.use(errorHandler);

  return app;
}
