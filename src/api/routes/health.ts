import { Router, Response } from "express";
import mongoose from "mongoose";

export const healthRouter = Router();

const healthResponder = (_req: unknown, res: Response) =>
  res.ok("health ok", { status: "ok", timestamp: new Date().toISOString() });

healthRouter.get("/health", healthResponder);

healthRouter.get("/readiness", (_req, res) => {
  const mongoReady = mongoose.connection.readyState === 1;
  if (mongoReady) {
    return res.ok("ready", { checks: { mongo: mongoReady } });
  }
  return res.fail("NOT_READY", "Dependencies not ready", {
    status: 503,
    meta: { checks: { mongo: mongoReady } },
  });
});
