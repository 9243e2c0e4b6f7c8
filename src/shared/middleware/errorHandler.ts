import type { Request, Response, NextFunction } from "express";
import * as Sentry from "@sentry/node";
import { ZodError } from "zod";
import { logger } from "../logger";
import { ServiceError } from "../errors/serviceError";

function isMalformedBody(err: unknown): boolean {
  return err instanceof SyntaxError && "type" in err && err.type === "entity.parse.failed";
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (err instanceof ServiceError) {
    return res.fail(err.code, err.message, { status: err.status });
  }

  // Zod validation errors
  if (err instanceof ZodError) {
    const fields = Object.fromEntries(
      err.issues.reduce<Map<string, string[]>>((map, issue) => {
        const key = issue.path.join(".") || "_error";
        const arr = map.get(key) ?? [];
        arr.push(issue.message);
        map.set(key, arr);
        return map;
      }, new Map())
    );
    return res.fail("VALIDATION_ERROR", "Invalid request", { status: 422, fields });
  }

  if (isMalformedBody(err)) {
    return res.fail("MALFORMED_BODY", "Request body is not valid JSON", { status: 400 });
  }

  // Generic errors: store diagnostics stay in the logs
  logger.error({ msg: "Unhandled error", err });
  Sentry.captureException(err);
  return res.fail("INTERNAL_ERROR", "Something went wrong", { status: 500 });
}
