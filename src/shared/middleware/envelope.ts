import type { Request, Response, NextFunction } from "express";

function buildMeta(res: Response, extra?: Record<string, unknown>) {
  return {
    requestId: res.locals.requestId,
    ts: new Date().toISOString(),
    ...(extra ?? {}),
  };
}

export function envelope(_req: Request, res: Response, next: NextFunction) {
  res.sendEnvelope = (message, variant, myData) => {
    if (res.headersSent) return res;
    const payload: Record<string, unknown> = { message, variant };
    if (typeof myData !== "undefined") {
      payload.myData = myData;
    }
    return res.json(payload);
  };

  res.ok = (message = "ok", myData) => res.sendEnvelope(message, "success", myData);

  res.fail = (code, message, options = {}) => {
    if (res.headersSent) return res;
    return res.status(options.status ?? 400).json({
      error: {
        code,
        message,
        hint: options.hint,
        fields: options.fields,
      },
      meta: buildMeta(res, options.meta),
    });
  };

  next();
}
