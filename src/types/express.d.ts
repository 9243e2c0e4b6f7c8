import "express-serve-static-core";

declare module "express-serve-static-core" {
  interface Request {
    requestId?: string;
  }

  interface Response {
    sendEnvelope(message: string, variant: "success" | "error" | "info", myData?: unknown): Response;
    ok(message?: string, myData?: unknown): Response;
    fail(
      code: string,
      message: string,
      options?: {
        hint?: string;
        fields?: Record<string, string[]>;
        status?: number;
        meta?: Record<string, unknown>;
      }
    ): Response;
  }
}
