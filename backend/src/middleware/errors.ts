import type { ErrorRequestHandler } from "express";
import type { Logger } from "pino";
import { isTokenError } from "@capped-token/sdk";

export function errorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req, res, _next) => {
    logger.error({ err, path: req.path }, "Request failed");
    if (isTokenError(err)) {
      res.status(500).json({ error: err.message, code: err.code });
      return;
    }
    res.status(500).json({ error: err instanceof Error ? err.message : "Internal error" });
  };
}
