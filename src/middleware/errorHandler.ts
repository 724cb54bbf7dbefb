import { Request, Response, NextFunction } from "express";
import { AppError } from "../utils/errors";
import { componentLogger } from "../utils/logger";

const log = componentLogger("errors");

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && "type" in err && err.type === "entity.parse.failed";
}

export function notFoundHandler(_req: Request, res: Response) {
  res.status(404).json({ error: "Route not found" });
}

// Express recognises error handlers by their four parameters
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  if (isBodyParseError(err)) {
    return res.status(400).json({ error: "Invalid JSON body" });
  }
  if (err instanceof AppError && err.statusCode < 500) {
    return res.status(err.statusCode).json({ error: err.message });
  }

  const message = err instanceof AppError ? err.message : "Internal server error";
  const cause = err instanceof AppError ? err.cause : err;
  log.error(message, {
    method: req.method,
    url: req.originalUrl,
    cause: cause instanceof Error ? cause.stack ?? cause.message : String(cause),
  });
  return res.status(500).json({ error: message });
}
