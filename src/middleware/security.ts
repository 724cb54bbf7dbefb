import { Request, Response, NextFunction, RequestHandler } from "express";
import { componentLogger } from "../utils/logger";

const log = componentLogger("http");

export function getClientIp(req: Request): string {
  const xf = req.headers["x-forwarded-for"];
  const forwarded = (Array.isArray(xf) ? xf[0] : xf ?? "").split(",")[0].trim();
  return forwarded || req.ip || req.socket.remoteAddress || "unknown";
}

// Warns about responses that take longer than thresholdMs to finish
export function logSlowRequests(thresholdMs: number): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const startTime = Date.now();
    res.on("finish", () => {
      const duration = Date.now() - startTime;
      if (duration > thresholdMs) {
        log.warn("Slow request", {
          ip: getClientIp(req),
          method: req.method,
          url: req.originalUrl,
          status: res.statusCode,
          durationMs: duration,
          userAgent: req.get("User-Agent"),
        });
      }
    });
    next();
  };
}
