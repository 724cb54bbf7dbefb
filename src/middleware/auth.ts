import { Request, Response, NextFunction, RequestHandler } from "express";
import jwt, { JwtPayload as VerifiedClaims } from "jsonwebtoken";

export type JwtPayload = { sub: string; role: "user" | "admin" };

/**
 * Guards admin routes with a bearer JWT carrying `role: "admin"`.
 * Without a secret the guard lets every request through.
 */
export function requireAdmin(secret?: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!secret) return next();

    const header = req.headers.authorization;
    if (!header?.startsWith("Bearer ")) return res.status(401).json({ error: "Missing token" });
    const token = header.slice(7);

    let payload: string | VerifiedClaims;
    try {
      payload = jwt.verify(token, secret);
    } catch {
      return res.status(401).json({ error: "Invalid token" });
    }
    if (typeof payload === "string" || payload.role !== "admin") {
      return res.status(403).json({ error: "Forbidden" });
    }
    res.locals.adminId = payload.sub;
    next();
  };
}
