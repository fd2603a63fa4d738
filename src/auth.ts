import { Request, Response, NextFunction, RequestHandler } from "express";
import { timingSafeEqual, createHash } from "crypto";

/**
 * Constant-time token comparison to prevent timing side-channel attacks.
 */
export function safeTokenCompare(a: string, b: string): boolean {
  if (!a || !b) return false;
  const hashA = createHash("sha256").update(a).digest();
  const hashB = createHash("sha256").update(b).digest();
  return timingSafeEqual(hashA, hashB);
}

/**
 * Express middleware that validates the Bearer header against `authToken`.
 *
 * Skips auth for the health check, for non-API routes, and entirely when no
 * token is configured.
 */
export function createAuthMiddleware(authToken: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!req.path.startsWith("/api/")) {
      next();
      return;
    }

    if (req.method === "GET" && req.path === "/api/health") {
      next();
      return;
    }

    if (!authToken) {
      next();
      return;
    }

    const authHeader = req.headers.authorization;
    if (authHeader?.startsWith("Bearer ") && safeTokenCompare(authHeader.slice(7), authToken)) {
      next();
      return;
    }

    res.status(401).json({ error: "Unauthorized" });
  };
}
