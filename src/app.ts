import express, { type ErrorRequestHandler, type Express } from "express";
import cors from "cors";
import rateLimit from "express-rate-limit";
import { createAuthMiddleware } from "./auth.js";
import { createHealthRouter } from "./routes/health.js";
import { createTrackingRouter } from "./routes/tracking.js";
import type { SessionRegistry } from "./tracking/registry.js";
import type { DeliveryChannel } from "./tracking/types.js";

export interface AppDeps {
  registry: SessionRegistry;
  channel: DeliveryChannel;
  authToken: string;
  allowedOrigins: string[];
}

export function createApp({ registry, channel, authToken, allowedOrigins }: AppDeps): Express {
  const app = express();

  app.use(cors({ origin: allowedOrigins, credentials: true }));
  app.use(express.json({ limit: "64kb" }));
  app.use(createAuthMiddleware(authToken));

  // Position updates arrive every few seconds per user, so only starts are tightly limited
  const generalLimiter = rateLimit({
    windowMs: 15 * 60 * 1000,
    max: 5000,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: "Too many requests, please slow down" },
  });

  const startLimiter = rateLimit({
    windowMs: 15 * 60 * 1000,
    max: 60,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: "Too many session start requests" },
  });

  app.use("/api/health", generalLimiter, createHealthRouter(registry));
  app.use("/api/tracking/:userId/start", startLimiter);
  app.use("/api/tracking", generalLimiter, createTrackingRouter(registry, channel));

  app.use("/api", (_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  // Malformed JSON bodies and anything a route did not handle
  const errorHandler: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
    const status =
      typeof err === "object" && err !== null && "status" in err && typeof err.status === "number"
        ? err.status
        : 500;
    if (status >= 500) console.error("[http] Unhandled error:", err);
    res.status(status).json({ error: status >= 500 ? "Internal error" : "Bad request" });
  };
  app.use(errorHandler);

  return app;
}
