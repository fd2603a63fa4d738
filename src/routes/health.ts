import { Router, Request, Response } from "express";
import type { SessionRegistry } from "../tracking/registry.js";

export function createHealthRouter(registry: SessionRegistry): Router {
  const router = Router();

  router.get("/", (_req: Request, res: Response) => {
    res.json({
      ok: true,
      uptime: process.uptime(),
      activeSessions: registry.activeCount(),
    });
  });

  return router;
}
