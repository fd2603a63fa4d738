import { Router, Request, Response } from "express";
import { z } from "zod";
import { SessionStartError, type SessionRegistry } from "../tracking/registry.js";
import type { DeliveryChannel } from "../tracking/types.js";

export const CoordinatesSchema = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
});

export const StartBodySchema = z.object({
  destinationId: z.string().trim().min(1).max(200),
  position: CoordinatesSchema,
  trackingDurationSeconds: z.number().int().min(60).max(86_400),
  deliveryIntervalMinutes: z.number().int().min(1).max(60),
  language: z.enum(["en", "ru", "fr"]).optional(),
});

const UserIdSchema = z.string().trim().min(1).max(200);

function badRequest(res: Response, error: z.ZodError): void {
  res.status(400).json({ error: "Invalid request", issues: error.issues.map((i) => `${i.path.join(".")}: ${i.message}`) });
}

export function createTrackingRouter(registry: SessionRegistry, channel: DeliveryChannel): Router {
  const router = Router();

  // GET / -- number of active sessions
  router.get("/", (_req: Request, res: Response) => {
    res.json({ active: registry.activeCount() });
  });

  // GET /:userId -- session snapshot
  router.get("/:userId", (req: Request, res: Response) => {
    const snapshot = registry.snapshot(req.params.userId);
    if (!snapshot) {
      res.status(404).json({ error: "Not tracking" });
      return;
    }
    res.json(snapshot);
  });

  // POST /:userId/start -- start (or restart) a live session
  router.post("/:userId/start", async (req: Request, res: Response) => {
    const userId = UserIdSchema.safeParse(req.params.userId);
    if (!userId.success) return badRequest(res, userId.error);
    const body = StartBodySchema.safeParse(req.body);
    if (!body.success) return badRequest(res, body.error);

    const { destinationId, position, trackingDurationSeconds, deliveryIntervalMinutes, language } = body.data;
    try {
      await registry.start(userId.data, destinationId, position, trackingDurationSeconds, deliveryIntervalMinutes, {
        language,
      });
      res.status(201).json(registry.snapshot(userId.data) ?? { userId: userId.data });
    } catch (err) {
      if (err instanceof SessionStartError) {
        console.error(`[tracking] ${err.message}:`, err.cause);
        res.status(503).json({ error: err.message });
        return;
      }
      console.error("[tracking] Unexpected start failure:", err);
      res.status(500).json({ error: "Internal error" });
    }
  });

  // PUT /:userId/position -- position update from the tracking client
  router.put("/:userId/position", async (req: Request, res: Response) => {
    const body = CoordinatesSchema.safeParse(req.body);
    if (!body.success) return badRequest(res, body.error);

    await registry.updatePosition(req.params.userId, body.data);
    res.json({ ok: true, tracking: registry.isTracking(req.params.userId) });
  });

  // POST /:userId/stop -- explicit stop, confirmed to the destination unless the session had already ended
  router.post("/:userId/stop", async (req: Request, res: Response) => {
    const userId = req.params.userId;
    const snapshot = await registry.stop(userId);

    if (snapshot) {
      try {
        await channel.notify(snapshot.destinationId, "stopped", snapshot.language);
      } catch (err) {
        console.error(`[tracking] Stop confirmation for user ${userId} failed:`, err);
      }
    }
    res.json({ ok: true, stopped: snapshot !== undefined });
  });

  return router;
}
