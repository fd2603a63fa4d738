import type { Server as IOServer } from "socket.io";
import { z } from "zod";
import { safeTokenCompare } from "../auth.js";
import type { SessionRegistry } from "../tracking/registry.js";
import type { ClientToServerEvents, ServerToClientEvents } from "../delivery/socket-channel.js";
import { CoordinatesSchema } from "../routes/tracking.js";

export type LiveServer = IOServer<ClientToServerEvents, ServerToClientEvents>;

// ---- Handshake rate limiter ----
// After HANDSHAKE_MAX_FAILURES failed auths in HANDSHAKE_WINDOW_MS, an IP is
// rejected until the window expires.
const HANDSHAKE_MAX_FAILURES = 5;
const HANDSHAKE_WINDOW_MS = 60_000;

interface FailureEntry {
  count: number;
  windowStart: number;
}

const SubscribeSchema = z.object({ destinationId: z.string().trim().min(1).max(200) });
const PositionSchema = CoordinatesSchema.extend({ userId: z.string().trim().min(1).max(200) });

export function setupSocketHandler(io: LiveServer, registry: SessionRegistry, authToken: string): void {
  const handshakeFailures = new Map<string, FailureEntry>();

  function isHandshakeRateLimited(ip: string): boolean {
    const entry = handshakeFailures.get(ip);
    if (!entry) return false;
    if (Date.now() - entry.windowStart > HANDSHAKE_WINDOW_MS) {
      handshakeFailures.delete(ip);
      return false;
    }
    return entry.count >= HANDSHAKE_MAX_FAILURES;
  }

  function recordHandshakeFailure(ip: string): void {
    const now = Date.now();
    const entry = handshakeFailures.get(ip);
    if (!entry || now - entry.windowStart > HANDSHAKE_WINDOW_MS) {
      handshakeFailures.set(ip, { count: 1, windowStart: now });
    } else {
      entry.count++;
    }
  }

  io.use((socket, next) => {
    if (!authToken) {
      next();
      return;
    }
    const ip = socket.handshake.address;
    if (isHandshakeRateLimited(ip)) {
      next(new Error("Too many failed attempts"));
      return;
    }
    const token: unknown = socket.handshake.auth.token;
    if (typeof token === "string" && safeTokenCompare(token, authToken)) {
      next();
      return;
    }
    recordHandshakeFailure(ip);
    console.warn(`[socket] Rejected handshake from ${ip}`);
    next(new Error("Unauthorized"));
  });

  io.on("connection", (socket) => {
    socket.on("live:subscribe", (data) => {
      const parsed = SubscribeSchema.safeParse(data);
      if (!parsed.success) return;
      void socket.join(parsed.data.destinationId);
    });

    socket.on("live:position", (data) => {
      const parsed = PositionSchema.safeParse(data);
      if (!parsed.success) return;
      const { userId, latitude, longitude } = parsed.data;
      registry.updatePosition(userId, { latitude, longitude }).catch((err: unknown) => {
        console.error(`[socket] Position update for user ${userId} failed:`, err);
      });
    });
  });
}
