import http from "http";
import { Server as IOServer } from "socket.io";

import config from "./config.js";
import { createApp } from "./app.js";
import { ClaudeCliGenerator, findClaudeBinary } from "./claude/cli-generator.js";
import { MessageCatalog } from "./delivery/messages.js";
import {
  SocketDeliveryChannel,
  type ClientToServerEvents,
  type ServerToClientEvents,
} from "./delivery/socket-channel.js";
import { setupSocketHandler, type LiveServer } from "./socket/handler.js";
import { SessionRegistry } from "./tracking/registry.js";

// ---- Shared services ----
const catalog = MessageCatalog.fromFile();

const generator = new ClaudeCliGenerator({
  binary: config.claudeBin || findClaudeBinary(),
  model: config.claudeModel,
  fallbackPlace: (language) => catalog.nearYou(language),
});

// ---- HTTP + Socket.IO ----
// The channel needs io and the app needs the channel, so io is attached to the server after
const io: LiveServer = new IOServer<ClientToServerEvents, ServerToClientEvents>({
  cors: {
    origin: config.allowedOrigins,
    methods: ["GET", "POST"],
  },
});

const channel = new SocketDeliveryChannel(
  {
    message: (room, payload) => io.to(room).emit("live:message", payload),
    notice: (room, payload) => io.to(room).emit("live:notice", payload),
  },
  catalog
);

const registry = new SessionRegistry({
  generator,
  channel,
  formatter: catalog,
  policy: config.tracker,
  defaultLanguage: config.defaultLanguage,
});

const app = createApp({
  registry,
  channel,
  authToken: config.authToken,
  allowedOrigins: config.allowedOrigins,
});

const server = http.createServer(app);
io.attach(server);
setupSocketHandler(io, registry, config.authToken);

if (!config.authToken) {
  console.warn("[live-facts] AUTH_TOKEN is not set, API and socket are unauthenticated");
}

// ---- Graceful shutdown ----
let isShuttingDown = false;

async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;

  console.log(`[live-facts] ${signal} received, stopping ${registry.activeCount()} session(s)`);
  server.close();

  const timeout = new Promise<"timeout">((resolve) => {
    setTimeout(() => resolve("timeout"), config.gracefulTimeoutMs).unref();
  });
  const outcome = await Promise.race([registry.shutdown().then(() => "done" as const), timeout]);
  if (outcome === "timeout") {
    console.warn(`[live-facts] Sessions did not stop within ${config.gracefulTimeoutMs}ms, exiting anyway`);
  }

  await io.close();
  process.exit(0);
}

server.listen(config.port, config.host, () => {
  console.log(`[live-facts] Server running at http://${config.host}:${config.port}`);
});

process.on("SIGTERM", () => {
  gracefulShutdown("SIGTERM").catch((err: unknown) => {
    console.error("[live-facts] Shutdown failed:", err);
    process.exit(1);
  });
});
process.on("SIGINT", () => {
  gracefulShutdown("SIGINT").catch((err: unknown) => {
    console.error("[live-facts] Shutdown failed:", err);
    process.exit(1);
  });
});
