/**
 * Main server entry point
 */

import { Hono } from "hono";
import { serve } from "@hono/node-server";
import { logger } from "hono/logger";
import { pino, type Logger } from "pino";
import { ENDPOINTS } from "@rpipe/shared";
import type { PipeServerConfig } from "@rpipe/shared";
import { SessionManager } from "./services/session-manager.js";
import { SessionSweeper } from "./services/session-sweeper.js";
import type { SigningKeyPair } from "./services/crypto.js";
import { setupSessionEndpoints } from "./endpoints/session.js";
import { setupChunkEndpoints } from "./endpoints/chunks.js";
import { errorResponse } from "./endpoints/http.js";

export { SessionManager } from "./services/session-manager.js";
export { SessionSweeper } from "./services/session-sweeper.js";
export { ChunkStore, digestChunk } from "./services/chunk-store.js";
export { KeyedLock } from "./services/keyed-lock.js";
export {
  ensureSigningKeys,
  generateSigningKeys,
  type SigningKeyPair,
} from "./services/crypto.js";

export interface ServerOptions {
  config: PipeServerConfig;
  signingKeys: SigningKeyPair;
  logger?: Logger;
}

export interface RunningServer {
  app: Hono;
  sessionManager: SessionManager;
  sweeper: SessionSweeper;
  close: () => Promise<void>;
}

/**
 * Build the HTTP app around a session manager. Used by `startServer` and,
 * without a listening socket, by tests through `app.request`.
 */
export function createApp(sessionManager: SessionManager, log: Logger): Hono {
  const app = new Hono();

  // Request logging through pino
  app.use(
    "*",
    logger((message, ...rest) => log.info([message, ...rest].join(" ")))
  );

  app.onError((err, c) => errorResponse(c, err, log));

  app.get(ENDPOINTS.HEALTH, (c) => {
    return c.json({
      ok: true,
      name: "rpipe-server",
      status: "running",
      sessions: sessionManager.size,
    });
  });

  setupSessionEndpoints(app, sessionManager);
  setupChunkEndpoints(app, sessionManager, log);

  return app;
}

export async function startServer(options: ServerOptions): Promise<RunningServer> {
  const { config } = options;

  // Logger
  const log =
    options.logger ??
    pino({
      transport: {
        target: "pino-pretty",
        options: { colorize: true, destination: 2 },
      },
    });

  // Initialize services
  const sessionManager = new SessionManager({
    config,
    signingKeys: options.signingKeys,
    logger: log,
  });
  await sessionManager.initialize();

  const sweeper = new SessionSweeper(
    sessionManager,
    { intervalMs: config.sweepIntervalMs },
    log
  );
  sweeper.start();

  const app = createApp(sessionManager, log);

  // Start server
  const server = serve(
    {
      fetch: app.fetch,
      port: config.port,
      hostname: config.bindAddress,
    },
    (info) => {
      log.info(`Server listening on http://${info.address}:${info.port}`);
    }
  );

  const close = () =>
    new Promise<void>((resolve, reject) => {
      sweeper.stop();
      sessionManager.clear();
      server.close((err) => (err ? reject(err) : resolve()));
    });

  return { app, sessionManager, sweeper, close };
}
