/**
 * Session endpoints: open, describe, seal (writer close), close (reader)
 */

import type { Hono } from "hono";
import { ENDPOINTS, handshakeSchema } from "@rpipe/shared";
import type { SessionManager } from "../services/session-manager.js";
import { bearerToken, parseSessionId, readBody, readerAuth } from "./http.js";

export function setupSessionEndpoints(
  app: Hono,
  sessionManager: SessionManager
) {
  // Open session
  app.post(ENDPOINTS.SESSIONS, async (c) => {
    const params = await readBody(c, handshakeSchema);
    const opened = await sessionManager.openSession(params);

    return c.json({ ok: true, ...opened }, 201);
  });

  // Public session info (readers need the salt and nonce base)
  app.get(ENDPOINTS.SESSION, (c) => {
    const session = sessionManager.describe(parseSessionId(c.req.param("id")));
    return c.json({ ok: true, session });
  });

  // Writer close: seal the stream
  app.post(ENDPOINTS.SESSION_SEAL, async (c) => {
    const sessionId = parseSessionId(c.req.param("id"));
    await sessionManager.verifyWriter(sessionId, bearerToken(c));

    const session = await sessionManager.seal(sessionId);
    return c.json({ ok: true, session });
  });

  // Reader close: release a sealed, fully acked session
  app.delete(ENDPOINTS.SESSION, async (c) => {
    const sessionId = parseSessionId(c.req.param("id"));
    sessionManager.verifyReader(sessionId, readerAuth(c));

    const session = await sessionManager.close(sessionId);
    return c.json({ ok: true, session });
  });
}
