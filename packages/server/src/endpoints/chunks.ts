/**
 * Chunk endpoints: append, fetch, ack
 */

import type { Hono } from "hono";
import type { Logger } from "pino";
import {
  ENDPOINTS,
  SequenceMismatchError,
  StoreFullError,
  ackBodySchema,
  appendChunkBodySchema,
  chunkFromWire,
  chunkToWire,
} from "@rpipe/shared";
import type { SessionManager } from "../services/session-manager.js";
import {
  bearerToken,
  errorResponse,
  parseSeq,
  parseSessionId,
  parseWait,
  readBody,
  readerAuth,
} from "./http.js";

export function setupChunkEndpoints(
  app: Hono,
  sessionManager: SessionManager,
  log: Logger
) {
  app.put(ENDPOINTS.CHUNK, async (c) => {
    const sessionId = parseSessionId(c.req.param("id"));
    const seq = parseSeq(c.req.param("seq"));
    await sessionManager.verifyWriter(sessionId, bearerToken(c));

    const body = await readBody(c, appendChunkBodySchema);
    const result = await sessionManager.appendChunk(
      sessionId,
      chunkFromWire({ ...body, seq }),
      { waitMs: parseWait(c.req.query("wait")) }
    );

    switch (result.status) {
      case "accepted":
        return c.json({ ok: true, ...result });
      case "sequence_mismatch":
        return errorResponse(
          c,
          new SequenceMismatchError(result.expected, seq),
          log
        );
      case "store_full":
        return errorResponse(
          c,
          new StoreFullError(
            `Buffer for session ${sessionId} is full, ack pending chunks first`
          ),
          log
        );
    }
  });

  app.get(ENDPOINTS.CHUNK, async (c) => {
    const sessionId = parseSessionId(c.req.param("id"));
    const seq = parseSeq(c.req.param("seq"));

    const result = await sessionManager.fetchChunk(sessionId, seq, {
      waitMs: parseWait(c.req.query("wait")),
    });

    if (result.status === "ok") {
      return c.json({ ok: true, status: "ok", chunk: chunkToWire(result.chunk) });
    }
    return c.json({ ok: true, ...result }, 202);
  });

  app.post(ENDPOINTS.SESSION_ACK, async (c) => {
    const sessionId = parseSessionId(c.req.param("id"));
    sessionManager.verifyReader(sessionId, readerAuth(c));

    const { seq } = await readBody(c, ackBodySchema);
    const ackedThrough = sessionManager.ack(sessionId, seq);

    return c.json({ ok: true, ackedThrough });
  });
}
