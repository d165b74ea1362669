/**
 * Shared request/response helpers for the pipe endpoints
 */

import type { Context } from "hono";
import type { Logger } from "pino";
import { z } from "zod";
import {
  AccessDeniedError,
  BadRequestError,
  ERROR_STATUS,
  HEADERS,
  PipeError,
  fromBase64,
  sessionIdSchema,
} from "@rpipe/shared";

const seqParamSchema = z.coerce
  .number()
  .int()
  .nonnegative()
  .max(Number.MAX_SAFE_INTEGER);

const waitParamSchema = z.coerce.number().int().nonnegative();

/**
 * Render any thrown value as `{ ok: false, code, message, ...details }`
 */
export function errorResponse(c: Context, err: unknown, log: Logger) {
  if (err instanceof PipeError) {
    if (err.code === "store_full") {
      c.header(HEADERS.RETRY_AFTER, "1");
    }
    return c.json(
      { ok: false, code: err.code, message: err.message, ...err.details() },
      ERROR_STATUS[err.code]
    );
  }

  log.error({ err }, "Unhandled endpoint error");
  return c.json(
    { ok: false, code: "internal", message: "Internal server error" },
    500
  );
}

export async function readBody<T extends z.ZodTypeAny>(
  c: Context,
  schema: T
): Promise<z.infer<T>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch (err) {
    throw new BadRequestError("Request body must be JSON", { cause: err });
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "body"}: ${i.message}`)
      .join("; ");
    throw new BadRequestError(`Invalid request body: ${issues}`);
  }
  return parsed.data;
}

export function parseSessionId(raw: string): string {
  const parsed = sessionIdSchema.safeParse(raw);
  if (!parsed.success) {
    throw new BadRequestError("Invalid session id");
  }
  return parsed.data;
}

export function parseSeq(raw: string): number {
  const parsed = seqParamSchema.safeParse(raw);
  if (!parsed.success) {
    throw new BadRequestError(`Invalid sequence number "${raw}"`);
  }
  return parsed.data;
}

export function parseWait(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const parsed = waitParamSchema.safeParse(raw);
  if (!parsed.success) {
    throw new BadRequestError(`Invalid wait "${raw}"`);
  }
  return parsed.data;
}

export function bearerToken(c: Context): string {
  const header = c.req.header(HEADERS.AUTHORIZATION);
  const match = header?.match(/^Bearer\s+(\S+)$/i);
  if (!match) {
    throw new AccessDeniedError("Missing write token");
  }
  return match[1];
}

export function readerAuth(c: Context): Uint8Array {
  const header = c.req.header(HEADERS.READER_AUTH);
  if (!header) {
    throw new AccessDeniedError("Missing reader credentials");
  }
  return fromBase64(header);
}
