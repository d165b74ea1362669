import { describe, expect, it } from "vitest";
import {
  AckOutOfRangeError,
  ERROR_STATUS,
  PipeError,
  SequenceMismatchError,
  SessionNotFoundError,
  StoreFullError,
  TransportError,
  errorFromWire,
  isPipeError,
} from "../src/index.js";

describe("PipeError", () => {
  it("names the concrete class", () => {
    const err = new StoreFullError("full");
    expect(err.name).toBe("StoreFullError");
    expect(err.code).toBe("store_full");
    expect(err.category).toBe("capacity");
    expect(err).toBeInstanceOf(PipeError);
    expect(err).toBeInstanceOf(Error);
  });

  it("carries details for the wire", () => {
    const err = new SequenceMismatchError(3, 5);
    expect(err.message).toBe("Sequence mismatch: expected 3, received 5");
    expect(err.details()).toEqual({ expected: 3, received: 5 });
    expect(new StoreFullError("full").details()).toEqual({});
  });

  it("keeps the cause", () => {
    const cause = new Error("socket hang up");
    const err = new TransportError("append failed", undefined, { cause });
    expect(err.cause).toBe(cause);
    expect(err.status).toBeUndefined();
  });
});

describe("ERROR_STATUS", () => {
  it("maps codes to HTTP statuses", () => {
    expect(ERROR_STATUS.session_not_found).toBe(404);
    expect(ERROR_STATUS.sequence_mismatch).toBe(409);
    expect(ERROR_STATUS.store_full).toBe(503);
    expect(ERROR_STATUS.chunk_evicted).toBe(410);
    expect(ERROR_STATUS.access_denied).toBe(401);
  });
});

describe("errorFromWire", () => {
  it("rebuilds typed errors with their details", () => {
    const err = errorFromWire("ack_out_of_range", "ignored", {
      seq: 9,
      nextWriteSeq: 4,
    });
    expect(err).toBeInstanceOf(AckOutOfRangeError);
    expect(err.details()).toEqual({ seq: 9, nextWriteSeq: 4 });
  });

  it("restores the session id", () => {
    const err = errorFromWire("session_not_found", "gone", { sessionId: "abc12345" });
    expect(err).toBeInstanceOf(SessionNotFoundError);
    expect(err.message).toBe("Session abc12345 not found or expired");
  });

  it("falls back to a transport error for unknown codes", () => {
    const err = errorFromWire("teapot", "short and stout");
    expect(err).toBeInstanceOf(TransportError);
    expect(err.message).toBe("teapot: short and stout");
  });
});

describe("isPipeError", () => {
  it("narrows only pipe errors", () => {
    expect(isPipeError(new StoreFullError("full"))).toBe(true);
    expect(isPipeError(new Error("plain"))).toBe(false);
    expect(isPipeError("store_full")).toBe(false);
  });
});
