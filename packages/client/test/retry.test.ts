import { describe, expect, it } from "vitest";
import { AuthError, StoreFullError, TransferFailedError, TransportError } from "@rpipe/shared";
import { backoffDelay, isTransient, resolveRetryPolicy, withRetry } from "../src/retry.js";
import { recordingSleep } from "./helpers.js";

const policy = { maxAttempts: 3, baseMs: 10, capMs: 15 };

describe("backoffDelay", () => {
	it("doubles up to the cap", () => {
		const p = { maxAttempts: 10, baseMs: 100, capMs: 1000 };
		expect([0, 1, 2, 3, 4, 5].map((n) => backoffDelay(n, p))).toEqual([100, 200, 400, 800, 1000, 1000]);
	});
});

describe("isTransient", () => {
	it("retries only channel failures", () => {
		expect(isTransient(new TransportError("reset"))).toBe(true);
		expect(isTransient(new TransferFailedError("gave up", 3))).toBe(false);
		expect(isTransient(new StoreFullError("full"))).toBe(false);
		expect(isTransient(new Error("plain"))).toBe(false);
	});
});

describe("resolveRetryPolicy", () => {
	it("fills in defaults", () => {
		expect(resolveRetryPolicy({ baseMs: 1 })).toEqual({ maxAttempts: 5, baseMs: 1, capMs: 8000 });
	});

	it("rejects a non-positive attempt count", () => {
		expect(() => resolveRetryPolicy({ maxAttempts: 0 })).toThrow(RangeError);
	});
});

describe("withRetry", () => {
	it("retries transport errors with backoff", async () => {
		const { delays, sleep } = recordingSleep();
		let calls = 0;

		const result = await withRetry(
			"append",
			async () => {
				calls++;
				if (calls < 3) throw new TransportError("connection reset");
				return "done";
			},
			{ policy, sleep },
		);

		expect(result).toBe("done");
		expect(delays).toEqual([10, 15]);
	});

	it("gives up after maxAttempts", async () => {
		const { delays, sleep } = recordingSleep();
		const cause = new TransportError("connection reset");

		const err = await withRetry(
			"append chunk 4",
			async () => {
				throw cause;
			},
			{ policy, sleep },
		).catch((e: unknown) => e);

		expect(err).toBeInstanceOf(TransferFailedError);
		expect(err).toMatchObject({
			message: "append chunk 4 failed after 3 attempts",
			attempts: 3,
			cause,
		});
		expect(delays).toEqual([10, 15]);
	});

	it("does not retry other errors", async () => {
		const { delays, sleep } = recordingSleep();
		let calls = 0;

		await expect(
			withRetry(
				"open",
				async () => {
					calls++;
					throw new AuthError("bad tag");
				},
				{ policy, sleep },
			),
		).rejects.toBeInstanceOf(AuthError);
		expect(calls).toBe(1);
		expect(delays).toEqual([]);
	});

	it("stops when aborted", async () => {
		const controller = new AbortController();
		controller.abort(new Error("cancelled"));

		await expect(withRetry("open", async () => "never", { policy, signal: controller.signal })).rejects.toThrow(
			"cancelled",
		);
	});
});
