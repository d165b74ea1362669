/**
 * Retry with exponential backoff for transient transport failures
 */

import { setTimeout as delay } from "node:timers/promises";
import {
	DEFAULT_CLIENT_OPTIONS,
	PipeError,
	TransferFailedError,
} from "@rpipe/shared";
import type { RetryPolicy } from "@rpipe/shared";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryOptions {
	policy: RetryPolicy;
	signal?: AbortSignal;
	sleep?: Sleep;
	onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
}

export const sleep: Sleep = async (ms, signal) => {
	await delay(ms, undefined, { signal });
};

export function resolveRetryPolicy(policy: Partial<RetryPolicy> = {}): RetryPolicy {
	const resolved = { ...DEFAULT_CLIENT_OPTIONS.retry, ...policy };
	if (!Number.isInteger(resolved.maxAttempts) || resolved.maxAttempts < 1) {
		throw new RangeError("retry.maxAttempts must be a positive integer");
	}
	return resolved;
}

/**
 * Delay before retry number `attempt` (0-based): base * 2^attempt, capped
 */
export function backoffDelay(attempt: number, policy: RetryPolicy): number {
	return Math.min(policy.capMs, policy.baseMs * 2 ** attempt);
}

/**
 * Channel failures worth retrying: transport errors and server-side 5xx
 * faults. TransferFailed is already the end of a retry loop.
 */
export function isTransient(err: unknown): boolean {
	return (
		err instanceof PipeError &&
		err.category === "transport" &&
		!(err instanceof TransferFailedError)
	);
}

/**
 * Run `operation` until it succeeds, retrying transient failures up to
 * `policy.maxAttempts` attempts in total. Any other error propagates at once.
 *
 * @throws TransferFailedError once attempts are exhausted
 */
export async function withRetry<T>(
	description: string,
	operation: (attempt: number) => Promise<T>,
	options: RetryOptions,
): Promise<T> {
	const { policy } = options;
	const wait = options.sleep ?? sleep;
	let lastError: unknown;

	for (let attempt = 0; attempt < policy.maxAttempts; attempt++) {
		options.signal?.throwIfAborted();

		try {
			return await operation(attempt);
		} catch (err) {
			if (!isTransient(err)) {
				throw err;
			}
			lastError = err;
			if (attempt + 1 >= policy.maxAttempts) {
				break;
			}

			const delayMs = backoffDelay(attempt, policy);
			options.onRetry?.(attempt + 1, delayMs, err);
			await wait(delayMs, options.signal);
		}
	}

	throw new TransferFailedError(
		`${description} failed after ${policy.maxAttempts} attempts`,
		policy.maxAttempts,
		{ cause: lastError },
	);
}
