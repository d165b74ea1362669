/**
 * HTTP realization of the pipe transport
 */

import { fetch as undiciFetch } from "undici";
import type { z } from "zod";
import {
	HEADERS,
	TransportError,
	ackResponseSchema,
	chunkFromWire,
	chunkToWire,
	errorBodySchema,
	errorFromWire,
	fetchResponseSchema,
	okResponseSchema,
	openSessionResponseSchema,
	sessionResponseSchema,
	appendResponseSchema,
	toBase64,
} from "@rpipe/shared";
import type {
	AppendOutcome,
	ChunkRecord,
	FetchChunkOptions,
	FetchOutcome,
	HandshakeParams,
	OpenSessionResponse,
	PipeTransport,
	RequestOptions,
	SessionInfo,
} from "@rpipe/shared";

export interface FetchInit {
	method: string;
	headers: Record<string, string>;
	body?: string;
	signal?: AbortSignal;
}

export interface FetchResponseLike {
	status: number;
	json(): Promise<unknown>;
}

/**
 * Minimal fetch signature; undici's fetch and Hono's `app.request` both fit
 */
export type FetchLike = (url: string, init: FetchInit) => Promise<FetchResponseLike>;

export interface HttpTransportOptions {
	baseUrl: string;
	fetch?: FetchLike;
	requestTimeoutMs?: number;
}

interface RawResponse {
	status: number;
	body: unknown;
}

interface CallOptions extends RequestOptions {
	body?: unknown;
	headers?: Record<string, string>;
	timeoutMs?: number;
}

const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

export class HttpTransport implements PipeTransport {
	private baseUrl: string;
	private fetchFn: FetchLike;
	private requestTimeoutMs: number;

	constructor(options: HttpTransportOptions) {
		this.baseUrl = options.baseUrl.replace(/\/+$/, "");
		this.fetchFn = options.fetch ?? ((url, init) => undiciFetch(url, init));
		this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
	}

	async openSession(
		params: HandshakeParams,
		options: RequestOptions = {},
	): Promise<OpenSessionResponse> {
		const res = await this.call("POST", "/sessions", { ...options, body: params });
		if (res.status !== 201) this.fail(res);

		const { sessionId, writeToken, session } = this.parse(openSessionResponseSchema, res);
		return { sessionId, writeToken, session };
	}

	async describeSession(sessionId: string, options: RequestOptions = {}): Promise<SessionInfo> {
		const res = await this.call("GET", sessionPath(sessionId), options);
		if (res.status !== 200) this.fail(res);

		return this.parse(sessionResponseSchema, res).session;
	}

	async appendChunk(
		sessionId: string,
		writeToken: string,
		chunk: ChunkRecord,
		options: RequestOptions = {},
	): Promise<AppendOutcome> {
		const { seq, ...body } = chunkToWire(chunk);
		const res = await this.call("PUT", `${sessionPath(sessionId)}/chunks/${seq}`, {
			...options,
			body,
			headers: bearer(writeToken),
		});

		if (res.status === 200) {
			const { ok: _ok, ...accepted } = this.parse(appendResponseSchema, res);
			return accepted;
		}

		const error = this.toError(res);
		switch (error.code) {
			case "sequence_mismatch":
				return { status: "sequence_mismatch", expected: errorNumber(res, "expected") };
			case "store_full":
				return { status: "store_full" };
			case "session_not_found":
				return { status: "session_not_found" };
			default:
				throw error;
		}
	}

	async fetchChunk(
		sessionId: string,
		seq: number,
		options: FetchChunkOptions = {},
	): Promise<FetchOutcome> {
		const waitMs = options.waitMs ?? 0;
		const query = waitMs > 0 ? `?wait=${waitMs}` : "";
		const res = await this.call("GET", `${sessionPath(sessionId)}/chunks/${seq}${query}`, {
			signal: options.signal,
			timeoutMs: this.requestTimeoutMs + waitMs,
		});

		if (res.status === 200 || res.status === 202) {
			const parsed = this.parse(fetchResponseSchema, res);
			if (parsed.status === "ok") {
				return { status: "ok", chunk: chunkFromWire(parsed.chunk) };
			}
			return {
				status: "not_yet_available",
				nextWriteSeq: parsed.nextWriteSeq,
				state: parsed.state,
			};
		}

		const error = this.toError(res);
		if (error.code === "session_not_found") {
			return { status: "session_not_found" };
		}
		throw error;
	}

	async ack(
		sessionId: string,
		seq: number,
		readerAuth: Uint8Array,
		options: RequestOptions = {},
	): Promise<{ ackedThrough: number }> {
		const res = await this.call("POST", `${sessionPath(sessionId)}/ack`, {
			...options,
			body: { seq },
			headers: { [HEADERS.READER_AUTH]: toBase64(readerAuth) },
		});
		if (res.status !== 200) this.fail(res);

		return { ackedThrough: this.parse(ackResponseSchema, res).ackedThrough };
	}

	async sealSession(
		sessionId: string,
		writeToken: string,
		options: RequestOptions = {},
	): Promise<SessionInfo> {
		const res = await this.call("POST", `${sessionPath(sessionId)}/seal`, {
			...options,
			headers: bearer(writeToken),
		});
		if (res.status !== 200) this.fail(res);

		return this.parse(sessionResponseSchema, res).session;
	}

	async closeSession(
		sessionId: string,
		readerAuth: Uint8Array,
		options: RequestOptions = {},
	): Promise<void> {
		const res = await this.call("DELETE", sessionPath(sessionId), {
			...options,
			headers: { [HEADERS.READER_AUTH]: toBase64(readerAuth) },
		});
		if (res.status !== 200) this.fail(res);

		this.parse(okResponseSchema, res);
	}

	private async call(method: string, path: string, options: CallOptions): Promise<RawResponse> {
		const timeout = AbortSignal.timeout(options.timeoutMs ?? this.requestTimeoutMs);
		const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

		const headers: Record<string, string> = { ...options.headers };
		let body: string | undefined;
		if (options.body !== undefined) {
			headers["content-type"] = HEADERS.CONTENT_TYPE_JSON;
			body = JSON.stringify(options.body);
		}

		let response: FetchResponseLike;
		try {
			response = await this.fetchFn(`${this.baseUrl}${path}`, { method, headers, body, signal });
		} catch (err) {
			// Caller cancellation is not a channel failure
			options.signal?.throwIfAborted();
			const reason = err instanceof Error ? err.message : String(err);
			throw new TransportError(`${method} ${path} failed: ${reason}`, undefined, { cause: err });
		}

		let parsed: unknown;
		try {
			parsed = await response.json();
		} catch (err) {
			throw new TransportError(
				`${method} ${path} returned a non-JSON body (HTTP ${response.status})`,
				response.status,
				{ cause: err },
			);
		}

		return { status: response.status, body: parsed };
	}

	private parse<T extends z.ZodTypeAny>(schema: T, res: RawResponse): z.infer<T> {
		const parsed = schema.safeParse(res.body);
		if (!parsed.success) {
			throw new TransportError(
				`Unexpected response shape (HTTP ${res.status}): ${parsed.error.message}`,
				res.status,
			);
		}
		return parsed.data;
	}

	private toError(res: RawResponse) {
		const parsed = errorBodySchema.safeParse(res.body);
		if (!parsed.success) {
			return new TransportError(`Unexpected HTTP ${res.status}`, res.status);
		}
		const { code, message, ok: _ok, ...details } = parsed.data;
		return errorFromWire(code, message, details);
	}

	private fail(res: RawResponse): never {
		throw this.toError(res);
	}
}

function sessionPath(sessionId: string): string {
	return `/sessions/${encodeURIComponent(sessionId)}`;
}

function bearer(token: string): Record<string, string> {
	return { [HEADERS.AUTHORIZATION]: `Bearer ${token}` };
}

function errorNumber(res: RawResponse, key: string): number {
	const parsed = errorBodySchema.safeParse(res.body);
	const value = parsed.success ? parsed.data[key] : undefined;
	if (typeof value !== "number") {
		throw new TransportError(`Error body is missing "${key}"`, res.status);
	}
	return value;
}
