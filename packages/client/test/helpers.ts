import { pino } from "pino";
import { DEFAULT_SERVER_CONFIG, SessionNotFoundError } from "@rpipe/shared";
import type {
	AppendOutcome,
	ChunkRecord,
	FetchOutcome,
	HandshakeParams,
	OpenSessionResponse,
	PipeServerConfig,
	PipeTransport,
	SessionInfo,
} from "@rpipe/shared";
import { SessionManager, createApp, generateSigningKeys } from "@rpipe/server";
import { HttpTransport } from "../src/transport.js";

export const silentLogger = pino({ level: "silent" });

export const fastRetry = { maxAttempts: 3, baseMs: 10, capMs: 100 };

/**
 * Server app answering in process, with a transport bound to it
 */
export async function createTestPipe(config: Partial<PipeServerConfig> = {}) {
	const manager = new SessionManager({
		config: {
			...DEFAULT_SERVER_CONFIG,
			bufferCapacity: 4,
			appendWaitMs: 1_000,
			maxFetchWaitMs: 200,
			...config,
		},
		signingKeys: await generateSigningKeys(),
		logger: silentLogger,
	});
	await manager.initialize();
	const app = createApp(manager, silentLogger);

	const transport = new HttpTransport({
		baseUrl: "http://pipe.test/",
		fetch: (url, init) => Promise.resolve(app.request(url, init)),
	});

	return { manager, app, transport };
}

/**
 * Records sleeps instead of waiting
 */
export function recordingSleep() {
	const delays: number[] = [];
	const sleep = async (ms: number) => {
		delays.push(ms);
	};
	return { delays, sleep };
}

type AppendScript = (chunk: ChunkRecord, call: number) => AppendOutcome | Error;

/**
 * Transport double for the writer: append outcomes come from a script,
 * everything the script lets through is accepted in order.
 */
export class ScriptedTransport implements PipeTransport {
	readonly appended: ChunkRecord[] = [];
	readonly sealed: string[] = [];
	readonly handshakes: HandshakeParams[] = [];
	private calls = 0;

	constructor(private script: AppendScript = () => new Error("unused")) {}

	async openSession(params: HandshakeParams): Promise<OpenSessionResponse> {
		this.handshakes.push(params);
		return {
			sessionId: "scripted-session",
			writeToken: "test-token",
			session: this.info(params),
		};
	}

	async describeSession(sessionId: string): Promise<SessionInfo> {
		throw new SessionNotFoundError(sessionId);
	}

	async appendChunk(
		_sessionId: string,
		_writeToken: string,
		chunk: ChunkRecord,
	): Promise<AppendOutcome> {
		const scripted = this.script(chunk, this.calls++);
		if (scripted instanceof Error) throw scripted;
		if (scripted.status === "accepted") {
			this.appended.push(chunk);
		}
		return scripted;
	}

	async fetchChunk(): Promise<FetchOutcome> {
		return { status: "session_not_found" };
	}

	async ack(): Promise<{ ackedThrough: number }> {
		return { ackedThrough: -1 };
	}

	async sealSession(sessionId: string): Promise<SessionInfo> {
		this.sealed.push(sessionId);
		return {
			...this.info({ kdf: "hkdf-sha256", salt: "", nonceBase: "", readerVerifier: "" }),
			state: "sealed",
		};
	}

	async closeSession(): Promise<void> {}

	private info(params: HandshakeParams): SessionInfo {
		return {
			id: "scripted-session",
			state: "open",
			createdAt: 0,
			lastActivityAt: 0,
			nextWriteSeq: 0,
			ackedThrough: -1,
			capacity: 4,
			...params,
		};
	}
}

/**
 * Accept every chunk in order
 */
export function acceptAll(chunk: ChunkRecord): AppendOutcome {
	return {
		status: "accepted",
		seq: chunk.seq,
		nextWriteSeq: chunk.seq + 1,
		duplicate: false,
		sealed: chunk.isLast,
	};
}

export const text = (s: string) => new TextEncoder().encode(s);
export const decodeText = (b: Uint8Array) => new TextDecoder().decode(b);
