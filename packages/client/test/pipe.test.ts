import { describe, expect, it } from "vitest";
import {
	AuthError,
	SessionNotFoundError,
	TransferFailedError,
	TransportError,
	concatBytes,
} from "@rpipe/shared";
import type { FetchOutcome, PipeTransport } from "@rpipe/shared";
import { PipeReader } from "../src/reader.js";
import { PipeWriter } from "../src/writer.js";
import { createTestPipe, decodeText, fastRetry, silentLogger, text } from "./helpers.js";

const secret = "test-secret";

function passThrough(inner: PipeTransport): PipeTransport {
	return {
		openSession: (params, options) => inner.openSession(params, options),
		describeSession: (id, options) => inner.describeSession(id, options),
		appendChunk: (id, token, chunk, options) => inner.appendChunk(id, token, chunk, options),
		fetchChunk: (id, seq, options) => inner.fetchChunk(id, seq, options),
		ack: (id, seq, auth, options) => inner.ack(id, seq, auth, options),
		sealSession: (id, token, options) => inner.sealSession(id, token, options),
		closeSession: (id, auth, options) => inner.closeSession(id, auth, options),
	};
}

/**
 * Flips one ciphertext bit in fetched chunks at `seq`, `times` times
 */
function corrupting(inner: PipeTransport, seq: number, times: number): PipeTransport {
	let remaining = times;
	return {
		...passThrough(inner),
		fetchChunk: async (id, s, options): Promise<FetchOutcome> => {
			const outcome = await inner.fetchChunk(id, s, options);
			if (outcome.status !== "ok" || s !== seq || remaining === 0) {
				return outcome;
			}
			remaining--;
			const ciphertext = Uint8Array.from(outcome.chunk.ciphertext);
			ciphertext[0] ^= 0x80;
			return { status: "ok", chunk: { ...outcome.chunk, ciphertext } };
		},
	};
}

describe("pipe end to end", () => {
	it("finishes reading when the close response is lost", async () => {
		const { manager, transport } = await createTestPipe();
		let lost = 0;
		const flaky: PipeTransport = {
			...passThrough(transport),
			closeSession: async (id, auth, options) => {
				await transport.closeSession(id, auth, options);
				if (lost++ === 0) throw new TransportError("socket hang up");
			},
		};

		const writer = await PipeWriter.open(transport, secret, { chunkSize: 4 });
		await writer.write(text("HelloWorld"));
		await writer.close();

		const reader = await PipeReader.open(flaky, secret, writer.sessionId, { retry: fastRetry });
		expect(decodeText(await reader.readAll())).toBe("HelloWorld");
		expect(lost).toBe(1);
		expect(() => manager.describe(writer.sessionId)).toThrow(SessionNotFoundError);
	});

	it("finishes writing when the reader drains the session before the final append is confirmed", async () => {
		const { transport } = await createTestPipe();
		let received = "";
		const flaky: PipeTransport = {
			...passThrough(transport),
			appendChunk: async (id, token, chunk, options) => {
				const outcome = await transport.appendChunk(id, token, chunk, options);
				if (chunk.isLast && received === "") {
					const reader = await PipeReader.open(transport, secret, id);
					received = decodeText(await reader.readAll());
					throw new TransportError("socket hang up");
				}
				return outcome;
			},
		};

		const writer = await PipeWriter.open(flaky, secret, { chunkSize: 4, retry: fastRetry });
		await writer.write(text("HelloWorld"));
		await writer.close();

		expect(received).toBe("HelloWorld");
		expect(writer.chunksAccepted).toBe(3);
	});

	it("delivers HelloWorld in three chunks and closes the session", async () => {
		const { manager, transport } = await createTestPipe();

		const writer = await PipeWriter.open(transport, secret, { chunkSize: 4, logger: silentLogger });
		expect(manager.describe(writer.sessionId).state).toBe("open");

		await writer.write(text("HelloWorld"));
		await writer.close();
		expect(manager.describe(writer.sessionId)).toMatchObject({ state: "sealed", nextWriteSeq: 3 });

		const reader = await PipeReader.open(transport, secret, writer.sessionId, {
			logger: silentLogger,
		});
		const data = await reader.readAll();

		expect(decodeText(data)).toBe("HelloWorld");
		expect(reader.position).toBe(3);
		expect(reader.bytesRead).toBe(10);
		expect(() => manager.describe(writer.sessionId)).toThrow(SessionNotFoundError);
	});

	it("streams concurrently through a small buffer", async () => {
		const { transport } = await createTestPipe({ bufferCapacity: 2 });
		const lines = Array.from({ length: 50 }, (_, i) => text(`line ${i}\n`));
		const expected = decodeText(concatBytes(lines));

		const writer = await PipeWriter.open(transport, secret, { chunkSize: 16 });
		const reader = await PipeReader.open(transport, secret, writer.sessionId, {
			fetchWaitMs: 100,
			retry: fastRetry,
		});

		const [, received] = await Promise.all([writer.pipeFrom(lines), reader.readAll()]);

		expect(decodeText(received)).toBe(expected);
		expect(reader.position).toBe(writer.chunksAccepted);
	});

	it("delivers an empty stream", async () => {
		const { transport } = await createTestPipe();
		const writer = await PipeWriter.open(transport, secret);
		await writer.close();

		const reader = await PipeReader.open(transport, secret, writer.sessionId);
		const data = await reader.readAll();

		expect(data.byteLength).toBe(0);
		expect(reader.position).toBe(1);
	});

	it("reads only once", async () => {
		const { transport } = await createTestPipe();
		const writer = await PipeWriter.open(transport, secret);
		await writer.write(text("once"));
		await writer.close();

		const reader = await PipeReader.open(transport, secret, writer.sessionId);
		await reader.readAll();

		expect(() => reader[Symbol.asyncIterator]()).toThrow(/can only be read once$/);
	});

	it("acks each chunk once the consumer moves on", async () => {
		const { manager, transport } = await createTestPipe();
		const rows = Array.from({ length: 32 }, (_, i) => `row ${i} `).join("");
		const writer = await PipeWriter.open(transport, secret, { chunkSize: 64 });
		await writer.write(text(rows));
		await writer.close();

		const reader = await PipeReader.open(transport, secret, writer.sessionId);
		const iterator = reader[Symbol.asyncIterator]();

		// Output can trail a frame, so pull until something arrives
		let first = await iterator.next();
		while (!first.done && first.value.byteLength === 0) {
			first = await iterator.next();
		}
		expect(first.done).toBe(false);
		const ackedWhileHeld = manager.describe(writer.sessionId).ackedThrough;
		expect(ackedWhileHeld).toBe(reader.position - 1);

		await iterator.next();
		expect(manager.describe(writer.sessionId).ackedThrough).toBeGreaterThan(ackedWhileHeld);
	});

	it("refuses a reader with the wrong secret", async () => {
		const { transport } = await createTestPipe();
		const writer = await PipeWriter.open(transport, secret);

		await expect(PipeReader.open(transport, "wrong-secret", writer.sessionId)).rejects.toThrow(
			AuthError,
		);
	});

	it("reports an unknown session", async () => {
		const { transport } = await createTestPipe();
		await expect(PipeReader.open(transport, secret, "missing-session")).rejects.toBeInstanceOf(
			SessionNotFoundError,
		);
	});

	it("recovers from one corrupted fetch", async () => {
		const { transport } = await createTestPipe();
		const writer = await PipeWriter.open(transport, secret, { chunkSize: 4 });
		await writer.write(text("HelloWorld"));
		await writer.close();

		const reader = await PipeReader.open(corrupting(transport, 1, 1), secret, writer.sessionId);
		expect(decodeText(await reader.readAll())).toBe("HelloWorld");
	});

	it("fails on a chunk that stays corrupted", async () => {
		const { transport } = await createTestPipe();
		const writer = await PipeWriter.open(transport, secret, { chunkSize: 4 });
		await writer.write(text("HelloWorld"));
		await writer.close();

		const reader = await PipeReader.open(corrupting(transport, 1, 2), secret, writer.sessionId);
		await expect(reader.readAll()).rejects.toThrow("Chunk 1 failed authentication");
	});

	it("gives up on a writer that goes quiet", async () => {
		const { transport } = await createTestPipe();
		const writer = await PipeWriter.open(transport, secret);

		const reader = await PipeReader.open(transport, secret, writer.sessionId, {
			fetchWaitMs: 0,
			idleTimeoutMs: 50,
			retry: fastRetry,
		});

		await expect(reader.readAll()).rejects.toBeInstanceOf(TransferFailedError);
	});

	it("stops reading when the session expires", async () => {
		const { manager, transport } = await createTestPipe({ sessionTtlMs: 1 });
		const writer = await PipeWriter.open(transport, secret, { chunkSize: 4 });
		await writer.write(text("HelloWorld"));

		const reader = await PipeReader.open(transport, secret, writer.sessionId, {
			retry: fastRetry,
		});
		await new Promise((resolve) => setTimeout(resolve, 10));
		expect(await manager.sweep()).toEqual([writer.sessionId]);

		await expect(reader.readAll()).rejects.toBeInstanceOf(SessionNotFoundError);
	});
});
