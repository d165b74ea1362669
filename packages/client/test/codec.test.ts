import { describe, expect, it } from "vitest";
import { CodecError, concatBytes } from "@rpipe/shared";
import { Compressor, Decompressor, compress, decompress } from "../src/codec.js";
import { decodeText, text } from "./helpers.js";

async function collect(source: AsyncIterable<Uint8Array>): Promise<Uint8Array[]> {
	const out: Uint8Array[] = [];
	for await (const item of source) out.push(item);
	return out;
}

describe("codec", () => {
	it("restores the input across frames", async () => {
		const pieces = [text("the quick brown fox "), text("jumps over "), text("the lazy dog")];

		const frames = await collect(compress(pieces));
		expect(frames).toHaveLength(3);

		const restored = concatBytes(await collect(decompress(frames)));
		expect(decodeText(restored)).toBe("the quick brown fox jumps over the lazy dog");
	});

	it("shrinks repetitive data", () => {
		const input = text("abc".repeat(1000));
		const frame = new Compressor().compressFrame(input, true);
		expect(frame.byteLength).toBeLessThan(100);
	});

	it("encodes empty input as a single final frame", async () => {
		const frames = await collect(compress([]));
		expect(frames).toHaveLength(1);
		expect(await collect(decompress(frames))).toEqual([]);
	});

	it("rejects a malformed frame", () => {
		const decompressor = new Decompressor();
		expect(() => decompressor.decompressFrame(new Uint8Array([0xff, 0xff, 0xff, 0xff]), true)).toThrow(
			CodecError,
		);
	});

	it("stays failed after a malformed frame", () => {
		const decompressor = new Decompressor();
		const bad = new Uint8Array([0xff, 0xff, 0xff, 0xff]);
		expect(() => decompressor.decompressFrame(bad)).toThrow(CodecError);
		expect(() => decompressor.decompressFrame(new Uint8Array(0), true)).toThrow(
			/^Malformed compressed frame/,
		);
	});

	it("refuses frames after the final one", () => {
		const compressor = new Compressor();
		const decompressor = new Decompressor();
		decompressor.decompressFrame(compressor.compressFrame(text("done"), true), true);

		expect(() => decompressor.decompressFrame(new Uint8Array([1]))).toThrow(
			"Frame received after the final frame",
		);
		expect(() => compressor.compressFrame(text("more"))).toThrow(CodecError);
	});

	it("fails on a stream with no frames", async () => {
		await expect(collect(decompress([]))).rejects.toBeInstanceOf(CodecError);
	});
});
