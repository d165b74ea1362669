/**
 * @rpipe/client - writer and reader ends of an encrypted remote pipe
 *
 * @example
 * ```typescript
 * import { HttpTransport, PipeReader, PipeWriter } from '@rpipe/client';
 *
 * const transport = new HttpTransport({ baseUrl: 'http://127.0.0.1:7878' });
 *
 * const writer = await PipeWriter.open(transport, secret);
 * await writer.write(data);
 * await writer.close();
 *
 * // elsewhere, given writer.sessionId
 * const reader = await PipeReader.open(transport, secret, sessionId);
 * for await (const bytes of reader) {
 *   process.stdout.write(bytes);
 * }
 * ```
 */

export { PipeWriter, type PipeWriterOptions } from "./writer.js";
export { PipeReader, type PipeReaderOptions } from "./reader.js";
export {
	HttpTransport,
	type FetchInit,
	type FetchLike,
	type FetchResponseLike,
	type HttpTransportOptions,
} from "./transport.js";
export {
	CryptoBox,
	deriveSessionKeys,
	nonceFor,
	readerVerifierOf,
	type SealedChunk,
	type Secret,
	type SessionKeys,
} from "./crypto-box.js";
export {
	Compressor,
	Decompressor,
	compress,
	decompress,
	type CompressionLevel,
} from "./codec.js";
export {
	backoffDelay,
	isTransient,
	resolveRetryPolicy,
	withRetry,
	type RetryOptions,
	type Sleep,
} from "./retry.js";
