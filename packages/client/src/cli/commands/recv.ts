/**
 * recv command - drains a pipe session to stdout (or a file)
 */

import { createWriteStream } from "node:fs";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import kleur from "kleur";
import { PipeReader } from "../../reader.js";
import { resolveCommonOptions, type CommonOptions } from "../options.js";

export type RecvOptions = CommonOptions & {
	output?: string;
};

export async function recvCommand(sessionId: string, options: RecvOptions) {
	const { transport, secret, logger } = resolveCommonOptions(options);

	const reader = await PipeReader.open(transport, secret, sessionId, { logger });
	const sink = options.output ? createWriteStream(options.output) : process.stdout;

	await pipeline(Readable.from(reader), sink);

	console.error(kleur.green(`✅ Received ${reader.bytesRead} bytes in ${reader.position} chunks`));
}
