/**
 * send command - streams stdin (or a file) into a new pipe session
 */

import { createReadStream } from "node:fs";
import kleur from "kleur";
import { PipeWriter } from "../../writer.js";
import { parseChunkSize, resolveCommonOptions, type CommonOptions } from "../options.js";

export type SendOptions = CommonOptions & {
	file?: string;
	chunkSize?: string;
};

export async function sendCommand(options: SendOptions) {
	const { transport, secret, logger } = resolveCommonOptions(options);

	const writer = await PipeWriter.open(transport, secret, {
		chunkSize: parseChunkSize(options.chunkSize),
		logger,
	});

	// The id goes to stdout so it can be captured by a script
	process.stdout.write(`${writer.sessionId}\n`);
	console.error(kleur.gray(`   Waiting for: rpipe recv ${writer.sessionId}`));

	const source = options.file ? createReadStream(options.file) : process.stdin;
	await writer.pipeFrom(source);

	console.error(
		kleur.green(`✅ Sent ${writer.bytesWritten} bytes in ${writer.chunksAccepted} chunks`),
	);
}
