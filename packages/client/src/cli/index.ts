#!/usr/bin/env node
/**
 * CLI entry point
 */

import { Command } from "commander";
import kleur from "kleur";
import { sendCommand, type SendOptions } from "./commands/send.js";
import { recvCommand, type RecvOptions } from "./commands/recv.js";
import { CLIENT_ENV_VARS } from "./options.js";

const program = new Command();

program
	.name("rpipe")
	.description("Send and receive bytes through an encrypted remote pipe")
	.version("0.1.0")
	.option("-s, --server <url>", `Pipe server URL (env ${CLIENT_ENV_VARS.SERVER})`)
	.option("--secret <secret>", `Shared secret (env ${CLIENT_ENV_VARS.SECRET})`)
	.option("-v, --verbose", "Log transfer progress to stderr");

program
	.command("send")
	.description("Open a pipe and stream stdin into it; prints the session id")
	.option("-f, --file <path>", "Read from a file instead of stdin")
	.option("--chunk-size <bytes>", "Plaintext bytes per chunk")
	.action(async (options: SendOptions) => {
		await sendCommand({ ...program.opts<SendOptions>(), ...options });
	});

program
	.command("recv")
	.description("Read a pipe to stdout")
	.argument("<sessionId>", "Session id printed by send")
	.option("-o, --output <path>", "Write to a file instead of stdout")
	.action(async (sessionId: string, options: RecvOptions) => {
		await recvCommand(sessionId, { ...program.opts<RecvOptions>(), ...options });
	});

program.parseAsync().catch((err: unknown) => {
	console.error(kleur.red(`❌ ${err instanceof Error ? err.message : String(err)}`));
	process.exit(1);
});
