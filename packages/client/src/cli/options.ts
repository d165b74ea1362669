/**
 * Options shared by the send and recv commands
 */

import { pino, type Logger } from "pino";
import type { Secret } from "../crypto-box.js";
import { HttpTransport } from "../transport.js";

export const DEFAULT_SERVER_URL = "http://127.0.0.1:7878";

export const CLIENT_ENV_VARS = {
	SERVER: "RPIPE_SERVER",
	SECRET: "RPIPE_SECRET",
} as const;

export type CommonOptions = {
	server?: string;
	secret?: string;
	verbose?: boolean;
};

export interface ResolvedOptions {
	transport: HttpTransport;
	secret: Secret;
	logger: Logger;
}

/**
 * Flags win over the environment. The secret has no default.
 */
export function resolveCommonOptions(
	options: CommonOptions,
	env: NodeJS.ProcessEnv = process.env,
): ResolvedOptions {
	const secret = options.secret ?? env[CLIENT_ENV_VARS.SECRET];
	if (!secret) {
		throw new Error(`A shared secret is required: pass --secret or set ${CLIENT_ENV_VARS.SECRET}`);
	}

	const baseUrl = options.server ?? env[CLIENT_ENV_VARS.SERVER] ?? DEFAULT_SERVER_URL;

	// stdout carries pipe data, so logs go to stderr
	const logger = pino({
		level: options.verbose ? "debug" : "warn",
		transport: {
			target: "pino-pretty",
			options: { colorize: true, destination: 2 },
		},
	});

	return { transport: new HttpTransport({ baseUrl }), secret, logger };
}

export function parseChunkSize(value: string | undefined): number | undefined {
	if (value === undefined) return undefined;
	const size = Number(value);
	if (!Number.isInteger(size) || size < 1) {
		throw new Error(`Invalid chunk size: ${value}`);
	}
	return size;
}
