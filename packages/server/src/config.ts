/**
 * Server configuration - rpipe.config.json merged with environment and CLI
 * overrides (priority: CLI > ENV > config file > defaults)
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { DEFAULT_SERVER_CONFIG } from "@rpipe/shared";
import type { PipeServerConfig } from "@rpipe/shared";

export const CONFIG_FILE_NAME = "rpipe.config.json";

const positiveInt = z.coerce.number().int().positive();

export const serverConfigSchema = z
  .object({
    port: z.coerce.number().int().min(0).max(65535),
    bindAddress: z.string().min(1),
    bufferCapacity: positiveInt,
    sessionTtlMs: positiveInt,
    sweepIntervalMs: positiveInt,
    appendWaitMs: z.coerce.number().int().nonnegative(),
    maxFetchWaitMs: z.coerce.number().int().nonnegative(),
    maxChunkBytes: positiveInt,
    maxSessions: positiveInt,
    tokenTtlMs: positiveInt,
    keyDir: z.string().min(1),
  })
  .strict();

const partialConfigSchema = serverConfigSchema.partial();

/**
 * Environment variables recognized by the server
 */
export const ENV_VARS = {
  RPIPE_PORT: "port",
  RPIPE_BIND: "bindAddress",
  RPIPE_BUFFER_CAPACITY: "bufferCapacity",
  RPIPE_SESSION_TTL_MS: "sessionTtlMs",
  RPIPE_KEY_DIR: "keyDir",
} as const satisfies Record<string, keyof PipeServerConfig>;

export function configFromEnv(
  env: NodeJS.ProcessEnv
): Partial<Record<keyof PipeServerConfig, string>> {
  const out: Partial<Record<keyof PipeServerConfig, string>> = {};
  for (const [name, key] of Object.entries(ENV_VARS)) {
    const value = env[name];
    if (value !== undefined && value !== "") {
      out[key] = value;
    }
  }
  return out;
}

export function resolveServerConfig(
  fileConfig: unknown,
  env: NodeJS.ProcessEnv = {},
  overrides: Partial<Record<keyof PipeServerConfig, string | number>> = {}
): PipeServerConfig {
  const layers: Array<[string, unknown]> = [
    ["config file", fileConfig ?? {}],
    ["environment", configFromEnv(env)],
    [
      "command line",
      Object.fromEntries(
        Object.entries(overrides).filter(([, value]) => value !== undefined)
      ),
    ],
  ];

  let merged: PipeServerConfig = { ...DEFAULT_SERVER_CONFIG };
  for (const [source, layer] of layers) {
    const parsed = partialConfigSchema.safeParse(layer);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
        .join("; ");
      throw new Error(`Invalid ${source} configuration: ${issues}`);
    }
    merged = { ...merged, ...parsed.data };
  }

  return merged;
}

export async function loadServerConfig(
  configPath: string | null,
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<Record<keyof PipeServerConfig, string | number>> = {}
): Promise<PipeServerConfig> {
  let fileConfig: unknown = {};
  if (configPath) {
    const text = await readFile(configPath, "utf-8");
    try {
      fileConfig = JSON.parse(text);
    } catch (err) {
      throw new Error(`${configPath} is not valid JSON`, { cause: err });
    }
  }
  return resolveServerConfig(fileConfig, env, overrides);
}
