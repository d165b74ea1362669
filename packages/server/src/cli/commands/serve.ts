/**
 * serve command - starts the pipe server
 */

import { existsSync } from "node:fs";
import { resolve } from "node:path";
import kleur from "kleur";
import { startServer } from "../../index.js";
import { ensureSigningKeys } from "../../services/crypto.js";
import { CONFIG_FILE_NAME, loadServerConfig } from "../../config.js";

export interface ServeOptions {
  config: string;
  port?: string;
  bind?: string;
  capacity?: string;
  ttl?: string;
}

const SHUTDOWN_GRACE_MS = 30_000;

export async function serveCommand(options: ServeOptions) {
  const configPath = resolve(process.cwd(), options.config);
  const hasConfigFile = existsSync(configPath);

  if (!hasConfigFile && options.config !== CONFIG_FILE_NAME) {
    console.error(kleur.red(`❌ ${options.config} not found`));
    process.exit(1);
  }

  const config = await loadServerConfig(
    hasConfigFile ? configPath : null,
    process.env,
    {
      port: options.port,
      bindAddress: options.bind,
      bufferCapacity: options.capacity,
      sessionTtlMs: options.ttl,
    }
  );

  // First run: generate signing keys for writer tokens
  const keyDir = resolve(process.cwd(), config.keyDir);
  const keys = await ensureSigningKeys(keyDir);
  if (keys.created) {
    console.error(kleur.cyan("🔑 Generated Ed25519 signing keys"));
  }
  console.error(kleur.gray(`   Fingerprint: ${keys.fingerprint}`));

  console.error(kleur.cyan("🚀 Starting rpipe server..."));
  const running = await startServer({ config, signingKeys: keys });

  const host = config.bindAddress === "0.0.0.0" ? "127.0.0.1" : config.bindAddress;
  console.error(kleur.green(`✅ Server started at http://${host}:${config.port}`));
  console.error(
    kleur.gray(
      `   Buffer capacity: ${config.bufferCapacity} chunks, session TTL: ${config.sessionTtlMs}ms`
    )
  );

  // Graceful shutdown
  process.once("SIGTERM", () => {
    console.error(kleur.yellow("SIGTERM received, shutting down gracefully..."));

    // Force close after grace period
    setTimeout(() => {
      console.error(kleur.red("Forcing shutdown after grace period"));
      process.exit(1);
    }, SHUTDOWN_GRACE_MS).unref();

    running.close().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error(kleur.red(`Shutdown failed: ${String(err)}`));
        process.exit(1);
      }
    );
  });
}
