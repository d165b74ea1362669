#!/usr/bin/env node
/**
 * CLI entry point
 */

import { Command } from "commander";
import kleur from "kleur";
import { initCommand } from "./commands/init.js";
import { serveCommand } from "./commands/serve.js";
import { CONFIG_FILE_NAME } from "../config.js";

const program = new Command();

program
  .name("rpipe-server")
  .description("Buffering server for encrypted remote pipes")
  .version("0.1.0");

program
  .command("init")
  .description(`Initialize ${CONFIG_FILE_NAME}`)
  .option("--dir <path>", "Project directory", ".")
  .action(async (options: { dir: string }) => {
    if (options.dir !== ".") {
      process.chdir(options.dir);
    }
    await initCommand();
  });

program
  .command("serve")
  .description("Start the pipe server")
  .option("-c, --config <path>", "Config file path", CONFIG_FILE_NAME)
  .option("-p, --port <number>", "Server port")
  .option("--bind <address>", "Bind address")
  .option("--capacity <chunks>", "Max unacked chunks buffered per session")
  .option("--ttl <ms>", "Session inactivity TTL in milliseconds")
  .option("--dir <path>", "Project directory", ".")
  .action(async (options: Parameters<typeof serveCommand>[0] & { dir: string }) => {
    if (options.dir !== ".") {
      process.chdir(options.dir);
    }
    await serveCommand(options);
  });

program.parseAsync().catch((err: unknown) => {
  console.error(kleur.red(`❌ ${err instanceof Error ? err.message : String(err)}`));
  process.exit(1);
});
