/**
 * init command - creates rpipe.config.json
 */

import { writeFile, access } from "node:fs/promises";
import { resolve } from "node:path";
import kleur from "kleur";
import { DEFAULT_SERVER_CONFIG } from "@rpipe/shared";
import { CONFIG_FILE_NAME } from "../../config.js";

export async function initCommand() {
  const configPath = resolve(process.cwd(), CONFIG_FILE_NAME);

  // Check if config already exists
  try {
    await access(configPath);
    console.error(kleur.yellow(`⚠ ${CONFIG_FILE_NAME} already exists`));
    return;
  } catch {
    // File doesn't exist, continue
  }

  await writeFile(
    configPath,
    JSON.stringify(DEFAULT_SERVER_CONFIG, null, 2) + "\n",
    "utf-8"
  );

  console.error(kleur.green(`✅ Created ${CONFIG_FILE_NAME}`));
  console.error("\nNext steps:");
  console.error(`  1. Edit ${CONFIG_FILE_NAME} to tune buffer capacity and TTLs`);
  console.error("  2. Run: rpipe-server serve");
}
