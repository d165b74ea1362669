import { readFileSync } from "node:fs";
import { describe, expect, it } from "vitest";
import { z } from "zod";

const root = new URL("../../../", import.meta.url);

const manifestSchema = z.object({
  name: z.string(),
  main: z.string(),
  types: z.string(),
  exports: z.object({
    ".": z.object({ source: z.string(), types: z.string(), default: z.string() }),
  }),
  bin: z.record(z.string()).optional(),
});

const buildConfigSchema = z.object({
  compilerOptions: z.object({ rootDir: z.string(), outDir: z.string() }),
});

function read(path: string): string {
  return readFileSync(new URL(path, root), "utf8");
}

describe("workspace packaging", () => {
  it.each(["shared", "server", "client"])(
    "%s runs from its build output and type-checks from source",
    (name) => {
      const manifest = manifestSchema.parse(JSON.parse(read(`packages/${name}/package.json`)));
      expect(manifest.exports["."]).toEqual({
        source: "./src/index.ts",
        types: "./dist/index.d.ts",
        default: "./dist/index.js",
      });
      expect(manifest.main).toBe("./dist/index.js");

      const build = buildConfigSchema.parse(
        JSON.parse(read(`packages/${name}/tsconfig.build.json`))
      );
      expect(build.compilerOptions).toMatchObject({ rootDir: "src", outDir: "dist" });
    }
  );

  it.each([
    ["server", "rpipe-server"],
    ["client", "rpipe"],
  ])("%s CLI is a built entry point with a node shebang", (name, command) => {
    const manifest = manifestSchema.parse(JSON.parse(read(`packages/${name}/package.json`)));
    expect(manifest.bin).toEqual({ [command]: "./dist/cli/index.js" });
    expect(read(`packages/${name}/src/cli/index.ts`).split("\n")[0]).toBe("#!/usr/bin/env node");
  });
});
