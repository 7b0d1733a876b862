/**
 * Tests for the published entry points
 *
 * Node loads the workspaces through their package.json files, so every
 * runtime entry must name compiled JavaScript under dist/.
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { spawnSync } from "node:child_process";
import { existsSync, readFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { VERSION } from "./cli/constants.js";

const cliRoot = resolve(dirname(fileURLToPath(import.meta.url)), "..");
const packagesRoot = resolve(cliRoot, "..");

const readJson = (path: string): unknown =>
  JSON.parse(readFileSync(path, "utf-8"));

/**
 * Nested field of parsed JSON, or undefined when any step is missing
 */
const field = (value: unknown, ...keys: readonly string[]): unknown => {
  let current = value;
  for (const key of keys) {
    if (typeof current !== "object" || current === null) return undefined;
    current = Object.getOwnPropertyDescriptor(current, key)?.value;
  }
  return current;
};

const packageDir = (name: "core" | "cli"): string => join(packagesRoot, name);

describe("Build Output", () => {
  for (const [name, entry] of [
    ["core", "index"],
    ["cli", "cli"],
  ] as const) {
    describe(`@flagline/${name}`, () => {
      const manifest = readJson(join(packageDir(name), "package.json"));
      const buildConfig = readJson(
        join(packageDir(name), "tsconfig.build.json")
      );

      it("should export compiled JavaScript by default", () => {
        expect(field(manifest, "exports", ".", "default")).to.equal(
          `./dist/${entry}.js`
        );
        expect(field(manifest, "exports", ".", "types")).to.equal(
          `./dist/${entry}.d.ts`
        );
        expect(field(manifest, "main")).to.equal(`./dist/${entry}.js`);
      });

      it("should export its sources under the source condition", () => {
        const source = field(manifest, "exports", ".", "source");
        expect(source).to.equal(`./src/${entry}.ts`);
        expect(existsSync(join(packageDir(name), `src/${entry}.ts`))).to.equal(
          true
        );
      });

      it("should compile src/ into dist/", () => {
        expect(field(buildConfig, "compilerOptions", "rootDir")).to.equal(
          "./src"
        );
        expect(field(buildConfig, "compilerOptions", "outDir")).to.equal(
          "./dist"
        );
        expect(
          field(buildConfig, "compilerOptions", "customConditions")
        ).to.deep.equal([]);
      });
    });
  }

  it("should point the binary at the compiled entry", () => {
    const manifest = readJson(join(cliRoot, "package.json"));
    expect(field(manifest, "bin", "flagline")).to.equal("./dist/index.js");
    expect(existsSync(join(cliRoot, "src/index.ts"))).to.equal(true);
  });

  it("should read the version from the CLI package", () => {
    const manifest = readJson(join(cliRoot, "package.json"));
    expect(VERSION).to.equal(field(manifest, "version"));
  });

  it("should run the built binary under plain Node.js", function () {
    const bin = join(cliRoot, "dist/index.js");
    if (!existsSync(bin)) {
      this.skip();
    }

    const result = spawnSync(process.execPath, [bin, "--version"], {
      encoding: "utf-8",
    });

    expect(result.stderr).to.equal("");
    expect(result.status).to.equal(0);
    expect(result.stdout).to.equal(`flagline ${VERSION}\n`);
  });
});
