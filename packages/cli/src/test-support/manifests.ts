/**
 * Manifest fixtures for CLI tests
 */

import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

export const writeJson = (path: string, value: unknown): void => {
  writeFileSync(path, JSON.stringify(value, null, 2) + "\n", "utf-8");
};

export const deployManifest = {
  name: "deploy",
  version: "1.2.0",
  tagline: "ship it",
  flags: [
    {
      name: "env",
      alias: "e",
      type: "NAME",
      description: "target environment",
      default: "dev",
    },
  ],
  commands: [
    {
      names: ["push", "p"],
      description: "upload a release",
      flags: [
        { name: "tag", alias: "t", description: "release tag" },
        { name: "note", description: "release note", default: null },
      ],
    },
    { names: ["status"], description: "show deployment status" },
  ],
};

/**
 * Run a test body in a fresh temp directory, removed afterwards
 */
export const withTempDir = async <T>(
  prefix: string,
  body: (dir: string) => T | Promise<T>
): Promise<T> => {
  const dir = mkdtempSync(join(tmpdir(), `flagline-${prefix}-`));
  try {
    return await body(dir);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
};
