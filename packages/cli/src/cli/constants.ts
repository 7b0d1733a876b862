/**
 * CLI constants
 */

import { createRequire } from "module";

// packages/cli/package.json, from both src/cli and dist/cli
const require = createRequire(import.meta.url);
const packageJson: { readonly version: string } = require("../../package.json");

export const VERSION = packageJson.version;

export const PROGRAM_NAME = "flagline";

export const MANIFEST_FILE = "flagline.json";
