/**
 * Manifest loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { basename, dirname, join, resolve } from "node:path";
import { EMPTY_VALUE, error, ok } from "@flagline/core";
import type {
  Action,
  Command,
  Flag,
  ProgramDefinition,
  ProgramIO,
  Result,
} from "@flagline/core";
import { MANIFEST_FILE } from "./cli/constants.js";
import type {
  ManifestAuthor,
  ManifestCommand,
  ManifestFlag,
  ProgramManifest,
} from "./types.js";

type JsonObject = { readonly [key: string]: unknown };

const isObject = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Field reader bound to one object and its path inside the manifest
 */
const fieldsOf = (source: JsonObject, label: string, path: string) => {
  const at = (key: string): string => `${label}: '${path}${key}'`;

  const optionalString = (key: string): Result<string | undefined, string> => {
    const value = source[key];
    if (value === undefined) return ok(undefined);
    return typeof value === "string"
      ? ok(value)
      : error(`${at(key)} must be a string`);
  };

  const requiredString = (key: string): Result<string, string> => {
    const value = source[key];
    if (value === undefined) return error(`${at(key)} is required`);
    return typeof value === "string"
      ? ok(value)
      : error(`${at(key)} must be a string`);
  };

  const optionalBoolean = (key: string): Result<boolean | undefined, string> => {
    const value = source[key];
    if (value === undefined) return ok(undefined);
    return typeof value === "boolean"
      ? ok(value)
      : error(`${at(key)} must be a boolean`);
  };

  const optionalList = <T>(
    key: string,
    readItem: (item: unknown, itemPath: string) => Result<T, string>
  ): Result<readonly T[] | undefined, string> => {
    const value = source[key];
    if (value === undefined) return ok(undefined);
    if (!Array.isArray(value)) return error(`${at(key)} must be an array`);

    const items: T[] = [];
    for (const [index, item] of value.entries()) {
      const read = readItem(item, `${path}${key}[${index}]`);
      if (!read.ok) return read;
      items.push(read.value);
    }
    return ok(items);
  };

  return { at, optionalString, requiredString, optionalBoolean, optionalList };
};

const readObject = (
  value: unknown,
  label: string,
  path: string
): Result<JsonObject, string> =>
  isObject(value)
    ? ok(value)
    : error(`${label}: '${path}' must be an object`);

const readFlag = (
  value: unknown,
  label: string,
  path: string
): Result<ManifestFlag, string> => {
  const object = readObject(value, label, path);
  if (!object.ok) return object;
  const fields = fieldsOf(object.value, label, `${path}.`);

  const name = fields.requiredString("name");
  if (!name.ok) return name;
  const alias = fields.optionalString("alias");
  if (!alias.ok) return alias;
  const type = fields.optionalString("type");
  if (!type.ok) return type;
  const description = fields.optionalString("description");
  if (!description.ok) return description;

  const fallback = object.value["default"];
  if (
    fallback !== undefined &&
    fallback !== null &&
    typeof fallback !== "string"
  ) {
    return error(`${fields.at("default")} must be a string or null`);
  }

  return ok({
    name: name.value,
    alias: alias.value,
    type: type.value,
    description: description.value,
    default: fallback,
  });
};

const readName = (
  value: unknown,
  label: string,
  path: string
): Result<string, string> =>
  typeof value === "string"
    ? ok(value)
    : error(`${label}: '${path}' must be a string`);

const readCommand = (
  value: unknown,
  label: string,
  path: string
): Result<ManifestCommand, string> => {
  const object = readObject(value, label, path);
  if (!object.ok) return object;
  const fields = fieldsOf(object.value, label, `${path}.`);

  const names = fields.optionalList("names", (item, itemPath) =>
    readName(item, label, itemPath)
  );
  if (!names.ok) return names;
  if (names.value === undefined) {
    return error(`${fields.at("names")} is required`);
  }
  const description = fields.optionalString("description");
  if (!description.ok) return description;
  const usage = fields.optionalString("usage");
  if (!usage.ok) return usage;
  const flags = fields.optionalList("flags", (item, itemPath) =>
    readFlag(item, label, itemPath)
  );
  if (!flags.ok) return flags;

  return ok({
    names: names.value,
    description: description.value,
    usage: usage.value,
    flags: flags.value,
  });
};

const readAuthor = (
  value: unknown,
  label: string,
  path: string
): Result<ManifestAuthor, string> => {
  const object = readObject(value, label, path);
  if (!object.ok) return object;
  const fields = fieldsOf(object.value, label, `${path}.`);

  const name = fields.requiredString("name");
  if (!name.ok) return name;
  const email = fields.optionalString("email");
  if (!email.ok) return email;

  return ok({ name: name.value, email: email.value });
};

/**
 * Check the shape of parsed manifest JSON. Names and duplicates are left to
 * the program's own schema check.
 */
export const validateManifest = (
  value: unknown,
  label: string = MANIFEST_FILE
): Result<ProgramManifest, string> => {
  if (!isObject(value)) {
    return error(`${label}: manifest must be an object`);
  }
  const fields = fieldsOf(value, label, "");

  const schema = fields.optionalString("$schema");
  if (!schema.ok) return schema;
  const name = fields.requiredString("name");
  if (!name.ok) return name;
  const version = fields.requiredString("version");
  if (!version.ok) return version;
  const tagline = fields.optionalString("tagline");
  if (!tagline.ok) return tagline;
  const description = fields.optionalString("description");
  if (!description.ok) return description;
  const usage = fields.optionalString("usage");
  if (!usage.ok) return usage;
  const requireCommand = fields.optionalBoolean("requireCommand");
  if (!requireCommand.ok) return requireCommand;
  const authors = fields.optionalList("authors", (item, path) =>
    readAuthor(item, label, path)
  );
  if (!authors.ok) return authors;
  const flags = fields.optionalList("flags", (item, path) =>
    readFlag(item, label, path)
  );
  if (!flags.ok) return flags;
  const commands = fields.optionalList("commands", (item, path) =>
    readCommand(item, label, path)
  );
  if (!commands.ok) return commands;

  return ok({
    $schema: schema.value,
    name: name.value,
    version: version.value,
    tagline: tagline.value,
    description: description.value,
    usage: usage.value,
    requireCommand: requireCommand.value,
    authors: authors.value,
    flags: flags.value,
    commands: commands.value,
  });
};

/**
 * Load and validate a manifest file
 */
export const loadManifest = (
  manifestPath: string
): Result<ProgramManifest, string> => {
  if (!existsSync(manifestPath)) {
    return {
      ok: false,
      error: `Manifest file not found: ${manifestPath}`,
    };
  }

  const label = basename(manifestPath);
  let content: unknown;
  try {
    content = JSON.parse(readFileSync(manifestPath, "utf-8"));
  } catch (parseError) {
    return {
      ok: false,
      error: `Failed to parse ${label}: ${parseError instanceof Error ? parseError.message : String(parseError)}`,
    };
  }

  return validateManifest(content, label);
};

/**
 * Find flagline.json by walking up the directory tree
 */
export const findManifest = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  while (true) {
    const manifestPath = join(currentDir, MANIFEST_FILE);
    if (existsSync(manifestPath)) {
      return manifestPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

/**
 * Manifest path from a --manifest value, or by discovery when it is empty
 */
export const resolveManifestPath = (
  manifestOption: string,
  cwd: string
): Result<string, string> => {
  if (manifestOption) {
    return ok(resolve(cwd, manifestOption));
  }

  const found = findManifest(cwd);
  return found
    ? ok(found)
    : error(`No ${MANIFEST_FILE} found in ${resolve(cwd)} or its parents`);
};

const toFlag = (flag: ManifestFlag): Flag => ({
  name: flag.name,
  alias: flag.alias,
  type: flag.type,
  description: flag.description,
  defaultValue: flag.default === null ? EMPTY_VALUE : flag.default,
});

const toCommand = (
  command: ManifestCommand,
  actionFor: (command: string | null) => Action
): Command => ({
  names: command.names,
  description: command.description,
  usage: command.usage,
  flags: (command.flags ?? []).map(toFlag),
  action: actionFor(command.names[0] ?? null),
});

/**
 * Program declaration for a manifest. Every command, and the top level
 * unless the manifest requires a command, runs the action built for it.
 */
export const manifestToDefinition = (
  manifest: ProgramManifest,
  actionFor: (command: string | null) => Action,
  io?: ProgramIO
): ProgramDefinition => ({
  name: manifest.name,
  version: manifest.version,
  tagline: manifest.tagline,
  description: manifest.description,
  authors: manifest.authors,
  usage: manifest.usage,
  flags: (manifest.flags ?? []).map(toFlag),
  commands: (manifest.commands ?? []).map((command) =>
    toCommand(command, actionFor)
  ),
  action: manifest.requireCommand ? undefined : actionFor(null),
  io,
});
