/**
 * Type definitions for CLI
 */

/**
 * Flag entry in flagline.json
 */
export type ManifestFlag = {
  readonly name: string;
  readonly alias?: string;
  readonly type?: string;
  readonly description?: string;
  // Absent: mandatory; null: defaults to the empty string
  readonly default?: string | null;
};

/**
 * Command entry in flagline.json
 */
export type ManifestCommand = {
  readonly names: readonly string[];
  readonly description?: string;
  readonly usage?: string;
  readonly flags?: readonly ManifestFlag[];
};

export type ManifestAuthor = {
  readonly name: string;
  readonly email?: string;
};

/**
 * Program manifest (flagline.json)
 */
export type ProgramManifest = {
  readonly $schema?: string;
  readonly name: string;
  readonly version: string;
  readonly tagline?: string;
  readonly description?: string;
  readonly authors?: readonly ManifestAuthor[];
  readonly usage?: string;
  // No top-level action: a command must be given
  readonly requireCommand?: boolean;
  readonly flags?: readonly ManifestFlag[];
  readonly commands?: readonly ManifestCommand[];
};

/**
 * What a manifest program received for one invocation
 */
export type InvocationReport = {
  /** Canonical name of the command that ran, null for the top level */
  readonly command: string | null;
  readonly flags: Readonly<Record<string, string>>;
  readonly arguments: readonly string[];
};
