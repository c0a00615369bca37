/**
 * Type definitions for CLI
 */

import type { Diagnostic } from "@mpbind/frontend";

/**
 * Project configuration file (mpbind.json)
 */
export type ProjectConfigFile = {
  readonly baseDirectory?: string;
  readonly dependencies?: readonly string[];
  readonly includePaths?: readonly string[];
  /** Artifact base name; `.h` and `.cpp` are appended. `-` writes to stdout. */
  readonly targetPath?: string;
  readonly variables?: Readonly<Record<string, string>>;
  /** Tag vocabulary file (YAML or JSON) */
  readonly tags?: string;
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  target?: string;
  tags?: string;
  includePaths?: string[];
};

export type ParsedArgs = {
  readonly command: string;
  readonly configFile?: string;
  /** `NAME=value` arguments */
  readonly assignments: Readonly<Record<string, string>>;
  readonly options: CliOptions;
  /** Arguments after `--` */
  readonly compilerFlags: readonly string[];
};

/**
 * Everything a run needs to know about one project config, with
 * placeholders expanded and paths made absolute
 */
export type ResolvedConfig = {
  readonly configPath: string;
  readonly baseDirectory: string;
  readonly dependencies: readonly string[];
  readonly includePaths: readonly string[];
  /** Absolute artifact base path, or undefined for stdout */
  readonly targetPath?: string;
  readonly variables: Readonly<Record<string, string>>;
  readonly tagsPath?: string;
  readonly verbose: boolean;
  readonly quiet: boolean;
};

/**
 * Placeholder sources, lowest priority first
 */
export type VariableSources = {
  readonly environment: Readonly<Record<string, string | undefined>>;
  readonly assignments: Readonly<Record<string, string>>;
  readonly compilerFlags: readonly string[];
};

/**
 * Command failure with the process exit code it maps to
 */
export type CommandFailure = {
  readonly exitCode: number;
  readonly diagnostics: readonly Diagnostic[];
};
