/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname, isAbsolute } from "node:path";
import {
  createDiagnostic,
  error,
  ok,
  type Diagnostic,
  type Result,
} from "@mpbind/frontend";
import type {
  CliOptions,
  ProjectConfigFile,
  ResolvedConfig,
  VariableSources,
} from "./types.js";

export const CONFIG_FILE_NAME = "mpbind.json";

/** Variables whose values are scanned like compiler flags */
const FLAG_VARIABLES = ["CFLAGS", "CXXFLAGS", "CPPFLAGS"] as const;

const PLACEHOLDER = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isStringArray = (value: unknown): value is readonly string[] =>
  Array.isArray(value) && value.every((item) => typeof item === "string");

const isStringRecord = (
  value: unknown
): value is Readonly<Record<string, string>> =>
  isRecord(value) &&
  Object.values(value).every((item) => typeof item === "string");

const invalidConfig = (configPath: string, message: string): Diagnostic =>
  createDiagnostic("MPB5002", "error", `${configPath}: ${message}`);

/**
 * Check the shape of a parsed mpbind.json
 */
const readConfigDocument = (
  document: unknown,
  configPath: string
): Result<ProjectConfigFile, Diagnostic> => {
  if (!isRecord(document)) {
    return error(invalidConfig(configPath, "config must be a JSON object"));
  }

  const {
    baseDirectory,
    dependencies,
    includePaths,
    targetPath,
    variables,
    tags,
  } = document;

  for (const [field, value] of [
    ["baseDirectory", baseDirectory],
    ["targetPath", targetPath],
    ["tags", tags],
  ] as const) {
    if (value !== undefined && typeof value !== "string") {
      return error(invalidConfig(configPath, `'${field}' must be a string`));
    }
  }
  for (const [field, value] of [
    ["dependencies", dependencies],
    ["includePaths", includePaths],
  ] as const) {
    if (value !== undefined && !isStringArray(value)) {
      return error(
        invalidConfig(configPath, `'${field}' must be an array of strings`)
      );
    }
  }
  if (variables !== undefined && !isStringRecord(variables)) {
    return error(
      invalidConfig(configPath, "'variables' must map names to strings")
    );
  }

  return ok({
    baseDirectory: typeof baseDirectory === "string" ? baseDirectory : undefined,
    dependencies: isStringArray(dependencies) ? dependencies : undefined,
    includePaths: isStringArray(includePaths) ? includePaths : undefined,
    targetPath: typeof targetPath === "string" ? targetPath : undefined,
    variables: isStringRecord(variables) ? variables : undefined,
    tags: typeof tags === "string" ? tags : undefined,
  });
};

/**
 * Load mpbind.json
 */
export const loadConfig = (
  configPath: string
): Result<ProjectConfigFile, Diagnostic> => {
  if (!existsSync(configPath)) {
    return error(
      createDiagnostic(
        "MPB5001",
        "error",
        `Config file not found: ${configPath}`
      )
    );
  }

  let document: unknown;
  try {
    document = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (e) {
    return error(
      invalidConfig(
        configPath,
        `failed to parse: ${e instanceof Error ? e.message : String(e)}`
      )
    );
  }

  return readConfigDocument(document, configPath);
};

/**
 * Find mpbind.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

export type CompilerFlags = {
  readonly includePaths: readonly string[];
  readonly defines: Readonly<Record<string, string>>;
};

/**
 * Pick `-I<dir>`, `-I <dir>` and `-D<NAME>[=value]` out of compiler flags.
 * Everything else is ignored.
 */
export const scanCompilerFlags = (flags: readonly string[]): CompilerFlags => {
  const includePaths: string[] = [];
  const defines: Record<string, string> = {};

  for (let i = 0; i < flags.length; i++) {
    const flag = flags[i];
    if (!flag) continue;

    if (flag.startsWith("-I")) {
      const dir = flag === "-I" ? flags[++i] : flag.slice(2);
      if (dir) includePaths.push(dir);
    } else if (flag.startsWith("-D")) {
      const definition = flag === "-D" ? (flags[++i] ?? "") : flag.slice(2);
      const eq = definition.indexOf("=");
      const name = eq < 0 ? definition : definition.slice(0, eq);
      if (name) defines[name] = eq < 0 ? "1" : definition.slice(eq + 1);
    }
  }

  return { includePaths, defines };
};

const splitFlags = (value: string | undefined): readonly string[] =>
  value ? value.split(/\s+/).filter((flag) => flag.length > 0) : [];

/**
 * Replace every `${NAME}`; an unknown name is an error
 */
export const expandPlaceholders = (
  text: string,
  variables: Readonly<Record<string, string>>,
  configPath: string
): Result<string, Diagnostic> => {
  const missing = [...text.matchAll(PLACEHOLDER)]
    .map((match) => match[1] ?? "")
    .find((name) => variables[name] === undefined);

  if (missing !== undefined) {
    return error(
      createDiagnostic(
        "MPB5003",
        "error",
        `${configPath}: unresolved placeholder \${${missing}}`,
        undefined,
        `Define ${missing} in 'variables', the environment or as ${missing}=value`
      )
    );
  }

  return ok(text.replace(PLACEHOLDER, (_match, name: string) => variables[name] ?? ""));
};

const definedOnly = (
  environment: Readonly<Record<string, string | undefined>>
): Readonly<Record<string, string>> =>
  Object.fromEntries(
    Object.entries(environment).flatMap(([name, value]) =>
      value === undefined ? [] : [[name, value]]
    )
  );

const expandAll = (
  values: readonly string[],
  variables: Readonly<Record<string, string>>,
  configPath: string
): Result<readonly string[], Diagnostic> => {
  const expanded: string[] = [];
  for (const value of values) {
    const result = expandPlaceholders(value, variables, configPath);
    if (!result.ok) return result;
    expanded.push(result.value);
  }
  return ok(expanded);
};

const expandOptional = (
  value: string | undefined,
  variables: Readonly<Record<string, string>>,
  configPath: string
): Result<string | undefined, Diagnostic> =>
  value === undefined ? ok(undefined) : expandPlaceholders(value, variables, configPath);

const absolute = (base: string, target: string): string =>
  isAbsolute(target) ? target : resolve(base, target);

/**
 * Resolve final configuration from file + CLI args.
 * Config paths are relative to the config file, CLI paths to the working
 * directory.
 */
export const resolveConfig = (
  config: ProjectConfigFile,
  configPath: string,
  cliOptions: CliOptions,
  sources: VariableSources,
  cwd: string = process.cwd()
): Result<ResolvedConfig, Diagnostic> => {
  const configDir = dirname(resolve(configPath));
  const environment = definedOnly(sources.environment);

  const layered = {
    ...(config.variables ?? {}),
    ...environment,
    ...sources.assignments,
  };
  const flags = scanCompilerFlags([
    ...FLAG_VARIABLES.flatMap((name) => splitFlags(layered[name])),
    ...sources.compilerFlags,
  ]);
  const variables: Readonly<Record<string, string>> = {
    ...(config.variables ?? {}),
    ...flags.defines,
    ...environment,
    ...sources.assignments,
  };

  const baseDirectory = expandOptional(config.baseDirectory, variables, configPath);
  if (!baseDirectory.ok) return baseDirectory;
  const dependencies = expandAll(config.dependencies ?? [], variables, configPath);
  if (!dependencies.ok) return dependencies;
  const includePaths = expandAll(config.includePaths ?? [], variables, configPath);
  if (!includePaths.ok) return includePaths;
  const targetPath = expandOptional(config.targetPath, variables, configPath);
  if (!targetPath.ok) return targetPath;
  const tags = expandOptional(config.tags, variables, configPath);
  if (!tags.ok) return tags;

  const target = cliOptions.target
    ? { value: cliOptions.target, base: cwd }
    : targetPath.value
      ? { value: targetPath.value, base: configDir }
      : undefined;

  return ok({
    configPath: resolve(configPath),
    baseDirectory: absolute(configDir, baseDirectory.value ?? "."),
    dependencies: dependencies.value.map((dep) => absolute(configDir, dep)),
    includePaths: [
      ...includePaths.value.map((dir) => absolute(configDir, dir)),
      ...(cliOptions.includePaths ?? []).map((dir) => absolute(cwd, dir)),
      ...flags.includePaths.map((dir) => absolute(cwd, dir)),
    ],
    targetPath:
      target === undefined || target.value === "-"
        ? undefined
        : absolute(target.base, target.value),
    variables,
    tagsPath: cliOptions.tags
      ? absolute(cwd, cliOptions.tags)
      : tags.value
        ? absolute(configDir, tags.value)
        : undefined,
    verbose: cliOptions.verbose ?? false,
    quiet: cliOptions.quiet ?? false,
  });
};
