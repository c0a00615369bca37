/**
 * Project loading - a unit's config, its tag vocabulary and its dependencies
 */

import {
  createDependencyRegistry,
  createDiagnostic,
  dependencyComponents,
  error,
  ok,
  resolveComponents,
  scanUnit,
  type DependencyLoader,
  type DependencyUnit,
  type Diagnostic,
  type Result,
  type TagVocabulary,
} from "@mpbind/frontend";
import { loadConfig, resolveConfig } from "./config.js";
import { loadTagVocabulary } from "./tags.js";
import type { CliOptions, ResolvedConfig, VariableSources } from "./types.js";

export type LoadedProject = {
  readonly config: ResolvedConfig;
  readonly tags: TagVocabulary;
};

/**
 * Load, resolve and pair a config with its tag vocabulary
 */
export const loadProject = (
  configPath: string,
  options: CliOptions,
  sources: VariableSources
): Result<LoadedProject, Diagnostic> => {
  const file = loadConfig(configPath);
  if (!file.ok) return file;

  const config = resolveConfig(file.value, configPath, options, sources);
  if (!config.ok) return config;

  const tags = loadTagVocabulary(config.value.tagsPath);
  if (!tags.ok) return tags;

  return ok({ config: config.value, tags: tags.value });
};

const unreadable = (configPath: string, cause: Diagnostic): Diagnostic =>
  createDiagnostic(
    "MPB3004",
    "error",
    `Dependency ${configPath} could not be loaded: ${cause.message}`,
    cause.location,
    cause.hint
  );

/**
 * Loader for dependency units. Dependencies see the environment and
 * command-line assignments but none of the dependent's options.
 */
export const createUnitLoader = (
  sources: VariableSources
): DependencyLoader => {
  const dependencySources: VariableSources = { ...sources, compilerFlags: [] };

  const loader: DependencyLoader = (configPath, registry) => {
    const project = loadProject(configPath, {}, dependencySources);
    if (!project.ok) {
      return error(
        project.error.code === "MPB3003"
          ? project.error
          : unreadable(configPath, project.error)
      );
    }
    const { config, tags } = project.value;

    for (const dependency of config.dependencies) {
      const loaded = registry.load(dependency, loader);
      if (!loaded.ok) return loaded;
    }

    const scanned = scanUnit(config.baseDirectory, tags);
    const components = resolveComponents(
      scanned.components,
      dependencyComponents(registry.collect(config.dependencies))
    );

    return ok({
      configPath: config.configPath,
      baseDirectory: config.baseDirectory,
      targetPath: config.targetPath,
      components,
      dependencies: config.dependencies,
    });
  };

  return loader;
};

/**
 * Load every dependency reachable from the unit, each config at most once
 */
export const loadDependencies = (
  config: ResolvedConfig,
  sources: VariableSources
): Result<readonly DependencyUnit[], Diagnostic> => {
  const registry = createDependencyRegistry();
  const loader = createUnitLoader(sources);

  for (const dependency of config.dependencies) {
    if (dependency === config.configPath) {
      return error(
        createDiagnostic(
          "MPB3003",
          "error",
          `Circular dependency detected: ${config.configPath} -> ${config.configPath}`
        )
      );
    }
    const loaded = registry.load(dependency, loader);
    if (!loaded.ok) return loaded;
  }

  registry.seal();
  return ok(registry.collect(config.dependencies));
};
