/**
 * mpbind generate command - scan, validate and write the binding artifacts
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import {
  analyzeUnit,
  error,
  fixHeaderReferences,
  isError,
  ok,
  relativeHeader,
  type DependencyUnit,
  type Diagnostic,
  type Result,
} from "@mpbind/frontend";
import {
  emitBindings,
  type BindingArtifacts,
  type DependencyBindings,
} from "@mpbind/emitter";
import { EXIT_CODES } from "../cli/constants.js";
import type { LoadedProject } from "../project.js";
import type { CommandFailure } from "../types.js";

export type GeneratedBindings = {
  readonly artifacts: BindingArtifacts;
  readonly warnings: readonly Diagnostic[];
};

const failure = (
  exitCode: number,
  diagnostics: readonly Diagnostic[]
): Result<never, CommandFailure> => error({ exitCode, diagnostics });

const headerOf = (targetPath: string): string => `${targetPath}.h`;

const dependencyBindings = (
  dependencies: readonly DependencyUnit[],
  direct: readonly string[],
  targetDirectory: string
): readonly DependencyBindings[] =>
  dependencies.map((unit) => ({
    components: unit.components,
    header: unit.targetPath
      ? relativeHeader(headerOf(unit.targetPath), targetDirectory)
      : undefined,
    direct: direct.includes(unit.configPath),
  }));

/**
 * Run the whole pipeline for one unit. Nothing is written here.
 */
export const generateBindings = (
  project: LoadedProject,
  dependencies: readonly DependencyUnit[],
  cwd: string = process.cwd()
): Result<GeneratedBindings, CommandFailure> => {
  const { config, tags } = project;

  const analyzed = analyzeUnit({
    baseDirectory: config.baseDirectory,
    tags,
    dependencies,
  });
  if (!analyzed.ok) {
    return failure(EXIT_CODES.validation, analyzed.error.diagnostics);
  }

  const targetDirectory = config.targetPath ? dirname(config.targetPath) : cwd;
  const headers = fixHeaderReferences(analyzed.value.components, {
    targetDirectory,
    includePaths: config.includePaths,
  });
  const warnings = [...analyzed.value.warnings, ...headers.diagnostics];
  if (headers.diagnostics.some(isError)) {
    return failure(EXIT_CODES.headerResolution, warnings);
  }

  const emitted = emitBindings({
    components: headers.components,
    dependencies: dependencyBindings(
      dependencies,
      config.dependencies,
      targetDirectory
    ),
    primaryHeader: config.targetPath
      ? relativeHeader(headerOf(config.targetPath), targetDirectory)
      : undefined,
  });
  if (!emitted.ok) {
    return failure(EXIT_CODES.generation, [
      ...warnings,
      ...emitted.error.diagnostics,
    ]);
  }

  return ok({
    artifacts: emitted.value,
    warnings: [...warnings, ...emitted.value.warnings],
  });
};

/**
 * Write `<target>.h` and `<target>.cpp`, or return both joined for stdout
 */
export const writeArtifacts = (
  artifacts: BindingArtifacts,
  targetPath: string | undefined
): string | undefined => {
  if (targetPath === undefined) {
    return `${artifacts.header}\n\n${artifacts.source}\n`;
  }

  mkdirSync(dirname(targetPath), { recursive: true });
  writeFileSync(headerOf(targetPath), `${artifacts.header}\n`, "utf-8");
  writeFileSync(`${targetPath}.cpp`, `${artifacts.source}\n`, "utf-8");
  return undefined;
};
