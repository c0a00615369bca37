/**
 * Unit analysis - scan, resolve and validate one source tree
 */

import * as fs from "node:fs";
import type { TagVocabulary } from "./config/tags.js";
import type { DependencyUnit } from "./registry/dependency-registry.js";
import { resolveComponents } from "./resolver/cross-reference.js";
import { createLinePatterns } from "./scanner/patterns.js";
import { scanSource } from "./scanner/scanner.js";
import { findSourceFiles } from "./scanner/source-discovery.js";
import type { Component } from "./types/declarations.js";
import {
  collectDiagnostics,
  mergeDiagnostics,
  type Diagnostic,
  type DiagnosticsCollector,
} from "./types/diagnostic.js";
import { ok, error, type Result } from "./types/result.js";
import { validateComponents } from "./validation/validator.js";

export type ScannedUnit = {
  readonly files: readonly string[];
  readonly components: readonly Component[];
  readonly diagnostics: readonly Diagnostic[];
};

export type AnalyzedUnit = {
  readonly components: readonly Component[];
  readonly dependencies: readonly DependencyUnit[];
  readonly warnings: readonly Diagnostic[];
};

export type AnalyzeOptions = {
  readonly baseDirectory: string;
  readonly tags: TagVocabulary;
  readonly dependencies: readonly DependencyUnit[];
};

/**
 * Scan every source file below the base directory
 */
export const scanUnit = (
  baseDirectory: string,
  tags: TagVocabulary
): ScannedUnit => {
  const patterns = createLinePatterns(tags);
  const files = findSourceFiles(baseDirectory);
  const components: Component[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const file of files) {
    const result = scanSource(fs.readFileSync(file, "utf-8"), file, patterns);
    components.push(...result.components);
    diagnostics.push(...result.diagnostics);
  }

  return { files, components, diagnostics };
};

export const dependencyComponents = (
  dependencies: readonly DependencyUnit[]
): readonly Component[] => dependencies.flatMap((unit) => unit.components);

/**
 * Scan, resolve and validate. Fails with every validation problem found.
 */
export const analyzeUnit = (
  options: AnalyzeOptions
): Result<AnalyzedUnit, DiagnosticsCollector> => {
  const scanned = scanUnit(options.baseDirectory, options.tags);
  const external = dependencyComponents(options.dependencies);
  const components = resolveComponents(scanned.components, external);
  const validation = validateComponents(components, external);

  if (validation.hasErrors) {
    return error(
      mergeDiagnostics(collectDiagnostics(scanned.diagnostics), validation)
    );
  }

  return ok({
    components,
    dependencies: options.dependencies,
    warnings: [...scanned.diagnostics, ...validation.diagnostics],
  });
};
