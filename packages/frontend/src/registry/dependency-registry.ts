/**
 * Dependency registry
 *
 * Holds every dependency unit loaded for one run, keyed by the absolute
 * path of its project config. Each path is loaded at most once, however
 * many dependents name it.
 */

import * as path from "node:path";
import type { Component } from "../types/declarations.js";
import { createDiagnostic, type Diagnostic } from "../types/diagnostic.js";
import { ok, error, type Result } from "../types/result.js";

export type DependencyUnit = {
  readonly configPath: string;
  readonly baseDirectory: string;
  readonly targetPath?: string;
  readonly components: readonly Component[];
  readonly dependencies: readonly string[];
};

export type DependencyLoader = (
  configPath: string,
  registry: DependencyRegistry
) => Result<DependencyUnit, Diagnostic>;

export type DependencyRegistry = {
  readonly load: (
    configPath: string,
    loader: DependencyLoader
  ) => Result<DependencyUnit, Diagnostic>;
  readonly get: (configPath: string) => DependencyUnit | undefined;
  /** Units reachable from the given config paths, each listed once */
  readonly collect: (configPaths: readonly string[]) => readonly DependencyUnit[];
  /** Refuse further loading once resolution starts */
  readonly seal: () => void;
};

export const createDependencyRegistry = (): DependencyRegistry => {
  const units = new Map<string, DependencyUnit>();
  const loading: string[] = [];
  let sealed = false;

  const load = (
    configPath: string,
    loader: DependencyLoader
  ): Result<DependencyUnit, Diagnostic> => {
    const key = path.resolve(configPath);
    const existing = units.get(key);
    if (existing) return ok(existing);

    if (sealed) {
      throw new Error(`Dependency registry is sealed; cannot load ${key}`);
    }

    if (loading.includes(key)) {
      const cycle = [...loading.slice(loading.indexOf(key)), key];
      return error(
        createDiagnostic(
          "MPB3003",
          "error",
          `Circular dependency detected: ${cycle.join(" -> ")}`
        )
      );
    }

    loading.push(key);
    const result = loader(key, registry);
    loading.pop();

    if (result.ok) {
      units.set(key, result.value);
    }
    return result;
  };

  const collect = (
    configPaths: readonly string[]
  ): readonly DependencyUnit[] => {
    const visited = new Set<string>();
    const ordered: DependencyUnit[] = [];

    const visit = (configPath: string): void => {
      const key = path.resolve(configPath);
      if (visited.has(key)) return;
      visited.add(key);
      const unit = units.get(key);
      if (!unit) return;
      ordered.push(unit);
      unit.dependencies.forEach(visit);
    };

    configPaths.forEach(visit);
    return ordered;
  };

  const registry: DependencyRegistry = {
    load,
    get: (configPath) => units.get(path.resolve(configPath)),
    collect,
    seal: () => {
      sealed = true;
    },
  };

  return registry;
};
