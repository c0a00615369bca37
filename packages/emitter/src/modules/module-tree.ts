/**
 * Module tree
 *
 * Declared dotted paths and all their ancestors become nodes. Paths a
 * dependency already defines are external: forward-declared, never emitted.
 */

import {
  createDiagnostic,
  error,
  ok,
  type Diagnostic,
  type Result,
  type SourceLocation,
} from "@mpbind/frontend";
import {
  moduleDeclarationName,
  moduleLineage,
  moduleScriptName,
  parentModule,
} from "../naming.js";

export type ModuleNode = {
  readonly path: string;
  readonly declarationName: string;
  readonly scriptName: string;
  /** Non-external submodule paths, in order of first declaration */
  readonly children: readonly string[];
  readonly external: boolean;
  /** Registered with the runtime rather than reached through a parent */
  readonly isRoot: boolean;
};

export type ModuleTree = ReadonlyMap<string, ModuleNode>;

export type ModuleDeclaration = {
  readonly path: string;
  readonly location?: SourceLocation;
};

/**
 * Paths defined by dependency units: their modules and every ancestor
 */
export const externalModulePaths = (
  dependencyModules: readonly string[]
): ReadonlySet<string> => new Set(dependencyModules.flatMap(moduleLineage));

export const buildModuleTree = (
  declarations: readonly ModuleDeclaration[],
  external: ReadonlySet<string> = new Set()
): Result<ModuleTree, Diagnostic> => {
  const paths: string[] = [];

  for (const declaration of declarations) {
    if (external.has(declaration.path)) {
      return error(
        createDiagnostic(
          "MPB4005",
          "error",
          `Module ${declaration.path} is already defined by a dependency`,
          declaration.location,
          "Declare the binding in a new submodule"
        )
      );
    }
    for (const path of moduleLineage(declaration.path)) {
      if (!paths.includes(path)) paths.push(path);
    }
  }

  const children = new Map<string, string[]>();
  for (const path of paths) {
    const parent = parentModule(path);
    if (parent === undefined || external.has(parent) || external.has(path)) {
      continue;
    }
    children.set(parent, [...(children.get(parent) ?? []), path]);
  }

  const tree = new Map<string, ModuleNode>();
  for (const path of paths) {
    const parent = parentModule(path);
    const isExternal = external.has(path);
    tree.set(path, {
      path,
      declarationName: moduleDeclarationName(path),
      scriptName: moduleScriptName(path),
      children: children.get(path) ?? [],
      external: isExternal,
      isRoot: !isExternal && (parent === undefined || external.has(parent)),
    });
  }

  return ok(tree);
};

/**
 * Submodules before the modules containing them. A containment cycle is
 * fatal and names every module on it.
 */
export const orderModules = (
  children: ReadonlyMap<string, readonly string[]>
): Result<readonly string[], Diagnostic> => {
  const ordered: string[] = [];
  const done = new Set<string>();
  const visiting: string[] = [];

  const visit = (path: string): Diagnostic | undefined => {
    if (done.has(path)) return undefined;
    if (visiting.includes(path)) {
      const cycle = [...visiting.slice(visiting.indexOf(path)), path];
      return createDiagnostic(
        "MPB4002",
        "error",
        `Module containment cycle: ${cycle.join(" -> ")}`
      );
    }

    visiting.push(path);
    for (const child of children.get(path) ?? []) {
      const problem = visit(child);
      if (problem) return problem;
    }
    visiting.pop();

    done.add(path);
    ordered.push(path);
    return undefined;
  };

  for (const path of children.keys()) {
    const problem = visit(path);
    if (problem) return error(problem);
  }

  return ok(ordered);
};

export const childrenOf = (
  tree: ModuleTree
): ReadonlyMap<string, readonly string[]> =>
  new Map([...tree.values()].map((node) => [node.path, node.children]));
