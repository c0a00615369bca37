/**
 * Binding generator - public API
 * Orchestrates planning, module ordering and artifact assembly
 */

import {
  addDiagnostic,
  collectDiagnostics,
  error,
  hasAttribute,
  ok,
  type Component,
  type Diagnostic,
  type DiagnosticsCollector,
  type Result,
} from "@mpbind/frontend";
import {
  typeConverter,
  typeDeclaration,
} from "./bindings/type-emitter.js";
import { createEmitContext, type BoundType } from "./context.js";
import { emitModule } from "./modules/module-emitter.js";
import {
  buildModuleTree,
  childrenOf,
  externalModulePaths,
  orderModules,
  type ModuleTree,
} from "./modules/module-tree.js";
import type { DispatchStrategy } from "./overloads/strategy.js";
import { planBindings } from "./planner.js";
import { renderTemplate } from "./templates/render.js";
import * as templates from "./templates/modules.js";
import type {
  BindingArtifacts,
  BindingInput,
  DependencyBindings,
} from "./types.js";

const isPublic = (type: BoundType): boolean =>
  hasAttribute(type.component.attributes, "ExportPublic");

const includes = (headers: Iterable<string>): string =>
  [...headers]
    .map((header) => renderTemplate(templates.INCLUDE, { header }))
    .join("\n");

const dependencyModules = (
  dependencies: readonly DependencyBindings[]
): readonly string[] =>
  dependencies.flatMap((dependency) =>
    dependency.components.flatMap((component) =>
      component.module === undefined ? [] : [component.module]
    )
  );

const ownModuleExterns = (tree: ModuleTree): string =>
  [...tree.values()]
    .filter((node) => !node.external)
    .map((node) =>
      renderTemplate(templates.MODULE_EXTERN, { name: node.declarationName })
    )
    .join("\n");

const headerArtifact = (
  input: BindingInput,
  publicTypes: readonly BoundType[],
  tree: ModuleTree
): string =>
  renderTemplate(templates.HEADER, {
    header_includes: includes(
      new Set(publicTypes.flatMap((type) => type.component.headers))
    ),
    dependency_includes: includes(
      input.dependencies.flatMap((dependency) =>
        dependency.direct && dependency.header ? [dependency.header] : []
      )
    ),
    type_declarations: publicTypes.map(typeDeclaration).join("\n"),
    extern_modules: ownModuleExterns(tree),
    converters: publicTypes.map(typeConverter).join("\n"),
  });

const sourceArtifact = (
  input: BindingInput,
  publicTypes: readonly BoundType[],
  privateTypes: readonly BoundType[],
  modules: readonly string[]
): string => {
  const publicHeaders = new Set(
    publicTypes.flatMap((type) => type.component.headers)
  );
  const remaining = new Set(
    input.components
      .flatMap((component: Component) => component.headers)
      .filter((header) => !publicHeaders.has(header))
  );

  return renderTemplate(templates.SOURCE, {
    primary_include: input.primaryHeader
      ? renderTemplate(templates.INCLUDE, { header: input.primaryHeader })
      : "",
    header_includes: includes(remaining),
    type_declarations: privateTypes.map(typeDeclaration).join("\n"),
    converters: privateTypes.map(typeConverter).join("\n"),
    modules: modules.join("\n\n"),
  });
};

const fail = (
  warnings: readonly Diagnostic[],
  problem: Diagnostic
): Result<BindingArtifacts, DiagnosticsCollector> =>
  error(addDiagnostic(collectDiagnostics(warnings), problem));

/**
 * Generate the declarations and definitions artifacts for one unit.
 * Nothing is produced when a generator-fatal problem is found.
 */
export const emitBindings = (
  input: BindingInput
): Result<BindingArtifacts, DiagnosticsCollector> => {
  const context = createEmitContext(
    input.components,
    input.dependencies.flatMap((dependency) => dependency.components)
  );

  const layout = planBindings(input.components, context);
  if (!layout.ok) return fail([], layout.error);
  const { warnings } = layout.value;

  const tree = buildModuleTree(
    layout.value.declarations,
    externalModulePaths(dependencyModules(input.dependencies))
  );
  if (!tree.ok) return fail(warnings, tree.error);

  const order = orderModules(childrenOf(tree.value));
  if (!order.ok) return fail(warnings, order.error);

  const strategies = new Map<string, DispatchStrategy>();
  const modules: string[] = [];
  for (const path of order.value) {
    const node = tree.value.get(path);
    if (!node) continue;
    const emitted = emitModule(
      node,
      tree.value,
      layout.value.modules.get(path),
      context
    );
    if (!emitted.ok) return fail(warnings, emitted.error);
    modules.push(emitted.value.code);
    emitted.value.strategies.forEach((strategy, key) =>
      strategies.set(key, strategy)
    );
  }

  const publicTypes = context.types.filter(isPublic);
  const privateTypes = context.types.filter((type) => !isPublic(type));

  return ok({
    header: headerArtifact(input, publicTypes, tree.value),
    source: sourceArtifact(input, publicTypes, privateTypes, modules),
    plan: { strategies, moduleOrder: order.value },
    warnings,
  });
};
