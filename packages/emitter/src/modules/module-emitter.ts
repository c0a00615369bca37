/**
 * Module emission
 */

import {
  error,
  ok,
  unqualifiedName,
  type Diagnostic,
  type PropertyDeclaration,
  type Result,
} from "@mpbind/frontend";
import {
  constantEntry,
  isModuleConstant,
} from "../bindings/constants.js";
import { emitType, typeTableEntry } from "../bindings/type-emitter.js";
import type { EmitContext } from "../context.js";
import { qstr, scriptName } from "../naming.js";
import {
  emitFunction,
  functionTableEntry,
  type FunctionBinding,
} from "../overloads/function-emitter.js";
import { groupOverloads, normalizeGroup } from "../overloads/overload-group.js";
import { describeGroup, type DispatchStrategy } from "../overloads/strategy.js";
import type { ModulePlan } from "../planner.js";
import { joinFragments, renderTemplate } from "../templates/render.js";
import * as templates from "../templates/modules.js";
import type { ModuleNode, ModuleTree } from "./module-tree.js";

export type EmittedModule = {
  readonly code: string;
  readonly strategies: ReadonlyMap<string, DispatchStrategy>;
};

const EMPTY_PLAN = (path: string): ModulePlan => ({
  path,
  types: [],
  functions: [],
  properties: [],
});

const variableValues = (
  property: PropertyDeclaration
): Readonly<Record<string, string>> => ({
  qstr: qstr(scriptName(property.name, property.attributes)),
  type: property.type,
  value: property.name,
});

const functionBindings = (
  node: ModuleNode,
  plan: ModulePlan,
  context: EmitContext
): Result<readonly FunctionBinding[], Diagnostic> => {
  const bindings: FunctionBinding[] = [];
  for (const group of groupOverloads(plan.functions)) {
    const normalized = normalizeGroup(group, group.name);
    if (!normalized.ok) return error(normalized.error);
    bindings.push({
      symbol: `${node.declarationName}${unqualifiedName(group.name)}`,
      group: normalized.value,
      shape: describeGroup(normalized.value, 0),
      bases: [],
      passesByAddress: context.passesByAddress,
    });
  }
  return ok(bindings);
};

/**
 * Emit one module of this unit, or its extern declaration when a
 * dependency defines it
 */
export const emitModule = (
  node: ModuleNode,
  tree: ModuleTree,
  plan: ModulePlan | undefined,
  context: EmitContext
): Result<EmittedModule, Diagnostic> => {
  if (node.external) {
    return ok({
      code: renderTemplate(templates.MODULE_EXTERN, { name: node.declarationName }),
      strategies: new Map(),
    });
  }

  const contents = plan ?? EMPTY_PLAN(node.path);
  const strategies = new Map<string, DispatchStrategy>();

  const types: string[] = [];
  for (const planned of contents.types) {
    const emitted = emitType(planned.type, context, planned.operators);
    if (!emitted.ok) return error(emitted.error);
    types.push(emitted.value.code);
    emitted.value.strategies.forEach((strategy, key) =>
      strategies.set(key, strategy)
    );
  }

  const bound = functionBindings(node, contents, context);
  if (!bound.ok) return error(bound.error);
  const functions = bound.value;
  for (const binding of functions) {
    strategies.set(`${node.path}.${binding.group.scriptName}`, binding.shape.own);
  }

  const constants = contents.properties.filter(isModuleConstant);
  const variables = contents.properties.filter(
    (property) => !isModuleConstant(property)
  );

  const submodules = node.children.flatMap((child) => {
    const childNode = tree.get(child);
    return childNode
      ? [
          renderTemplate(templates.SUBMODULE_ENTRY, {
            qstr: qstr(childNode.scriptName),
            name: childNode.declarationName,
          }),
        ]
      : [];
  });

  const code = renderTemplate(templates.MODULE, {
    name: node.declarationName,
    qstr: qstr(node.isRoot ? node.path : node.scriptName),
    body: joinFragments([...functions.map(emitFunction), ...types], "\n\n"),
    getters: variables
      .filter((property) => !property.attributes.has("PropWriteOnly"))
      .map((property) =>
        renderTemplate(templates.MODULE_GETTER, variableValues(property))
      )
      .join("\n"),
    setters: variables
      .filter(
        (property) =>
          !property.attributes.has("PropReadOnly") &&
          !property.modifiers.has("const")
      )
      .map((property) =>
        renderTemplate(templates.MODULE_SETTER, variableValues(property))
      )
      .join("\n"),
    entries: [
      ...constants.map((property) => constantEntry(property, property.name)),
      ...submodules,
      ...functions.map(functionTableEntry),
      ...contents.types.map((planned) => typeTableEntry(planned.type)),
    ].join("\n"),
    registration: node.isRoot
      ? renderTemplate(templates.MODULE_REGISTRATION, {
          qstr: qstr(node.path),
          name: node.declarationName,
        })
      : "",
  });

  return ok({ code, strategies });
};
