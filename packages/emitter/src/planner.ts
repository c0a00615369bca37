/**
 * Binding planner
 *
 * Sorts the unit's declarations into the modules they are exposed from.
 * Free operators move onto the type named by their first parameter.
 */

import {
  createDiagnostic,
  error,
  ok,
  type Component,
  type Diagnostic,
  type FunctionDeclaration,
  type OperatorDeclaration,
  type PropertyDeclaration,
  type Result,
} from "@mpbind/frontend";
import type { BoundType, EmitContext } from "./context.js";
import type { ModuleDeclaration } from "./modules/module-tree.js";

export type PlannedType = {
  readonly type: BoundType;
  /** Own operators followed by attached free operators */
  readonly operators: readonly OperatorDeclaration[];
};

export type ModulePlan = {
  readonly path: string;
  readonly types: readonly PlannedType[];
  readonly functions: readonly FunctionDeclaration[];
  readonly properties: readonly PropertyDeclaration[];
};

export type BindingLayout = {
  readonly modules: ReadonlyMap<string, ModulePlan>;
  readonly declarations: readonly ModuleDeclaration[];
  readonly warnings: readonly Diagnostic[];
};

type MutablePlan = {
  types: PlannedType[];
  functions: FunctionDeclaration[];
  properties: PropertyDeclaration[];
};

const outsideModule = (component: Component): Diagnostic =>
  createDiagnostic(
    "MPB4004",
    "error",
    component.name === undefined
      ? "Declarations outside any module"
      : `Type ${component.name} is declared outside any module`,
    component.location,
    "Add a module tag before the declaration"
  );

const unattached = (operator: OperatorDeclaration): Diagnostic =>
  createDiagnostic(
    "MPB1002",
    "warning",
    `Free operator ${operator.operator} has no exposed type to attach to`,
    operator.location
  );

export const planBindings = (
  components: readonly Component[],
  context: EmitContext
): Result<BindingLayout, Diagnostic> => {
  const plans = new Map<string, MutablePlan>();
  const declarations: ModuleDeclaration[] = [];
  const attached = new Map<string, OperatorDeclaration[]>();
  const freeOperators: OperatorDeclaration[] = [];

  const planFor = (component: Component): MutablePlan | undefined => {
    const path = component.module;
    if (path === undefined) return undefined;
    const existing = plans.get(path);
    if (existing) return existing;
    const created: MutablePlan = { types: [], functions: [], properties: [] };
    plans.set(path, created);
    declarations.push({ path, location: component.location });
    return created;
  };

  for (const component of components) {
    const plan = planFor(component);
    if (!plan) return error(outsideModule(component));

    if (component.name === undefined) {
      plan.functions.push(...component.functions);
      plan.properties.push(...component.properties);
      freeOperators.push(...component.operators);
    }
  }

  const warnings: Diagnostic[] = [];
  for (const operator of freeOperators) {
    const [first, ...rest] = operator.parameters;
    const target = first ? context.boundType(first.type) : undefined;
    if (!target || target.external) {
      warnings.push(unattached(operator));
      continue;
    }
    attached.set(target.name, [
      ...(attached.get(target.name) ?? []),
      { ...operator, parameters: rest },
    ]);
  }

  for (const type of context.types) {
    const plan = planFor(type.component);
    plan?.types.push({
      type,
      operators: [
        ...type.component.operators,
        ...(attached.get(type.name) ?? []),
      ],
    });
  }

  return ok({
    modules: new Map(
      [...plans].map(([path, plan]) => [path, { path, ...plan }])
    ),
    declarations,
    warnings,
  });
};
