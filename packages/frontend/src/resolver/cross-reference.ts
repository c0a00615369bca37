/**
 * Cross-reference resolver
 *
 * Rewrites every referenced type spelling to the namespace-qualified name of
 * the declared type it refers to. The current unit is searched before the
 * dependencies; unknown names stay as written.
 */

import type {
  Component,
  FunctionDeclaration,
  OperatorDeclaration,
  Parameter,
  PropertyDeclaration,
} from "../types/declarations.js";
import {
  constPrefix,
  lookupName,
  namespaceOf,
  unqualifiedName,
} from "./type-names.js";

export type TypeIndex = ReadonlyMap<string, Component>;

export type TypeMatch = {
  readonly name: string;
  readonly component?: Component;
};

export const buildTypeIndex = (
  current: readonly Component[],
  dependencies: readonly Component[] = []
): TypeIndex => {
  const index = new Map<string, Component>();
  for (const component of [...current, ...dependencies]) {
    if (component.name === undefined) continue;
    const key = unqualifiedName(component.name);
    if (!index.has(key)) {
      index.set(key, component);
    }
  }
  return index;
};

export const findType = (index: TypeIndex, type: string): TypeMatch => {
  const component = index.get(lookupName(type));
  if (component?.name === undefined) {
    return { name: type };
  }

  const namespace = namespaceOf(component.name);
  const bare = unqualifiedName(type);
  return {
    name: `${constPrefix(type)}${namespace ? `${namespace}::${bare}` : bare}`,
    component,
  };
};

const resolveParameters = (
  parameters: readonly Parameter[],
  index: TypeIndex
): readonly Parameter[] =>
  parameters.map((parameter) => ({
    ...parameter,
    type: findType(index, parameter.type).name,
  }));

const resolveFunction = (
  fn: FunctionDeclaration,
  index: TypeIndex
): FunctionDeclaration => ({
  ...fn,
  returnType:
    fn.returnType === undefined
      ? undefined
      : findType(index, fn.returnType).name,
  parameters: resolveParameters(fn.parameters, index),
});

const resolveOperator = (
  op: OperatorDeclaration,
  index: TypeIndex
): OperatorDeclaration => ({
  ...op,
  returnType: findType(index, op.returnType).name,
  parameters: resolveParameters(op.parameters, index),
});

const resolveProperty = (
  property: PropertyDeclaration,
  index: TypeIndex
): PropertyDeclaration => ({
  ...property,
  type: findType(index, property.type).name,
});

export const resolveComponent = (
  component: Component,
  index: TypeIndex
): Component => ({
  ...component,
  properties: component.properties.map((p) => resolveProperty(p, index)),
  functions: component.functions.map((f) => resolveFunction(f, index)),
  operators: component.operators.map((o) => resolveOperator(o, index)),
  constructors: component.constructors.map((c) => resolveFunction(c, index)),
});

/**
 * Resolve the current unit's components against themselves and the dependencies
 */
export const resolveComponents = (
  components: readonly Component[],
  dependencies: readonly Component[] = []
): readonly Component[] => {
  const index = buildTypeIndex(components, dependencies);
  return components.map((component) => resolveComponent(component, index));
};
