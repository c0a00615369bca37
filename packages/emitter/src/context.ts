/**
 * Emit context
 *
 * Shared lookups for one generation run: every exposed type of the unit and
 * its dependencies, how each is held, and the shapes of base-type method
 * groups that derived groups forward to.
 */

import {
  buildTypeIndex,
  findType,
  hasAttribute,
  nonTemplateName,
  stripConst,
  unqualifiedName,
  type Component,
  type TypeIndex,
} from "@mpbind/frontend";
import { scriptName } from "./naming.js";
import {
  selfArgsOf,
  type BaseForward,
  type MethodOwner,
} from "./overloads/function-emitter.js";
import {
  groupOverloads,
  normalizeGroup,
  type OverloadGroup,
} from "./overloads/overload-group.js";
import { describeGroup, type GroupShape } from "./overloads/strategy.js";

/**
 * owned     - constructed and destroyed by the glue, held by value
 * reference - lifetime managed elsewhere, held by reference
 * pointer   - transient, held by address and checked for validity
 */
export type Ownership = "owned" | "reference" | "pointer";

export type BoundType = {
  readonly component: Component;
  /** Namespace-qualified declared name */
  readonly name: string;
  /** Binding struct stem: `Py<structName>` */
  readonly structName: string;
  readonly scriptName: string;
  readonly ownership: Ownership;
  /** Spelling of the value the binding struct holds */
  readonly valueType: string;
  /** Declared by a dependency */
  readonly external: boolean;
};

export type EmitContext = {
  /** Exposed types of the current unit, in declaration order */
  readonly types: readonly BoundType[];
  readonly boundType: (spelling: string) => BoundType | undefined;
  readonly passesByAddress: (type: string) => boolean;
  readonly publicBases: (type: BoundType) => readonly BoundType[];
  readonly methodGroups: (type: BoundType) => readonly OverloadGroup[];
  readonly baseForwards: (
    type: BoundType,
    scriptName: string
  ) => readonly BaseForward[];
};

/** Character pointers convert as strings, never by address */
const STRING_POINTERS: ReadonlySet<string> = new Set(["char*", "const char*"]);

export const ownershipOf = (component: Component): Ownership =>
  hasAttribute(component.attributes, "TypeOwned")
    ? "owned"
    : hasAttribute(component.attributes, "TypeNonTransient")
      ? "reference"
      : "pointer";

const valueTypeOf = (name: string, ownership: Ownership): string => {
  switch (ownership) {
    case "owned":
      return name;
    case "reference":
      return `${name}&`;
    case "pointer":
      return `${name}*`;
  }
};

export const methodOwner = (type: BoundType): MethodOwner => ({
  structName: type.structName,
  qualifiedName: type.name,
  accessor: type.ownership === "pointer" ? "->" : ".",
});

const bindType = (component: Component, external: boolean): BoundType[] => {
  const name = component.name;
  if (name === undefined) return [];
  const ownership = ownershipOf(component);
  return [
    {
      component,
      name,
      structName: nonTemplateName(unqualifiedName(name)),
      scriptName: scriptName(name, component.attributes),
      ownership,
      valueType: valueTypeOf(name, ownership),
      external,
    },
  ];
};

export const createEmitContext = (
  components: readonly Component[],
  dependencies: readonly Component[] = []
): EmitContext => {
  const index: TypeIndex = buildTypeIndex(components, dependencies);
  const current = components.flatMap((component) => bindType(component, false));
  const byName = new Map<string, BoundType>();
  for (const type of [
    ...current,
    ...dependencies.flatMap((component) => bindType(component, true)),
  ]) {
    if (!byName.has(type.name)) byName.set(type.name, type);
  }

  const boundType = (spelling: string): BoundType | undefined => {
    const name = findType(index, stripConst(spelling)).component?.name;
    return name === undefined ? undefined : byName.get(name);
  };

  const passesByAddress = (type: string): boolean =>
    type.endsWith("*") &&
    !STRING_POINTERS.has(type) &&
    boundType(type)?.ownership !== "pointer";

  const publicBases = (type: BoundType): readonly BoundType[] =>
    type.component.bases
      .filter((base) => base.access === "public")
      .flatMap((base) => {
        const bound = boundType(base.name);
        return bound ? [bound] : [];
      });

  const groupCache = new Map<string, readonly OverloadGroup[]>();
  const methodGroups = (type: BoundType): readonly OverloadGroup[] => {
    const cached = groupCache.get(type.name);
    if (cached) return cached;
    const groups = groupOverloads(type.component.functions).map((group) => {
      const normalized = normalizeGroup(group, `${type.name}::${group.name}`);
      return normalized.ok ? normalized.value : group;
    });
    groupCache.set(type.name, groups);
    return groups;
  };

  const shapeCache = new Map<string, GroupShape>();
  const inProgress = new Set<string>();

  const groupShape = (type: BoundType, group: OverloadGroup): GroupShape => {
    const key = `${type.name}::${group.scriptName}`;
    const cached = shapeCache.get(key);
    if (cached) return cached;

    inProgress.add(key);
    const bases = baseForwards(type, group.scriptName).map((base) => base.shape);
    inProgress.delete(key);

    const shape = describeGroup(
      group,
      selfArgsOf(group, methodOwner(type)),
      bases
    );
    shapeCache.set(key, shape);
    return shape;
  };

  const baseForwards = (
    type: BoundType,
    name: string
  ): readonly BaseForward[] =>
    publicBases(type).flatMap((base) => {
      const group = methodGroups(base).find((g) => g.scriptName === name);
      if (!group || inProgress.has(`${base.name}::${name}`)) return [];
      return [
        {
          symbol: `${base.structName}${group.name}`,
          shape: groupShape(base, group),
        },
      ];
    });

  return {
    types: current,
    boundType,
    passesByAddress,
    publicBases,
    methodGroups,
    baseForwards,
  };
};
