/**
 * Overload grouping
 *
 * Every declaration exposed under the same script name joins one group.
 * Group-wide flags are the union of the flags on its declarations.
 */

import {
  createDiagnostic,
  error,
  hasAttribute,
  ok,
  type Diagnostic,
  type FunctionDeclaration,
  type Parameter,
  type Result,
  type SourceLocation,
} from "@mpbind/frontend";
import { scriptName } from "../naming.js";

export type BoundParameter = {
  readonly name: string;
  /** Full spelling including a leading `const` */
  readonly type: string;
  readonly defaultValue?: string;
  readonly isOut: boolean;
};

export type Overload = {
  readonly parameters: readonly BoundParameter[];
  /** Undefined for constructors */
  readonly returnType?: string;
  readonly isStatic: boolean;
  readonly location: SourceLocation;
};

export type FunctionFlags = {
  readonly noOverloads: boolean;
  readonly unchecked: boolean;
  readonly noDefaults: boolean;
  readonly allowKwargs: boolean;
};

export type OverloadGroup = {
  /** Declared name, namespace-qualified for free functions */
  readonly name: string;
  readonly scriptName: string;
  readonly overloads: readonly Overload[];
  readonly flags: FunctionFlags;
  readonly location: SourceLocation;
};

const NO_FLAGS: FunctionFlags = {
  noOverloads: false,
  unchecked: false,
  noDefaults: false,
  allowKwargs: false,
};

export const parameterSpelling = (parameter: Parameter): string =>
  parameter.isConst ? `const ${parameter.type}` : parameter.type;

export const bindParameter = (parameter: Parameter): BoundParameter => ({
  name: parameter.name,
  type: parameterSpelling(parameter),
  defaultValue: parameter.defaultValue,
  isOut:
    hasAttribute(parameter.attributes, "ParamIsOut") ||
    (!parameter.isConst && parameter.type.endsWith("&")),
});

const flagsOf = (declaration: FunctionDeclaration): FunctionFlags => ({
  noOverloads: hasAttribute(declaration.attributes, "FuncNoOverloads"),
  unchecked: hasAttribute(declaration.attributes, "FuncUnchecked"),
  noDefaults: hasAttribute(declaration.attributes, "FuncNoDefaults"),
  allowKwargs: hasAttribute(declaration.attributes, "FuncAllowKwargs"),
});

const mergeFlags = (a: FunctionFlags, b: FunctionFlags): FunctionFlags => ({
  noOverloads: a.noOverloads || b.noOverloads,
  unchecked: a.unchecked || b.unchecked,
  noDefaults: a.noDefaults || b.noDefaults,
  allowKwargs: a.allowKwargs || b.allowKwargs,
});

const toOverload = (declaration: FunctionDeclaration): Overload => ({
  parameters: declaration.parameters.map(bindParameter),
  returnType: declaration.returnType,
  isStatic: declaration.modifiers.has("static"),
  location: declaration.location,
});

/**
 * Group declarations by script name, in order of first appearance
 */
export const groupOverloads = (
  declarations: readonly FunctionDeclaration[]
): readonly OverloadGroup[] => {
  const groups = new Map<string, OverloadGroup>();

  for (const declaration of declarations) {
    const key = scriptName(declaration.name, declaration.attributes);
    const existing = groups.get(key);
    groups.set(
      key,
      existing
        ? {
            ...existing,
            overloads: [...existing.overloads, toOverload(declaration)],
            flags: mergeFlags(existing.flags, flagsOf(declaration)),
          }
        : {
            name: declaration.name,
            scriptName: key,
            overloads: [toOverload(declaration)],
            flags: mergeFlags(NO_FLAGS, flagsOf(declaration)),
            location: declaration.location,
          }
    );
  }

  return [...groups.values()];
};

/**
 * Apply FuncNoDefaults and FuncNoOverloads before strategy selection
 */
export const normalizeGroup = (
  group: OverloadGroup,
  displayName: string
): Result<OverloadGroup, Diagnostic> => {
  if (group.flags.noOverloads && group.overloads.length > 1) {
    return error(
      createDiagnostic(
        "MPB4003",
        "error",
        `Function ${displayName} allows no overloads but declares ${group.overloads.length}`,
        group.overloads[1]?.location ?? group.location
      )
    );
  }

  if (!group.flags.noDefaults) return ok(group);

  return ok({
    ...group,
    overloads: group.overloads.map((overload) => ({
      ...overload,
      parameters: overload.parameters.map(
        ({ defaultValue: _dropped, ...parameter }) => parameter
      ),
    })),
  });
};

/**
 * Parameter type lists of every overload are identical
 */
export const hasUniformSignature = (group: OverloadGroup): boolean => {
  const signature = (overload: Overload): string =>
    overload.parameters.map((parameter) => parameter.type).join(",");
  const first = group.overloads[0];
  return (
    first !== undefined &&
    group.overloads.every((overload) => signature(overload) === signature(first))
  );
};

export const requiredCount = (overload: Overload): number => {
  const firstOptional = overload.parameters.findIndex(
    (parameter) => parameter.defaultValue !== undefined
  );
  return firstOptional < 0 ? overload.parameters.length : firstOptional;
};

export const hasDefaults = (overload: Overload): boolean =>
  overload.parameters.some((parameter) => parameter.defaultValue !== undefined);
