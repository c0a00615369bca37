/**
 * Dispatch strategy selection
 *
 * Exactly one strategy is chosen for the group's own overloads. The entry
 * point may need a wider calling convention than the own overloads when a
 * base type's group of the same name requires it.
 */

import {
  hasDefaults,
  requiredCount,
  type OverloadGroup,
} from "./overload-group.js";

export type DispatchStrategy = "unchecked" | "fixed" | "variable" | "keyword";

/** Calling convention of a native entry point */
export type CallConvention = "fixed" | "variable" | "keyword";

/** Largest argument count, self included, a fixed-arity entry point takes */
export const FIXED_ARITY_LIMIT = 3;

export type GroupShape = {
  /** Strategy for the group's own overloads */
  readonly own: DispatchStrategy;
  /** Strategy of the exposed entry point, own overloads and bases together */
  readonly entry: DispatchStrategy;
  /** Distinct argument counts, self included, in ascending order */
  readonly arities: readonly number[];
  readonly minArgs: number;
  readonly maxArgs: number;
};

const RANK: Readonly<Record<CallConvention, number>> = {
  fixed: 0,
  variable: 1,
  keyword: 2,
};

const BY_RANK: readonly CallConvention[] = ["fixed", "variable", "keyword"];

const widthOf = (shape: GroupShape): number => {
  switch (shape.entry) {
    case "keyword":
      return RANK.keyword;
    case "variable":
      return RANK.variable;
    case "fixed":
      return RANK.fixed;
    case "unchecked":
      return shape.maxArgs <= FIXED_ARITY_LIMIT ? RANK.fixed : RANK.variable;
  }
};

/**
 * Convention an entry point is actually called with. A fixed group that
 * accepts several argument counts is reached through a positional trampoline.
 */
export const conventionOf = (shape: GroupShape): CallConvention => {
  const width = widthOf(shape);
  if (width !== RANK.fixed) return BY_RANK[width] ?? "variable";
  return shape.arities.length === 1 ? "fixed" : "variable";
};

const ownArities = (group: OverloadGroup, selfArgs: number): number[] =>
  group.overloads.map((overload) => overload.parameters.length + selfArgs);

/**
 * Pick the strategy for a group's own overloads
 */
export const selectDispatchStrategy = (
  group: OverloadGroup,
  selfArgs: number,
  bases: readonly GroupShape[] = []
): DispatchStrategy => {
  if (group.flags.unchecked && group.overloads.length === 1) {
    return "unchecked";
  }

  if (group.flags.allowKwargs) {
    return "keyword";
  }

  const fitsFixed =
    ownArities(group, selfArgs).every((arity) => arity <= FIXED_ARITY_LIMIT) &&
    !group.overloads.some(hasDefaults) &&
    bases.every((base) => widthOf(base) === RANK.fixed);

  return fitsFixed ? "fixed" : "variable";
};

const unique = (values: readonly number[]): readonly number[] =>
  [...new Set(values)].sort((a, b) => a - b);

/**
 * Strategy, entry strategy and accepted argument counts of a group
 */
export const describeGroup = (
  group: OverloadGroup,
  selfArgs: number,
  bases: readonly GroupShape[] = []
): GroupShape => {
  const own = selectDispatchStrategy(group, selfArgs, bases);
  const arities = ownArities(group, selfArgs);
  const minimums = group.overloads.map(
    (overload) => requiredCount(overload) + selfArgs
  );

  if (own === "unchecked") {
    const arity = arities[0] ?? selfArgs;
    return { own, entry: own, arities: [arity], minArgs: arity, maxArgs: arity };
  }

  const width = Math.max(RANK[own], ...bases.map(widthOf));
  const entry = BY_RANK[width] ?? "variable";

  return {
    own,
    entry,
    arities: unique([...arities, ...bases.flatMap((base) => base.arities)]),
    minArgs: Math.min(...minimums, ...bases.map((base) => base.minArgs)),
    maxArgs: Math.max(...arities, ...bases.map((base) => base.maxArgs)),
  };
};
