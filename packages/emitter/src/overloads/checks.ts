/**
 * Argument check synthesis
 *
 * Builds the boolean C++ expressions that decide whether a call matches an
 * overload. Argument counts include `self` for bound methods.
 */

import type { BoundParameter, Overload } from "./overload-group.js";
import { requiredCount } from "./overload-group.js";

export const isValue = (type: string, expression: string): string =>
  `mpbind::ScriptValue<${type}>::Is(${expression})`;

export const kwargObject = (parameter: BoundParameter): string =>
  `${parameter.name}_obj`;

export const kwargPresent = (parameter: BoundParameter): string =>
  `${parameter.name}_present`;

const conjunction = (terms: readonly string[]): string =>
  terms.length === 0 ? "true" : terms.join(" && ");

const positional = (parameter: BoundParameter, index: number): string =>
  isValue(parameter.type, `args[${index}]`);

const byKeyword = (parameter: BoundParameter): string =>
  `${kwargPresent(parameter)} && ${isValue(parameter.type, kwargObject(parameter))}`;

const optionalPositional = (
  overload: Overload,
  selfArgs: number
): readonly string[] =>
  overload.parameters.flatMap((parameter, index) =>
    parameter.defaultValue === undefined
      ? []
      : [
          `(n_args <= ${index + selfArgs} || ${positional(parameter, index + selfArgs)})`,
        ]
  );

/**
 * Fixed arity: the arity itself is checked by the runtime, so only the types
 */
export const fixedOverloadCheck = (
  overload: Overload,
  objects: readonly string[]
): string =>
  conjunction(
    overload.parameters.map((parameter, index) =>
      isValue(parameter.type, objects[index] ?? `arg${index}_obj`)
    )
  );

/**
 * Positional-only variable arity
 */
export const positionalOverloadCheck = (
  overload: Overload,
  selfArgs: number
): string => {
  const required = requiredCount(overload);
  const total = overload.parameters.length;
  const count =
    required === total
      ? [`n_args == ${total + selfArgs}`]
      : [`n_args >= ${required + selfArgs}`, `n_args <= ${total + selfArgs}`];

  return conjunction([
    ...count,
    ...overload.parameters
      .slice(0, required)
      .map((parameter, index) => positional(parameter, index + selfArgs)),
    ...optionalPositional(overload, selfArgs),
  ]);
};

/**
 * One candidate per number of positionally supplied required parameters,
 * from all of them down to none, most positional first
 */
export const requiredCandidates = (
  overload: Overload,
  selfArgs: number
): readonly string[] => {
  const required = overload.parameters.slice(0, requiredCount(overload));
  const comparison = required.length === overload.parameters.length ? "==" : ">=";
  const candidates: string[] = [];

  for (let supplied = required.length; supplied >= 0; supplied--) {
    candidates.push(
      conjunction([
        `n_args ${comparison} ${supplied + selfArgs}`,
        ...required
          .slice(0, supplied)
          .map((parameter, index) => positional(parameter, index + selfArgs)),
        ...required.slice(supplied).map(byKeyword),
      ])
    );
  }

  return candidates;
};

export const requiredCheck = (overload: Overload, selfArgs: number): string =>
  requiredCandidates(overload, selfArgs)
    .map((candidate) => `(${candidate})`)
    .join(" || ");

const isPresent = <T>(value: T | undefined): value is T => value !== undefined;

/**
 * Every non-empty subset of `items`, by size and then index order.
 * For k items this is 2^k - 1 subsets.
 */
export const optionalSubsets = <T>(
  items: readonly T[]
): readonly (readonly T[])[] => {
  const subsets: (readonly T[])[] = [];
  const k = items.length;

  for (let size = 1; size <= k; size++) {
    const indices = Array.from({ length: size }, (_unused, i) => i);

    for (;;) {
      subsets.push(indices.map((index) => items[index]).filter(isPresent));

      let position = size - 1;
      while (position >= 0 && indices[position] === k - size + position) {
        position--;
      }
      if (position < 0) break;

      indices[position] = (indices[position] ?? 0) + 1;
      for (let next = position + 1; next < size; next++) {
        indices[next] = (indices[next - 1] ?? 0) + 1;
      }
    }
  }

  return subsets;
};

export const optionalParameters = (
  overload: Overload
): readonly BoundParameter[] =>
  overload.parameters.filter((parameter) => parameter.defaultValue !== undefined);

/**
 * One check per subset of optional parameters supplied by keyword
 */
export const optionalSubsetChecks = (overload: Overload): readonly string[] =>
  optionalSubsets(optionalParameters(overload)).map(
    (subset) => `(${subset.map(byKeyword).join(" && ")})`
  );

/**
 * Subset checks grouped by how many optional keywords were passed
 */
export const optionalCheck = (overload: Overload): string => {
  const bySize = new Map<number, string[]>();
  const subsets = optionalSubsets(optionalParameters(overload));
  const checks = optionalSubsetChecks(overload);

  subsets.forEach((subset, index) => {
    const list = bySize.get(subset.length) ?? [];
    list.push(checks[index] ?? "false");
    bySize.set(subset.length, list);
  });

  return [...bySize.entries()]
    .map(
      ([size, list]) => `(optional_kwargs == ${size} && (${list.join(" || ")}))`
    )
    .join(" || ");
};

/**
 * Range and positional type checks of optional parameters under keyword calling
 */
export const optionalPositionalCheck = (
  overload: Overload,
  selfArgs: number
): string =>
  conjunction([
    `n_args <= ${overload.parameters.length + selfArgs}`,
    ...optionalPositional(overload, selfArgs),
  ]);
