/**
 * Operator routing
 *
 * `[]` goes to the subscript handler, parameterless operators to the unary
 * switch and everything else to the binary switch. Spellings missing from
 * the catalog stop generation.
 */

import {
  createDiagnostic,
  error,
  ok,
  type Diagnostic,
  type OperatorDeclaration,
  type Result,
} from "@mpbind/frontend";
import { parameterSpelling } from "../overloads/overload-group.js";
import { joinFragments, renderTemplate } from "../templates/render.js";
import * as templates from "../templates/operators.js";

export type OperatorCode = {
  readonly subscripts: readonly string[];
  readonly unary: readonly string[];
  readonly binary: readonly string[];
};

type OperatorSet = {
  readonly spelling: string;
  readonly overloads: readonly OperatorDeclaration[];
};

/**
 * Unary and binary forms of one spelling (`-v`, `a - b`) form separate sets
 */
const bySpelling = (
  operators: readonly OperatorDeclaration[]
): readonly OperatorSet[] => {
  const sets = new Map<string, OperatorSet>();
  for (const operator of operators) {
    const key = `${operator.operator}/${operator.parameters.length === 0}`;
    const existing = sets.get(key);
    sets.set(key, {
      spelling: operator.operator,
      overloads: [...(existing?.overloads ?? []), operator],
    });
  }
  return [...sets.values()];
};

const unsupported = (
  operator: OperatorDeclaration,
  owner: string
): Diagnostic =>
  createDiagnostic(
    "MPB4001",
    "error",
    `Operator ${operator.operator} of ${owner} is not supported`,
    operator.location
  );

const subscript = (operator: OperatorDeclaration, self: string): string => {
  const index = operator.parameters[0];
  return renderTemplate(templates.SUBSCRIPT, {
    index_type: index ? parameterSpelling(index) : "void",
    return_type: operator.returnType,
    value: self,
  });
};

const binaryBody = (
  operator: OperatorDeclaration,
  entry: templates.BinaryOperator,
  lhs: string
): string => {
  switch (entry.kind) {
    case "comparison":
      return renderTemplate(templates.BINARY_COMPARISON, {
        lhs,
        op: operator.operator,
      });
    case "inplace":
      return renderTemplate(templates.BINARY_INPLACE, {
        lhs,
        op: operator.operator,
      });
    case "value":
      return renderTemplate(templates.BINARY_VALUE, {
        return_type: operator.returnType,
        lhs,
        op: operator.operator,
      });
  }
};

/**
 * Route a type's operators into subscript, unary and binary fragments.
 * `self` and `lhs` are the dereferenced value expressions.
 */
export const routeOperators = (
  operators: readonly OperatorDeclaration[],
  owner: string,
  self: string,
  lhs: string
): Result<OperatorCode, Diagnostic> => {
  const subscripts: string[] = [];
  const unary: string[] = [];
  const binary: string[] = [];

  for (const { spelling, overloads } of bySpelling(operators)) {
    const first = overloads[0];
    if (!first) continue;

    if (spelling === "[]") {
      subscripts.push(...overloads.map((operator) => subscript(operator, self)));
      continue;
    }

    if (first.parameters.length === 0) {
      const label = templates.UNARY_OPERATORS.get(spelling);
      if (!label) return error(unsupported(first, owner));
      unary.push(
        renderTemplate(templates.UNARY_CASE, {
          label,
          return_type: first.returnType,
          op: spelling,
          value: self,
        })
      );
      continue;
    }

    const entry = templates.BINARY_OPERATORS.get(spelling);
    if (!entry) return error(unsupported(first, owner));
    binary.push(
      renderTemplate(templates.BINARY_CASE, {
        label: entry.label,
        overloads: joinFragments(
          overloads.map((operator) =>
            renderTemplate(templates.BINARY_OVERLOAD, {
              type: operator.parameters[0]
                ? parameterSpelling(operator.parameters[0])
                : "void",
              body: binaryBody(operator, entry, lhs),
            })
          )
        ),
      })
    );
  }

  return ok({ subscripts, unary, binary });
};
