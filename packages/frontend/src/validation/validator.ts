/**
 * Validator - every referenced type must be declared or built in
 */

import type {
  Component,
  Parameter,
} from "../types/declarations.js";
import {
  addDiagnostic,
  createDiagnostic,
  createDiagnosticsCollector,
  formatLocation,
  type DiagnosticsCollector,
  type SourceLocation,
} from "../types/diagnostic.js";
import {
  nonTemplateName,
  stripConst,
  stripIndirection,
  unqualifiedName,
} from "../resolver/type-names.js";
import { BUILTIN_TYPES } from "./builtin-types.js";
import { findUnsupportedSpelling } from "./type-spelling.js";

type TypeCheck = {
  readonly type: string;
  readonly role: "Parameter" | "Return" | "Property";
  readonly subject: string;
  readonly location: SourceLocation;
};

/**
 * Names of all declared types, plus one error per duplicate
 */
const collectDeclaredNames = (
  components: readonly Component[],
  collector: DiagnosticsCollector
): {
  readonly names: ReadonlySet<string>;
  readonly collector: DiagnosticsCollector;
} => {
  const seen = new Map<string, Component>();
  let result = collector;

  for (const component of components) {
    if (component.name === undefined) continue;
    const name = nonTemplateName(unqualifiedName(component.name));
    const first = seen.get(name);
    if (first) {
      result = addDiagnostic(
        result,
        createDiagnostic(
          "MPB2003",
          "error",
          `Type ${name} already defined at ${formatLocation(first.location)}`,
          component.location,
          undefined,
          [first.location]
        )
      );
      continue;
    }
    seen.set(name, component);
  }

  return { names: new Set(seen.keys()), collector: result };
};

const isKnownType = (type: string, declared: ReadonlySet<string>): boolean => {
  const spelled = stripIndirection(nonTemplateName(stripConst(type)));
  return (
    BUILTIN_TYPES.has(spelled) ||
    declared.has(nonTemplateName(stripIndirection(unqualifiedName(type))))
  );
};

const owner = (component: Component): string =>
  component.name === undefined ? "" : `${component.name}::`;

const parameterChecks = (
  parameters: readonly Parameter[],
  subject: string,
  location: SourceLocation
): readonly TypeCheck[] =>
  parameters.map((parameter) => ({
    type: parameter.type,
    role: "Parameter",
    subject,
    location,
  }));

const typeChecks = (component: Component): readonly TypeCheck[] => {
  const prefix = owner(component);
  const checks: TypeCheck[] = [];

  for (const constructor of component.constructors) {
    checks.push(
      ...parameterChecks(
        constructor.parameters,
        `constructor of ${component.name ?? ""}`,
        constructor.location
      )
    );
  }

  for (const fn of component.functions) {
    const subject = `function ${prefix}${fn.name}`;
    checks.push(...parameterChecks(fn.parameters, subject, fn.location));
    if (fn.returnType !== undefined) {
      checks.push({
        type: fn.returnType,
        role: "Return",
        subject,
        location: fn.location,
      });
    }
  }

  for (const op of component.operators) {
    const subject = `operator${op.operator} of ${component.name ?? "module scope"}`;
    checks.push(...parameterChecks(op.parameters, subject, op.location));
    checks.push({
      type: op.returnType,
      role: "Return",
      subject,
      location: op.location,
    });
  }

  for (const property of component.properties) {
    checks.push({
      type: property.type,
      role: "Property",
      subject: `${prefix}${property.name}`,
      location: property.location,
    });
  }

  return checks;
};

/**
 * Validate the current unit against itself and its dependencies.
 * All violations are collected; nothing stops at the first one.
 */
export const validateComponents = (
  current: readonly Component[],
  dependencies: readonly Component[] = []
): DiagnosticsCollector => {
  const declared = collectDeclaredNames(
    [...current, ...dependencies],
    createDiagnosticsCollector()
  );
  let collector = declared.collector;

  for (const component of current) {
    for (const check of typeChecks(component)) {
      const unsupported = findUnsupportedSpelling(check.type);
      if (unsupported) {
        collector = addDiagnostic(
          collector,
          createDiagnostic(
            "MPB2002",
            "error",
            `${unsupported.description} not supported for ${check.subject} of type ${check.type}`,
            check.location
          )
        );
        continue;
      }

      if (!isKnownType(check.type, declared.names)) {
        collector = addDiagnostic(
          collector,
          createDiagnostic(
            "MPB2001",
            "error",
            `${check.role} type ${check.type} not found for ${check.subject}`,
            check.location
          )
        );
      }
    }
  }

  return collector;
};
