/**
 * mpbind components command - describe what the scanner found
 */

import {
  formatLocation,
  type Attribute,
  type AttributeMap,
  type Component,
  type FunctionDeclaration,
  type OperatorDeclaration,
  type Parameter,
  type PropertyDeclaration,
} from "@mpbind/frontend";

const formatAttribute = (attribute: Attribute): string => {
  switch (attribute.kind) {
    case "flag":
      return attribute.name;
    case "keyValue":
      return `${attribute.name}=${attribute.value}`;
    case "group":
      return `${attribute.name}(${formatAttributes(attribute.attributes)})`;
  }
};

const formatAttributes = (attributes: AttributeMap): string =>
  [...attributes.values()].map(formatAttribute).join(", ");

const withAttributes = (text: string, attributes: AttributeMap): string =>
  attributes.size > 0 ? `${text} [${formatAttributes(attributes)}]` : text;

const formatParameter = (parameter: Parameter): string =>
  withAttributes(
    `${parameter.isConst ? "const " : ""}${parameter.type} ${parameter.name}${
      parameter.defaultValue !== undefined ? ` = ${parameter.defaultValue}` : ""
    }`,
    parameter.attributes
  );

const formatModifiers = (modifiers: ReadonlySet<string>): string =>
  [...modifiers].map((modifier) => `${modifier} `).join("");

const describeFunction = (
  label: string,
  fn: FunctionDeclaration
): string =>
  withAttributes(
    `  ${label}: ${formatModifiers(fn.modifiers)}${fn.returnType ? `${fn.returnType} ` : ""}${fn.name}(${fn.parameters
      .map(formatParameter)
      .join(", ")})${fn.isConstMethod ? " const" : ""}`,
    fn.attributes
  );

const describeOperator = (op: OperatorDeclaration): string =>
  withAttributes(
    `  Operator: ${op.returnType} operator${op.operator}(${op.parameters
      .map(formatParameter)
      .join(", ")})`,
    op.attributes
  );

const describeProperty = (property: PropertyDeclaration): string =>
  withAttributes(
    `  Property: ${formatModifiers(property.modifiers)}${property.type} ${property.name}${
      property.value !== undefined ? ` = ${property.value}` : ""
    }`,
    property.attributes
  );

/**
 * One header line per component followed by an indented line per member
 */
export const describeComponent = (component: Component): readonly string[] => {
  const title = component.name
    ? `${component.kind ?? "type"} ${component.name}`
    : "globals";
  const bases = component.bases.length
    ? ` : ${component.bases.map((base) => `${base.access} ${base.name}`).join(", ")}`
    : "";

  return [
    withAttributes(
      `${title}${bases} (module ${component.module ?? "-"}) at ${formatLocation(component.location)}`,
      component.attributes
    ),
    ...component.headers.map((header) => `  Requires: ${header}`),
    ...component.constructors.map((fn) => describeFunction("Constructor", fn)),
    ...component.destructors.map((fn) => describeFunction("Destructor", fn)),
    ...component.properties.map(describeProperty),
    ...component.functions.map((fn) => describeFunction("Function", fn)),
    ...component.operators.map(describeOperator),
  ];
};

export const describeComponents = (
  components: readonly Component[]
): string => components.flatMap(describeComponent).join("\n");
