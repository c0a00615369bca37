/**
 * Script-visible and native identifier naming
 */

import {
  attributeValue,
  unqualifiedName,
  type AttributeMap,
} from "@mpbind/frontend";

/**
 * `GetValue` → `get_value`, `HTTPServer` → `httpserver`
 */
export const toSnakeCase = (name: string): string =>
  name
    .replace(/[A-Z]+/g, (run) => `_${run.toLowerCase()}`)
    .replace(/^_/, "");

/**
 * Name a declaration is exposed under; a `Name="..."` attribute wins
 */
export const scriptName = (
  declaredName: string,
  attributes: AttributeMap
): string =>
  attributeValue(attributes, "Name") ??
  toSnakeCase(unqualifiedName(declaredName));

/**
 * Native identifier stem for a module: `geometry.shapes` → `GeometryShapes`
 */
export const moduleDeclarationName = (modulePath: string): string =>
  modulePath
    .split(".")
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1).toLowerCase())
    .join("");

export const moduleScriptName = (modulePath: string): string =>
  modulePath.slice(modulePath.lastIndexOf(".") + 1);

/**
 * Interned-string identifier: `a.b` → `MP_QSTR_a_dot_b`
 */
export const qstr = (text: string): string =>
  `MP_QSTR_${text.replace(/\./g, "_dot_")}`;

export const parentModule = (modulePath: string): string | undefined => {
  const dot = modulePath.lastIndexOf(".");
  return dot < 0 ? undefined : modulePath.slice(0, dot);
};

/**
 * `a.b.c` → `["a", "a.b", "a.b.c"]`
 */
export const moduleLineage = (modulePath: string): readonly string[] =>
  modulePath
    .split(".")
    .map((_part, index, parts) => parts.slice(0, index + 1).join("."));
