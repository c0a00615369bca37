/**
 * Constant table entries
 */

import { stripConst, type PropertyDeclaration } from "@mpbind/frontend";
import { qstr, scriptName } from "../naming.js";
import { renderTemplate } from "../templates/render.js";
import { CONSTANT_ENTRY } from "../templates/modules.js";

export type ConstantKind = "INT" | "FLOAT" | "QSTR" | "BOOL" | "PTR";

const CONSTANT_KINDS: ReadonlyMap<string, ConstantKind> = new Map([
  ["int", "INT"],
  ["int8_t", "INT"],
  ["int16_t", "INT"],
  ["int32_t", "INT"],
  ["int64_t", "INT"],
  ["uint8_t", "INT"],
  ["uint16_t", "INT"],
  ["uint32_t", "INT"],
  ["uint64_t", "INT"],
  ["float", "FLOAT"],
  ["double", "FLOAT"],
  ["bool", "BOOL"],
  ["std::string", "QSTR"],
  ["std::string_view", "QSTR"],
  ["char*", "QSTR"],
]);

export const constantKind = (type: string): ConstantKind =>
  CONSTANT_KINDS.get(stripConst(type)) ?? "PTR";

/**
 * static constexpr members, and anything tagged PropConstant
 */
export const isTypeConstant = (property: PropertyDeclaration): boolean =>
  (property.modifiers.has("static") && property.modifiers.has("constexpr")) ||
  property.attributes.has("PropConstant");

/**
 * constexpr globals, and anything tagged PropConstant
 */
export const isModuleConstant = (property: PropertyDeclaration): boolean =>
  property.modifiers.has("constexpr") || property.attributes.has("PropConstant");

/**
 * Object constants are referenced by address; a constant declared without
 * an initializer is read through its name
 */
export const constantEntry = (
  property: PropertyDeclaration,
  qualifiedName: string
): string => {
  const kind = constantKind(property.type);
  const value =
    kind === "PTR" ? `&${qualifiedName}` : (property.value ?? qualifiedName);
  return renderTemplate(CONSTANT_ENTRY, {
    qstr: qstr(scriptName(property.name, property.attributes)),
    kind,
    value,
  });
};
