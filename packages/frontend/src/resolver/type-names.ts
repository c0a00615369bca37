/**
 * Type name helpers
 */

import { splitTopLevel } from "../scanner/text.js";

const CONST_PREFIX = /^const\s+/;

export const stripConst = (type: string): string =>
  type.replace(CONST_PREFIX, "");

export const constPrefix = (type: string): string =>
  CONST_PREFIX.exec(type)?.[0] ?? "";

const segments = (name: string): readonly string[] =>
  splitTopLevel(name.replace(/::/g, "\u0000"), "\u0000", "<");

/**
 * Last `::` segment outside template arguments: `a::b::Foo<x::Y>*` → `Foo<x::Y>*`
 */
export const unqualifiedName = (type: string): string => {
  const parts = segments(stripConst(type));
  return (parts[parts.length - 1] ?? "").replace(/\u0000/g, "::");
};

/**
 * Everything before the last segment: `a::b::Foo` → `a::b`
 */
export const namespaceOf = (name: string): string =>
  segments(name)
    .slice(0, -1)
    .map((part) => part.replace(/\u0000/g, "::"))
    .join("::");

export const stripIndirection = (type: string): string =>
  type.replace(/[\s*&]+$/, "");

export const nonTemplateName = (type: string): string => {
  const open = type.indexOf("<");
  return open >= 0 ? type.slice(0, open) : type;
};

/**
 * Bare name used to look a spelling up among declared types
 */
export const lookupName = (type: string): string =>
  stripIndirection(unqualifiedName(type));
