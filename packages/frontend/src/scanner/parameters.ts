/**
 * Parameter list and base list parsing
 */

import type { TagVocabulary } from "../config/tags.js";
import { EMPTY_ATTRIBUTES } from "../types/attributes.js";
import type {
  Access,
  BaseType,
  Parameter,
  TypeKind,
} from "../types/declarations.js";
import { parseAttributes } from "./attribute-reader.js";
import {
  indexOfTopLevel,
  matchTag,
  normalizeTypeSpelling,
  splitTopLevel,
} from "./text.js";

const NAMED_PARAMETER = /^(?<type>.*?[\w>*&])\s*(?<name>\b[A-Za-z_]\w*)$/;

// Words that complete a type spelling rather than name a parameter
const TYPE_WORDS: ReadonlySet<string> = new Set([
  "int",
  "char",
  "short",
  "long",
  "float",
  "double",
  "bool",
  "signed",
  "unsigned",
  "void",
]);

const splitNameFromType = (
  declaration: string,
  index: number
): { readonly type: string; readonly name: string } => {
  const match = NAMED_PARAMETER.exec(declaration);
  const type = match?.groups?.type;
  const name = match?.groups?.name;
  if (type === undefined || name === undefined || TYPE_WORDS.has(name)) {
    return { type: declaration, name: `arg${index}` };
  }
  return { type: normalizeTypeSpelling(type), name };
};

/**
 * Parse one parameter: `[Tag(attrs)] [const] type name [= default]`
 */
export const parseParameter = (
  text: string,
  index: number,
  tags: TagVocabulary
): Parameter | undefined => {
  let remaining = text.trim();
  if (remaining.length === 0) return undefined;

  let attributes = EMPTY_ATTRIBUTES;
  const tag = matchTag(remaining, tags.parameter);
  if (tag) {
    attributes = parseAttributes(tag.payload);
    remaining = tag.rest;
  }

  let defaultValue: string | undefined;
  const equals = indexOfTopLevel(remaining, "=");
  if (equals >= 0) {
    defaultValue = remaining.slice(equals + 1).trim();
    remaining = remaining.slice(0, equals);
  }

  const constPrefix = /^const\s+/.exec(remaining);
  const isConst = constPrefix !== null;
  if (constPrefix) {
    remaining = remaining.slice(constPrefix[0].length);
  }

  const { type, name } = splitNameFromType(
    normalizeTypeSpelling(remaining),
    index
  );

  return { name, type, defaultValue, isConst, attributes };
};

/**
 * Parse the text between a declaration's parentheses
 */
export const parseParameterList = (
  text: string,
  tags: TagVocabulary
): readonly Parameter[] => {
  const trimmed = text.trim();
  if (trimmed.length === 0 || trimmed === "void") return [];

  const parameters: Parameter[] = [];
  for (const part of splitTopLevel(trimmed, ",", "(<[{")) {
    const parameter = parseParameter(part, parameters.length, tags);
    if (parameter) {
      parameters.push(parameter);
    }
  }
  return parameters;
};

const BASE_ENTRY =
  /^(?:(?<access>public|private|protected)\s+)?(?:virtual\s+)?(?<name>.+)$/;

const isAccess = (value: string | undefined): value is Access =>
  value === "public" || value === "private" || value === "protected";

/**
 * Parse a base list such as `public Shape, private Counted<Circle>`.
 * Without an access specifier a struct inherits publicly and a class privately.
 */
export const parseBaseTypes = (
  text: string | undefined,
  kind: TypeKind
): readonly BaseType[] => {
  if (text === undefined) return [];

  const bases: BaseType[] = [];
  for (const part of splitTopLevel(text, ",", "(<")) {
    const match = BASE_ENTRY.exec(part.trim());
    const name = match?.groups?.name;
    if (!name) continue;

    const access = match?.groups?.access;
    bases.push({
      name: normalizeTypeSpelling(name),
      access: isAccess(access)
        ? access
        : kind === "struct"
          ? "public"
          : "private",
    });
  }
  return bases;
};
