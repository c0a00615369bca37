/**
 * Tag vocabulary - the literal spellings that mark declarations for export
 */

import type { TypeKind } from "../types/declarations.js";
import { createDiagnostic, type Diagnostic } from "../types/diagnostic.js";
import { ok, error, type Result } from "../types/result.js";

export type TagVocabulary = {
  readonly module: string;
  readonly types: Readonly<Record<string, TypeKind>>;
  readonly property: string;
  readonly function: string;
  readonly operator: string;
  readonly parameter: string;
};

export const DEFAULT_TAGS: TagVocabulary = {
  module: "MPyModule",
  types: { MPyClass: "class", MPyStruct: "struct" },
  property: "MPyProperty",
  function: "MPyFunction",
  operator: "MPyOperator",
  parameter: "MPyParam",
};

const SINGLE_TAG_KEYS = [
  "module",
  "property",
  "function",
  "operator",
  "parameter",
] as const;

const TAG_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const invalid = (message: string, source: string): Diagnostic =>
  createDiagnostic("MPB5004", "error", `${source}: ${message}`);

const readTypeTags = (
  value: unknown,
  source: string
): Result<Readonly<Record<string, TypeKind>> | undefined, Diagnostic> => {
  if (value === undefined) return ok(undefined);
  if (!isRecord(value)) {
    return error(invalid("'types' must map tag names to class or struct", source));
  }

  const types: Record<string, TypeKind> = {};
  for (const [tag, kind] of Object.entries(value)) {
    if (!TAG_NAME.test(tag)) {
      return error(invalid(`'${tag}' is not a valid tag name`, source));
    }
    if (kind !== "class" && kind !== "struct") {
      return error(
        invalid(`type tag '${tag}' must be "class" or "struct"`, source)
      );
    }
    types[tag] = kind;
  }
  return ok(types);
};

/**
 * Merge a parsed vocabulary document over the defaults.
 * Keys the document leaves out keep their default spelling.
 */
export const readTagVocabulary = (
  document: unknown,
  source: string,
  defaults: TagVocabulary = DEFAULT_TAGS
): Result<TagVocabulary, Diagnostic> => {
  if (document === null || document === undefined) return ok(defaults);
  if (!isRecord(document)) {
    return error(invalid("tag vocabulary must be a mapping", source));
  }

  const overrides: Partial<Record<(typeof SINGLE_TAG_KEYS)[number], string>> =
    {};
  for (const key of SINGLE_TAG_KEYS) {
    const value = document[key];
    if (value === undefined) continue;
    if (typeof value !== "string" || !TAG_NAME.test(value)) {
      return error(invalid(`'${key}' must be a tag name`, source));
    }
    overrides[key] = value;
  }

  const types = readTypeTags(document.types, source);
  if (!types.ok) return types;

  return ok({
    ...defaults,
    ...overrides,
    types: types.value ?? defaults.types,
  });
};
