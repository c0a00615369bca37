/**
 * Tag vocabulary loading
 */

import { existsSync, readFileSync } from "node:fs";
import YAML from "yaml";
import {
  createDiagnostic,
  DEFAULT_TAGS,
  error,
  ok,
  readTagVocabulary,
  type Diagnostic,
  type Result,
  type TagVocabulary,
} from "@mpbind/frontend";

/**
 * Read a YAML (or JSON) vocabulary file; without one the defaults apply
 */
export const loadTagVocabulary = (
  tagsPath: string | undefined
): Result<TagVocabulary, Diagnostic> => {
  if (tagsPath === undefined) return ok(DEFAULT_TAGS);

  if (!existsSync(tagsPath)) {
    return error(
      createDiagnostic("MPB5004", "error", `Tag file not found: ${tagsPath}`)
    );
  }

  let document: unknown;
  try {
    document = YAML.parse(readFileSync(tagsPath, "utf-8"));
  } catch (e) {
    return error(
      createDiagnostic(
        "MPB5004",
        "error",
        `${tagsPath}: ${e instanceof Error ? e.message : String(e)}`
      )
    );
  }

  return readTagVocabulary(document, tagsPath);
};
