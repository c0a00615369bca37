/**
 * Header reference fixup
 *
 * Header references are rewritten relative to the directory the generated
 * files are written to, so the generated glue can include them directly.
 */

import { existsSync, statSync } from "node:fs";
import * as path from "node:path";
import type { Component } from "../types/declarations.js";
import { createDiagnostic, type Diagnostic } from "../types/diagnostic.js";

export type HeaderContext = {
  readonly targetDirectory: string;
  readonly includePaths: readonly string[];
};

export type HeaderFixup = {
  readonly components: readonly Component[];
  readonly diagnostics: readonly Diagnostic[];
};

const isFile = (candidate: string): boolean =>
  existsSync(candidate) && statSync(candidate).isFile();

const toPosix = (p: string): string => p.split(path.sep).join("/");

/**
 * Find the file a reference such as `"a/b.h"` or `<c.h>` names.
 * Quoted references look beside the including file first.
 */
export const resolveInclude = (
  reference: string,
  includingFile: string,
  includePaths: readonly string[]
): string | undefined => {
  const isSystem = reference.startsWith("<");
  const name = reference.slice(1, -1);

  if (path.isAbsolute(name)) {
    return isFile(name) ? name : undefined;
  }

  const searchPath = isSystem
    ? includePaths
    : [path.dirname(includingFile), ...includePaths];

  return searchPath
    .map((directory) => path.resolve(directory, name))
    .find(isFile);
};

export const relativeHeader = (file: string, targetDirectory: string): string =>
  `"${toPosix(path.relative(targetDirectory, path.resolve(file)))}"`;

/**
 * Rewrite every component's header references. A component's own file comes
 * first. Unresolved quoted references are errors; unresolved system
 * references are kept as written with a warning.
 */
export const fixHeaderReferences = (
  components: readonly Component[],
  context: HeaderContext
): HeaderFixup => {
  const diagnostics: Diagnostic[] = [];

  const fixed = components.map((component): Component => {
    const file = component.location.file;
    const headers = [relativeHeader(file, context.targetDirectory)];

    for (const reference of component.headers) {
      const resolved = resolveInclude(reference, file, context.includePaths);
      if (resolved) {
        headers.push(relativeHeader(resolved, context.targetDirectory));
        continue;
      }

      const isSystem = reference.startsWith("<");
      diagnostics.push(
        createDiagnostic(
          isSystem ? "MPB3002" : "MPB3001",
          isSystem ? "warning" : "error",
          `Header ${reference} not found`,
          component.location,
          isSystem ? undefined : "Add its directory to includePaths"
        )
      );
      headers.push(reference);
    }

    return { ...component, headers: [...new Set(headers)] };
  });

  return { components: fixed, diagnostics };
};
