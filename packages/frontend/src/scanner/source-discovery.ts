/**
 * Source file discovery
 */

import * as fs from "node:fs";
import * as path from "node:path";

export const SOURCE_EXTENSIONS: ReadonlySet<string> = new Set([
  ".h",
  ".hh",
  ".hpp",
  ".hxx",
  ".c",
  ".cc",
  ".cpp",
  ".cxx",
]);

/**
 * All recognised source files below a directory, in sorted order
 */
export const findSourceFiles = (baseDirectory: string): readonly string[] => {
  const files: string[] = [];

  const walk = (dir: string): void => {
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        walk(fullPath);
      } else if (
        entry.isFile() &&
        SOURCE_EXTENSIONS.has(path.extname(entry.name).toLowerCase())
      ) {
        files.push(fullPath);
      }
    }
  };

  walk(path.resolve(baseDirectory));
  return files.sort();
};
