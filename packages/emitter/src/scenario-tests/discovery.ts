/**
 * Test scenario discovery
 *
 * Directory structure:
 *   testcases/
 *   └── <category>/<test>/   # annotated headers + config.yaml
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { parseConfigYaml } from "./config-parser.js";
import type { Scenario } from "./types.js";

export const discoverScenarios = (baseDir: string): readonly Scenario[] => {
  const scenarios: Scenario[] = [];

  const walk = (dir: string, pathParts: readonly string[]): void => {
    const entries = fs.readdirSync(dir, { withFileTypes: true });

    if (entries.some((e) => e.name === "config.yaml")) {
      const configPath = path.join(dir, "config.yaml");
      const testEntries = parseConfigYaml(fs.readFileSync(configPath, "utf-8"));

      for (const entry of testEntries) {
        const inputPath = path.join(dir, entry.input);
        if (!fs.existsSync(inputPath)) {
          throw new Error(
            `Input file not found: ${inputPath} (title: "${entry.title}", config: ${configPath})`
          );
        }

        scenarios.push({ ...entry, pathParts, inputPath });
      }
    }

    for (const entry of entries) {
      if (entry.isDirectory()) {
        walk(path.join(dir, entry.name), [...pathParts, entry.name]);
      }
    }
  };

  if (fs.existsSync(baseDir)) {
    walk(baseDir, []);
  }
  return scenarios;
};
