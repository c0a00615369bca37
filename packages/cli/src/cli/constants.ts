/**
 * CLI constants
 */

import { createRequire } from "module";

const require = createRequire(import.meta.url);
const packageJson = require("../../package.json") as { version: string };

export const VERSION = packageJson.version;

export const EXIT_CODES = {
  success: 0,
  usage: 1,
  validation: 2,
  headerResolution: 3,
  generation: 4,
} as const;
