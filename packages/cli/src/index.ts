#!/usr/bin/env node
/**
 * mpbind CLI - generate MicroPython bindings from annotated C++ headers
 */

import { runCli } from "./cli.js";

try {
  process.exitCode = runCli(process.argv.slice(2));
} catch (error) {
  console.error("Fatal error:", error);
  process.exitCode = 1;
}
