/**
 * CLI argument parser
 */

import type { CliOptions, ParsedArgs } from "../types.js";

const ASSIGNMENT = /^([A-Za-z_][A-Za-z0-9_]*)=(.*)$/s;

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: readonly string[]): ParsedArgs => {
  const options: CliOptions = {};
  const assignments: Record<string, string> = {};
  const compilerFlags: string[] = [];
  let command = "";
  let configFile: string | undefined;
  let captureCompilerFlags = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg) continue;

    // Everything after -- is read as compiler flags
    if (arg === "--") {
      captureCompilerFlags = true;
      continue;
    }

    if (captureCompilerFlags) {
      compilerFlags.push(arg);
      continue;
    }

    if (!arg.startsWith("-")) {
      const assignment = ASSIGNMENT.exec(arg);
      if (assignment?.[1] !== undefined) {
        assignments[assignment[1]] = assignment[2] ?? "";
      } else if (!command) {
        command = arg;
      } else if (!configFile) {
        configFile = arg;
      }
      continue;
    }

    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", options: {}, assignments: {}, compilerFlags: [] };

      case "-v":
      case "--version":
        return { command: "version", options: {}, assignments: {}, compilerFlags: [] };

      case "-V":
      case "--verbose":
        options.verbose = true;
        break;

      case "-q":
      case "--quiet":
        options.quiet = true;
        break;

      case "-o":
      case "--target":
        options.target = args[++i] ?? "";
        break;

      case "-t":
      case "--tags":
        options.tags = args[++i] ?? "";
        break;

      case "-I":
      case "--include":
        {
          const dir = args[++i] ?? "";
          if (dir) {
            options.includePaths = options.includePaths || [];
            options.includePaths.push(dir);
          }
        }
        break;

      default:
        if (arg.startsWith("-I") && arg.length > 2) {
          options.includePaths = options.includePaths || [];
          options.includePaths.push(arg.slice(2));
        }
    }
  }

  return { command, configFile, assignments, options, compilerFlags };
};
