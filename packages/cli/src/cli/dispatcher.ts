/**
 * CLI command dispatcher
 */

import { resolve } from "node:path";
import {
  dependencyComponents,
  resolveComponents,
  scanUnit,
} from "@mpbind/frontend";
import { describeComponents } from "../commands/components.js";
import { generateBindings, writeArtifacts } from "../commands/generate.js";
import { findConfig, CONFIG_FILE_NAME } from "../config.js";
import { loadDependencies, loadProject, type LoadedProject } from "../project.js";
import type { VariableSources } from "../types.js";
import { EXIT_CODES, VERSION } from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";
import { reportDiagnostics } from "./reporting.js";

const PROJECT_COMMANDS: ReadonlySet<string> = new Set([
  "generate",
  "components",
  "sources",
  "target-path",
  "base-path",
]);

const generate = (project: LoadedProject, sources: VariableSources): number => {
  const { config } = project;
  // Progress shares stdout with the artifacts unless they go to files
  const log = (message: string): void => {
    if (config.verbose && config.targetPath !== undefined) console.log(message);
  };

  log(`Loading ${config.dependencies.length} dependencies`);
  const dependencies = loadDependencies(config, sources);
  if (!dependencies.ok) {
    reportDiagnostics([dependencies.error]);
    return EXIT_CODES.headerResolution;
  }

  log(`Scanning ${config.baseDirectory}`);
  const generated = generateBindings(project, dependencies.value);
  if (!generated.ok) {
    reportDiagnostics(generated.error.diagnostics, config);
    console.error(
      generated.error.exitCode === EXIT_CODES.validation
        ? "Validation failed"
        : generated.error.exitCode === EXIT_CODES.headerResolution
          ? "Header resolution failed"
          : "Generation failed"
    );
    return generated.error.exitCode;
  }

  reportDiagnostics(generated.value.warnings, config);
  const output = writeArtifacts(generated.value.artifacts, config.targetPath);
  if (output !== undefined) {
    process.stdout.write(output);
  } else {
    log(`Wrote ${config.targetPath}.h and ${config.targetPath}.cpp`);
  }
  return EXIT_CODES.success;
};

const components = (project: LoadedProject, sources: VariableSources): number => {
  const dependencies = loadDependencies(project.config, sources);
  if (!dependencies.ok) {
    reportDiagnostics([dependencies.error]);
    return EXIT_CODES.headerResolution;
  }

  const scanned = scanUnit(project.config.baseDirectory, project.tags);
  reportDiagnostics(scanned.diagnostics, project.config);
  const resolved = resolveComponents(
    scanned.components,
    dependencyComponents(dependencies.value)
  );
  console.log(describeComponents(resolved));
  return EXIT_CODES.success;
};

/**
 * Main CLI entry point
 */
export const runCli = (
  args: readonly string[],
  environment: Readonly<Record<string, string | undefined>> = process.env,
  cwd: string = process.cwd()
): number => {
  const parsed = parseArgs(args);

  if (parsed.command === "version") {
    console.log(`mpbind v${VERSION}`);
    return EXIT_CODES.success;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return EXIT_CODES.success;
  }

  if (!PROJECT_COMMANDS.has(parsed.command)) {
    console.error(`Error: Unknown command '${parsed.command}'`);
    console.error("Run 'mpbind --help' for usage information");
    return EXIT_CODES.usage;
  }

  const configPath = parsed.configFile
    ? resolve(cwd, parsed.configFile)
    : findConfig(cwd);
  if (!configPath) {
    console.error(`Error: No ${CONFIG_FILE_NAME} found`);
    return EXIT_CODES.usage;
  }

  const sources: VariableSources = {
    environment,
    assignments: parsed.assignments,
    compilerFlags: parsed.compilerFlags,
  };
  const project = loadProject(configPath, parsed.options, sources);
  if (!project.ok) {
    reportDiagnostics([project.error]);
    return EXIT_CODES.usage;
  }
  const { config } = project.value;

  switch (parsed.command) {
    case "target-path":
      console.log(config.targetPath ?? "-");
      return EXIT_CODES.success;

    case "base-path":
      console.log(config.baseDirectory);
      return EXIT_CODES.success;

    case "sources":
      console.log(scanUnit(config.baseDirectory, project.value.tags).files.join("\n"));
      return EXIT_CODES.success;

    case "components":
      return components(project.value, sources);

    default:
      return generate(project.value, sources);
  }
};
