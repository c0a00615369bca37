/**
 * mpbind CLI - programmatic API
 */

export { runCli, parseArgs, VERSION, EXIT_CODES } from "./cli.js";
export * from "./types.js";
export * from "./config.js";
export { loadTagVocabulary } from "./tags.js";
export { loadDependencies, loadProject, type LoadedProject } from "./project.js";
export { generateBindings, writeArtifacts } from "./commands/generate.js";
export { describeComponents } from "./commands/components.js";
