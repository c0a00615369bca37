/**
 * mpbind frontend - declaration scanning, resolution and validation
 */

export * from "./types/result.js";
export * from "./types/diagnostic.js";
export * from "./types/attributes.js";
export * from "./types/declarations.js";
export * from "./config/tags.js";
export { parseAttributes } from "./scanner/attribute-reader.js";
export {
  createLinePatterns,
  type LinePatterns,
} from "./scanner/patterns.js";
export { scanSource, type ScanResult } from "./scanner/scanner.js";
export {
  findSourceFiles,
  SOURCE_EXTENSIONS,
} from "./scanner/source-discovery.js";
export {
  buildTypeIndex,
  findType,
  resolveComponents,
  type TypeIndex,
  type TypeMatch,
} from "./resolver/cross-reference.js";
export {
  lookupName,
  namespaceOf,
  nonTemplateName,
  stripConst,
  stripIndirection,
  unqualifiedName,
} from "./resolver/type-names.js";
export {
  fixHeaderReferences,
  relativeHeader,
  resolveInclude,
  type HeaderContext,
  type HeaderFixup,
} from "./resolver/include-resolution.js";
export { validateComponents } from "./validation/validator.js";
export { findUnsupportedSpelling } from "./validation/type-spelling.js";
export {
  createDependencyRegistry,
  type DependencyLoader,
  type DependencyRegistry,
  type DependencyUnit,
} from "./registry/dependency-registry.js";
export {
  analyzeUnit,
  dependencyComponents,
  scanUnit,
  type AnalyzedUnit,
  type AnalyzeOptions,
  type ScannedUnit,
} from "./analysis.js";
