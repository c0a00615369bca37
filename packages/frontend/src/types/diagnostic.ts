/**
 * Diagnostic types for mpbind
 */

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  | "MPB1001" // Constructor dropped (unsupported parameter spelling)
  | "MPB1002" // Free operator never attached to a type
  | "MPB2001" // Unknown type reference
  | "MPB2002" // Unsupported type spelling
  | "MPB2003" // Duplicate type declaration
  | "MPB3001" // Unresolved quoted header
  | "MPB3002" // Unresolved system header
  | "MPB3003" // Circular dependency between project configs
  | "MPB3004" // Dependency config could not be loaded
  | "MPB4001" // Unsupported operator
  | "MPB4002" // Module containment cycle
  | "MPB4003" // Overloads declared on a no-overloads function
  | "MPB4004" // Declaration outside any module
  | "MPB4005" // Module already defined by a dependency
  | "MPB5001" // Config file not found
  | "MPB5002" // Invalid config file
  | "MPB5003" // Unresolved placeholder
  | "MPB5004"; // Invalid tag vocabulary

export type SourceLocation = {
  readonly file: string;
  readonly line: number;
};

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly location?: SourceLocation;
  readonly hint?: string;
  readonly relatedLocations?: readonly SourceLocation[];
};

export const createDiagnostic = (
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  location?: SourceLocation,
  hint?: string,
  relatedLocations?: readonly SourceLocation[]
): Diagnostic => ({
  code,
  severity,
  message,
  location,
  hint,
  relatedLocations,
});

export const isError = (diagnostic: Diagnostic): boolean =>
  diagnostic.severity === "error";

const severityLabel = (severity: DiagnosticSeverity): string =>
  severity.charAt(0).toUpperCase() + severity.slice(1);

export const formatLocation = (location: SourceLocation): string =>
  `${location.file}:${location.line}`;

/**
 * Render a diagnostic as `path:line:Error: message`
 */
export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const prefix = diagnostic.location
    ? `${formatLocation(diagnostic.location)}:`
    : "";
  const line = `${prefix}${severityLabel(diagnostic.severity)}: ${diagnostic.message}`;

  return diagnostic.hint ? `${line}\n  Hint: ${diagnostic.hint}` : line;
};

export type DiagnosticsCollector = {
  readonly diagnostics: readonly Diagnostic[];
  readonly hasErrors: boolean;
};

export const createDiagnosticsCollector = (): DiagnosticsCollector => ({
  diagnostics: [],
  hasErrors: false,
});

export const addDiagnostic = (
  collector: DiagnosticsCollector,
  diagnostic: Diagnostic
): DiagnosticsCollector => ({
  diagnostics: [...collector.diagnostics, diagnostic],
  hasErrors: collector.hasErrors || isError(diagnostic),
});

export const mergeDiagnostics = (
  collector1: DiagnosticsCollector,
  collector2: DiagnosticsCollector
): DiagnosticsCollector => ({
  diagnostics: [...collector1.diagnostics, ...collector2.diagnostics],
  hasErrors: collector1.hasErrors || collector2.hasErrors,
});

export const collectDiagnostics = (
  diagnostics: readonly Diagnostic[]
): DiagnosticsCollector =>
  diagnostics.reduce(addDiagnostic, createDiagnosticsCollector());
