/**
 * Diagnostic output
 */

import { formatDiagnostic, isError, type Diagnostic } from "@mpbind/frontend";

export type ReportOptions = {
  readonly quiet?: boolean;
};

/**
 * Errors go to stderr always; warnings unless quiet
 */
export const reportDiagnostics = (
  diagnostics: readonly Diagnostic[],
  options: ReportOptions = {}
): void => {
  for (const diagnostic of diagnostics) {
    if (isError(diagnostic)) {
      console.error(formatDiagnostic(diagnostic));
    } else if (!options.quiet) {
      console.warn(formatDiagnostic(diagnostic));
    }
  }
};
