/**
 * Scenario test types
 */

/**
 * Diagnostics matching mode:
 * - "contains": expected codes must be present, extra codes allowed (default)
 * - "exact": actual codes must exactly match expected codes
 */
export type DiagnosticsMode = "contains" | "exact";

export type Expectations = {
  /** Lines that must appear in the definitions artifact */
  readonly expectSource?: readonly string[];
  /** Lines that must appear in the declarations artifact */
  readonly expectHeader?: readonly string[];
  /** Dispatch strategy per group key */
  readonly expectStrategies?: Readonly<Record<string, string>>;
  /** Modules in emission order */
  readonly expectModuleOrder?: readonly string[];
  readonly expectDiagnostics?: readonly string[];
  readonly expectDiagnosticsMode?: DiagnosticsMode;
};

export type TestEntry = Expectations & {
  readonly input: string;
  readonly title: string;
};

export type Scenario = Expectations & {
  readonly pathParts: readonly string[];
  readonly title: string;
  readonly inputPath: string;
};

export type DescribeNode = {
  readonly name: string;
  readonly children: Map<string, DescribeNode>;
  tests: Scenario[];
};
