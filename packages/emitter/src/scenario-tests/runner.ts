/**
 * Test scenario runner
 */

import { expect } from "chai";
import * as fs from "node:fs";
import * as path from "node:path";
import {
  createLinePatterns,
  DEFAULT_TAGS,
  fixHeaderReferences,
  isError,
  resolveComponents,
  scanSource,
  validateComponents,
  type Diagnostic,
} from "@mpbind/frontend";
import { emitBindings } from "../emitter.js";
import type { BindingArtifacts } from "../types.js";
import type { DiagnosticsMode, Scenario } from "./types.js";

type Outcome = {
  readonly diagnostics: readonly Diagnostic[];
  readonly artifacts?: BindingArtifacts;
};

const describeDiagnostics = (diagnostics: readonly Diagnostic[]): string =>
  diagnostics.map((d) => `  ${d.code}: ${d.message}`).join("\n");

/**
 * Scan, resolve, validate and generate one annotated header, written
 * beside the header itself
 */
const generate = (inputPath: string): Outcome => {
  const scanned = scanSource(
    fs.readFileSync(inputPath, "utf-8"),
    inputPath,
    createLinePatterns(DEFAULT_TAGS)
  );
  const resolved = resolveComponents(scanned.components, []);
  const validation = validateComponents(resolved, []);
  const headers = fixHeaderReferences(resolved, {
    targetDirectory: path.dirname(inputPath),
    includePaths: [],
  });

  const diagnostics = [
    ...scanned.diagnostics,
    ...validation.diagnostics,
    ...headers.diagnostics,
  ];
  if (diagnostics.some(isError)) {
    return { diagnostics };
  }

  const result = emitBindings({ components: headers.components, dependencies: [] });
  if (!result.ok) {
    return { diagnostics: [...diagnostics, ...result.error.diagnostics] };
  }

  return {
    diagnostics: [...diagnostics, ...result.value.warnings],
    artifacts: result.value,
  };
};

const checkDiagnostics = (
  scenario: Scenario,
  expected: readonly string[],
  actual: readonly Diagnostic[]
): void => {
  const actualCodes = new Set<string>(actual.map((d) => d.code));
  const mode: DiagnosticsMode = scenario.expectDiagnosticsMode ?? "contains";

  const missing = expected.filter((c) => !actualCodes.has(c));
  if (missing.length) {
    throw new Error(
      `Missing expected diagnostics (${mode}): ${missing.join(", ")}\n` +
        `Expected: ${expected.join(", ")}\n` +
        `Actual diagnostics:\n${describeDiagnostics(actual)}`
    );
  }

  if (mode === "exact") {
    const expectedSet = new Set(expected);
    const unexpected = actual.filter((d) => !expectedSet.has(d.code));
    if (unexpected.length) {
      throw new Error(
        `Unexpected diagnostics in exact mode:\n${describeDiagnostics(unexpected)}`
      );
    }
  }
};

const expectLines = (
  artifact: string,
  lines: readonly string[] | undefined,
  label: string
): void => {
  for (const line of lines ?? []) {
    const found = artifact
      .split("\n")
      .some((candidate) => candidate.trim() === line.trim());
    expect(found, `${label} is missing line: ${line}`).to.equal(true);
  }
};

/**
 * Run a single test scenario
 */
export const runScenario = (scenario: Scenario): void => {
  const outcome = generate(scenario.inputPath);

  if (scenario.expectDiagnostics?.length) {
    checkDiagnostics(scenario, scenario.expectDiagnostics, outcome.diagnostics);
  }

  const artifacts = outcome.artifacts;
  const expectsOutput =
    scenario.expectSource !== undefined ||
    scenario.expectHeader !== undefined ||
    scenario.expectStrategies !== undefined ||
    scenario.expectModuleOrder !== undefined;

  if (!artifacts) {
    if (expectsOutput || !scenario.expectDiagnostics?.length) {
      throw new Error(
        `Generation failed for ${scenario.inputPath}:\n${describeDiagnostics(outcome.diagnostics)}`
      );
    }
    return;
  }

  if (!expectsOutput && scenario.expectDiagnostics === undefined) {
    throw new Error(`Scenario ${scenario.title} expects nothing`);
  }

  expectLines(artifacts.source, scenario.expectSource, "source");
  expectLines(artifacts.header, scenario.expectHeader, "header");

  if (scenario.expectModuleOrder) {
    expect(artifacts.plan.moduleOrder).to.deep.equal(scenario.expectModuleOrder);
  }

  for (const [key, strategy] of Object.entries(scenario.expectStrategies ?? {})) {
    expect(artifacts.plan.strategies.get(key), `strategy of ${key}`).to.equal(
      strategy
    );
  }
};
