/**
 * Config.yaml parser for scenario tests
 */

import YAML from "yaml";
import type { DiagnosticsMode, TestEntry } from "./types.js";

const SOURCE_EXTENSION = /\.(?:h|hpp|hh|hxx)$/;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Trim, drop empties, deduplicate and sort diagnostic codes
 */
const normalizeDiagnosticCodes = (
  codes: readonly string[]
): readonly string[] => {
  const normalized = codes.map((c) => c.trim()).filter((c) => c.length > 0);
  return [...new Set(normalized)].sort();
};

const parseStringList = (
  value: unknown,
  field: string
): readonly string[] | undefined => {
  if (value === undefined || value === null) {
    return undefined;
  }

  if (!Array.isArray(value)) {
    throw new Error(`${field} must be an array of strings`);
  }

  return value.map((v: unknown) => {
    if (typeof v !== "string") {
      throw new Error(`${field} must contain strings. Got: ${JSON.stringify(v)}`);
    }
    return v;
  });
};

/**
 * Parse and validate expectDiagnostics: MPB#### codes, undefined when empty
 */
const parseExpectDiagnostics = (
  value: unknown
): readonly string[] | undefined => {
  const list = parseStringList(value, "expectDiagnostics");
  if (!list) return undefined;

  const codes = normalizeDiagnosticCodes(list);
  for (const c of codes) {
    if (!/^MPB\d{4}$/.test(c)) {
      throw new Error(`Invalid diagnostic code "${c}". Expected format MPB####.`);
    }
  }

  return codes.length > 0 ? codes : undefined;
};

const parseDiagnosticsMode = (value: unknown): DiagnosticsMode | undefined => {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (value === "contains" || value === "exact") {
    return value;
  }
  throw new Error(
    `Invalid expectDiagnosticsMode: "${String(value)}". Must be "contains" or "exact".`
  );
};

const parseStrategies = (
  value: unknown
): Readonly<Record<string, string>> | undefined => {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new Error("expectStrategies must map group keys to strategies");
  }

  const strategies: Record<string, string> = {};
  for (const [key, strategy] of Object.entries(value)) {
    if (typeof strategy !== "string") {
      throw new Error(`Strategy for ${key} must be a string`);
    }
    strategies[key] = strategy;
  }
  return strategies;
};

const parseEntry = (item: unknown): TestEntry => {
  if (!isRecord(item)) {
    throw new Error(`Invalid test entry: ${JSON.stringify(item)}`);
  }

  const { input, title } = item;
  if (typeof input !== "string" || typeof title !== "string") {
    throw new Error("Each test entry must have 'input' and 'title' as strings");
  }

  if (!SOURCE_EXTENSION.test(input)) {
    throw new Error(`input must be a header file: ${input}`);
  }

  const expectDiagnostics = parseExpectDiagnostics(item.expectDiagnostics);
  const expectDiagnosticsMode = parseDiagnosticsMode(item.expectDiagnosticsMode);

  if (expectDiagnosticsMode && !expectDiagnostics) {
    throw new Error(
      `expectDiagnosticsMode is set for ${input} but expectDiagnostics is missing.`
    );
  }

  return {
    input,
    title,
    expectSource: parseStringList(item.expectSource, "expectSource"),
    expectHeader: parseStringList(item.expectHeader, "expectHeader"),
    expectStrategies: parseStrategies(item.expectStrategies),
    expectModuleOrder: parseStringList(item.expectModuleOrder, "expectModuleOrder"),
    expectDiagnostics,
    expectDiagnosticsMode,
  };
};

/**
 * Parse config.yaml and extract test entries
 */
export const parseConfigYaml = (yamlContent: string): readonly TestEntry[] => {
  const parsed: unknown = YAML.parse(yamlContent);

  if (!Array.isArray(parsed)) {
    throw new Error("config.yaml must be an array of test entries");
  }

  return parsed.map(parseEntry);
};
