/**
 * Tests for diagnostic types
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  createDiagnostic,
  formatDiagnostic,
  createDiagnosticsCollector,
  addDiagnostic,
  mergeDiagnostics,
  collectDiagnostics,
  isError,
} from "./diagnostic.js";

describe("Diagnostics", () => {
  describe("formatDiagnostic", () => {
    it("should format an error as path:line:Error: message", () => {
      const diagnostic = createDiagnostic(
        "MPB2001",
        "error",
        "Property type Color not found for Shape::fill",
        { file: "include/shape.h", line: 12 }
      );

      expect(formatDiagnostic(diagnostic)).to.equal(
        "include/shape.h:12:Error: Property type Color not found for Shape::fill"
      );
    });

    it("should capitalise warnings", () => {
      const diagnostic = createDiagnostic(
        "MPB3002",
        "warning",
        "Header <vector> not found",
        { file: "a.h", line: 1 }
      );

      expect(formatDiagnostic(diagnostic)).to.equal(
        "a.h:1:Warning: Header <vector> not found"
      );
    });

    it("should omit the location prefix when there is none", () => {
      const diagnostic = createDiagnostic("MPB5001", "error", "No config");
      expect(formatDiagnostic(diagnostic)).to.equal("Error: No config");
    });

    it("should append the hint on its own line", () => {
      const diagnostic = createDiagnostic(
        "MPB4001",
        "error",
        "Operator ! not supported",
        undefined,
        "Use a named function instead"
      );

      expect(formatDiagnostic(diagnostic)).to.equal(
        "Error: Operator ! not supported\n  Hint: Use a named function instead"
      );
    });
  });

  describe("DiagnosticsCollector", () => {
    it("should start empty", () => {
      const collector = createDiagnosticsCollector();
      expect(collector.diagnostics).to.have.length(0);
      expect(collector.hasErrors).to.equal(false);
    });

    it("should track errors but not warnings", () => {
      const warned = addDiagnostic(
        createDiagnosticsCollector(),
        createDiagnostic("MPB1001", "warning", "dropped")
      );
      expect(warned.hasErrors).to.equal(false);

      const failed = addDiagnostic(
        warned,
        createDiagnostic("MPB2003", "error", "duplicate")
      );
      expect(failed.hasErrors).to.equal(true);
      expect(failed.diagnostics).to.have.length(2);
    });

    it("should merge collectors in order", () => {
      const first = collectDiagnostics([
        createDiagnostic("MPB2001", "error", "a"),
      ]);
      const second = collectDiagnostics([
        createDiagnostic("MPB1002", "warning", "b"),
      ]);

      const merged = mergeDiagnostics(first, second);
      expect(merged.diagnostics.map((d) => d.message)).to.deep.equal([
        "a",
        "b",
      ]);
      expect(merged.hasErrors).to.equal(true);
    });
  });

  describe("isError", () => {
    it("should only report error severity", () => {
      expect(isError(createDiagnostic("MPB2001", "error", "x"))).to.equal(true);
      expect(isError(createDiagnostic("MPB2001", "info", "x"))).to.equal(false);
    });
  });
});
