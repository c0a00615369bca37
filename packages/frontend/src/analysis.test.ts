/**
 * Tests for unit analysis
 */

import { describe, it, before, after } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { DEFAULT_TAGS } from "./config/tags.js";
import { analyzeUnit, scanUnit } from "./analysis.js";
import { findSourceFiles } from "./scanner/source-discovery.js";
import { formatDiagnostic } from "./types/diagnostic.js";

describe("Unit analysis", () => {
  let root = "";

  const write = (relative: string, lines: readonly string[]): void => {
    const file = path.join(root, relative);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, lines.join("\n"));
  };

  before(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "mpbind-analysis-"));
    write("good/src/a.h", [
      "MPyModule(shapes)",
      "MPyFunction() void Draw(Circle* c);",
    ]);
    write("good/src/b.hpp", [
      "MPyModule(shapes)",
      "namespace shapes {",
      "MPyClass() class Circle {",
      "    Circle(Circle&& other);",
      "};",
      "}",
    ]);
    write("good/src/notes.txt", ["MPyClass() class Ignored {", "};"]);
    write("good/src/nested/c.cc", []);
    write("dep/s.h", ["MPyModule(dep)", "MPyClass() class Square {", "};"]);
    write("bad/x.h", [
      "MPyModule(m)",
      "MPyFunction() void Draw(Square* s);",
    ]);
  });

  after(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("should find source files by extension in sorted order", () => {
    expect(findSourceFiles(path.join(root, "good"))).to.deep.equal([
      path.join(root, "good/src/a.h"),
      path.join(root, "good/src/b.hpp"),
      path.join(root, "good/src/nested/c.cc"),
    ]);
  });

  it("should scan every file into one component list", () => {
    const scanned = scanUnit(path.join(root, "good"), DEFAULT_TAGS);
    expect(scanned.components.map((c) => c.name)).to.deep.equal([
      undefined,
      "shapes::Circle",
    ]);
    expect(scanned.diagnostics.map((d) => d.code)).to.deep.equal(["MPB1001"]);
  });

  it("should resolve references and keep scanner warnings", () => {
    const result = analyzeUnit({
      baseDirectory: path.join(root, "good"),
      tags: DEFAULT_TAGS,
      dependencies: [],
    });

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    const draw = result.value.components[0]?.functions[0];
    expect(draw?.parameters.map((p) => p.type)).to.deep.equal([
      "shapes::Circle*",
    ]);
    expect(result.value.warnings.map((d) => d.code)).to.deep.equal([
      "MPB1001",
    ]);
  });

  it("should fail with validation errors", () => {
    const result = analyzeUnit({
      baseDirectory: path.join(root, "bad"),
      tags: DEFAULT_TAGS,
      dependencies: [],
    });

    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error.diagnostics.map(formatDiagnostic)).to.deep.equal([
      `${path.join(root, "bad/x.h")}:2:Error: Parameter type Square* not found for function Draw`,
    ]);
  });

  it("should accept types from dependency units", () => {
    const dependency = scanUnit(path.join(root, "dep"), DEFAULT_TAGS);
    const result = analyzeUnit({
      baseDirectory: path.join(root, "bad"),
      tags: DEFAULT_TAGS,
      dependencies: [
        {
          configPath: path.join(root, "dep/mpbind.json"),
          baseDirectory: path.join(root, "dep"),
          components: dependency.components,
          dependencies: [],
        },
      ],
    });

    expect(result.ok).to.equal(true);
  });
});
