/**
 * Tests for the cross-reference resolver
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { DEFAULT_TAGS } from "../config/tags.js";
import { createLinePatterns } from "../scanner/patterns.js";
import { scanSource } from "../scanner/scanner.js";
import type { Component } from "../types/declarations.js";
import { buildTypeIndex, findType, resolveComponents } from "./cross-reference.js";

const patterns = createLinePatterns(DEFAULT_TAGS);

const scan = (file: string, lines: readonly string[]): readonly Component[] =>
  scanSource(lines.join("\n"), file, patterns).components;

const dependency = scan("dep/color.h", [
  "MPyModule(ui)",
  "namespace ui {",
  "MPyClass() class Color {",
  "};",
  "MPyClass() class Brush {",
  "};",
]);

const current = scan("app/shapes.h", [
  "MPyModule(shapes)",
  "namespace geo {",
  "MPyClass() class Vector {",
  "    MPyFunction() Vector Scaled(float factor) const;",
  "    MPyProperty() Color tint;",
  "    MPyFunction() const Brush& Stroke();",
  "};",
  "MPyClass() class Color {",
  "};",
  "MPyFunction() float Length(const Vector* v);",
]);

describe("Cross-reference resolver", () => {
  describe("findType", () => {
    const index = buildTypeIndex(current, dependency);

    it("should qualify and keep pointer markers", () => {
      expect(findType(index, "Vector*").name).to.equal("geo::Vector*");
      expect(findType(index, "const Brush&").name).to.equal("const ui::Brush&");
    });

    it("should prefer the current unit over dependencies", () => {
      expect(findType(index, "Color").name).to.equal("geo::Color");
      expect(findType(index, "Color").component?.location.file).to.equal(
        "app/shapes.h"
      );
    });

    it("should leave unknown names unchanged", () => {
      expect(findType(index, "float")).to.deep.equal({ name: "float" });
      expect(findType(index, "std::vector<Vector>")).to.deep.equal({
        name: "std::vector<Vector>",
      });
    });
  });

  describe("resolveComponents", () => {
    const resolved = resolveComponents(current, dependency);

    it("should rewrite return, parameter and property types", () => {
      const vector = resolved[0];
      expect(vector?.functions.map((f) => f.returnType)).to.deep.equal([
        "geo::Vector",
        "const ui::Brush&",
      ]);
      expect(vector?.properties[0]?.type).to.equal("geo::Color");

      const globals = resolved[2];
      expect(globals?.functions[0]?.parameters[0]?.type).to.equal(
        "geo::Vector*"
      );
      expect(globals?.functions[0]?.returnType).to.equal("float");
    });

    it("should be idempotent", () => {
      const twice = resolveComponents(resolved, dependency);
      const thrice = resolveComponents(twice, dependency);
      expect(twice).to.deep.equal(resolved);
      expect(thrice).to.deep.equal(twice);
    });
  });
});
