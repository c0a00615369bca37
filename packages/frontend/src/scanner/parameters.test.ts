/**
 * Tests for parameter and base list parsing
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { DEFAULT_TAGS } from "../config/tags.js";
import {
  parseBaseTypes,
  parseParameter,
  parseParameterList,
} from "./parameters.js";

describe("parseParameter", () => {
  it("should read type, name and default", () => {
    const parameter = parseParameter("float scale = 1.0f", 0, DEFAULT_TAGS);
    expect(parameter?.type).to.equal("float");
    expect(parameter?.name).to.equal("scale");
    expect(parameter?.defaultValue).to.equal("1.0f");
    expect(parameter?.isConst).to.equal(false);
  });

  it("should strip const and attach pointer markers to the type", () => {
    const parameter = parseParameter("const Vector & other", 0, DEFAULT_TAGS);
    expect(parameter?.type).to.equal("Vector&");
    expect(parameter?.name).to.equal("other");
    expect(parameter?.isConst).to.equal(true);
  });

  it("should keep multi-word builtin spellings", () => {
    const parameter = parseParameter("unsigned long long id", 0, DEFAULT_TAGS);
    expect(parameter?.type).to.equal("unsigned long long");
    expect(parameter?.name).to.equal("id");
  });

  it("should name unnamed parameters by position", () => {
    expect(parseParameter("int", 2, DEFAULT_TAGS)?.name).to.equal("arg2");
    expect(parseParameter("unsigned int", 0, DEFAULT_TAGS)).to.include({
      type: "unsigned int",
      name: "arg0",
    });
  });

  it("should read the parameter tag", () => {
    const parameter = parseParameter(
      "MPyParam(ParamIsOut) int* result",
      0,
      DEFAULT_TAGS
    );
    expect(parameter?.type).to.equal("int*");
    expect(parameter?.name).to.equal("result");
    expect(parameter?.attributes.has("ParamIsOut")).to.equal(true);
  });

  it("should keep template arguments together", () => {
    const parameter = parseParameter(
      "std::map<int, float> table",
      0,
      DEFAULT_TAGS
    );
    expect(parameter?.type).to.equal("std::map<int,float>");
    expect(parameter?.name).to.equal("table");
  });
});

describe("parseParameterList", () => {
  it("should treat () and (void) as empty", () => {
    expect(parseParameterList("", DEFAULT_TAGS)).to.deep.equal([]);
    expect(parseParameterList(" void ", DEFAULT_TAGS)).to.deep.equal([]);
  });

  it("should split on top-level commas only", () => {
    const parameters = parseParameterList(
      "std::pair<int, int> range, int step = Clamp(1, 2)",
      DEFAULT_TAGS
    );
    expect(parameters.map((p) => p.name)).to.deep.equal(["range", "step"]);
    expect(parameters[1]?.defaultValue).to.equal("Clamp(1, 2)");
  });
});

describe("parseBaseTypes", () => {
  it("should read access specifiers", () => {
    expect(
      parseBaseTypes("public Shape, protected Counted<Circle, int>", "class")
    ).to.deep.equal([
      { name: "Shape", access: "public" },
      { name: "Counted<Circle,int>", access: "protected" },
    ]);
  });

  it("should default access by declared kind", () => {
    expect(parseBaseTypes("Shape", "struct")).to.deep.equal([
      { name: "Shape", access: "public" },
    ]);
    expect(parseBaseTypes("Shape", "class")).to.deep.equal([
      { name: "Shape", access: "private" },
    ]);
  });
});
