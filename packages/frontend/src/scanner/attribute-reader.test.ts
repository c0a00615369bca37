/**
 * Tests for the attribute grammar reader
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { parseAttributes } from "./attribute-reader.js";

describe("parseAttributes", () => {
  it("should return an empty map for empty text", () => {
    expect(parseAttributes("").size).to.equal(0);
    expect(parseAttributes("  ,  ").size).to.equal(0);
  });

  it("should read flags", () => {
    const attributes = parseAttributes("TypeOwned, ExportPublic");
    expect([...attributes.keys()]).to.deep.equal(["TypeOwned", "ExportPublic"]);
    expect(attributes.get("TypeOwned")).to.deep.equal({
      kind: "flag",
      name: "TypeOwned",
    });
  });

  it("should strip one layer of quotes from values", () => {
    const attributes = parseAttributes(`TypeFactory="MakeWidget", Name='"q"'`);
    expect(attributes.get("TypeFactory")).to.deep.equal({
      kind: "keyValue",
      name: "TypeFactory",
      value: "MakeWidget",
    });
    expect(attributes.get("Name")).to.deep.equal({
      kind: "keyValue",
      name: "Name",
      value: '"q"',
    });
  });

  it("should keep commas inside quoted values", () => {
    const attributes = parseAttributes(`TypeInitCode="Setup(a, b);", TypeOwned`);
    expect(attributes.get("TypeInitCode")).to.deep.equal({
      kind: "keyValue",
      name: "TypeInitCode",
      value: "Setup(a, b);",
    });
    expect(attributes.has("TypeOwned")).to.equal(true);
  });

  it("should read nested groups recursively", () => {
    const attributes = parseAttributes("Outer(A, Inner(B=1, C)), D");
    const outer = attributes.get("Outer");
    expect(outer?.kind).to.equal("group");
    if (outer?.kind !== "group") return;

    expect([...outer.attributes.keys()]).to.deep.equal(["A", "Inner"]);
    const inner = outer.attributes.get("Inner");
    if (inner?.kind !== "group") {
      expect.fail("Inner should be a group");
    }
    expect(inner.attributes.get("B")).to.deep.equal({
      kind: "keyValue",
      name: "B",
      value: "1",
    });
    expect(attributes.get("D")?.kind).to.equal("flag");
  });

  it("should let the last duplicate win", () => {
    const attributes = parseAttributes("Mode=a, Mode=b");
    expect(attributes.size).to.equal(1);
    expect(attributes.get("Mode")).to.deep.equal({
      kind: "keyValue",
      name: "Mode",
      value: "b",
    });
  });

  it("should terminate on unbalanced parentheses", () => {
    const attributes = parseAttributes("Broken(A, B");
    expect(attributes.size).to.equal(1);
    expect(attributes.get("Broken(A, B")?.kind).to.equal("flag");
  });
});
