/**
 * Tests for tag vocabulary reading
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { DEFAULT_TAGS, readTagVocabulary } from "./tags.js";

describe("readTagVocabulary", () => {
  it("should return the defaults for an empty document", () => {
    const result = readTagVocabulary(null, "tags.yaml");
    expect(result).to.deep.equal({ ok: true, value: DEFAULT_TAGS });
  });

  it("should override only the keys present", () => {
    const result = readTagVocabulary(
      { function: "Export", types: { Exposed: "class" } },
      "tags.yaml"
    );

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    expect(result.value.function).to.equal("Export");
    expect(result.value.module).to.equal("MPyModule");
    expect(result.value.types).to.deep.equal({ Exposed: "class" });
  });

  it("should reject a type tag with an unknown kind", () => {
    const result = readTagVocabulary(
      { types: { Exposed: "union" } },
      "tags.yaml"
    );

    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error.code).to.equal("MPB5004");
    expect(result.error.message).to.equal(
      `tags.yaml: type tag 'Exposed' must be "class" or "struct"`
    );
  });

  it("should reject tag names that are not identifiers", () => {
    const result = readTagVocabulary({ module: "My Module" }, "tags.yaml");
    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error.message).to.equal(
      "tags.yaml: 'module' must be a tag name"
    );
  });

  it("should reject a document that is not a mapping", () => {
    const result = readTagVocabulary(["MPyModule"], "tags.yaml");
    expect(result.ok).to.equal(false);
  });
});
