/**
 * Tests for argument check synthesis
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import type { Overload } from "./overload-group.js";
import {
  fixedOverloadCheck,
  optionalCheck,
  optionalSubsetChecks,
  optionalSubsets,
  positionalOverloadCheck,
  requiredCandidates,
  requiredCheck,
} from "./checks.js";

const overload = (
  parameters: readonly [string, string, string?][]
): Overload => ({
  parameters: parameters.map(([type, name, defaultValue]) => ({
    name,
    type,
    defaultValue,
    isOut: false,
  })),
  returnType: "void",
  isStatic: false,
  location: { file: "api.h", line: 1 },
});

const withOptionals = overload([
  ["int", "a"],
  ["float", "b", "1.0f"],
  ["bool", "c", "true"],
]);

describe("Argument checks", () => {
  describe("fixed arity", () => {
    it("should check each argument object", () => {
      expect(
        fixedOverloadCheck(overload([["int", "a"]]), ["arg0_obj"])
      ).to.equal("mpbind::ScriptValue<int>::Is(arg0_obj)");
    });

    it("should accept any call without parameters", () => {
      expect(fixedOverloadCheck(overload([]), [])).to.equal("true");
    });
  });

  describe("variable arity", () => {
    it("should bound the count and check optional positions", () => {
      expect(positionalOverloadCheck(withOptionals, 0)).to.equal(
        [
          "n_args >= 1",
          "n_args <= 3",
          "mpbind::ScriptValue<int>::Is(args[0])",
          "(n_args <= 1 || mpbind::ScriptValue<float>::Is(args[1]))",
          "(n_args <= 2 || mpbind::ScriptValue<bool>::Is(args[2]))",
        ].join(" && ")
      );
    });

    it("should require an exact count without optionals", () => {
      expect(
        positionalOverloadCheck(overload([["Vector&", "v"]]), 1)
      ).to.equal("n_args == 2 && mpbind::ScriptValue<Vector&>::Is(args[1])");
    });
  });

  describe("keyword calling", () => {
    it("should generate candidates from most to least positional", () => {
      expect(requiredCandidates(withOptionals, 0)).to.deep.equal([
        "n_args >= 1 && mpbind::ScriptValue<int>::Is(args[0])",
        "n_args >= 0 && a_present && mpbind::ScriptValue<int>::Is(a_obj)",
      ]);
    });

    it("should offset positions past self", () => {
      const pair = overload([
        ["int", "x"],
        ["int", "y"],
      ]);
      expect(requiredCheck(pair, 1)).to.equal(
        [
          "(n_args == 3 && mpbind::ScriptValue<int>::Is(args[1]) && mpbind::ScriptValue<int>::Is(args[2]))",
          "(n_args == 2 && mpbind::ScriptValue<int>::Is(args[1]) && y_present && mpbind::ScriptValue<int>::Is(y_obj))",
          "(n_args == 1 && x_present && mpbind::ScriptValue<int>::Is(x_obj) && y_present && mpbind::ScriptValue<int>::Is(y_obj))",
        ].join(" || ")
      );
    });

    it("should check every subset of optional keywords", () => {
      expect(optionalSubsetChecks(withOptionals)).to.deep.equal([
        "(b_present && mpbind::ScriptValue<float>::Is(b_obj))",
        "(c_present && mpbind::ScriptValue<bool>::Is(c_obj))",
        "(b_present && mpbind::ScriptValue<float>::Is(b_obj) && c_present && mpbind::ScriptValue<bool>::Is(c_obj))",
      ]);
      expect(optionalCheck(withOptionals)).to.equal(
        "(optional_kwargs == 1 && ((b_present && mpbind::ScriptValue<float>::Is(b_obj)) || (c_present && mpbind::ScriptValue<bool>::Is(c_obj))))" +
          " || (optional_kwargs == 2 && ((b_present && mpbind::ScriptValue<float>::Is(b_obj) && c_present && mpbind::ScriptValue<bool>::Is(c_obj))))"
      );
    });

    it("should produce three subset checks for three required and two optional parameters", () => {
      const configure = overload([
        ["int", "x"],
        ["int", "y"],
        ["int", "z"],
        ["float", "scale", "1.0f"],
        ["bool", "visible", "true"],
      ]);
      expect(optionalSubsetChecks(configure)).to.have.length(3);
    });
  });

  describe("optionalSubsets", () => {
    it("should enumerate subsets by size in index order", () => {
      expect(optionalSubsets(["a", "b", "c"])).to.deep.equal([
        ["a"],
        ["b"],
        ["c"],
        ["a", "b"],
        ["a", "c"],
        ["b", "c"],
        ["a", "b", "c"],
      ]);
    });

    it("should yield 2^k - 1 distinct subsets", () => {
      for (let k = 0; k <= 6; k++) {
        const items = Array.from({ length: k }, (_unused, i) => i);
        const subsets = optionalSubsets(items);
        expect(subsets).to.have.length(2 ** k - 1);
        expect(new Set(subsets.map((subset) => subset.join(","))).size).to.equal(
          2 ** k - 1
        );
      }
    });
  });
});
