/**
 * Tests for dispatch strategy selection
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import type { FunctionFlags, Overload, OverloadGroup } from "./overload-group.js";
import {
  conventionOf,
  describeGroup,
  selectDispatchStrategy,
  type DispatchStrategy,
} from "./strategy.js";

const location = { file: "api.h", line: 1 };

const overload = (types: readonly string[], optional = 0): Overload => ({
  parameters: types.map((type, index) => ({
    name: `p${index}`,
    type,
    defaultValue: index >= types.length - optional ? "0" : undefined,
    isOut: false,
  })),
  returnType: "void",
  isStatic: false,
  location,
});

const group = (
  overloads: readonly Overload[],
  flags: Partial<FunctionFlags> = {}
): OverloadGroup => ({
  name: "Scale",
  scriptName: "scale",
  overloads,
  flags: {
    noOverloads: false,
    unchecked: false,
    noDefaults: false,
    allowKwargs: false,
    ...flags,
  },
  location,
});

describe("Dispatch strategy selection", () => {
  it("should pick fixed arity for overloads of one and two parameters", () => {
    const scale = group([overload(["float"]), overload(["float", "float"])]);

    expect(selectDispatchStrategy(scale, 0)).to.equal("fixed");
    const shape = describeGroup(scale, 0);
    expect(shape.arities).to.deep.equal([1, 2]);
    expect(conventionOf(shape)).to.equal("variable");
  });

  it("should pick keyword dispatch when an overload opts in", () => {
    const configure = group(
      [overload(["int", "int", "int", "float", "bool"], 2)],
      { allowKwargs: true }
    );

    expect(selectDispatchStrategy(configure, 0)).to.equal("keyword");
    expect(describeGroup(configure, 0)).to.deep.include({
      minArgs: 3,
      maxArgs: 5,
    });
  });

  it("should forward to a keyword base from a positional derived group", () => {
    const base = describeGroup(
      group([overload(["int", "int"], 1)], { allowKwargs: true }),
      1
    );
    const derived = group([overload(["int"])]);

    expect(selectDispatchStrategy(derived, 1, [base])).to.equal("variable");
    const shape = describeGroup(derived, 1, [base]);
    expect(shape.own).to.equal("variable");
    expect(shape.entry).to.equal("keyword");
    expect(conventionOf(shape)).to.equal("keyword");
  });

  it("should stay fixed when every base is fixed", () => {
    const base = describeGroup(group([overload(["int"])]), 1);
    const shape = describeGroup(group([overload(["float"])]), 1, [base]);

    expect(shape.entry).to.equal("fixed");
    expect(shape.arities).to.deep.equal([2]);
    expect(conventionOf(shape)).to.equal("fixed");
  });

  it("should use variable arity above the fixed limit or with defaults", () => {
    expect(
      selectDispatchStrategy(group([overload(["int", "int", "int"])]), 1)
    ).to.equal("variable");
    expect(
      selectDispatchStrategy(group([overload(["int", "int"], 1)]), 0)
    ).to.equal("variable");
  });

  it("should only skip checks for a single unchecked overload", () => {
    expect(
      selectDispatchStrategy(group([overload(["int"])], { unchecked: true }), 0)
    ).to.equal("unchecked");
    expect(
      selectDispatchStrategy(
        group([overload(["int"]), overload(["float"])], { unchecked: true }),
        0
      )
    ).to.equal("fixed");
  });

  it("should select exactly one strategy for every combination", () => {
    const strategies: ReadonlySet<DispatchStrategy> = new Set([
      "unchecked",
      "fixed",
      "variable",
      "keyword",
    ]);
    const shapes = [
      [overload([])],
      [overload(["int"]), overload(["int", "int"])],
      [overload(["int", "int", "int", "int"])],
      [overload(["int", "int"], 2)],
    ];

    for (const overloads of shapes) {
      for (const unchecked of [false, true]) {
        for (const allowKwargs of [false, true]) {
          for (const selfArgs of [0, 1]) {
            const selected = selectDispatchStrategy(
              group(overloads, { unchecked, allowKwargs }),
              selfArgs
            );
            expect(strategies.has(selected)).to.equal(true);
          }
        }
      }
    }
  });
});
