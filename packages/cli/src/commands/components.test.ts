/**
 * Tests for component descriptions
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  EMPTY_ATTRIBUTES,
  parseAttributes,
  type Component,
  type Modifier,
} from "@mpbind/frontend";
import { describeComponent } from "./components.js";

const location = { file: "geo.h", line: 4 };

const member = (attributes = "") => ({
  modifiers: new Set<Modifier>(),
  attributes: parseAttributes(attributes),
  module: "geo",
  location,
  headers: [],
});

const vector: Component = {
  kind: "class",
  name: "geo::Vector",
  bases: [{ name: "geo::Shape", access: "public" }],
  attributes: parseAttributes("TypeOwned, Name=vec"),
  properties: [{ ...member("PropReadOnly"), name: "x", type: "float", value: "0" }],
  functions: [
    {
      ...member(),
      name: "Length",
      returnType: "float",
      parameters: [],
      isConstMethod: true,
    },
  ],
  operators: [],
  constructors: [
    {
      ...member(),
      name: "geo::Vector",
      parameters: [
        { name: "x", type: "float", defaultValue: "1", isConst: false, attributes: EMPTY_ATTRIBUTES },
      ],
      isConstMethod: false,
    },
  ],
  destructors: [],
  module: "geo",
  headers: ['"geo.h"'],
  location,
};

describe("describeComponent", () => {
  it("should list the type and every member", () => {
    expect(describeComponent(vector)).to.deep.equal([
      "class geo::Vector : public geo::Shape (module geo) at geo.h:4 [TypeOwned, Name=vec]",
      '  Requires: "geo.h"',
      "  Constructor: geo::Vector(float x = 1)",
      "  Property: float x = 0 [PropReadOnly]",
      "  Function: float Length() const",
    ]);
  });

  it("should name the globals holder", () => {
    const [line] = describeComponent({ ...vector, name: undefined, kind: undefined, bases: [], attributes: EMPTY_ATTRIBUTES, module: undefined });
    expect(line).to.equal("globals (module -) at geo.h:4");
  });
});
