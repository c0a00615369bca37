/**
 * Test registration for Mocha
 */

import { describe, it } from "mocha";
import { runScenario } from "./runner.js";
import type { DescribeNode } from "./types.js";

/**
 * Register describe blocks recursively
 */
export const registerNode = (node: DescribeNode): void => {
  describe(node.name, () => {
    for (const child of node.children.values()) {
      registerNode(child);
    }

    for (const scenario of node.tests) {
      it(scenario.title, () => {
        runScenario(scenario);
      });
    }
  });
};
