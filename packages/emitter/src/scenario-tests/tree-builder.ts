/**
 * Build describe tree structure for nested tests
 */

import type { DescribeNode, Scenario } from "./types.js";

export const buildDescribeTree = (
  scenarios: readonly Scenario[]
): DescribeNode | undefined => {
  if (scenarios.length === 0) return undefined;

  const root: DescribeNode = {
    name: "Scenario Tests",
    children: new Map(),
    tests: [],
  };

  for (const scenario of scenarios) {
    let current = root;

    for (const part of scenario.pathParts) {
      let node = current.children.get(part);
      if (!node) {
        node = { name: part, children: new Map(), tests: [] };
        current.children.set(part, node);
      }
      current = node;
    }

    current.tests.push(scenario);
  }

  return root;
};
