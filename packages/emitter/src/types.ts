/**
 * Emitter input and output types
 */

import type { Component, Diagnostic } from "@mpbind/frontend";
import type { DispatchStrategy } from "./overloads/strategy.js";

export type DependencyBindings = {
  readonly components: readonly Component[];
  /** Include spelling of the dependency's declarations artifact, quotes included */
  readonly header?: string;
  /** Named by this unit's config rather than reached through another dependency */
  readonly direct: boolean;
};

export type BindingInput = {
  /** Resolved, validated components with fixed header references */
  readonly components: readonly Component[];
  readonly dependencies: readonly DependencyBindings[];
  /** Include spelling of this unit's declarations artifact; omitted when both artifacts go to one stream */
  readonly primaryHeader?: string;
};

/**
 * Decisions made while generating, kept for inspection and tests
 */
export type BindingPlan = {
  /** Own dispatch strategy per group, keyed `Type.name` or `module.path.name` */
  readonly strategies: ReadonlyMap<string, DispatchStrategy>;
  /** Modules in emission order */
  readonly moduleOrder: readonly string[];
};

export type BindingArtifacts = {
  readonly header: string;
  readonly source: string;
  readonly plan: BindingPlan;
  readonly warnings: readonly Diagnostic[];
};
