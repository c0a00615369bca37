/**
 * mpbind emitter - MicroPython binding generator
 */

export * from "./types.js";
export { emitBindings } from "./emitter.js";
export { createEmitContext, type BoundType, type EmitContext } from "./context.js";
export { planBindings, type BindingLayout, type ModulePlan } from "./planner.js";
export {
  buildModuleTree,
  orderModules,
  type ModuleNode,
  type ModuleTree,
} from "./modules/module-tree.js";
export type { DispatchStrategy } from "./overloads/strategy.js";
export { qstr, scriptName, toSnakeCase } from "./naming.js";
