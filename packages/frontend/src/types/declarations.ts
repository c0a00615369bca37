/**
 * Declaration model produced by the scanner
 */

import type { AttributeMap } from "./attributes.js";
import type { SourceLocation } from "./diagnostic.js";

export type Modifier =
  | "const"
  | "constexpr"
  | "static"
  | "explicit"
  | "extern"
  | "inline"
  | "virtual";

export type Parameter = {
  readonly name: string;
  readonly type: string;
  readonly defaultValue?: string;
  readonly isConst: boolean;
  readonly attributes: AttributeMap;
};

type MemberBase = {
  readonly modifiers: ReadonlySet<Modifier>;
  readonly attributes: AttributeMap;
  readonly module?: string;
  readonly location: SourceLocation;
  readonly headers: readonly string[];
};

/**
 * Functions, constructors (no return type) and destructors
 */
export type FunctionDeclaration = MemberBase & {
  readonly name: string;
  readonly returnType?: string;
  readonly parameters: readonly Parameter[];
  readonly isConstMethod: boolean;
};

export type PropertyDeclaration = MemberBase & {
  readonly name: string;
  readonly type: string;
  readonly value?: string;
};

export type OperatorDeclaration = MemberBase & {
  readonly operator: string;
  readonly returnType: string;
  readonly parameters: readonly Parameter[];
  readonly isConstMethod: boolean;
};

export type Access = "public" | "private" | "protected";

export type BaseType = {
  readonly name: string;
  readonly access: Access;
};

export type TypeKind = "class" | "struct";

/**
 * One declared type, or the per-file globals holder when `name` is absent
 */
export type Component = {
  readonly kind?: TypeKind;
  readonly tag?: string;
  readonly name?: string;
  readonly bases: readonly BaseType[];
  readonly attributes: AttributeMap;
  readonly properties: readonly PropertyDeclaration[];
  readonly functions: readonly FunctionDeclaration[];
  readonly operators: readonly OperatorDeclaration[];
  readonly constructors: readonly FunctionDeclaration[];
  readonly destructors: readonly FunctionDeclaration[];
  readonly module?: string;
  readonly headers: readonly string[];
  readonly location: SourceLocation;
};
