/**
 * Declaration scanner
 *
 * Single pass over the lines of one source file. Tagged types open a
 * component whose body is tracked by brace depth; tagged members wait for
 * their declaration line and land in the open component, or in the file's
 * globals component when no type is open.
 */

import { EMPTY_ATTRIBUTES, type AttributeMap } from "../types/attributes.js";
import type {
  BaseType,
  Component,
  FunctionDeclaration,
  OperatorDeclaration,
  PropertyDeclaration,
  TypeKind,
} from "../types/declarations.js";
import {
  createDiagnostic,
  type Diagnostic,
  type SourceLocation,
} from "../types/diagnostic.js";
import { findUnsupportedSpelling } from "../validation/type-spelling.js";
import { parseAttributes } from "./attribute-reader.js";
import { stripComments } from "./lexical-filter.js";
import { parseBaseTypes, parseParameterList } from "./parameters.js";
import {
  createConstructorPatterns,
  matchTypeTag,
  readModifiers,
  type ConstructorPatterns,
  type LinePatterns,
} from "./patterns.js";
import {
  countBraces,
  matchTag,
  normalizeTypeSpelling,
  stripQuotes,
} from "./text.js";

export type ScanResult = {
  readonly components: readonly Component[];
  readonly diagnostics: readonly Diagnostic[];
};

type ComponentBuilder = {
  tag?: string;
  kind?: TypeKind;
  name?: string;
  bases: readonly BaseType[];
  attributes: AttributeMap;
  properties: PropertyDeclaration[];
  functions: FunctionDeclaration[];
  operators: OperatorDeclaration[];
  constructors: FunctionDeclaration[];
  destructors: FunctionDeclaration[];
  module?: string;
  headers: readonly string[];
  location: SourceLocation;
};

type TypeState =
  | { readonly kind: "outsideType" }
  | {
      readonly kind: "awaitingTypeDeclaration";
      readonly component: ComponentBuilder;
      depth: number;
    }
  | {
      readonly kind: "insideTypeBody";
      readonly component: ComponentBuilder;
      readonly members: ConstructorPatterns;
      depth: number;
    };

type MemberKind = "property" | "function" | "operator";

type PendingMember = {
  readonly kind: MemberKind;
  readonly attributes: AttributeMap;
  readonly module?: string;
  readonly headers: readonly string[];
};

const MEMBER_KINDS: readonly MemberKind[] = ["property", "function", "operator"];

const newComponent = (
  location: SourceLocation,
  module: string | undefined,
  headers: readonly string[],
  attributes: AttributeMap = EMPTY_ATTRIBUTES
): ComponentBuilder => ({
  bases: [],
  attributes,
  properties: [],
  functions: [],
  operators: [],
  constructors: [],
  destructors: [],
  module,
  headers,
  location,
});

const qualify = (namespace: string | undefined, name: string): string =>
  namespace ? `${namespace}::${name}` : name;

const freeze = (builder: ComponentBuilder): Component => ({ ...builder });

/**
 * Scan one source file into components
 */
export const scanSource = (
  text: string,
  file: string,
  patterns: LinePatterns
): ScanResult => {
  const { tags } = patterns;
  const components: Component[] = [];
  const diagnostics: Diagnostic[] = [];
  const pendingHeaders: string[] = [];

  let namespace: string | undefined;
  let currentModule: string | undefined;
  let globals: ComponentBuilder | undefined;
  let typeState: TypeState = { kind: "outsideType" };
  let pending: PendingMember | undefined;

  const closeType = (): void => {
    if (typeState.kind !== "outsideType" && typeState.component.name) {
      components.push(freeze(typeState.component));
    }
    typeState = { kind: "outsideType" };
  };

  const closeGlobals = (): void => {
    if (globals) {
      components.push(freeze({ ...globals, headers: [...pendingHeaders] }));
    }
    globals = undefined;
  };

  const ownerFor = (location: SourceLocation): ComponentBuilder => {
    if (typeState.kind !== "outsideType") return typeState.component;
    globals ??= newComponent(location, currentModule, []);
    return globals;
  };

  const scopeName = (name: string): string =>
    typeState.kind === "outsideType" ? qualify(namespace, name) : name;

  const acceptMember = (
    member: PendingMember,
    line: string,
    location: SourceLocation
  ): boolean => {
    const base = {
      attributes: member.attributes,
      module: member.module,
      headers: member.headers,
      location,
    };

    switch (member.kind) {
      case "property": {
        const groups = patterns.property.exec(line)?.groups;
        if (!groups?.type || !groups.name) return false;
        ownerFor(location).properties.push({
          ...base,
          name: scopeName(groups.name),
          type: normalizeTypeSpelling(groups.type),
          value: groups.value,
          modifiers: readModifiers(groups.modifiers),
        });
        return true;
      }

      case "function": {
        const groups = patterns.function.exec(line)?.groups;
        if (!groups?.type || !groups.name) return false;
        const modifiers = readModifiers(groups.modifiers);
        const returnType = normalizeTypeSpelling(groups.type);
        ownerFor(location).functions.push({
          ...base,
          name: scopeName(groups.name),
          returnType: modifiers.has("const")
            ? `const ${returnType}`
            : returnType,
          parameters: parseParameterList(groups.params ?? "", tags),
          modifiers,
          isConstMethod: groups.qualifier !== undefined,
        });
        return true;
      }

      case "operator": {
        const groups = patterns.operator.exec(line)?.groups;
        if (!groups?.type || !groups.op) return false;
        const modifiers = readModifiers(groups.modifiers);
        const returnType = normalizeTypeSpelling(groups.type);
        ownerFor(location).operators.push({
          ...base,
          operator: groups.op,
          returnType: modifiers.has("const")
            ? `const ${returnType}`
            : returnType,
          parameters: parseParameterList(groups.params ?? "", tags),
          modifiers,
          isConstMethod: groups.qualifier !== undefined,
        });
        return true;
      }
    }
  };

  const memberTag = (kind: MemberKind): string => tags[kind];

  const lines = stripComments(text);
  for (let index = 0; index < lines.length; index++) {
    let line = lines[index] ?? "";
    const location: SourceLocation = { file, line: index + 1 };

    const header = patterns.header.exec(line)?.groups?.include;
    if (header) {
      pendingHeaders.push(header);
      continue;
    }

    const moduleTag = matchTag(line, tags.module);
    if (moduleTag) {
      closeGlobals();
      currentModule = stripQuotes(moduleTag.payload.trim());
      continue;
    }

    const namespaceMatch = patterns.namespace.exec(line)?.groups?.name;
    if (namespaceMatch) {
      namespace = namespaceMatch;
      continue;
    }

    if (typeState.kind !== "outsideType") {
      typeState.depth += countBraces(line);
      if (typeState.depth < 1) {
        closeType();
      }
    }

    const typeTag = matchTypeTag(line, tags);
    if (typeTag) {
      closeType();
      typeState = {
        kind: "awaitingTypeDeclaration",
        component: {
          ...newComponent(
            location,
            currentModule,
            [...pendingHeaders],
            parseAttributes(typeTag.payload)
          ),
          tag: typeTag.tag,
        },
        depth: countBraces(typeTag.rest) + 1,
      };
      line = typeTag.rest;
    }

    if (typeState.kind === "awaitingTypeDeclaration") {
      const groups = patterns.typeDeclaration.exec(line)?.groups;
      const kind = groups?.kind;
      if (groups?.name && (kind === "class" || kind === "struct")) {
        const component: ComponentBuilder = typeState.component;
        component.kind = kind;
        component.name = qualify(namespace, groups.name);
        component.bases = parseBaseTypes(groups.bases, kind);
        component.location = location;
        typeState = {
          kind: "insideTypeBody",
          component,
          members: createConstructorPatterns(groups.name),
          depth: typeState.depth - 1,
        };
        continue;
      }
    }

    if (typeState.kind === "insideTypeBody") {
      const { component, members } = typeState;

      const constructor = members.constructor.exec(line)?.groups;
      if (constructor) {
        const parameters = parseParameterList(constructor.params ?? "", tags);
        const rest = constructor.rest ?? "";
        const unsupported = parameters
          .map((parameter) => findUnsupportedSpelling(parameter.type))
          .find((problem) => problem !== undefined);

        if (unsupported) {
          diagnostics.push(
            createDiagnostic(
              "MPB1001",
              "warning",
              `Constructor of ${component.name ?? "?"} skipped: ${unsupported.description} are not supported`,
              location
            )
          );
        } else if (!/^=\s*delete\b/.test(rest)) {
          component.constructors.push({
            name: component.name ?? "",
            parameters,
            modifiers: readModifiers(constructor.modifiers),
            isConstMethod: false,
            attributes: EMPTY_ATTRIBUTES,
            module: component.module,
            headers: component.headers,
            location,
          });
        }
        line = rest;
      }

      const destructor = members.destructor.exec(line)?.groups;
      if (destructor) {
        component.destructors.push({
          name: `~${component.name ?? ""}`,
          parameters: [],
          modifiers: readModifiers(destructor.modifiers),
          isConstMethod: false,
          attributes: EMPTY_ATTRIBUTES,
          module: component.module,
          headers: component.headers,
          location,
        });
        line = destructor.rest ?? "";
      }
    }

    for (const kind of MEMBER_KINDS) {
      const tag = matchTag(line, memberTag(kind));
      if (tag) {
        pending = {
          kind,
          attributes: parseAttributes(tag.payload),
          module: currentModule,
          headers: [...pendingHeaders],
        };
        line = tag.rest;
      }

      if (pending?.kind === kind && acceptMember(pending, line, location)) {
        pending = undefined;
        break;
      }
    }
  }

  closeType();
  closeGlobals();

  return { components, diagnostics };
};
