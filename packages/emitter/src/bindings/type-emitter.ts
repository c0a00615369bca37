/**
 * Type emission
 *
 * One exposed type becomes a binding struct wrapping the native value, its
 * construction hook, attribute, operator and subscript handlers, its methods
 * and the type object tying them together.
 */

import {
  attributeValue,
  error,
  hasAttribute,
  ok,
  type Diagnostic,
  type OperatorDeclaration,
  type PropertyDeclaration,
  type Result,
} from "@mpbind/frontend";
import { methodOwner, type BoundType, type EmitContext } from "../context.js";
import { qstr, scriptName } from "../naming.js";
import {
  bindParameter,
  normalizeGroup,
  requiredCount,
  type Overload,
} from "../overloads/overload-group.js";
import {
  callArguments,
  emitFunction,
  functionTableEntry,
  positionalInit,
  selfArgsOf,
  type FunctionBinding,
} from "../overloads/function-emitter.js";
import { positionalOverloadCheck } from "../overloads/checks.js";
import { describeGroup, type DispatchStrategy } from "../overloads/strategy.js";
import { joinFragments, renderTemplate } from "../templates/render.js";
import * as operatorTemplates from "../templates/operators.js";
import * as templates from "../templates/types.js";
import { TYPE_ENTRY } from "../templates/modules.js";
import { constantEntry, isTypeConstant } from "./constants.js";
import { routeOperators } from "./operators.js";

export type EmittedType = {
  readonly code: string;
  /** Strategy per method group, keyed `Struct.script_name` */
  readonly strategies: ReadonlyMap<string, DispatchStrategy>;
};

const derefValue = (type: BoundType, holder: string): string =>
  type.ownership === "pointer" ? `(*${holder}->Value)` : `${holder}->Value`;

export const typeDeclaration = (type: BoundType): string =>
  renderTemplate(templates.TYPE_DECLARATION, {
    name: type.structName,
    value_type: type.valueType,
  });

export const typeConverter = (type: BoundType): string =>
  renderTemplate(templates.CONVERTER, {
    value_type: type.valueType,
    name: type.structName,
  });

export const typeTableEntry = (type: BoundType): string =>
  renderTemplate(TYPE_ENTRY, { qstr: qstr(type.scriptName), name: type.structName });

const DEFAULT_CONSTRUCTOR: Overload = {
  parameters: [],
  isStatic: false,
  location: { file: "", line: 0 },
};

const ownedInit = (type: BoundType, context: EmitContext): string => {
  const declared = type.component.constructors.map(
    (constructor): Overload => ({
      parameters: constructor.parameters.map(bindParameter),
      isStatic: false,
      location: constructor.location,
    })
  );
  const overloads = declared.length > 0 ? declared : [DEFAULT_CONSTRUCTOR];

  const constructors = overloads.map((overload) =>
    renderTemplate(templates.CONSTRUCTOR, {
      check: positionalOverloadCheck(overload, 0),
      arg_init: positionalInit(overload, 0),
      type: type.name,
      args: callArguments(overload, context.passesByAddress),
    })
  );

  return renderTemplate(templates.OWNED_INIT, {
    name: type.structName,
    script_name: type.scriptName,
    min: Math.min(...overloads.map(requiredCount)),
    max: Math.max(...overloads.map((overload) => overload.parameters.length)),
    constructors: constructors.join("\nelse "),
    init_code: attributeValue(type.component.attributes, "TypeInitCode") ?? "",
  });
};

const initCode = (type: BoundType, context: EmitContext): string => {
  if (type.ownership === "owned") return ownedInit(type, context);

  const factory = attributeValue(type.component.attributes, "TypeFactory");
  return factory
    ? renderTemplate(templates.FACTORY_INIT, {
        name: type.structName,
        value_type: type.valueType,
        factory,
      })
    : renderTemplate(templates.UNCONSTRUCTIBLE_INIT, {
        name: type.structName,
        script_name: type.scriptName,
      });
};

const hasDestructor = (type: BoundType): boolean =>
  type.ownership === "owned" && type.component.destructors.length > 0;

const propertyValues = (
  property: PropertyDeclaration,
  type: BoundType
): Readonly<Record<string, string>> => ({
  qstr: qstr(scriptName(property.name, property.attributes)),
  type: property.type,
  accessor: methodOwner(type).accessor,
  member: property.name,
});

const attrCode = (
  type: BoundType,
  variables: readonly PropertyDeclaration[],
  bases: readonly BoundType[]
): string =>
  renderTemplate(templates.ATTR, {
    name: type.structName,
    getters: variables
      .filter((property) => !hasAttribute(property.attributes, "PropWriteOnly"))
      .map((property) =>
        renderTemplate(templates.GETTER, propertyValues(property, type))
      )
      .join("\n"),
    setters: variables
      .filter(
        (property) =>
          !hasAttribute(property.attributes, "PropReadOnly") &&
          !property.modifiers.has("const")
      )
      .map((property) =>
        renderTemplate(templates.SETTER, propertyValues(property, type))
      )
      .join("\n"),
    base_loads: bases
      .map((base) =>
        renderTemplate(templates.BASE_ATTR_LOAD, { base: base.structName })
      )
      .join("\n"),
    base_stores: bases
      .map((base) =>
        renderTemplate(templates.BASE_ATTR_STORE, { base: base.structName })
      )
      .join("\n"),
  });

const baseCalls = (bases: readonly BoundType[], template: string): string =>
  bases
    .map((base) => renderTemplate(template, { base: base.structName }))
    .join("\n");

const parentSlot = (
  type: BoundType,
  bases: readonly BoundType[]
): { readonly definition: string; readonly slot?: string } => {
  const [single, ...rest] = bases;
  if (!single) return { definition: "" };
  if (rest.length === 0) {
    return { definition: "", slot: `parent, &Py${single.structName}::PyType` };
  }
  return {
    definition: renderTemplate(templates.BASES_TUPLE, {
      name: type.structName,
      count: bases.length,
      items: bases
        .map((base) => `MP_ROM_PTR(&Py${base.structName}::PyType)`)
        .join(", "),
    }),
    slot: `parent, &Py${type.structName}Bases`,
  };
};

/**
 * Emit one exposed type. `operators` holds the type's own operators and any
 * free operators attached to it.
 */
export const emitType = (
  type: BoundType,
  context: EmitContext,
  operators: readonly OperatorDeclaration[] = type.component.operators
): Result<EmittedType, Diagnostic> => {
  const owner = methodOwner(type);
  const bases = context.publicBases(type);
  const self = derefValue(type, "self");

  const routed = routeOperators(operators, type.name, self, derefValue(type, "lhs"));
  if (!routed.ok) return routed;

  const methods: FunctionBinding[] = [];
  const strategies = new Map<string, DispatchStrategy>();
  for (const group of context.methodGroups(type)) {
    const normalized = normalizeGroup(group, `${type.name}::${group.name}`);
    if (!normalized.ok) return error(normalized.error);

    const forwards = context.baseForwards(type, group.scriptName);
    const shape = describeGroup(
      normalized.value,
      selfArgsOf(normalized.value, owner),
      forwards.map((forward) => forward.shape)
    );
    strategies.set(`${type.structName}.${group.scriptName}`, shape.own);
    methods.push({
      symbol: `${type.structName}${group.name}`,
      group: normalized.value,
      shape,
      owner,
      bases: forwards,
      passesByAddress: context.passesByAddress,
    });
  }

  const constants = type.component.properties.filter(isTypeConstant);
  const variables = type.component.properties.filter(
    (property) => !isTypeConstant(property)
  );

  const unaryCases = [
    ...(hasAttribute(type.component.attributes, "TypeIsHashable")
      ? [renderTemplate(operatorTemplates.HASH_CASE, { value: self })]
      : []),
    ...(type.ownership === "pointer" ? [operatorTemplates.BOOL_CASE] : []),
    ...routed.value.unary,
  ];

  const localEntries = [
    ...(hasDestructor(type)
      ? [renderTemplate(templates.DESTROY_ENTRY, { name: type.structName })]
      : []),
    ...constants.map((property) =>
      constantEntry(property, `${type.name}::${property.name}`)
    ),
    ...methods.map(functionTableEntry),
  ];

  const parent = parentSlot(type, bases);
  const slots = [
    `make_new, Py${type.structName}Init`,
    `attr, Py${type.structName}Attr`,
    `unary_op, Py${type.structName}UnaryOp`,
    `binary_op, Py${type.structName}BinaryOp`,
    `subscr, Py${type.structName}Index`,
    ...(localEntries.length > 0
      ? [`locals_dict, &Py${type.structName}Locals`]
      : []),
    ...(parent.slot ? [parent.slot] : []),
  ];

  const code = joinFragments(
    [
      initCode(type, context),
      hasDestructor(type)
        ? renderTemplate(templates.DESTROY, {
            name: type.structName,
            type: type.name,
          })
        : "",
      attrCode(type, variables, bases),
      renderTemplate(templates.UNARY_OP, {
        name: type.structName,
        cases: unaryCases.join("\n"),
        base_ops: baseCalls(bases, operatorTemplates.BASE_UNARY),
      }),
      renderTemplate(templates.BINARY_OP, {
        name: type.structName,
        cases: routed.value.binary.join("\n"),
        base_ops: baseCalls(bases, operatorTemplates.BASE_BINARY),
      }),
      renderTemplate(templates.INDEX, {
        name: type.structName,
        subscripts: routed.value.subscripts.join("\n"),
        base_ops: baseCalls(bases, operatorTemplates.BASE_INDEX),
      }),
      ...methods.map(emitFunction),
      localEntries.length > 0
        ? renderTemplate(templates.LOCALS, {
            name: type.structName,
            entries: localEntries.join("\n"),
          })
        : "",
      parent.definition,
      renderTemplate(templates.TYPE_OBJECT, {
        name: type.structName,
        qstr: qstr(type.scriptName),
        slots: slots.join(",\n"),
      }),
    ],
    "\n\n"
  );

  return ok({ code, strategies });
};
