/**
 * Function group emission
 *
 * Each group becomes:
 *   Py<Symbol>Impl*    - own overloads, in the own strategy's convention
 *   Py<Symbol>Dispatch - own overloads, then base forwarding; null when nothing matched.
 *                        Base dispatch entries are declared ahead of use, since a
 *                        base may be defined later in this unit or in a dependency.
 *   Py<Symbol>         - exposed entry point, raises on no match
 *   Py<Symbol>Obj      - the function object placed in dictionaries
 */

import { qstr } from "../naming.js";
import { joinFragments, renderTemplate } from "../templates/render.js";
import * as templates from "../templates/functions.js";
import {
  fixedOverloadCheck,
  optionalCheck,
  optionalPositionalCheck,
  positionalOverloadCheck,
  requiredCheck,
} from "./checks.js";
import {
  hasDefaults,
  hasUniformSignature,
  requiredCount,
  type BoundParameter,
  type Overload,
  type OverloadGroup,
} from "./overload-group.js";
import {
  conventionOf,
  type CallConvention,
  type GroupShape,
} from "./strategy.js";

export type MethodOwner = {
  /** Binding struct stem: `Py<structName>` */
  readonly structName: string;
  readonly qualifiedName: string;
  /** `->` for pointer-held values */
  readonly accessor: "." | "->";
};

export type BaseForward = {
  readonly symbol: string;
  readonly shape: GroupShape;
};

export type FunctionBinding = {
  readonly symbol: string;
  readonly group: OverloadGroup;
  readonly shape: GroupShape;
  readonly owner?: MethodOwner;
  readonly bases: readonly BaseForward[];
  /** Pointer parameters whose converted value is held by value */
  readonly passesByAddress: (type: string) => boolean;
};

export const selfArgsOf = (
  group: OverloadGroup,
  owner: MethodOwner | undefined
): number => (owner !== undefined && !group.overloads[0]?.isStatic ? 1 : 0);

export const isStaticMethod = (binding: FunctionBinding): boolean =>
  binding.owner !== undefined && selfArgsOf(binding.group, binding.owner) === 0;

const fixedObjects = (arity: number, selfArgs: number): readonly string[] => [
  ...(selfArgs > 0 ? ["self_in"] : []),
  ...Array.from({ length: arity - selfArgs }, (_unused, i) => `arg${i}_obj`),
];

const positionalObjects = (arity: number): readonly string[] =>
  Array.from({ length: arity }, (_unused, i) => `args[${i}]`);

const paramsFor = (
  convention: CallConvention,
  arity: number,
  selfArgs: number
): string => {
  switch (convention) {
    case "fixed":
      return fixedObjects(arity, selfArgs)
        .map((name) => `mp_obj_t ${name}`)
        .join(", ");
    case "variable":
      return "size_t n_args, const mp_obj_t* args";
    case "keyword":
      return "size_t n_args, const mp_obj_t* args, mp_map_t* kwargs";
  }
};

const argsFor = (
  convention: CallConvention,
  arity: number,
  selfArgs: number
): string => {
  switch (convention) {
    case "fixed":
      return fixedObjects(arity, selfArgs).join(", ");
    case "variable":
      return "n_args, args";
    case "keyword":
      return "n_args, args, kwargs";
  }
};

const entryArity = (shape: GroupShape): number =>
  shape.arities[0] ?? shape.minArgs;

const selfInit = (
  binding: FunctionBinding,
  convention: CallConvention
): string =>
  selfArgsOf(binding.group, binding.owner) > 0 && binding.owner
    ? renderTemplate(templates.SELF_FROM_OBJECT, {
        owner: binding.owner.structName,
        object: convention === "fixed" ? "self_in" : "args[0]",
      })
    : "";

const isVoid = (type: string | undefined): boolean =>
  type === undefined || type === "void";

const returnCode = (overload: Overload): string => {
  const outputs = overload.parameters.filter((parameter) => parameter.isOut);
  if (outputs.length === 0) {
    return isVoid(overload.returnType)
      ? templates.RETURN_NONE
      : renderTemplate(templates.RETURN_RESULT, {
          type: overload.returnType ?? "void",
        });
  }

  const items = [
    ...(isVoid(overload.returnType)
      ? []
      : [
          renderTemplate(templates.TO_OBJECT, {
            type: overload.returnType ?? "void",
            value: "result",
          }),
        ]),
    ...outputs.map((parameter) =>
      renderTemplate(templates.TO_OBJECT, {
        type: parameter.type,
        value: parameter.name,
      })
    ),
  ];
  return renderTemplate(templates.RETURN_OUTPUTS, {
    items: items.join(", "),
    count: items.length,
  });
};

export const callArguments = (
  overload: Overload,
  passesByAddress: (type: string) => boolean
): string =>
  overload.parameters
    .map((parameter) =>
      passesByAddress(parameter.type) ? `&${parameter.name}` : parameter.name
    )
    .join(", ");

const callCode = (binding: FunctionBinding, overload: Overload): string => {
  const { group, owner } = binding;
  const args = callArguments(overload, binding.passesByAddress);

  const call =
    owner === undefined
      ? `${group.name}(${args})`
      : overload.isStatic
        ? `${owner.qualifiedName}::${group.name}(${args})`
        : `self->Value${owner.accessor}${group.name}(${args})`;

  return renderTemplate(
    isVoid(overload.returnType)
      ? templates.CALL_WITHOUT_RESULT
      : templates.CALL_WITH_RESULT,
    { call, return_code: returnCode(overload) }
  );
};

const initFromObject = (parameter: BoundParameter, object: string): string =>
  renderTemplate(templates.INIT_FROM_OBJECT, {
    name: parameter.name,
    type: parameter.type,
    object,
  });

export const positionalInit = (overload: Overload, selfArgs: number): string =>
  overload.parameters
    .map((parameter, i) =>
      parameter.defaultValue === undefined
        ? initFromObject(parameter, `args[${i + selfArgs}]`)
        : renderTemplate(templates.INIT_POSITIONAL_OPTIONAL, {
            name: parameter.name,
            type: parameter.type,
            default: parameter.defaultValue,
            index: i + selfArgs,
          })
    )
    .join("\n");

const keywordInit = (overload: Overload, selfArgs: number): string =>
  overload.parameters
    .map((parameter, i) =>
      renderTemplate(
        parameter.defaultValue === undefined
          ? templates.INIT_KEYWORD_REQUIRED
          : templates.INIT_KEYWORD_OPTIONAL,
        {
          name: parameter.name,
          type: parameter.type,
          default: parameter.defaultValue ?? "",
          index: i + selfArgs,
        }
      )
    )
    .join("\n");

const overloadBlock = (check: string, argInit: string, call: string): string =>
  renderTemplate(templates.OVERLOAD, { check, arg_init: argInit, call });

const fixedImpl = (binding: FunctionBinding, arity: number): string => {
  const selfArgs = selfArgsOf(binding.group, binding.owner);
  const skipChecks =
    hasUniformSignature(binding.group) && binding.bases.length === 0;
  const objects = fixedObjects(arity, selfArgs).slice(selfArgs);

  const overloads = binding.group.overloads
    .filter((overload) => overload.parameters.length + selfArgs === arity)
    .map((overload) =>
      overloadBlock(
        skipChecks ? "true" : fixedOverloadCheck(overload, objects),
        overload.parameters
          .map((parameter, i) => initFromObject(parameter, objects[i] ?? ""))
          .join("\n"),
        callCode(binding, overload)
      )
    );

  return renderTemplate(templates.IMPL, {
    symbol: binding.symbol,
    suffix: arity,
    params: paramsFor("fixed", arity, selfArgs),
    self_init: selfInit(binding, "fixed"),
    locals: "",
    overloads: overloads.join("\n"),
  });
};

const variableImpl = (binding: FunctionBinding): string => {
  const selfArgs = selfArgsOf(binding.group, binding.owner);
  const overloads = binding.group.overloads.map((overload) =>
    overloadBlock(
      positionalOverloadCheck(overload, selfArgs),
      positionalInit(overload, selfArgs),
      callCode(binding, overload)
    )
  );

  return renderTemplate(templates.IMPL, {
    symbol: binding.symbol,
    suffix: "",
    params: paramsFor("variable", 0, selfArgs),
    self_init: selfInit(binding, "variable"),
    locals: "",
    overloads: overloads.join("\n"),
  });
};

const keywordOverload = (
  binding: FunctionBinding,
  overload: Overload,
  selfArgs: number
): string => {
  const argInit = keywordInit(overload, selfArgs);
  const call = callCode(binding, overload);

  if (!hasDefaults(overload)) {
    return overloadBlock(requiredCheck(overload, selfArgs), argInit, call);
  }

  return renderTemplate(templates.KEYWORD_OVERLOAD_WITH_OPTIONALS, {
    required_check: requiredCheck(overload, selfArgs),
    required_args: requiredCount(overload) + selfArgs,
    positional_check: optionalPositionalCheck(overload, selfArgs),
    optional_check: optionalCheck(overload),
    arg_init: argInit,
    call,
  });
};

const keywordImpl = (binding: FunctionBinding): string => {
  const selfArgs = selfArgsOf(binding.group, binding.owner);
  const names = [
    ...new Set(
      binding.group.overloads.flatMap((overload) =>
        overload.parameters.map((parameter) => parameter.name)
      )
    ),
  ];

  return renderTemplate(templates.IMPL, {
    symbol: binding.symbol,
    suffix: "",
    params: paramsFor("keyword", 0, selfArgs),
    self_init: selfInit(binding, "keyword"),
    locals: names
      .map((name) => renderTemplate(templates.KWARG_LOOKUP, { name }))
      .join("\n"),
    overloads: binding.group.overloads
      .map((overload) => keywordOverload(binding, overload, selfArgs))
      .join("\n"),
  });
};

/**
 * Call into a target taking `target` from an entry point taking `entry`
 */
const attempt = (
  entry: CallConvention,
  target: CallConvention,
  targetArity: number,
  selfArgs: number,
  callee: string
): string => {
  if (entry === target) {
    return renderTemplate(templates.ATTEMPT, {
      call: `${callee}(${argsFor(entry, targetArity, selfArgs)})`,
    });
  }

  const guards = [
    ...(entry === "keyword" ? ["kwargs->used == 0"] : []),
    ...(target === "fixed" ? [`n_args == ${targetArity}`] : []),
  ];
  const args =
    target === "fixed"
      ? positionalObjects(targetArity).join(", ")
      : argsFor(target, targetArity, selfArgs);

  return renderTemplate(templates.GUARDED_ATTEMPT, {
    guard: guards.join(" && "),
    call: `${callee}(${args})`,
  });
};

const ownAttempts = (
  binding: FunctionBinding,
  entry: CallConvention,
  selfArgs: number
): readonly string[] => {
  const { shape, symbol } = binding;
  switch (shape.own) {
    case "unchecked":
      return [];
    case "fixed": {
      const arities = [
        ...new Set(
          binding.group.overloads.map(
            (overload) => overload.parameters.length + selfArgs
          )
        ),
      ].sort((a, b) => a - b);
      return arities.map((arity) =>
        attempt(entry, "fixed", arity, selfArgs, `Py${symbol}Impl${arity}`)
      );
    }
    case "variable":
    case "keyword":
      return [attempt(entry, shape.own, 0, selfArgs, `Py${symbol}Impl`)];
  }
};

const baseAttempts = (
  binding: FunctionBinding,
  entry: CallConvention,
  selfArgs: number
): readonly string[] =>
  binding.bases.map((base) =>
    attempt(
      entry,
      conventionOf(base.shape),
      entryArity(base.shape),
      selfArgs,
      `Py${base.symbol}Dispatch`
    )
  );

const basePrototypes = (binding: FunctionBinding, selfArgs: number): string =>
  binding.bases
    .map((base) =>
      renderTemplate(templates.DISPATCH_PROTOTYPE, {
        symbol: base.symbol,
        params: paramsFor(
          conventionOf(base.shape),
          entryArity(base.shape),
          selfArgs
        ),
      })
    )
    .join("\n");

const uncheckedDispatch = (
  binding: FunctionBinding,
  convention: CallConvention,
  arity: number,
  selfArgs: number
): string => {
  const overload = binding.group.overloads[0];
  if (!overload) return "";
  const objects =
    convention === "fixed"
      ? fixedObjects(arity, selfArgs).slice(selfArgs)
      : overload.parameters.map((_parameter, i) => `args[${i + selfArgs}]`);

  return renderTemplate(templates.UNCHECKED_DISPATCH, {
    symbol: binding.symbol,
    params: paramsFor(convention, arity, selfArgs),
    self_init: selfInit(binding, convention),
    arg_init: overload.parameters
      .map((parameter, i) => initFromObject(parameter, objects[i] ?? ""))
      .join("\n"),
    call: callCode(binding, overload),
  });
};

const functionObject = (
  binding: FunctionBinding,
  convention: CallConvention,
  arity: number
): string => {
  switch (convention) {
    case "fixed":
      return renderTemplate(templates.FIXED_OBJECT, {
        symbol: binding.symbol,
        arity,
      });
    case "variable":
      return renderTemplate(templates.VARIABLE_OBJECT, {
        symbol: binding.symbol,
        min: binding.shape.minArgs,
        max: binding.shape.maxArgs,
      });
    case "keyword":
      // required parameters may all arrive by keyword
      return renderTemplate(templates.KEYWORD_OBJECT, {
        symbol: binding.symbol,
        min: selfArgsOf(binding.group, binding.owner),
      });
  }
};

const ownImpls = (binding: FunctionBinding, selfArgs: number): string[] => {
  switch (binding.shape.own) {
    case "unchecked":
      return [];
    case "fixed":
      return [
        ...new Set(
          binding.group.overloads.map(
            (overload) => overload.parameters.length + selfArgs
          )
        ),
      ]
        .sort((a, b) => a - b)
        .map((arity) => fixedImpl(binding, arity));
    case "variable":
      return [variableImpl(binding)];
    case "keyword":
      return [keywordImpl(binding)];
  }
};

/**
 * Native code for one function group
 */
export const emitFunction = (binding: FunctionBinding): string => {
  const selfArgs = selfArgsOf(binding.group, binding.owner);
  const convention = conventionOf(binding.shape);
  const arity = entryArity(binding.shape);

  const dispatch =
    binding.shape.own === "unchecked"
      ? uncheckedDispatch(binding, convention, arity, selfArgs)
      : renderTemplate(templates.DISPATCH, {
          symbol: binding.symbol,
          params: paramsFor(convention, arity, selfArgs),
          prototypes: basePrototypes(binding, selfArgs),
          attempts: [
            ...ownAttempts(binding, convention, selfArgs),
            ...baseAttempts(binding, convention, selfArgs),
          ].join("\n"),
        });

  const entry = renderTemplate(templates.ENTRY, {
    symbol: binding.symbol,
    params: paramsFor(convention, arity, selfArgs),
    args: argsFor(convention, arity, selfArgs),
    script_name: binding.group.scriptName,
    object: functionObject(binding, convention, arity),
  });

  const staticWrapper = isStaticMethod(binding)
    ? renderTemplate(templates.STATIC_METHOD_OBJECT, { symbol: binding.symbol })
    : "";

  return joinFragments(
    [...ownImpls(binding, selfArgs), dispatch, entry, staticWrapper],
    "\n\n"
  );
};

/**
 * Dictionary entry exposing the group
 */
export const functionTableEntry = (binding: FunctionBinding): string =>
  `{MP_ROM_QSTR(${qstr(binding.group.scriptName)}), MP_ROM_PTR(&Py${binding.symbol}${
    isStaticMethod(binding) ? "Static" : ""
  }Obj)},`;
