/**
 * Operator catalog and fragments
 */

export type BinaryKind = "value" | "comparison" | "inplace";

export type BinaryOperator = {
  readonly label: string;
  readonly kind: BinaryKind;
};

/** Unary operator spelling → `MP_UNARY_OP_*` label */
export const UNARY_OPERATORS: ReadonlyMap<string, string> = new Map([
  ["+", "POSITIVE"],
  ["-", "NEGATIVE"],
  ["~", "INVERT"],
]);

/** Binary operator spelling → `MP_BINARY_OP_*` label */
export const BINARY_OPERATORS: ReadonlyMap<string, BinaryOperator> = new Map([
  ["+", { label: "ADD", kind: "value" }],
  ["-", { label: "SUBTRACT", kind: "value" }],
  ["*", { label: "MULTIPLY", kind: "value" }],
  ["/", { label: "TRUE_DIVIDE", kind: "value" }],
  ["%", { label: "MODULO", kind: "value" }],
  ["<<", { label: "LSHIFT", kind: "value" }],
  [">>", { label: "RSHIFT", kind: "value" }],
  ["&", { label: "AND", kind: "value" }],
  ["|", { label: "OR", kind: "value" }],
  ["^", { label: "XOR", kind: "value" }],
  ["==", { label: "EQUAL", kind: "comparison" }],
  ["!=", { label: "NOT_EQUAL", kind: "comparison" }],
  ["<", { label: "LESS", kind: "comparison" }],
  ["<=", { label: "LESS_EQUAL", kind: "comparison" }],
  [">", { label: "MORE", kind: "comparison" }],
  [">=", { label: "MORE_EQUAL", kind: "comparison" }],
  ["+=", { label: "INPLACE_ADD", kind: "inplace" }],
  ["-=", { label: "INPLACE_SUBTRACT", kind: "inplace" }],
  ["*=", { label: "INPLACE_MULTIPLY", kind: "inplace" }],
  ["/=", { label: "INPLACE_TRUE_DIVIDE", kind: "inplace" }],
  ["%=", { label: "INPLACE_MODULO", kind: "inplace" }],
  ["<<=", { label: "INPLACE_LSHIFT", kind: "inplace" }],
  [">>=", { label: "INPLACE_RSHIFT", kind: "inplace" }],
  ["&=", { label: "INPLACE_AND", kind: "inplace" }],
  ["|=", { label: "INPLACE_OR", kind: "inplace" }],
  ["^=", { label: "INPLACE_XOR", kind: "inplace" }],
]);

export const UNARY_CASE = "case MP_UNARY_OP_${label}: return mpbind::ScriptValue<${return_type}>::To(${op}${value});";

export const HASH_CASE = "case MP_UNARY_OP_HASH: return MP_OBJ_NEW_SMALL_INT(mpbind::HashCode(${value}));";

export const BOOL_CASE = "case MP_UNARY_OP_BOOL: return mp_obj_new_bool(mpbind::IsValid(self->Value));";

export const BINARY_CASE = `
case MP_BINARY_OP_\${label}:
    \${overloads:keep_indent}
    break;
`;

export const BINARY_OVERLOAD = `
if (mpbind::ScriptValue<\${type}>::Is(rhs_in))
{
    auto&& rhs = mpbind::ScriptValue<\${type}>::From(rhs_in);
    \${body:keep_indent}
}
`;

export const BINARY_VALUE = "return mpbind::ScriptValue<${return_type}>::To(${lhs} ${op} rhs);";

export const BINARY_COMPARISON = "return mp_obj_new_bool(${lhs} ${op} rhs);";

export const BINARY_INPLACE = `
\${lhs} \${op} rhs;
return lhs_in;
`;

export const SUBSCRIPT = "if (mpbind::ScriptValue<${index_type}>::Is(index)) return mpbind::Subscript<${index_type}, ${return_type}>(${value}, index, value);";

export const BASE_UNARY = "if (auto result = Py${base}UnaryOp(op, value); result != MP_OBJ_NULL) return result;";

export const BASE_BINARY = "if (auto result = Py${base}BinaryOp(op, lhs_in, rhs_in); result != MP_OBJ_NULL) return result;";

export const BASE_INDEX = "if (auto result = Py${base}Index(self_in, index, value); result != MP_OBJ_NULL) return result;";
