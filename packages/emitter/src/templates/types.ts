/**
 * Type fragments
 */

export const TYPE_DECLARATION = `
struct Py\${name} : public mpbind::ScriptObject<\${value_type}>
{
    static const mp_obj_type_t PyType;
};
void Py\${name}Attr(mp_obj_t self_in, qstr attr, mp_obj_t* dest);
mp_obj_t Py\${name}UnaryOp(mp_unary_op_t op, mp_obj_t value);
mp_obj_t Py\${name}BinaryOp(mp_binary_op_t op, mp_obj_t lhs_in, mp_obj_t rhs_in);
mp_obj_t Py\${name}Index(mp_obj_t self_in, mp_obj_t index, mp_obj_t value);
`;

export const CONVERTER = "template <> struct ScriptTypeMap<CleanType<${value_type}>> { using Value = Py${name}; };";

export const CONSTRUCTOR = `
if (\${check})
{
    \${arg_init:keep_indent,empty_no_line}
    new (&self->Value) \${type}(\${args});
}
`;

export const OWNED_INIT = `
static mp_obj_t Py\${name}Init(const mp_obj_type_t* type, size_t n_args, size_t n_kw, const mp_obj_t* args)
{
    mp_arg_check_num(n_args, n_kw, \${min}, \${max}, false);
    auto* self = mp_obj_malloc(Py\${name}, type);
    \${constructors:keep_indent}
    else
    {
        mp_raise_TypeError(MP_ERROR_TEXT("\${script_name}: invalid arguments"));
    }
    \${init_code:keep_indent,empty_no_line}
    return MP_OBJ_FROM_PTR(self);
}
`;

export const FACTORY_INIT = `
static mp_obj_t Py\${name}Init(const mp_obj_type_t* type, size_t n_args, size_t n_kw, const mp_obj_t* args)
{
    mp_arg_check_num(n_args, n_kw, 0, 0, false);
    return mpbind::ScriptValue<\${value_type}>::To(\${factory}());
}
`;

export const UNCONSTRUCTIBLE_INIT = `
static mp_obj_t Py\${name}Init(const mp_obj_type_t* type, size_t n_args, size_t n_kw, const mp_obj_t* args)
{
    mp_raise_TypeError(MP_ERROR_TEXT("\${script_name} cannot be constructed"));
}
`;

export const DESTROY = `
static mp_obj_t Py\${name}Destroy(mp_obj_t self_in)
{
    using ValueType = \${type};
    auto* self = static_cast<Py\${name}*>(MP_OBJ_TO_PTR(self_in));
    self->Value.~ValueType();
    return mp_const_none;
}
static MP_DEFINE_CONST_FUN_OBJ_1(Py\${name}DestroyObj, Py\${name}Destroy);
`;

export const DESTROY_ENTRY = "{MP_ROM_QSTR(MP_QSTR___del__), MP_ROM_PTR(&Py${name}DestroyObj)},";

export const GETTER = "if (attr == ${qstr}) { dest[0] = mpbind::ScriptValue<${type}>::To(self->Value${accessor}${member}); return; }";

export const SETTER = "if (attr == ${qstr}) { self->Value${accessor}${member} = mpbind::ScriptValue<${type}>::From(dest[1]); dest[0] = MP_OBJ_NULL; return; }";

export const BASE_ATTR_LOAD = "Py${base}Attr(self_in, attr, dest); if (dest[0] != MP_OBJ_NULL) return;";

export const BASE_ATTR_STORE = "Py${base}Attr(self_in, attr, dest); if (dest[0] == MP_OBJ_NULL) return;";

export const ATTR = `
void Py\${name}Attr(mp_obj_t self_in, qstr attr, mp_obj_t* dest)
{
    auto* self = static_cast<Py\${name}*>(MP_OBJ_TO_PTR(self_in));
    if (dest[0] == MP_OBJ_NULL)
    {
        \${getters:keep_indent,empty_no_line}
        \${base_loads:keep_indent,empty_no_line}
        dest[1] = MP_OBJ_SENTINEL;
    }
    else if (dest[1] != MP_OBJ_NULL)
    {
        \${setters:keep_indent,empty_no_line}
        \${base_stores:keep_indent,empty_no_line}
    }
}
`;

export const UNARY_OP = `
mp_obj_t Py\${name}UnaryOp(mp_unary_op_t op, mp_obj_t value)
{
    auto* self = static_cast<Py\${name}*>(MP_OBJ_TO_PTR(value));
    switch (op)
    {
        \${cases:keep_indent,empty_no_line}
        default: break;
    }
    \${base_ops:keep_indent,empty_no_line}
    return MP_OBJ_NULL;
}
`;

export const BINARY_OP = `
mp_obj_t Py\${name}BinaryOp(mp_binary_op_t op, mp_obj_t lhs_in, mp_obj_t rhs_in)
{
    auto* lhs = static_cast<Py\${name}*>(MP_OBJ_TO_PTR(lhs_in));
    switch (op)
    {
        \${cases:keep_indent,empty_no_line}
        default: break;
    }
    \${base_ops:keep_indent,empty_no_line}
    return MP_OBJ_NULL;
}
`;

export const INDEX = `
mp_obj_t Py\${name}Index(mp_obj_t self_in, mp_obj_t index, mp_obj_t value)
{
    auto* self = static_cast<Py\${name}*>(MP_OBJ_TO_PTR(self_in));
    \${subscripts:keep_indent,empty_no_line}
    \${base_ops:keep_indent,empty_no_line}
    return MP_OBJ_NULL;
}
`;

export const LOCALS = `
static const mp_rom_map_elem_t Py\${name}LocalsTable[] =
{
    \${entries:keep_indent}
};
static MP_DEFINE_CONST_DICT(Py\${name}Locals, Py\${name}LocalsTable);
`;

export const BASES_TUPLE = `
static const mp_rom_obj_tuple_t Py\${name}Bases =
{
    {&mp_type_tuple}, \${count}, {\${items}}
};
`;

export const TYPE_OBJECT = `
MP_DEFINE_CONST_OBJ_TYPE(
    Py\${name}Type,
    \${qstr},
    MP_TYPE_FLAG_NONE,
    \${slots:keep_indent}
);
extern "C++" { const mp_obj_type_t Py\${name}::PyType = Py\${name}Type; }
`;
