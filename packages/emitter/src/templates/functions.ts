/**
 * Function and method fragments
 */

export const SELF_FROM_OBJECT = `auto* self = static_cast<Py\${owner}*>(MP_OBJ_TO_PTR(\${object}));`;

export const INIT_FROM_OBJECT = `auto&& \${name} = mpbind::ScriptValue<\${type}>::From(\${object});`;

export const INIT_POSITIONAL_OPTIONAL = `
mpbind::ValueOf<\${type}> \${name} = \${default};
if (n_args > \${index}) \${name} = mpbind::ScriptValue<\${type}>::From(args[\${index}]);
`;

export const KWARG_LOOKUP = `
mp_obj_t \${name}_obj = MP_OBJ_NULL;
bool \${name}_present = mpbind::FindKwarg(kwargs, "\${name}", &\${name}_obj);
`;

export const INIT_KEYWORD_REQUIRED = `
if (n_args > \${index}) \${name}_obj = args[\${index}];
auto&& \${name} = mpbind::ScriptValue<\${type}>::From(\${name}_obj);
`;

export const INIT_KEYWORD_OPTIONAL = `
if (n_args > \${index}) { \${name}_obj = args[\${index}]; \${name}_present = true; }
mpbind::ValueOf<\${type}> \${name} = \${default};
if (\${name}_present) \${name} = mpbind::ScriptValue<\${type}>::From(\${name}_obj);
`;

export const CALL_WITH_RESULT = `
auto&& result = \${call};
\${return_code}
`;

export const CALL_WITHOUT_RESULT = `
\${call};
\${return_code}
`;

export const RETURN_NONE = "return mp_const_none;";

export const RETURN_RESULT = "return mpbind::ScriptValue<${type}>::To(result);";

export const RETURN_OUTPUTS = `
mp_obj_t outputs[] = {\${items}};
return mp_obj_new_tuple(\${count}, outputs);
`;

export const TO_OBJECT = "mpbind::ScriptValue<${type}>::To(${value})";

export const OVERLOAD = `
if (\${check})
{
    \${arg_init:keep_indent,empty_no_line}
    \${call:keep_indent}
}
`;

export const KEYWORD_OVERLOAD_WITH_OPTIONALS = `
if (\${required_check})
{
    const size_t optional_kwargs = kwargs->used - (n_args < \${required_args} ? \${required_args} - n_args : 0);
    if (\${positional_check} && (optional_kwargs == 0 || \${optional_check}))
    {
        \${arg_init:keep_indent,empty_no_line}
        \${call:keep_indent}
    }
}
`;

export const IMPL = `
static mp_obj_t Py\${symbol}Impl\${suffix}(\${params})
{
    \${self_init:keep_indent,empty_no_line}
    \${locals:keep_indent,empty_no_line}
    \${overloads:keep_indent}
    return MP_OBJ_NULL;
}
`;

export const UNCHECKED_DISPATCH = `
mp_obj_t Py\${symbol}Dispatch(\${params})
{
    \${self_init:keep_indent,empty_no_line}
    \${arg_init:keep_indent,empty_no_line}
    \${call:keep_indent}
}
`;

export const DISPATCH = `
\${prototypes:empty_no_line}
mp_obj_t Py\${symbol}Dispatch(\${params})
{
    \${attempts:keep_indent}
    return MP_OBJ_NULL;
}
`;

export const DISPATCH_PROTOTYPE = "mp_obj_t Py${symbol}Dispatch(${params});";

export const ATTEMPT = "if (auto result = ${call}; result != MP_OBJ_NULL) return result;";

export const GUARDED_ATTEMPT = `
if (\${guard})
{
    if (auto result = \${call}; result != MP_OBJ_NULL) return result;
}
`;

export const ENTRY = `
static mp_obj_t Py\${symbol}(\${params})
{
    if (auto result = Py\${symbol}Dispatch(\${args}); result != MP_OBJ_NULL) return result;
    mp_raise_TypeError(MP_ERROR_TEXT("\${script_name}: invalid arguments"));
}
\${object}
`;

export const FIXED_OBJECT = "static MP_DEFINE_CONST_FUN_OBJ_${arity}(Py${symbol}Obj, Py${symbol});";

export const VARIABLE_OBJECT = "static MP_DEFINE_CONST_FUN_OBJ_VAR_BETWEEN(Py${symbol}Obj, ${min}, ${max}, Py${symbol});";

export const KEYWORD_OBJECT = "static MP_DEFINE_CONST_FUN_OBJ_KW(Py${symbol}Obj, ${min}, Py${symbol});";

export const STATIC_METHOD_OBJECT = "static MP_DEFINE_CONST_STATICMETHOD_OBJ(Py${symbol}StaticObj, MP_ROM_PTR(&Py${symbol}Obj));";
