/**
 * Module and artifact fragments
 */

export const CONSTANT_ENTRY = "{MP_ROM_QSTR(${qstr}), MP_ROM_${kind}(${value})},";

export const TYPE_ENTRY = "{MP_ROM_QSTR(${qstr}), MP_ROM_PTR(&Py${name}::PyType)},";

export const SUBMODULE_ENTRY = "{MP_ROM_QSTR(${qstr}), MP_ROM_PTR(&Py${name}Module)},";

export const MODULE_GETTER = "if (attr == ${qstr}) return mpbind::ScriptValue<${type}>::To(${value});";

export const MODULE_SETTER = "if (attr == ${qstr}) { ${value} = mpbind::ScriptValue<${type}>::From(value); return mp_const_none; }";

export const MODULE_EXTERN = "extern const mp_obj_module_t Py${name}Module;";

export const MODULE_REGISTRATION = "MP_REGISTER_MODULE(${qstr}, Py${name}Module);";

export const MODULE = `
\${body:empty_no_line}

static mp_obj_t Py\${name}GetAttr(mp_obj_t attr_obj)
{
    qstr attr = mp_obj_str_get_qstr(attr_obj);
    \${getters:keep_indent,empty_no_line}
    mp_raise_msg_varg(&mp_type_AttributeError, MP_ERROR_TEXT("module '%q' has no attribute '%q'"), \${qstr}, attr);
}
static MP_DEFINE_CONST_FUN_OBJ_1(Py\${name}GetAttrObj, Py\${name}GetAttr);

static mp_obj_t Py\${name}SetAttr(mp_obj_t attr_obj, mp_obj_t value)
{
    qstr attr = mp_obj_str_get_qstr(attr_obj);
    \${setters:keep_indent,empty_no_line}
    mp_raise_msg_varg(&mp_type_AttributeError, MP_ERROR_TEXT("can't set attribute '%q'"), attr);
}
static MP_DEFINE_CONST_FUN_OBJ_2(Py\${name}SetAttrObj, Py\${name}SetAttr);

static const mp_rom_map_elem_t Py\${name}GlobalsTable[] =
{
    {MP_ROM_QSTR(MP_QSTR___name__), MP_ROM_QSTR(\${qstr})},
    {MP_ROM_QSTR(MP_QSTR___getattr__), MP_ROM_PTR(&Py\${name}GetAttrObj)},
    {MP_ROM_QSTR(MP_QSTR___setattr__), MP_ROM_PTR(&Py\${name}SetAttrObj)},
    \${entries:keep_indent,empty_no_line}
};
static MP_DEFINE_CONST_DICT(Py\${name}Globals, Py\${name}GlobalsTable);

const mp_obj_module_t Py\${name}Module =
{
    .base = {&mp_type_module},
    .globals = (mp_obj_dict_t*)&Py\${name}Globals,
};
\${registration:empty_no_line}
`;

export const INCLUDE = "#include ${header}";

const SUPPRESS_WARNINGS = `
#if defined(__GNUC__)
#pragma GCC diagnostic push
#pragma GCC diagnostic ignored "-Wunused-function"
#pragma GCC diagnostic ignored "-Wunused-variable"
#pragma GCC diagnostic ignored "-Wunused-parameter"
#endif
`;

const RESTORE_WARNINGS = `
#if defined(__GNUC__)
#pragma GCC diagnostic pop
#endif
`;

export const HEADER = `
// Generated by mpbind. Do not edit.
#pragma once

\${header_includes:empty_no_line}
\${dependency_includes:empty_no_line}
#include "mpbind/runtime.h"
${SUPPRESS_WARNINGS}
extern "C"
{
    #include "py/obj.h"
    #include "py/runtime.h"

    \${type_declarations:keep_indent,empty_no_line}
    \${extern_modules:keep_indent,empty_no_line}
}

namespace mpbind
{
    \${converters:keep_indent,empty_no_line}
}
${RESTORE_WARNINGS}`;

export const SOURCE = `
// Generated by mpbind. Do not edit.
\${primary_include:empty_no_line}
\${header_includes:empty_no_line}
${SUPPRESS_WARNINGS}
extern "C"
{
    \${type_declarations:keep_indent,empty_no_line}
}

namespace mpbind
{
    \${converters:keep_indent,empty_no_line}
}

extern "C"
{
    \${modules:keep_indent,empty_no_line}
}
${RESTORE_WARNINGS}`;
