/**
 * Types the generated glue converts without a declaration
 */

export const BUILTIN_TYPES: ReadonlySet<string> = new Set([
  "void",
  "bool",
  "char",
  "unsigned char",
  "signed char",
  "short",
  "unsigned short",
  "int",
  "unsigned",
  "unsigned int",
  "long",
  "unsigned long",
  "long long",
  "unsigned long long",
  "float",
  "double",
  "int8_t",
  "int16_t",
  "int32_t",
  "int64_t",
  "uint8_t",
  "uint16_t",
  "uint32_t",
  "uint64_t",
  "size_t",
  "ssize_t",
  "std::size_t",
  "std::ssize_t",
  "std::string",
  "std::string_view",
  "std::vector",
  "std::span",
  "span",
]);
