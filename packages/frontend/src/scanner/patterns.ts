/**
 * Line recognizers for the declaration scanner
 */

import type { TagVocabulary } from "../config/tags.js";
import type { Modifier, TypeKind } from "../types/declarations.js";
import { matchTag, type TagMatch } from "./text.js";

const MEMBER_MODIFIERS = "virtual|constexpr|const|inline|static|extern";
const CONSTRUCTOR_MODIFIERS = "constexpr|virtual|explicit|inline";
const BUILTIN_PREFIX = "(?:(?:unsigned|signed|long|short)\\s+)*";
const TYPE_SPELLING = `${BUILTIN_PREFIX}[A-Za-z0-9_:]+\\b(?:\\s*<[A-Za-z0-9_:<>*&,\\s]*>)?(?:::[A-Za-z0-9_]+\\b)*(?:\\s*[*&]+)?`;
const CPP_ATTRIBUTES = "(?:\\[\\[.*?\\]\\]\\s*)?";
const TRAILING_QUALIFIERS =
  "(?<qualifier>const)?\\s*(?:noexcept\\s*)?(?:override\\s*)?(?:final\\s*)?";

const modifiers = (words: string): string =>
  `(?<modifiers>(?:(?:${words})\\s+)*)`;

export type LinePatterns = {
  readonly tags: TagVocabulary;
  readonly header: RegExp;
  readonly namespace: RegExp;
  readonly typeDeclaration: RegExp;
  readonly property: RegExp;
  readonly function: RegExp;
  readonly operator: RegExp;
};

export type TypeTagMatch = TagMatch & {
  readonly tag: string;
  readonly kind: TypeKind;
};

export type ConstructorPatterns = {
  readonly constructor: RegExp;
  readonly destructor: RegExp;
};

export const createLinePatterns = (tags: TagVocabulary): LinePatterns => ({
  tags,
  header: /^\s*#\s*include\s*(?<include>"[^"]*"|<[^>]*>)/,
  namespace: /^\s*namespace\s+(?<name>[A-Za-z0-9_:]+)\s*(?:\{.*)?$/,
  typeDeclaration: new RegExp(
    `^\\s*(?<kind>class|struct)\\s+${CPP_ATTRIBUTES}(?<name>[A-Za-z0-9_]+)\\s*(?:final\\s*)?(?::\\s*(?<bases>[^{;]+?))?\\s*(?:[{;].*)?$`
  ),
  property: new RegExp(
    `^\\s*${modifiers(MEMBER_MODIFIERS)}(?<type>${TYPE_SPELLING})\\s*${CPP_ATTRIBUTES}(?<name>[A-Za-z0-9_]+)\\s*(?:=\\s*(?<value>[^;]*?)\\s*;.*|[{;].*)$`
  ),
  function: new RegExp(
    `^\\s*${modifiers(MEMBER_MODIFIERS)}(?<type>${TYPE_SPELLING})\\s*${CPP_ATTRIBUTES}(?<name>[A-Za-z0-9_]+)\\s*\\((?<params>.*?)\\)\\s*${TRAILING_QUALIFIERS}(?:[;{=].*)$`
  ),
  operator: new RegExp(
    `^\\s*${modifiers(MEMBER_MODIFIERS)}(?<type>${TYPE_SPELLING})\\s*${CPP_ATTRIBUTES}operator\\s*(?<op>\\[\\]|[+\\-*/%^&|~!=<>]+)\\s*\\((?<params>.*?)\\)\\s*${TRAILING_QUALIFIERS}(?:[;{=].*)$`
  ),
});

const escapeName = (name: string): string =>
  name.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/**
 * Constructor and destructor recognizers scoped to one type name
 */
export const createConstructorPatterns = (
  typeName: string
): ConstructorPatterns => {
  const name = escapeName(typeName);
  return {
    constructor: new RegExp(
      `^\\s*${modifiers(CONSTRUCTOR_MODIFIERS)}${CPP_ATTRIBUTES}${name}\\s*\\((?<params>.*?)\\)\\s*(?<rest>.*)$`
    ),
    destructor: new RegExp(
      `^\\s*${modifiers(CONSTRUCTOR_MODIFIERS)}${CPP_ATTRIBUTES}~${name}\\s*\\(\\s*(?:void)?\\s*\\)\\s*(?<rest>.*)$`
    ),
  };
};

export const matchTypeTag = (
  line: string,
  tags: TagVocabulary
): TypeTagMatch | undefined => {
  for (const [tag, kind] of Object.entries(tags.types)) {
    const match = matchTag(line, tag);
    if (match) {
      return { ...match, tag, kind };
    }
  }
  return undefined;
};

const MODIFIER_WORDS: ReadonlySet<string> = new Set<Modifier>([
  "const",
  "constexpr",
  "static",
  "explicit",
  "extern",
  "inline",
  "virtual",
]);

const isModifier = (word: string): word is Modifier => MODIFIER_WORDS.has(word);

export const readModifiers = (text: string | undefined): ReadonlySet<Modifier> =>
  new Set((text ?? "").split(/\s+/).filter(isModifier));
