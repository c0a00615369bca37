/**
 * Attribute values read from tag payloads such as `MPyClass(TypeOwned, TypeFactory=Make)`
 */

export type Attribute =
  | { readonly kind: "flag"; readonly name: string }
  | { readonly kind: "keyValue"; readonly name: string; readonly value: string }
  | {
      readonly kind: "group";
      readonly name: string;
      readonly attributes: AttributeMap;
    };

export type AttributeMap = ReadonlyMap<string, Attribute>;

export const EMPTY_ATTRIBUTES: AttributeMap = new Map();

export const hasAttribute = (attributes: AttributeMap, name: string): boolean =>
  attributes.has(name);

/**
 * Value of a key/value attribute, undefined for flags, groups and absent names
 */
export const attributeValue = (
  attributes: AttributeMap,
  name: string
): string | undefined => {
  const attribute = attributes.get(name);
  return attribute?.kind === "keyValue" ? attribute.value : undefined;
};
