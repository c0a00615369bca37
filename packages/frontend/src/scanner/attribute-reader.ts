/**
 * Attribute grammar reader
 *
 * Entries are separated by top-level commas:
 *   Name            → flag
 *   Name=value      → key/value (one layer of quotes stripped)
 *   Name(entries)   → group, read recursively
 */

import type { Attribute, AttributeMap } from "../types/attributes.js";
import { splitTopLevel, stripQuotes } from "./text.js";

const GROUP_ENTRY = /^([A-Za-z_][A-Za-z0-9_:]*)\s*\(([\s\S]*)\)$/;

const readEntry = (entry: string): Attribute => {
  const group = GROUP_ENTRY.exec(entry);
  if (group?.[1] !== undefined && group[2] !== undefined) {
    return {
      kind: "group",
      name: group[1],
      attributes: parseAttributes(group[2]),
    };
  }

  const equals = entry.indexOf("=");
  if (equals >= 0) {
    return {
      kind: "keyValue",
      name: entry.slice(0, equals).trim(),
      value: stripQuotes(entry.slice(equals + 1).trim()),
    };
  }

  return { kind: "flag", name: entry };
};

/**
 * Parse the text between a tag's parentheses into a name → attribute map.
 * Later entries with the same name replace earlier ones.
 */
export const parseAttributes = (text: string): AttributeMap => {
  const attributes = new Map<string, Attribute>();
  for (const part of splitTopLevel(text, ",", "(")) {
    const entry = part.trim();
    if (entry.length === 0) continue;
    const attribute = readEntry(entry);
    attributes.set(attribute.name, attribute);
  }
  return attributes;
};
