/**
 * Text helpers shared by the line recognizers
 */

const OPENERS: Readonly<Record<string, string>> = {
  "(": ")",
  "<": ">",
  "[": "]",
  "{": "}",
};

/**
 * Split on a separator that is not nested inside any of the given brackets
 * or a quoted string. Unbalanced closers never push depth below zero.
 */
export const splitTopLevel = (
  text: string,
  separator: string,
  brackets: string = "("
): readonly string[] => {
  const parts: string[] = [];
  let depth = 0;
  let quote: string | undefined;
  let start = 0;
  const closers = new Set([...brackets].map((open) => OPENERS[open]));

  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    if (quote) {
      if (ch === "\\") {
        i++;
      } else if (ch === quote) {
        quote = undefined;
      }
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (brackets.includes(ch)) {
      depth++;
    } else if (closers.has(ch)) {
      depth = Math.max(0, depth - 1);
    } else if (ch === separator && depth === 0) {
      parts.push(text.slice(start, i));
      start = i + 1;
    }
  }
  parts.push(text.slice(start));
  return parts;
};

/**
 * Index of the first top-level occurrence of `ch`, or -1
 */
export const indexOfTopLevel = (
  text: string,
  ch: string,
  brackets: string = "(<[{"
): number => {
  const parts = splitTopLevel(text, ch, brackets);
  const first = parts[0];
  return parts.length > 1 && first !== undefined ? first.length : -1;
};

export type TagMatch = {
  readonly payload: string;
  readonly rest: string;
};

const escapeRegExp = (text: string): string =>
  text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/**
 * Match `Tag(payload) rest` at the start of a line, reading the payload
 * up to its balancing parenthesis
 */
export const matchTag = (line: string, tag: string): TagMatch | undefined => {
  const opening = new RegExp(`^\\s*${escapeRegExp(tag)}\\s*\\(`).exec(line);
  if (!opening) return undefined;

  let depth = 1;
  let quote: string | undefined;
  const start = opening[0].length;
  for (let i = start; i < line.length; i++) {
    const ch = line.charAt(i);
    if (quote) {
      if (ch === "\\") {
        i++;
      } else if (ch === quote) {
        quote = undefined;
      }
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === "(") {
      depth++;
    } else if (ch === ")") {
      depth--;
      if (depth === 0) {
        return {
          payload: line.slice(start, i),
          rest: line.slice(i + 1).trim(),
        };
      }
    }
  }
  return undefined;
};

/**
 * Net brace count of a line, ignoring braces inside string and character literals
 */
export const countBraces = (line: string): number => {
  let count = 0;
  let quote: string | undefined;
  for (let i = 0; i < line.length; i++) {
    const ch = line.charAt(i);
    if (quote) {
      if (ch === "\\") {
        i++;
      } else if (ch === quote) {
        quote = undefined;
      }
    } else if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === "{") {
      count++;
    } else if (ch === "}") {
      count--;
    }
  }
  return count;
};

/**
 * Remove one layer of matching surrounding quotes
 */
export const stripQuotes = (text: string): string => {
  const first = text.charAt(0);
  if (
    text.length >= 2 &&
    (first === '"' || first === "'") &&
    text.charAt(text.length - 1) === first
  ) {
    return text.slice(1, -1);
  }
  return text;
};

/**
 * Collapse whitespace in a type spelling: `std::map<int, int> &` → `std::map<int,int>&`
 */
export const normalizeTypeSpelling = (text: string): string =>
  text
    .trim()
    .replace(/\s+/g, " ")
    .replace(/\s*([*&<>,]|::)\s*/g, "$1");
