/**
 * Template rendering
 *
 * Placeholders are written `${name}` or `${name:option,option}`.
 *   keep_indent   - continuation lines of a multi-line value take the
 *                   indentation of the line holding the placeholder
 *   empty_no_line - an empty value alone on its line removes the line
 *
 * Leading and trailing newlines of every value are dropped, so fragments
 * can be written as block literals.
 */

export type TemplateValue = string | number;

export type TemplateValues = Readonly<Record<string, TemplateValue>>;

type PlaceholderOptions = {
  readonly keepIndent: boolean;
  readonly emptyNoLine: boolean;
};

const PLACEHOLDER = /\$\{([A-Za-z_][A-Za-z0-9_]*)(?::([a-z_,]+))?\}/g;
const SOLE_PLACEHOLDER = /^\s*\$\{[A-Za-z_][A-Za-z0-9_]*(?::[a-z_,]+)?\}\s*$/;

const parseOptions = (text: string | undefined): PlaceholderOptions => {
  const options = new Set(text ? text.split(",") : []);
  for (const option of options) {
    if (option !== "keep_indent" && option !== "empty_no_line") {
      throw new Error(`Unknown template option: ${option}`);
    }
  }
  return {
    keepIndent: options.has("keep_indent"),
    emptyNoLine: options.has("empty_no_line"),
  };
};

const trimNewlines = (value: string): string =>
  value.replace(/^(?:\r?\n)+/, "").replace(/(?:\r?\n)+$/, "");

const lookup = (values: TemplateValues, name: string): string => {
  const value = values[name];
  if (value === undefined) {
    throw new Error(`Missing template value: ${name}`);
  }
  return trimNewlines(String(value));
};

const indentContinuation = (value: string, indent: string): string =>
  value
    .split("\n")
    .map((line, index) =>
      index === 0 || line.length === 0 ? line : `${indent}${line}`
    )
    .join("\n");

const renderLine = (
  line: string,
  values: TemplateValues
): string | undefined => {
  const indent = /^\s*/.exec(line)?.[0] ?? "";
  let dropLine = false;

  const rendered = line.replace(
    PLACEHOLDER,
    (_match, name: string, optionText: string | undefined) => {
      const options = parseOptions(optionText);
      const value = lookup(values, name);
      if (value.length === 0 && options.emptyNoLine && SOLE_PLACEHOLDER.test(line)) {
        dropLine = true;
      }
      return options.keepIndent ? indentContinuation(value, indent) : value;
    }
  );

  return dropLine ? undefined : rendered;
};

/**
 * Stamp values into a template. Every placeholder must have a value.
 */
export const renderTemplate = (
  template: string,
  values: TemplateValues = {}
): string =>
  trimNewlines(template)
    .split("\n")
    .map((line) => renderLine(line, values))
    .filter((line): line is string => line !== undefined)
    .join("\n");

/**
 * Join rendered fragments, skipping empty ones
 */
export const joinFragments = (
  fragments: readonly string[],
  separator = "\n"
): string => fragments.filter((fragment) => fragment.length > 0).join(separator);
