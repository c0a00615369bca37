/**
 * Comment removal ahead of line scanning
 */

type FilterState = "code" | "blockComment" | "string" | "char";

/**
 * Remove `//` and `/* *\/` comments, keeping one output line per input line.
 * Comment markers inside string and character literals are left alone.
 */
export const stripComments = (text: string): readonly string[] => {
  const output: string[] = [];
  let state: FilterState = "code";

  for (const line of text.split(/\r?\n/)) {
    let kept = "";
    // Literals do not continue onto the next line
    if (state !== "blockComment") state = "code";

    for (let i = 0; i < line.length; i++) {
      const ch = line.charAt(i);
      const next = line.charAt(i + 1);

      switch (state) {
        case "blockComment":
          if (ch === "*" && next === "/") {
            state = "code";
            i++;
            kept += " ";
          }
          break;

        case "string":
        case "char":
          kept += ch;
          if (ch === "\\") {
            kept += next;
            i++;
          } else if (ch === (state === "string" ? '"' : "'")) {
            state = "code";
          }
          break;

        case "code":
          if (ch === "/" && next === "/") {
            i = line.length;
          } else if (ch === "/" && next === "*") {
            state = "blockComment";
            i++;
          } else {
            if (ch === '"') state = "string";
            if (ch === "'") state = "char";
            kept += ch;
          }
          break;
      }
    }

    output.push(kept.trimEnd());
  }

  return output;
};
