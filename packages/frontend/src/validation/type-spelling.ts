/**
 * Structural type spelling check
 */

export type UnsupportedSpelling = {
  readonly suffix: "&&" | "&*" | "*&" | "**";
  readonly description: string;
};

const UNSUPPORTED: readonly UnsupportedSpelling[] = [
  { suffix: "&&", description: "Rvalue references (&&)" },
  { suffix: "&*", description: "Pointers to references (&*)" },
  { suffix: "*&", description: "References to pointers (*&)" },
  { suffix: "**", description: "Pointers to pointers (**)" },
];

export const findUnsupportedSpelling = (
  type: string
): UnsupportedSpelling | undefined => {
  const compact = type.replace(/\s+/g, "");
  return UNSUPPORTED.find((entry) => compact.endsWith(entry.suffix));
};
