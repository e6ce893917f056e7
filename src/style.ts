/**
 * Graphviz `style` keywords. Not every keyword is meaningful for every element
 * (`rounded` and `diagonals` only affect node and cluster outlines, for
 * instance); Graphviz ignores the ones that do not apply.
 *
 * `none` means no `style` attribute is written.
 */
export type Style =
  | "none"
  | "solid"
  | "dashed"
  | "dotted"
  | "bold"
  | "rounded"
  | "diagonals"
  | "filled"
  | "striped"
  | "wedged"
  | "invis";

const STYLE_KEYWORDS: Record<Style, string> = {
  none: "",
  solid: "solid",
  dashed: "dashed",
  dotted: "dotted",
  bold: "bold",
  rounded: "rounded",
  diagonals: "diagonals",
  filled: "filled",
  striped: "striped",
  wedged: "wedged",
  invis: "invis",
};

export function styleKeyword(style: Style): string {
  return STYLE_KEYWORDS[style];
}
