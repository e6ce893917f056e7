/**
 * The text of a Graphviz label, color or shape value.
 *
 * - `LabelStr` is shown as is: backslashes, double quotes and newlines are
 *   escaped on output.
 * - `EscStr` is a Graphviz escString. Backslashes pass through untouched so
 *   that `\n`, `\l` (left-justify the preceding line), `\r` and `\N` keep their
 *   meaning; only double quotes and literal newlines are escaped.
 * - `HtmlStr` is an HTML-like label, written between `<` and `>` with no
 *   escaping at all.
 */
export type Text =
  | { readonly kind: "LabelStr"; readonly text: string }
  | { readonly kind: "EscStr"; readonly text: string }
  | { readonly kind: "HtmlStr"; readonly text: string };

export function labelStr(text: string): Text {
  return { kind: "LabelStr", text };
}

export function escStr(text: string): Text {
  return { kind: "EscStr", text };
}

export function htmlStr(text: string): Text {
  return { kind: "HtmlStr", text };
}

function escapeLabelStr(s: string): string {
  return s.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n");
}

function escapeEscStr(s: string): string {
  return s.replace(/"/g, '\\"').replace(/\n/g, "\\n");
}

/** Renders `text` with its delimiters, ready to follow `label=`. */
export function textToDotString(text: Text): string {
  switch (text.kind) {
    case "LabelStr":
      return `"${escapeLabelStr(text.text)}"`;
    case "EscStr":
      return `"${escapeEscStr(text.text)}"`;
    case "HtmlStr":
      return `<${text.text}>`;
  }
}

// Content that, wrapped in an EscStr, renders the same as `text`.
function preEscapedContent(text: Text): string {
  if (text.kind === "LabelStr") return text.text.replace(/\\/g, "\\\\").replace(/\n/g, "\\n");
  return text.text;
}

/** Puts `suffix` on a line below `text`, with a blank line between them. */
export function suffixLine(text: Text, suffix: Text): Text {
  return escStr(`${preEscapedContent(text)}\\n\\n${preEscapedContent(suffix)}`);
}

/** Escapes markup characters for use inside an `HtmlStr`. */
export function escapeHtml(s: string): string {
  return s.replace(/&/g, "&amp;").replace(/"/g, "&quot;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}
