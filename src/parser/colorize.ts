/**
 * ANSI terminal colouring of source text, driven by the Lezer tree.
 */

import { highlightTree, tagHighlighter, tags as t } from "@lezer/highlight";
import { parser } from "./lezer";

const RESET = "\x1b[0m";

const ANSI = new Map<string, string>([
  ["keyword", "\x1b[38;5;173m"],
  ["definition", "\x1b[38;5;221m"],
  ["name", "\x1b[38;5;145m"],
  ["comment", "\x1b[38;5;244m"],
  ["operator", "\x1b[38;5;110m"],
  ["bracket", "\x1b[38;5;210m"],
]);

const highlighter = tagHighlighter([
  { tag: [t.keyword, t.definitionKeyword], class: "keyword" },
  { tag: t.definition(t.variableName), class: "definition" },
  { tag: t.variableName, class: "name" },
  { tag: t.lineComment, class: "comment" },
  { tag: [t.operator, t.definitionOperator], class: "operator" },
  { tag: [t.angleBracket, t.squareBracket, t.brace], class: "bracket" },
]);

/**
 * Wrap each highlighted token of `source` in ANSI colour codes.
 * Input that does not parse is still coloured as far as the tree allows.
 */
export function highlightCode(source: string): string {
  const tree = parser.parse(source);
  let result = "";
  let pos = 0;

  highlightTree(tree, highlighter, (from, to, classes) => {
    const codes = classes
      .split(" ")
      .map((c) => ANSI.get(c) ?? "")
      .join("");
    result += source.slice(pos, from) + codes + source.slice(from, to) + RESET;
    pos = to;
  });

  return result + source.slice(pos);
}
