/**
 * Syntax highlighting props for the grammar's node types.
 */

import { styleTags, tags as t } from "@lezer/highlight";

export const highlighting = styleTags({
  "swap clone drop quote compose apply": t.keyword,
  fn: t.definitionKeyword,
  "Definition/Name": t.definition(t.variableName),
  "Call/Name": t.variableName,
  LineComment: t.lineComment,
  "SmallStep BigStep": t.operator,
  "StackOpen StackClose": t.angleBracket,
  "[ ]": t.squareBracket,
  "{ }": t.brace,
  "=": t.definitionOperator,
});
