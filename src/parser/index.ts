/**
 * Parser for the combinator calculus.
 */

// Main parser: Lezer + desugar to the expression model
export {
  parseProgram,
  parseExpr,
  parseDefinition,
  parseAssertion,
  desugarProgram,
  desugarAssertion,
  ParseError,
} from "./desugar";
export type { ProgramItem } from "./desugar";

// Lezer parsers (error-tolerant and strict)
export { parser as lezerParser, strictParser, assertionParser } from "./lezer";
export { highlighting } from "./highlight";
export { highlightCode } from "./colorize";
