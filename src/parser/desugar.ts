/**
 * Desugar Lezer trees into the expression model.
 *
 * Identifiers are interned into the caller's symbol table while walking, so
 * parsing is always relative to one session.
 */

import type { Tree, TreeCursor } from "@lezer/common";
import type { LRParser } from "@lezer/lr";
import type { Assertion, StepDiscipline } from "../assertion";
import { fnDef } from "../definitions";
import type { FnDef } from "../definitions";
import { configuration } from "../evaluate";
import type { Configuration } from "../evaluate";
import { call, intrinsic, isIntrinsicName, quote, sequence } from "../expr";
import type { Expr, Value } from "../expr";
import type { SymbolTable } from "../symbols";
import { assertionParser, strictParser } from "./lezer";

// ============================================================================
// Parse Results
// ============================================================================

/**
 * One unit of program input: a definition, or a run of terms forming a
 * single expression.
 */
export type ProgramItem = { tag: "def"; def: FnDef } | { tag: "expr"; expr: Expr };

export class ParseError extends Error {
  constructor(
    message: string,
    public readonly pos?: number
  ) {
    super(message);
    this.name = "ParseError";
  }
}

// ============================================================================
// Entry Points
// ============================================================================

/**
 * Parse a sequence of definitions and expressions.
 */
export function parseProgram(source: string, symbols: SymbolTable): ProgramItem[] {
  return desugarProgram(parseTree(strictParser, source), source, symbols);
}

/**
 * Parse source that must be a single expression (possibly empty).
 */
export function parseExpr(source: string, symbols: SymbolTable): Expr {
  const exprs = parseProgram(source, symbols).map((item) => {
    if (item.tag === "def") {
      throw new ParseError("Expected an expression, found a definition");
    }
    return item.expr;
  });
  return sequence(exprs);
}

export function parseDefinition(source: string, symbols: SymbolTable): FnDef {
  const items = parseProgram(source, symbols);
  const [item] = items;
  if (items.length !== 1 || item.tag !== "def") {
    throw new ParseError("Expected exactly one definition");
  }
  return item.def;
}

export function parseAssertion(source: string, symbols: SymbolTable): Assertion {
  return desugarAssertion(parseTree(assertionParser, source), source, symbols);
}

function parseTree(parser: LRParser, source: string): Tree {
  try {
    return parser.parse(source);
  } catch (e) {
    if (e instanceof SyntaxError) {
      const match = /(\d+)$/.exec(e.message);
      const pos = match === null ? undefined : Number(match[1]);
      throw new ParseError(pos === undefined ? e.message : `Unexpected input at offset ${pos}`, pos);
    }
    throw e;
  }
}

// ============================================================================
// Tree Walking
// ============================================================================

function text(cursor: TreeCursor, source: string): string {
  return source.slice(cursor.from, cursor.to);
}

// Reads the name through a call so earlier comparisons don't narrow it
function nodeName(cursor: TreeCursor): string {
  return cursor.name;
}

export function desugarProgram(tree: Tree, source: string, symbols: SymbolTable): ProgramItem[] {
  const cursor = tree.cursor();
  const items: ProgramItem[] = [];
  let terms: Expr[] = [];

  const flush = (): void => {
    if (terms.length > 0) {
      items.push({ tag: "expr", expr: sequence(terms) });
      terms = [];
    }
  };

  if (cursor.name === "Program" && cursor.firstChild()) {
    do {
      if (nodeName(cursor) === "Definition") {
        flush();
        items.push({ tag: "def", def: desugarDefinition(cursor, source, symbols) });
      } else {
        const term = desugarTerm(cursor, source, symbols);
        if (term !== undefined) terms.push(term);
      }
    } while (cursor.nextSibling());
  }
  flush();

  return items;
}

function desugarDefinition(cursor: TreeCursor, source: string, symbols: SymbolTable): FnDef {
  let name: string | undefined;
  const body: Expr[] = [];

  if (cursor.firstChild()) {
    do {
      if (cursor.name === "Name") {
        name = text(cursor, source);
      } else {
        const term = desugarTerm(cursor, source, symbols);
        if (term !== undefined) body.push(term);
      }
    } while (cursor.nextSibling());
    cursor.parent();
  }

  if (name === undefined) {
    throw new ParseError("Definition without a name", cursor.from);
  }
  return fnDef(symbols.intern(name), sequence(body));
}

/**
 * Desugar the node under the cursor if it is a term. Punctuation and
 * comments yield `undefined`.
 */
function desugarTerm(cursor: TreeCursor, source: string, symbols: SymbolTable): Expr | undefined {
  switch (cursor.name) {
    case "Intrinsic": {
      const name = text(cursor, source);
      if (!isIntrinsicName(name)) {
        throw new ParseError(`Unknown intrinsic '${name}'`, cursor.from);
      }
      return intrinsic(name);
    }
    case "Call":
      return call(symbols.intern(text(cursor, source)));
    case "Quotation":
      return quote(sequence(desugarChildren(cursor, source, symbols)));
    default:
      return undefined;
  }
}

function desugarChildren(cursor: TreeCursor, source: string, symbols: SymbolTable): Expr[] {
  const terms: Expr[] = [];
  if (cursor.firstChild()) {
    do {
      const term = desugarTerm(cursor, source, symbols);
      if (term !== undefined) terms.push(term);
    } while (cursor.nextSibling());
    cursor.parent();
  }
  return terms;
}

// ============================================================================
// Assertions
// ============================================================================

export function desugarAssertion(tree: Tree, source: string, symbols: SymbolTable): Assertion {
  const cursor = tree.cursor();
  const configs: Configuration[] = [];
  let discipline: StepDiscipline | undefined;

  if (cursor.name === "Assertion" && cursor.firstChild()) {
    do {
      if (nodeName(cursor) === "Configuration") {
        configs.push(desugarConfiguration(cursor, source, symbols));
      } else if (nodeName(cursor) === "Arrow" && cursor.firstChild()) {
        discipline = nodeName(cursor) === "BigStep" ? "big" : "small";
        cursor.parent();
      }
    } while (cursor.nextSibling());
  }

  const [input, output] = configs;
  if (configs.length !== 2 || discipline === undefined) {
    throw new ParseError("Expected an assertion of the form ⟨…⟩ e ⟶ ⟨…⟩ e");
  }
  return { discipline, input, output };
}

function desugarConfiguration(cursor: TreeCursor, source: string, symbols: SymbolTable): Configuration {
  let stack: Value[] = [];
  const terms: Expr[] = [];

  if (cursor.firstChild()) {
    do {
      if (cursor.name === "Stack") {
        stack = desugarStack(cursor, source, symbols);
      } else {
        const term = desugarTerm(cursor, source, symbols);
        if (term !== undefined) terms.push(term);
      }
    } while (cursor.nextSibling());
    cursor.parent();
  }

  return configuration(stack, sequence(terms));
}

function desugarStack(cursor: TreeCursor, source: string, symbols: SymbolTable): Value[] {
  const values: Value[] = [];
  for (const term of desugarChildren(cursor, source, symbols)) {
    if (term.tag !== "call" && term.tag !== "quote") {
      throw new ParseError("Stack values must be quotations or names", cursor.from);
    }
    values.push(term);
  }
  return values;
}
