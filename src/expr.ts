/**
 * Expression model for the combinator calculus.
 *
 * Programs are trees of calls, quotations, compositions and intrinsics.
 * Runtime stack values reuse the call and quotation nodes; compositions and
 * bare intrinsics only ever appear as program text.
 *
 * All nodes are immutable. Reduction builds new trees and shares unchanged
 * subtrees freely.
 */

import type { Sym } from "./symbols";

// ============================================================================
// Intrinsics
// ============================================================================

export type IntrinsicKind = "swap" | "clone" | "drop" | "quote" | "compose" | "apply";

export const INTRINSICS: readonly IntrinsicKind[] = ["swap", "clone", "drop", "quote", "compose", "apply"];

/**
 * Number of stack values each intrinsic consumes.
 */
export const INTRINSIC_ARITY: Readonly<Record<IntrinsicKind, number>> = {
  swap: 2,
  clone: 1,
  drop: 1,
  quote: 1,
  compose: 2,
  apply: 1,
};

export function isIntrinsicName(name: string): name is IntrinsicKind {
  return INTRINSICS.some((kind) => kind === name);
}

// ============================================================================
// Expression Types
// ============================================================================

export type Expr = CallExpr | QuoteExpr | ComposeExpr | IntrinsicExpr;

export interface CallExpr {
  readonly tag: "call";
  readonly symbol: Sym;
}

export interface QuoteExpr {
  readonly tag: "quote";
  readonly body: Expr;
}

/**
 * Sequential composition. Never holds fewer than two items, except for the
 * empty composition that marks "nothing left to run".
 */
export interface ComposeExpr {
  readonly tag: "compose";
  readonly exprs: readonly Expr[];
}

export interface IntrinsicExpr {
  readonly tag: "intrinsic";
  readonly kind: IntrinsicKind;
}

// ============================================================================
// Values
// ============================================================================

/**
 * A stack value: a call or a quotation.
 */
export type Value = CallExpr | QuoteExpr;

/**
 * Top of stack is the last element.
 */
export type ValueStack = readonly Value[];

export function isValue(expr: Expr): expr is Value {
  return expr.tag === "call" || expr.tag === "quote";
}

// ============================================================================
// Constructors
// ============================================================================

export const empty: ComposeExpr = { tag: "compose", exprs: [] };

export const call = (symbol: Sym): CallExpr => ({ tag: "call", symbol });

export const quote = (body: Expr): QuoteExpr => ({ tag: "quote", body });

export const intrinsic = (kind: IntrinsicKind): IntrinsicExpr => ({ tag: "intrinsic", kind });

/**
 * Compose expressions left to right.
 *
 * Nested compositions are flattened, empty ones disappear, and a single
 * remaining item stands for itself.
 */
export function sequence(exprs: readonly Expr[]): Expr {
  const flat: Expr[] = [];
  const push = (e: Expr): void => {
    if (e.tag === "compose") {
      e.exprs.forEach(push);
    } else {
      flat.push(e);
    }
  };
  exprs.forEach(push);

  if (flat.length === 0) return empty;
  if (flat.length === 1) return flat[0];
  return { tag: "compose", exprs: flat };
}

/**
 * Rebuild an expression so every composition, including those inside
 * quotations, is in normal form.
 */
export function normalize(expr: Expr): Expr {
  switch (expr.tag) {
    case "call":
    case "intrinsic":
      return expr;
    case "quote":
      return quote(normalize(expr.body));
    case "compose":
      return sequence(expr.exprs.map(normalize));
  }
}

/**
 * The items of an expression as a run list: a composition yields its
 * items, anything else is a one-item list.
 */
export function items(expr: Expr): readonly Expr[] {
  return expr.tag === "compose" ? expr.exprs : [expr];
}

export function isEmpty(expr: Expr): boolean {
  return expr.tag === "compose" && expr.exprs.length === 0;
}

// ============================================================================
// Structural Equality
// ============================================================================

/**
 * Deep, order-sensitive equality. Symbols compare by identity.
 */
export function exprEquals(a: Expr, b: Expr): boolean {
  if (a === b) return true;
  switch (a.tag) {
    case "call":
      return b.tag === "call" && a.symbol === b.symbol;
    case "intrinsic":
      return b.tag === "intrinsic" && a.kind === b.kind;
    case "quote":
      return b.tag === "quote" && exprEquals(a.body, b.body);
    case "compose":
      return (
        b.tag === "compose" &&
        a.exprs.length === b.exprs.length &&
        a.exprs.every((e, i) => exprEquals(e, b.exprs[i]))
      );
  }
}

export function valueEquals(a: Value, b: Value): boolean {
  return exprEquals(a, b);
}

export function stackEquals(a: ValueStack, b: ValueStack): boolean {
  return a.length === b.length && a.every((v, i) => valueEquals(v, b[i]));
}
