/**
 * Term-rewriting evaluator.
 *
 * A configuration is a value stack paired with the expression still to run.
 * `step` performs exactly one transition; `reduce` iterates to the empty
 * expression, an error, or the caller's step bound. The transition relation
 * is a partial function: each configuration has at most one successor.
 */

import type { Expr, IntrinsicKind, Value, ValueStack } from "./expr";
import {
  INTRINSIC_ARITY,
  empty,
  isEmpty,
  quote,
  sequence,
  exprEquals,
  stackEquals,
} from "./expr";
import {
  EvalError,
  StackUnderflowError,
  StepLimitExceededError,
  TypeMismatchError,
  UnboundCallError,
} from "./errors";
import type { Sym } from "./symbols";

// ============================================================================
// Configurations and Outcomes
// ============================================================================

export interface Configuration {
  readonly stack: ValueStack;
  readonly expr: Expr;
}

export const configuration = (stack: ValueStack, expr: Expr): Configuration => ({ stack, expr });

export function isTerminal(config: Configuration): boolean {
  return isEmpty(sequence([config.expr]));
}

export function configEquals(a: Configuration, b: Configuration): boolean {
  return stackEquals(a.stack, b.stack) && exprEquals(a.expr, b.expr);
}

export type StepOutcome =
  | { tag: "stepped"; config: Configuration }
  | { tag: "terminal"; config: Configuration }
  | { tag: "failed"; config: Configuration; error: EvalError };

export type ReductionOutcome =
  | { tag: "normal"; config: Configuration; steps: number }
  | { tag: "failed"; config: Configuration; steps: number; error: EvalError }
  | { tag: "limitExceeded"; config: Configuration; steps: number; error: StepLimitExceededError };

export interface ReduceOptions {
  /** Give up after this many steps. `null` or absent means no bound. */
  maxSteps?: number | null;
}

// ============================================================================
// Evaluation Context
// ============================================================================

/**
 * What the evaluator may consult while reducing: which symbols name
 * intrinsics, and a frozen view of the definitions.
 */
export interface EvalContext {
  readonly intrinsics: ReadonlyMap<Sym, IntrinsicKind>;
  readonly definitions: ReadonlyMap<Sym, Expr>;
}

// ============================================================================
// Evaluator
// ============================================================================

export class Evaluator {
  constructor(private readonly ctx: EvalContext) {}

  /**
   * Perform one transition.
   */
  step(config: Configuration): StepOutcome {
    const expr = sequence([config.expr]);
    if (isEmpty(expr)) {
      return { tag: "terminal", config: configuration(config.stack, expr) };
    }
    try {
      return { tag: "stepped", config: this.reduceHead(config.stack, expr) };
    } catch (e) {
      if (e instanceof EvalError) {
        return { tag: "failed", config, error: e };
      }
      throw e;
    }
  }

  /**
   * Iterate `step` to a normal form.
   */
  reduce(config: Configuration, options: ReduceOptions = {}): ReductionOutcome {
    const run = this.run(config, options);
    for (;;) {
      const next = run.next();
      if (next.done) return next.value;
    }
  }

  /**
   * Lazily yield every configuration reached after the initial one,
   * finishing with the reduction outcome.
   */
  *run(config: Configuration, options: ReduceOptions = {}): Generator<Configuration, ReductionOutcome> {
    const maxSteps = options.maxSteps ?? null;
    let current = config;
    let steps = 0;

    for (;;) {
      if (isTerminal(current)) {
        return { tag: "normal", config: current, steps };
      }
      if (maxSteps !== null && steps >= maxSteps) {
        return { tag: "limitExceeded", config: current, steps, error: new StepLimitExceededError(maxSteps) };
      }
      const outcome = this.step(current);
      switch (outcome.tag) {
        case "failed":
          return { tag: "failed", config: current, steps, error: outcome.error };
        case "terminal":
          return { tag: "normal", config: outcome.config, steps };
        case "stepped":
          steps++;
          current = outcome.config;
          yield current;
          break;
      }
    }
  }

  // ==========================================================================
  // Transitions
  // ==========================================================================

  /**
   * Rewrite the head of a non-empty, flattened expression.
   */
  private reduceHead(stack: ValueStack, expr: Expr): Configuration {
    switch (expr.tag) {
      case "compose": {
        const [head, ...rest] = expr.exprs;
        const next = this.reduceHead(stack, head);
        return configuration(next.stack, sequence([next.expr, ...rest]));
      }

      case "quote":
        return configuration([...stack, expr], empty);

      case "intrinsic":
        return this.applyIntrinsic(expr.kind, stack);

      case "call": {
        const kind = this.ctx.intrinsics.get(expr.symbol);
        if (kind !== undefined) {
          return this.applyIntrinsic(kind, stack);
        }
        const body = this.ctx.definitions.get(expr.symbol);
        if (body === undefined) {
          throw new UnboundCallError(expr.symbol);
        }
        return configuration(stack, body);
      }
    }
  }

  private applyIntrinsic(kind: IntrinsicKind, stack: ValueStack): Configuration {
    const arity = INTRINSIC_ARITY[kind];
    if (stack.length < arity) {
      throw new StackUnderflowError(kind, stack.length, arity);
    }
    const rest = stack.slice(0, stack.length - arity);
    const args = stack.slice(stack.length - arity);

    switch (kind) {
      case "swap": {
        const [a, b] = args;
        return configuration([...rest, b, a], empty);
      }
      case "clone": {
        const [a] = args;
        return configuration([...rest, a, a], empty);
      }
      case "drop":
        return configuration(rest, empty);
      case "quote": {
        const [a] = args;
        return configuration([...rest, quote(a)], empty);
      }
      case "compose": {
        // [A] [B] compose gives [A B]: stack order, not pop order
        const [a, b] = args;
        const body = sequence([this.quotationBody(a, kind), this.quotationBody(b, kind)]);
        return configuration([...rest, quote(body)], empty);
      }
      case "apply": {
        const [a] = args;
        return configuration(rest, this.quotationBody(a, kind));
      }
    }
  }

  /**
   * The body of the quotation a stack value denotes. A bare call is
   * resolved through the definitions until a quotation turns up.
   */
  private quotationBody(value: Value, intrinsic: IntrinsicKind): Expr {
    const seen = new Set<Sym>();
    let current: Expr = value;

    while (current.tag === "call") {
      const symbol: Sym = current.symbol;
      if (this.ctx.intrinsics.has(symbol)) {
        throw new TypeMismatchError(intrinsic, "quotation", "intrinsic");
      }
      if (seen.has(symbol)) {
        throw new TypeMismatchError(intrinsic, "quotation", "cyclic definition");
      }
      seen.add(symbol);
      const body = this.ctx.definitions.get(symbol);
      if (body === undefined) {
        throw new UnboundCallError(symbol);
      }
      current = body;
    }

    switch (current.tag) {
      case "quote":
        return current.body;
      case "compose":
        throw new TypeMismatchError(intrinsic, "quotation", "composition");
      case "intrinsic":
        throw new TypeMismatchError(intrinsic, "quotation", "intrinsic");
    }
  }
}
