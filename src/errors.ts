/**
 * Errors raised while reducing or checking configurations.
 *
 * The evaluator throws these internally; its public operations catch them
 * and hand them back inside a tagged outcome.
 */

import type { IntrinsicKind } from "./expr";
import type { Sym } from "./symbols";

export type EvalErrorKind =
  | "stackUnderflow"
  | "unboundCall"
  | "typeMismatch"
  | "malformedAssertion"
  | "stepLimitExceeded";

export abstract class EvalError extends Error {
  abstract readonly kind: EvalErrorKind;
}

/**
 * An intrinsic needed more values than the stack held.
 */
export class StackUnderflowError extends EvalError {
  readonly kind = "stackUnderflow";

  constructor(
    public readonly intrinsic: IntrinsicKind,
    public readonly available: number,
    public readonly expected: number
  ) {
    super(`Stack underflow in ${intrinsic}: expected ${expected} value(s), found ${available}`);
    this.name = "StackUnderflowError";
  }
}

/**
 * A call names neither an intrinsic nor a stored definition.
 */
export class UnboundCallError extends EvalError {
  readonly kind = "unboundCall";

  constructor(public readonly symbol: Sym) {
    super(`Undefined function ${symbol.toString()}`);
    this.name = "UnboundCallError";
  }
}

export class TypeMismatchError extends EvalError {
  readonly kind = "typeMismatch";

  constructor(
    public readonly intrinsic: IntrinsicKind,
    public readonly expected: string,
    public readonly got: string
  ) {
    super(`Type mismatch in ${intrinsic}: expected ${expected}, got ${got}`);
    this.name = "TypeMismatchError";
  }
}

export type MalformedAssertionReason =
  /** The claimed input configuration has no successor. */
  | "noStep"
  /** A big-step claim whose right-hand side still has work left. */
  | "nonTerminalResult"
  /** The evaluator produced something other than the claimed output. */
  | "mismatch";

export class MalformedAssertionError extends EvalError {
  readonly kind = "malformedAssertion";

  constructor(public readonly reason: MalformedAssertionReason, message: string) {
    super(message);
    this.name = "MalformedAssertionError";
  }
}

/**
 * A caller-supplied step bound ran out before reduction finished.
 * This says nothing about whether the program terminates.
 */
export class StepLimitExceededError extends EvalError {
  readonly kind = "stepLimitExceeded";

  constructor(public readonly limit: number) {
    super(`Step limit of ${limit} exceeded`);
    this.name = "StepLimitExceededError";
  }
}
