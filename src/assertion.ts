/**
 * Operational-semantics assertion checker.
 *
 * A claim states that a configuration reduces to another, either in exactly
 * one step (`⟶`) or all the way to normal form (`⇓`). The checker runs the
 * evaluator and compares what it actually produced.
 */

import type { EvalError } from "./errors";
import { MalformedAssertionError } from "./errors";
import type { Configuration, Evaluator, ReduceOptions } from "./evaluate";
import { configEquals, isTerminal } from "./evaluate";

export type StepDiscipline = "small" | "big";

export interface Assertion {
  readonly discipline: StepDiscipline;
  readonly input: Configuration;
  readonly output: Configuration;
}

export type AssertionResult =
  | { pass: true; actual: Configuration; steps: number }
  | { pass: false; actual: Configuration; steps: number; error: EvalError };

export function checkAssertion(
  evaluator: Evaluator,
  assertion: Assertion,
  options: ReduceOptions = {}
): AssertionResult {
  switch (assertion.discipline) {
    case "small":
      return checkSmallStep(evaluator, assertion);
    case "big":
      return checkBigStep(evaluator, assertion, options);
  }
}

function checkSmallStep(evaluator: Evaluator, { input, output }: Assertion): AssertionResult {
  const outcome = evaluator.step(input);
  switch (outcome.tag) {
    case "failed":
      return { pass: false, actual: outcome.config, steps: 0, error: outcome.error };
    case "terminal":
      return {
        pass: false,
        actual: outcome.config,
        steps: 0,
        error: new MalformedAssertionError("noStep", "No step applies: the input configuration is terminal"),
      };
    case "stepped":
      return compare(outcome.config, output, 1);
  }
}

function checkBigStep(evaluator: Evaluator, { input, output }: Assertion, options: ReduceOptions): AssertionResult {
  if (!isTerminal(output)) {
    return {
      pass: false,
      actual: input,
      steps: 0,
      error: new MalformedAssertionError(
        "nonTerminalResult",
        "A big-step claim must end in a terminal configuration"
      ),
    };
  }

  const outcome = evaluator.reduce(input, options);
  switch (outcome.tag) {
    case "failed":
    case "limitExceeded":
      return { pass: false, actual: outcome.config, steps: outcome.steps, error: outcome.error };
    case "normal":
      return compare(outcome.config, output, outcome.steps);
  }
}

function compare(actual: Configuration, claimed: Configuration, steps: number): AssertionResult {
  if (configEquals(actual, claimed)) {
    return { pass: true, actual, steps };
  }
  return {
    pass: false,
    actual,
    steps,
    error: new MalformedAssertionError("mismatch", "The evaluator produced a different configuration"),
  };
}
