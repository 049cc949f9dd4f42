/**
 * Trace recorder - the sequence of configurations a reduction visits.
 *
 * A `Trace` is restartable: each iteration re-runs the evaluator from the
 * initial configuration, and since reduction is deterministic every run
 * yields the same entries.
 */

import type { Configuration, Evaluator, ReduceOptions, ReductionOutcome } from "./evaluate";

export interface TraceEntry {
  /** 0 for the initial configuration, then one per step. */
  readonly index: number;
  readonly config: Configuration;
}

export interface RecordedTrace {
  readonly entries: TraceEntry[];
  readonly outcome: ReductionOutcome;
}

export class Trace implements Iterable<TraceEntry> {
  constructor(
    private readonly evaluator: Evaluator,
    private readonly initial: Configuration,
    private readonly options: ReduceOptions = {}
  ) {}

  [Symbol.iterator](): Iterator<TraceEntry> {
    return this.entries();
  }

  /**
   * Lazily yield each visited configuration; the generator's return value
   * says how the reduction ended.
   */
  *entries(): Generator<TraceEntry, ReductionOutcome> {
    yield { index: 0, config: this.initial };
    const run = this.evaluator.run(this.initial, this.options);
    let index = 1;
    for (;;) {
      const next = run.next();
      if (next.done) return next.value;
      yield { index: index++, config: next.value };
    }
  }

  collect(): RecordedTrace {
    const entries: TraceEntry[] = [];
    const iterator = this.entries();
    for (;;) {
      const next = iterator.next();
      if (next.done) return { entries, outcome: next.value };
      entries.push(next.value);
    }
  }
}

export function trace(evaluator: Evaluator, initial: Configuration, options: ReduceOptions = {}): Trace {
  return new Trace(evaluator, initial, options);
}
