import type { Action, State, TerminationStrategy } from "./types";
import { InvalidHyperparameterError } from "./errors";

/**
 * Stops after a fixed number of steps: the first `iterations - 1` calls
 * return `false` and call number `iterations` returns `true`.
 */
export class FixedIterations implements TerminationStrategy<unknown> {
  private _calls = 0;

  /**
   * @throws {InvalidHyperparameterError} unless `iterations` is a positive integer.
   */
  constructor(readonly iterations: number) {
    if (!Number.isInteger(iterations) || iterations < 1) {
      throw new InvalidHyperparameterError("iterations", iterations, "a positive integer");
    }
  }

  /** Number of times {@link FixedIterations.shouldStop} has been called. */
  get calls(): number {
    return this._calls;
  }

  shouldStop(): boolean {
    this._calls += 1;
    return this._calls >= this.iterations;
  }
}

/**
 * Stops as soon as the agent reaches a terminal state (no legal actions).
 * Useful for episodic processes trained one episode per `train` call.
 */
export class SinkStates<TState extends State<TState, TAction>, TAction extends Action>
  implements TerminationStrategy<TState>
{
  shouldStop(state: TState): boolean {
    return state.actions().length === 0;
  }
}

/**
 * Stops once `milliseconds` have elapsed since the first call.
 * The clock is polled on every call; nothing runs in the background.
 */
export class TimeLimit implements TerminationStrategy<unknown> {
  private _startedAt: number | undefined;

  /**
   * @param milliseconds  Wall-clock budget, a non-negative finite number.
   * @param now           Clock in milliseconds. Defaults to `Date.now`.
   * @throws {InvalidHyperparameterError} on a negative or non-finite budget.
   */
  constructor(
    readonly milliseconds: number,
    private readonly now: () => number = Date.now
  ) {
    if (!Number.isFinite(milliseconds) || milliseconds < 0) {
      throw new InvalidHyperparameterError("milliseconds", milliseconds, "a non-negative finite number");
    }
  }

  shouldStop(): boolean {
    const current = this.now();
    if (this._startedAt === undefined) {
      this._startedAt = current;
    }
    return current - this._startedAt >= this.milliseconds;
  }
}
