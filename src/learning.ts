import type { LearningStrategy } from "./types";
import { assertFinite, assertUnitInterval } from "./errors";

/**
 * Standard tabular Q-learning update:
 *
 * `new = old + alpha * (reward + gamma * bestNext - old)`
 *
 * where a missing `old` or `bestNext` is replaced by `initialValue`.
 *
 * @example
 * ```ts
 * const learning = new QLearning(0.2, 0.01, 2);
 * learning.value(undefined, -1, 2); // 2 + 0.2 * (-1 + 0.02 - 2)
 * ```
 */
export class QLearning implements LearningStrategy {
  /**
   * @param alpha         Learning rate in `[0, 1]`.
   * @param gamma         Discount factor in `[0, 1]`.
   * @param initialValue  Value of pairs that were never learned.
   * @throws {InvalidHyperparameterError} on an out-of-range parameter.
   */
  constructor(
    readonly alpha: number,
    readonly gamma: number,
    readonly initialValue: number
  ) {
    assertUnitInterval("alpha", alpha);
    assertUnitInterval("gamma", gamma);
    assertFinite("initialValue", initialValue);
  }

  value(oldValue: number | undefined, reward: number, bestNext: number | undefined): number {
    const old = oldValue ?? this.initialValue;
    const maxNext = bestNext ?? this.initialValue;
    return old + this.alpha * (reward + this.gamma * maxNext - old);
  }
}
