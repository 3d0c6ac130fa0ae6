/**
 * Thrown by strategy constructors when a hyperparameter is outside the range
 * the strategy accepts (e.g. a learning rate above 1 or a negative iteration
 * count).
 *
 * @example
 * ```ts
 * try {
 *   new QLearning(1.5, 0.9, 0);
 * } catch (err) {
 *   if (err instanceof InvalidHyperparameterError) {
 *     console.error(`Bad ${err.parameter}: ${err.value}`);
 *   }
 * }
 * ```
 */
export class InvalidHyperparameterError extends RangeError {
  /** Name of the offending parameter (e.g. `"alpha"`). */
  readonly parameter: string;
  /** The rejected value. */
  readonly value: number;

  constructor(parameter: string, value: number, expected: string) {
    super(`Invalid hyperparameter "${parameter}": expected ${expected}, received ${value}.`);
    this.name = "InvalidHyperparameterError";
    this.parameter = parameter;
    this.value = value;
  }
}

/** Throws unless `value` is a finite number within `[0, 1]`. */
export function assertUnitInterval(parameter: string, value: number): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new InvalidHyperparameterError(parameter, value, "a number in [0, 1]");
  }
}

/** Throws unless `value` is a finite number. */
export function assertFinite(parameter: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new InvalidHyperparameterError(parameter, value, "a finite number");
  }
}
