import type {
  Action,
  ActionValueLookup,
  ExplorationStrategy,
  State,
} from "./types";
import { assertFinite, assertUnitInterval } from "./errors";

/** Source of uniformly distributed numbers in `[0, 1)`, like `Math.random`. */
export type RandomSource = () => number;

/**
 * Returns the action with the highest score, ties going to the first one in
 * `actions` order. Actions scored `undefined` are skipped.
 *
 * @returns The winning action, or `undefined` when no action has a score.
 */
export function pickGreedy<TAction>(
  actions: ReadonlyArray<TAction>,
  score: (action: TAction) => number | undefined
): TAction | undefined {
  let best: TAction | undefined;
  let bestScore = -Infinity;
  for (const action of actions) {
    const value = score(action);
    if (value === undefined) continue;
    // Strict comparison keeps the first of equal candidates.
    if (best === undefined || value > bestScore) {
      best = action;
      bestScore = value;
    }
  }
  return best;
}

function pickUniform<TAction>(
  actions: ReadonlyArray<TAction>,
  random: RandomSource
): TAction | undefined {
  if (actions.length === 0) return undefined;
  const index = Math.min(Math.floor(random() * actions.length), actions.length - 1);
  return actions[index];
}

/**
 * Explores by sampling uniformly among the legal actions of the current state.
 *
 * @template TState  - The state type.
 * @template TAction - The action type.
 */
export class RandomExploration<TState extends State<TState, TAction>, TAction extends Action>
  implements ExplorationStrategy<TState, TAction>
{
  constructor(private readonly random: RandomSource = Math.random) {}

  pickAction(state: TState): TAction | undefined {
    return pickUniform(state.actions(), this.random);
  }
}

/**
 * Options for {@link EpsilonGreedyExploration}.
 */
export interface EpsilonGreedyOptions {
  /** Probability in `[0, 1]` of taking a uniformly random action. */
  epsilon: number;
  /** Value assumed for actions that have no table entry. Defaults to `0`. */
  initialValue?: number;
  /** Defaults to `Math.random`. */
  random?: RandomSource;
}

/**
 * With probability `epsilon` explores uniformly, otherwise exploits the best
 * known action of the current state.
 *
 * @template TState  - The state type.
 * @template TAction - The action type.
 *
 * @example
 * ```ts
 * trainer.train(agent, learning, termination, new EpsilonGreedyExploration({ epsilon: 0.1 }));
 * ```
 */
export class EpsilonGreedyExploration<TState extends State<TState, TAction>, TAction extends Action>
  implements ExplorationStrategy<TState, TAction>
{
  readonly epsilon: number;
  readonly initialValue: number;
  private readonly random: RandomSource;

  /**
   * @throws {InvalidHyperparameterError} if `epsilon` is outside `[0, 1]` or
   *         `initialValue` is not finite.
   */
  constructor(options: EpsilonGreedyOptions) {
    const { epsilon, initialValue = 0, random = Math.random } = options;
    assertUnitInterval("epsilon", epsilon);
    assertFinite("initialValue", initialValue);
    this.epsilon = epsilon;
    this.initialValue = initialValue;
    this.random = random;
  }

  pickAction(state: TState, values: ActionValueLookup<TState, TAction>): TAction | undefined {
    const actions = state.actions();
    if (this.random() < this.epsilon) {
      return pickUniform(actions, this.random);
    }
    return pickGreedy(actions, (action) => values.get(state, action) ?? this.initialValue);
  }
}
