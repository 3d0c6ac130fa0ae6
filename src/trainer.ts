import type {
  Action,
  ActionValue,
  Agent,
  ExplorationStrategy,
  LearnedValue,
  LearningStrategy,
  State,
  TerminalValue,
  TerminationStrategy,
  TrainerHooks,
  TrainerOptions,
  TrainingSummary,
} from "./types";
import { QTable } from "./q-table";
import { pickGreedy } from "./exploration";

/** Best next value used for terminal states when no option is given. */
const DEFAULT_TERMINAL_VALUE = 0;

function resolveTerminalValue<TState>(terminalValue: TerminalValue<TState>, state: TState): number {
  return typeof terminalValue === "function" ? terminalValue(state) : terminalValue;
}

/**
 * Learns an action-value table for a user-defined process by repeatedly
 * letting an agent explore it.
 *
 * The trainer owns the table; it is created empty, filled by {@link train}
 * and queried through {@link expectedValue} and {@link bestAction}. Several
 * `train` calls (e.g. one per episode) accumulate into the same table.
 *
 * @template TState  - The state type.
 * @template TAction - The action type.
 *
 * @example
 * ```ts
 * const trainer = new AgentTrainer<Cell, Move>();
 * trainer.train(
 *   agent,
 *   new QLearning(0.2, 0.01, 2),
 *   new FixedIterations(100_000),
 *   new RandomExploration()
 * );
 * trainer.bestAction(new Cell(10, 9));
 * ```
 */
export class AgentTrainer<TState extends State<TState, TAction>, TAction extends Action> {
  private readonly _table = new QTable<TState, TAction>();
  private readonly _terminalValue: TerminalValue<TState>;
  private readonly _hooks: TrainerHooks<TState, TAction> | undefined;

  constructor(options: TrainerOptions<TState, TAction> = {}) {
    this._terminalValue = options.terminalValue ?? DEFAULT_TERMINAL_VALUE;
    this._hooks = options.hooks;
  }

  /**
   * Runs the explore → act → observe → update loop until the termination
   * strategy says stop, or until the agent sits in a state without legal
   * actions. The agent is mutated in place.
   *
   * @returns How many updates were made and why training ended.
   */
  train(
    agent: Agent<TState, TAction>,
    learningStrategy: LearningStrategy,
    terminationStrategy: TerminationStrategy<TState>,
    explorationStrategy: ExplorationStrategy<TState, TAction>
  ): TrainingSummary {
    const hooks = this._hooks;
    let steps = 0;

    for (;;) {
      const current = agent.currentState();
      const action = explorationStrategy.pickAction(current, this._table);
      if (action === undefined) {
        return this.finish({ steps, reason: "NO_AVAILABLE_ACTION" });
      }

      // The agent may mutate its state in place, so keep a copy of the origin.
      const state = current.clone();
      const oldValue = this._table.get(state, action);

      agent.takeAction(action);
      const nextState = agent.currentState();
      const reward = agent.reward();

      const bestNext = this.bestNextValue(nextState, learningStrategy.initialValue);
      const newValue = learningStrategy.value(oldValue, reward, bestNext);
      this._table.set(state, action, newValue);

      hooks?.onStep?.({
        index: steps,
        state,
        action,
        reward,
        nextState,
        bestNext,
        oldValue,
        newValue,
      });
      steps += 1;

      if (terminationStrategy.shouldStop(nextState)) {
        return this.finish({ steps, reason: "TERMINATION_STRATEGY" });
      }
    }
  }

  /**
   * The learned value of taking `action` in `state`.
   *
   * @returns The stored value, or `undefined` if the pair was never updated.
   */
  expectedValue(state: TState, action: TAction): number | undefined {
    return this._table.get(state, action);
  }

  /**
   * Every learned action value of `state`.
   *
   * @returns The entries, or `undefined` if nothing was learned for `state`.
   */
  expectedValues(state: TState): ReadonlyArray<ActionValue<TAction>> | undefined {
    return this._table.valuesFor(state);
  }

  /**
   * The legal action of `state` with the highest learned value. Ties go to
   * the action declared first by `state.actions()`; actions that were never
   * learned are not candidates.
   *
   * @returns The action, or `undefined` if `state` has no legal actions or
   *          none of them has a learned value.
   */
  bestAction(state: TState): TAction | undefined {
    return pickGreedy(state.actions(), (action) => this._table.get(state, action));
  }

  /** A snapshot of the whole table. */
  learnedValues(): ReadonlyArray<LearnedValue<TState, TAction>> {
    return this._table.entries();
  }

  /**
   * Replaces everything learned so far with `entries`.
   *
   * @returns `this` for fluent chaining.
   */
  importLearnedValues(entries: Iterable<LearnedValue<TState, TAction>>): this {
    this._table.clear();
    for (const { state, action, value } of entries) {
      this._table.set(state, action, value);
    }
    return this;
  }

  private bestNextValue(state: TState, initialValue: number): number {
    const actions = state.actions();
    if (actions.length === 0) {
      return resolveTerminalValue(this._terminalValue, state);
    }
    let best = -Infinity;
    for (const action of actions) {
      best = Math.max(best, this._table.get(state, action) ?? initialValue);
    }
    return best;
  }

  private finish(summary: TrainingSummary): TrainingSummary {
    this._hooks?.onTerminate?.(summary);
    return summary;
  }
}

/**
 * Creates a new trainer with an empty value table.
 *
 * @example
 * ```ts
 * const trainer = createTrainer<Coin, Bet>({ terminalValue: 0 });
 * ```
 */
export function createTrainer<TState extends State<TState, TAction>, TAction extends Action>(
  options: TrainerOptions<TState, TAction> = {}
): AgentTrainer<TState, TAction> {
  return new AgentTrainer<TState, TAction>(options);
}
