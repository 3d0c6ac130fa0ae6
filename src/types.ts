/**
 * An action that can be taken from a {@link State}.
 * Two actions are considered equal exactly when their hashes are equal;
 * referential identity does not matter.
 */
export interface Action {
  /** Stable key for this action. Logically equal actions must return the same value. */
  hash(): string;
}

/**
 * A state of the user's Markov decision process.
 *
 * `TSelf` is the implementing type itself, so that {@link State.clone} keeps
 * the concrete type. `TAction` is the action type that is legal from it.
 *
 * @template TSelf   - The concrete state type.
 * @template TAction - The action type declared by this state.
 *
 * @example
 * ```ts
 * class Cell implements State<Cell, Move> {
 *   constructor(readonly x: number, readonly y: number) {}
 *   hash() { return `${this.x},${this.y}`; }
 *   actions() { return MOVES; }
 *   clone() { return new Cell(this.x, this.y); }
 * }
 * ```
 */
export interface State<TSelf, TAction extends Action> {
  /** Stable key for this state. Logically equal states must return the same value. */
  hash(): string;
  /**
   * Every action that is legal from this state, in a stable declared order.
   * An empty array marks a terminal (absorbing) state.
   */
  actions(): ReadonlyArray<TAction>;
  /** A logical copy that does not alias any mutable part of this state. */
  clone(): TSelf;
}

/**
 * The entity that lives in the process: it owns one current state, executes
 * actions on it and reports the reward of where it ended up.
 *
 * @template TState  - The state type.
 * @template TAction - The action type.
 */
export interface Agent<TState extends State<TState, TAction>, TAction extends Action> {
  /** The agent's live state. Only {@link Agent.takeAction} may change it. */
  currentState(): TState;
  /**
   * Applies `action` to the current state. Passing an action that is not
   * legal from the current state is undefined, domain-specific behaviour.
   */
  takeAction(action: TAction): void;
  /** Reward of the current state, i.e. the state produced by the most recent action. */
  reward(): number;
}

/**
 * Read-only view of learned values handed to exploration strategies.
 */
export interface ActionValueLookup<TState extends State<TState, TAction>, TAction extends Action> {
  /** The stored value for the pair, or `undefined` when it was never learned. */
  get(state: TState, action: TAction): number | undefined;
}

/**
 * Picks the next action to try from the legal actions of a state.
 */
export interface ExplorationStrategy<TState extends State<TState, TAction>, TAction extends Action> {
  /**
   * @returns One action legal from `state`, or `undefined` when `state`
   *          has no legal actions.
   */
  pickAction(state: TState, values: ActionValueLookup<TState, TAction>): TAction | undefined;
}

/**
 * Computes the new value of the (previous state, action taken) pair.
 */
export interface LearningStrategy {
  /** Value assumed for pairs that have no table entry yet. */
  readonly initialValue: number;
  /**
   * @param oldValue  Stored value of the pair being updated, if any.
   * @param reward    Reward observed after taking the action.
   * @param bestNext  Best value reachable from the next state, if known.
   */
  value(oldValue: number | undefined, reward: number, bestNext: number | undefined): number;
}

/**
 * Decides after every completed training step whether training should stop.
 * Implementations may keep state across calls.
 */
export interface TerminationStrategy<TState> {
  /** Called with the agent's state after the step's update has been stored. */
  shouldStop(state: TState): boolean;
}

/**
 * One learned entry of the value table.
 */
export interface ActionValue<TAction> {
  action: TAction;
  value: number;
}

/**
 * A learned entry together with the state it belongs to.
 */
export interface LearnedValue<TState, TAction> extends ActionValue<TAction> {
  state: TState;
}

/**
 * Value used as the best next value when the next state has no legal actions.
 * Either a constant or a function of that terminal state.
 */
export type TerminalValue<TState> = number | ((state: TState) => number);

/**
 * Everything the trainer knows about a single completed step.
 */
export interface TrainingStep<TState, TAction> {
  /** Zero-based index of the step within the current `train` call. */
  index: number;
  /** Copy of the state the action was taken from. */
  state: TState;
  action: TAction;
  reward: number;
  /** The state the agent ended up in (live reference, do not keep). */
  nextState: TState;
  bestNext: number;
  oldValue: number | undefined;
  newValue: number;
}

/**
 * Reason codes reported when training ends.
 */
export type TerminationReason =
  | "TERMINATION_STRATEGY"
  | "NO_AVAILABLE_ACTION";

/**
 * Returned by `train()` and passed to {@link TrainerHooks.onTerminate}.
 */
export interface TrainingSummary {
  /** Number of value updates performed. */
  steps: number;
  reason: TerminationReason;
}

/**
 * Optional observability callbacks invoked synchronously during training.
 *
 * @template TState  - The state type.
 * @template TAction - The action type.
 */
export interface TrainerHooks<TState, TAction> {
  /** Called after every value update. */
  onStep?: (step: TrainingStep<TState, TAction>) => void;
  /** Called once when a `train` call ends. */
  onTerminate?: (summary: TrainingSummary) => void;
}

/**
 * Options accepted by the trainer.
 *
 * @template TState  - The state type.
 * @template TAction - The action type.
 */
export interface TrainerOptions<TState, TAction> {
  /** Best next value used when the next state is terminal. Defaults to `0`. */
  terminalValue?: TerminalValue<TState>;
  /** Optional observability callbacks. */
  hooks?: TrainerHooks<TState, TAction>;
}
