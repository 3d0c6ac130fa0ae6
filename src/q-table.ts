import type {
  Action,
  ActionValue,
  ActionValueLookup,
  LearnedValue,
  State,
} from "./types";

/** Learned values of a single state, keyed by action hash. */
interface StateRow<TState, TAction> {
  state: TState;
  values: Map<string, ActionValue<TAction>>;
}

/**
 * Sparse action-value table keyed by the user's `hash()` contract.
 *
 * Rows are created lazily on the first write for a state and are never
 * evicted. Each row keeps a clone of its state so the table can be listed
 * after the agent has moved on.
 *
 * @template TState  - The state type.
 * @template TAction - The action type.
 *
 * @example
 * ```ts
 * const table = new QTable<Cell, Move>();
 * table.set(cell, up, 1.5);
 * table.get(cell, up); // 1.5
 * table.get(cell, down); // undefined
 * ```
 */
export class QTable<TState extends State<TState, TAction>, TAction extends Action>
  implements ActionValueLookup<TState, TAction>
{
  private readonly _rows = new Map<string, StateRow<TState, TAction>>();

  /** Number of (state, action) pairs with a stored value. */
  get size(): number {
    let total = 0;
    for (const row of this._rows.values()) {
      total += row.values.size;
    }
    return total;
  }

  /**
   * @returns The stored value, or `undefined` when the pair was never set.
   */
  get(state: TState, action: TAction): number | undefined {
    return this._rows.get(state.hash())?.values.get(action.hash())?.value;
  }

  /**
   * Inserts or overwrites the value of a pair.
   *
   * @returns `this` for fluent chaining.
   */
  set(state: TState, action: TAction, value: number): this {
    const key = state.hash();
    let row = this._rows.get(key);
    if (row === undefined) {
      row = { state: state.clone(), values: new Map() };
      this._rows.set(key, row);
    }
    row.values.set(action.hash(), { action, value });
    return this;
  }

  /**
   * Every learned value of `state`, in insertion order.
   *
   * @returns The entries, or `undefined` when nothing was learned for the state.
   */
  valuesFor(state: TState): ReadonlyArray<ActionValue<TAction>> | undefined {
    const row = this._rows.get(state.hash());
    if (row === undefined) return undefined;
    return [...row.values.values()].map((entry) => ({ ...entry }));
  }

  /** Snapshot of every entry. States are cloned. */
  entries(): LearnedValue<TState, TAction>[] {
    const result: LearnedValue<TState, TAction>[] = [];
    for (const row of this._rows.values()) {
      for (const { action, value } of row.values.values()) {
        result.push({ state: row.state.clone(), action, value });
      }
    }
    return result;
  }

  /** Removes every entry. */
  clear(): void {
    this._rows.clear();
  }
}
