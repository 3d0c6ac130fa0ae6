import type { Action, Agent, State } from "../../types";

// ── Deterministic chain 0 → 1 → … → last; only the last position pays 1 ────

export class Advance implements Action {
  hash(): string {
    return "advance";
  }
}

export const ADVANCE = new Advance();

export class Position implements State<Position, Advance> {
  constructor(
    readonly index: number,
    readonly length: number
  ) {}

  hash(): string {
    return String(this.index);
  }

  actions(): ReadonlyArray<Advance> {
    return this.index < this.length - 1 ? [ADVANCE] : [];
  }

  clone(): Position {
    return new Position(this.index, this.length);
  }
}

export class ChainAgent implements Agent<Position, Advance> {
  private state: Position;

  constructor(length: number, start = 0) {
    this.state = new Position(start, length);
  }

  currentState(): Position {
    return this.state;
  }

  takeAction(_action: Advance): void {
    this.state = new Position(this.state.index + 1, this.state.length);
  }

  reward(): number {
    return this.state.index === this.state.length - 1 ? 1 : 0;
  }
}

// ── Counter mutated in place by its agent ───────────────────────────────────

export class Increment implements Action {
  hash(): string {
    return "increment";
  }
}

export const INCREMENT = new Increment();

export class Counter implements State<Counter, Increment> {
  constructor(public value: number) {}

  hash(): string {
    return String(this.value);
  }

  actions(): ReadonlyArray<Increment> {
    return [INCREMENT];
  }

  clone(): Counter {
    return new Counter(this.value);
  }
}

export class CounterAgent implements Agent<Counter, Increment> {
  readonly state = new Counter(0);

  currentState(): Counter {
    return this.state;
  }

  takeAction(_action: Increment): void {
    this.state.value += 1;
  }

  reward(): number {
    return this.state.value;
  }
}
