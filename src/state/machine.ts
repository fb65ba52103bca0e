import { IllegalTransitionError, ValidationError } from "../errors.js";

export type TransitionMap<S extends string> = Readonly<Record<S, readonly S[]>>;

/** State definition in contract-file form: each state lists where it may go. */
export type StateDefinition<S extends string> = Readonly<
  Record<S, { description?: string; allowedTransitions: readonly S[] }>
>;

// Object.entries widens record keys to string; the records here are keyed by S.
function entriesOf<K extends string, V>(record: Readonly<Record<K, V>>): Array<[K, V]> {
  return Object.entries(record) as Array<[K, V]>;
}

/**
 * Static transition table. All lookups are pure; the table never changes
 * after construction.
 */
export class TransitionTable<S extends string> {
  private readonly table = new Map<S, ReadonlySet<S>>();

  constructor(transitions: TransitionMap<S>) {
    for (const [from, targets] of entriesOf(transitions)) {
      this.table.set(from, new Set(targets));
    }
    for (const [from, targets] of this.table) {
      for (const to of targets) {
        if (!this.table.has(to)) {
          throw new ValidationError("VALIDATION_FAILED", `State "${from}" allows transition to unknown state "${to}"`);
        }
      }
    }
  }

  static fromDefinition<S extends string>(definition: StateDefinition<S>): TransitionTable<S> {
    const transitions = Object.fromEntries(
      entriesOf(definition).map(([state, entry]) => [state, entry.allowedTransitions]),
    ) as TransitionMap<S>;
    return new TransitionTable(transitions);
  }

  states(): S[] {
    return [...this.table.keys()];
  }

  has(state: string): state is S {
    return this.states().some((s) => s === state);
  }

  targets(state: S): S[] {
    return [...(this.table.get(state) ?? [])];
  }

  isTerminal(state: S): boolean {
    return (this.table.get(state)?.size ?? 0) === 0;
  }

  canTransition(current: S, target: S): boolean {
    return this.table.get(current)?.has(target) ?? false;
  }

  /** Returns `target`, or throws `IllegalTransitionError` when the table forbids the move. */
  transition(current: S, target: S): S {
    if (!this.canTransition(current, target)) {
      throw new IllegalTransitionError(current, target);
    }
    return target;
  }
}

export type TransitionRecord<S extends string> = { from: S; to: S };

/** A single mutable cursor over a transition table. */
export class StateMachine<S extends string> {
  readonly table: TransitionTable<S>;
  private current: S;
  private readonly moves: TransitionRecord<S>[] = [];

  constructor(table: TransitionTable<S>, initialState: S) {
    if (!table.has(initialState)) {
      throw new ValidationError("VALIDATION_FAILED", `Initial state ${initialState} not in states`);
    }
    this.table = table;
    this.current = initialState;
  }

  get state(): S {
    return this.current;
  }

  get history(): readonly TransitionRecord<S>[] {
    return this.moves;
  }

  can(target: S): boolean {
    return this.table.canTransition(this.current, target);
  }

  transition(target: S): S {
    const from = this.current;
    this.current = this.table.transition(from, target);
    this.moves.push({ from, to: target });
    return this.current;
  }
}
