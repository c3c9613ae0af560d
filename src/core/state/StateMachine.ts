export type StateKey = string;

export type TransitionMap<S extends StateKey> = Partial<Record<S, readonly S[]>>;

export interface StateMachineHooks<S extends StateKey> {
  onEnter?: Partial<Record<S, () => void>>;
  onExit?: Partial<Record<S, () => void>>;
  onChange?: (prev: S, next: S) => void;
}

export class StateMachine<S extends StateKey> {
  private readonly allowed: TransitionMap<S>;
  private readonly hooks: StateMachineHooks<S>;
  private _state: S;

  constructor(initial: S, allowed: TransitionMap<S>, hooks: StateMachineHooks<S> = {}) {
    this._state = initial;
    this.allowed = allowed;
    this.hooks = hooks;
  }

  get state(): S {
    return this._state;
  }

  can(next: S): boolean {
    if (next === this._state) return true;
    const list = this.allowed[this._state];
    return !!list && list.includes(next);
  }

  /**
   * Moves to `next` when the map allows it. Returns false (and stays put)
   * for a disallowed move; re-entering the current state is a no-op.
   */
  set(next: S): boolean {
    if (!this.can(next)) return false;
    if (next === this._state) return true;
    const prev = this._state;
    this.hooks.onExit?.[prev]?.();
    this._state = next;
    this.hooks.onChange?.(prev, next);
    this.hooks.onEnter?.[next]?.();
    return true;
  }
}
