/***
 * State — Current application mode plus at most one pending transition.
 *
 * schedule_transition() only records intent. The app applies the pending
 * value once per tick, after every stage has run, as a full
 * exit(old) → flip → enter(new) sequence, including when new === old.
 * A later request in the same tick replaces an earlier one.
 *
 ***/

export type StateValue = string | number;

export enum STATE_EDGE {
  ENTER = "enter",
  EXIT = "exit",
}

export class State<S extends StateValue = StateValue> {
  private _current: S;
  private _pending: S | null = null;

  constructor(initial: S) {
    this._current = initial;
  }

  public get current(): S {
    return this._current;
  }

  public get pending(): S | null {
    return this._pending;
  }

  /** Record a transition for the end of the tick. Returns the request it replaced. */
  public schedule_transition(next: S): S | null {
    const replaced = this._pending;
    this._pending = next;
    return replaced;
  }

  /** @internal Hand the pending request to the app and clear it. */
  public _take_pending(): S | null {
    const next = this._pending;
    this._pending = null;
    return next;
  }

  /** @internal */
  public _set_current(next: S): void {
    this._current = next;
  }
}
