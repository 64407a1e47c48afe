/***
 * App — A built, frozen schedule plus everything it runs against.
 *
 * The host drives it by calling tick() from its own loop (or a Runner).
 * One tick:
 *
 *   1. snapshot the current state
 *   2. sweep the stage systems in order, flushing after each one
 *   3. notify every system of archetypes it has not seen
 *   4. clear per-tick store trackers
 *   5. apply at most one pending state transition
 *
 * Everything is synchronous. Errors thrown by systems are not caught.
 *
 ***/

import type { EventRegistry, EventType } from "./event";
import type { Executor } from "./executor";
import { AppControl } from "./exit";
import type { ResourceStore, ResourceType } from "./resource";
import type { Schedule } from "./schedule";
import { STATE_EDGE, type State, type StateValue } from "./state";
import type { Store } from "./store";
import type { Logger } from "./utils/logger";

export class App<S extends StateValue = StateValue> {
  private _tick_count = 0;

  constructor(
    readonly world: Store,
    private readonly schedule: Schedule<S>,
    private readonly executor: Executor<S>,
    private readonly resources: ResourceStore,
    private readonly event_registry: EventRegistry,
    private readonly _state: State<S>,
    readonly log: Logger,
  ) {}

  public tick(): void {
    const current = this._state.current;

    this.executor.run_sweep(current);
    this.executor.notify_new_archetypes();
    this.world.clear_trackers();
    this.apply_transition();

    this._tick_count++;
  }

  private apply_transition(): void {
    // Taken before the listeners run: requests they make wait a tick
    const next = this._state._take_pending();
    if (next === null) return;

    const previous = this._state.current;
    this.executor.run_listeners(STATE_EDGE.EXIT, previous);
    this._state._set_current(next);
    this.executor.run_listeners(STATE_EDGE.ENTER, next);

    this.log.info("state transition", {
      from: previous,
      to: next,
      tick: this._tick_count,
    });
  }

  public get tick_count(): number {
    return this._tick_count;
  }

  public get system_count(): number {
    return this.schedule.count;
  }

  // =======================================================
  // State
  // =======================================================

  public get state(): S {
    return this._state.current;
  }

  public get pending_state(): S | null {
    return this._state.pending;
  }

  public schedule_transition(next: S): void {
    const replaced = this._state.schedule_transition(next);
    if (replaced !== null) {
      this.log.debug("transition request replaced", { replaced, next });
    }
  }

  // =======================================================
  // Resources (immediate, between ticks)
  // =======================================================

  public resource<T extends object>(type: ResourceType<T>): T {
    return this.resources.get(type);
  }

  public try_resource<T extends object>(type: ResourceType<T>): T | undefined {
    return this.resources.try_get(type);
  }

  public has_resource(type: ResourceType): boolean {
    return this.resources.has(type);
  }

  public insert_resource(value: object): this {
    this.resources.insert(value);
    return this;
  }

  // =======================================================
  // Events
  // =======================================================

  /** Visible to the systems of the next tick, until its EVENT_RESET. */
  public emit_event(value: object): void {
    this.event_registry.emit(value);
  }

  public read_events<T extends object>(type: EventType<T>): readonly T[] {
    return this.event_registry.read(type);
  }

  // =======================================================
  // Lifecycle
  // =======================================================

  public get exit_requested(): boolean {
    return this.resources.try_get(AppControl)?.exit_requested ?? false;
  }

  /** Run every system's dispose hook, in registration order, then drop resources and events. */
  public dispose(): void {
    for (const system of this.schedule.all) system.dispose?.();
    this.event_registry.clear_all();
    this.resources.clear();
    this.log.debug("app disposed", { ticks: this._tick_count });
  }
}
