/***
 * SystemContext — The handle every system receives.
 *
 * Systems never reach app internals directly: resources, events, state and
 * entity changes all go through this object. Entity changes are deferred
 * into `commands` and applied by flush(), which the app calls after each
 * system returns, so the next system always sees them. Reads (get, has,
 * queries) see the store as of the last flush.
 *
 * Events and state requests are not deferred: emit() appends immediately
 * and schedule_transition() records intent immediately.
 *
 ***/

import { Commands } from "./commands";
import type { ComponentDef, ComponentEntry } from "./component";
import type { EntityID } from "./entity";
import type { EventRegistry, EventType, Events } from "./event";
import type {
  DefaultResourceType,
  ResourceStore,
  ResourceType,
} from "./resource";
import type { State, StateValue } from "./state";
import type { Store } from "./store";
import type { Logger } from "./utils/logger";
import { SCHEDULER_ERROR, SchedulerError } from "./utils/error";

export class SystemContext<S extends StateValue = StateValue> {
  readonly commands: Commands;
  private _state: State<S> | null = null;

  constructor(
    readonly world: Store,
    private readonly resources: ResourceStore,
    private readonly event_registry: EventRegistry,
    readonly log: Logger,
  ) {
    this.commands = new Commands(world);
  }

  // =======================================================
  // Resources
  // =======================================================

  resource<T extends object>(type: ResourceType<T>): T {
    return this.resources.get(type);
  }

  try_resource<T extends object>(type: ResourceType<T>): T | undefined {
    return this.resources.try_get(type);
  }

  has_resource(type: ResourceType): boolean {
    return this.resources.has(type);
  }

  /** Deferred: the value is stored when this system is flushed. */
  insert_resource(value: object): this {
    this.commands.insert_resource(value);
    return this;
  }

  /** Deferred: constructs the default when this system is flushed, if absent. */
  init_resource(type: DefaultResourceType): this {
    this.commands.init_resource(type);
    return this;
  }

  // =======================================================
  // Events
  // =======================================================

  emit<T extends object>(value: T): void {
    this.event_registry.emit(value);
  }

  read<T extends object>(type: EventType<T>): readonly T[] {
    return this.event_registry.read(type);
  }

  events<T extends object>(type: EventType<T>): Events<T> {
    return this.event_registry.get(type);
  }

  // =======================================================
  // State
  // =======================================================

  get state(): S {
    return this.require_state().current;
  }

  schedule_transition(next: S): void {
    const replaced = this.require_state().schedule_transition(next);
    if (replaced !== null) {
      this.log.debug("transition request replaced", { replaced, next });
    }
  }

  /** @internal Called once by build(), after the startup systems. */
  _install_state(state: State<S>): void {
    this._state = state;
  }

  private require_state(): State<S> {
    if (this._state === null) {
      throw new SchedulerError(
        SCHEDULER_ERROR.STATE_NOT_INITIALIZED,
        "State is not available to startup systems",
      );
    }
    return this._state;
  }

  // =======================================================
  // Entities
  // =======================================================

  spawn(...entries: ComponentEntry[]): EntityID {
    return this.commands.spawn(...entries);
  }

  insert<T>(entity: EntityID, def: ComponentDef<T>, value: T): this {
    this.commands.insert(entity, def, value);
    return this;
  }

  remove(entity: EntityID, def: ComponentDef): this {
    this.commands.remove(entity, def);
    return this;
  }

  despawn(entity: EntityID): this {
    this.commands.despawn(entity);
    return this;
  }

  get<T>(entity: EntityID, def: ComponentDef<T>): T | undefined {
    return this.world.get(entity, def);
  }

  has(entity: EntityID, def: ComponentDef): boolean {
    return this.world.has(entity, def);
  }

  /** Entities that lost `def` so far this tick. */
  removed(def: ComponentDef): readonly EntityID[] {
    return this.world.removed(def);
  }

  /** Apply every deferred change queued since the last flush. */
  flush(): void {
    this.commands.apply(this.resources);
  }
}
