/***
 * Commands — Deferred structural changes queued by a system.
 *
 * Nothing here touches the store until apply(), which the app calls right
 * after the system that queued the commands returns. Commands are applied
 * in the order they were queued. spawn() hands out the entity ID at once
 * (reserved in the store), so later commands in the same system can
 * target it.
 *
 * Commands aimed at an entity that died before the flush are dropped.
 *
 ***/

import type { ComponentDef, ComponentEntry } from "./component";
import type { EntityID } from "./entity";
import type {
  DefaultResourceType,
  ResourceStore,
  ResourceType,
} from "./resource";
import type { Store } from "./store";

export type Command =
  | { k: "spawn"; entity: EntityID; entries: readonly ComponentEntry[] }
  | { k: "insert"; entity: EntityID; entries: readonly ComponentEntry[] }
  | { k: "remove"; entity: EntityID; def: ComponentDef }
  | { k: "despawn"; entity: EntityID }
  | { k: "insert_resource"; value: object }
  | { k: "init_resource"; type: DefaultResourceType }
  | { k: "remove_resource"; type: ResourceType };

export class Commands {
  private q: Command[] = [];

  constructor(private readonly store: Store) {}

  public spawn(...entries: ComponentEntry[]): EntityID {
    const entity = this.store.reserve_entity();
    this.q.push({ k: "spawn", entity, entries });
    return entity;
  }

  public insert<T>(entity: EntityID, def: ComponentDef<T>, value: T): void {
    this.q.push({ k: "insert", entity, entries: [{ def, value }] });
  }

  public remove(entity: EntityID, def: ComponentDef): void {
    this.q.push({ k: "remove", entity, def });
  }

  public despawn(entity: EntityID): void {
    this.q.push({ k: "despawn", entity });
  }

  public insert_resource(value: object): void {
    this.q.push({ k: "insert_resource", value });
  }

  public init_resource(type: DefaultResourceType): void {
    this.q.push({ k: "init_resource", type });
  }

  public remove_resource(type: ResourceType): void {
    this.q.push({ k: "remove_resource", type });
  }

  public get length(): number {
    return this.q.length;
  }

  /** Apply and drain every queued command. Returns how many were applied. */
  public apply(resources: ResourceStore): number {
    const queued = this.q;
    this.q = [];
    let applied = 0;
    for (const cmd of queued) {
      if (this.apply_one(cmd, resources)) applied++;
    }
    return applied;
  }

  private apply_one(cmd: Command, resources: ResourceStore): boolean {
    const store = this.store;
    switch (cmd.k) {
      case "spawn":
      case "insert":
        if (!store.is_alive(cmd.entity)) return false;
        store.insert_many(cmd.entity, cmd.entries);
        return true;
      case "remove":
        if (!store.is_alive(cmd.entity)) return false;
        return store.remove(cmd.entity, cmd.def);
      case "despawn":
        if (!store.is_alive(cmd.entity)) return false;
        store.despawn(cmd.entity);
        return true;
      case "insert_resource":
        resources.insert(cmd.value);
        return true;
      case "init_resource":
        resources.init(cmd.type);
        return true;
      case "remove_resource":
        return resources.remove(cmd.type);
    }
  }
}
