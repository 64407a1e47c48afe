/***
 * Store — Entity and component storage the scheduler is built on.
 *
 * Owns entity ID allocation, the component registry, the archetype graph
 * and the entity → (archetype, row) mapping. Systems reach it through
 * SystemContext; structural changes made from systems go through the
 * command buffer and land here when the system is flushed.
 *
 * Every distinct component combination observed gets one Archetype, in
 * creation order. archetype_generation is the number created so far, so
 * archetypes_since(g) is exactly what a consumer that stopped at g has not
 * seen yet.
 *
 * Per-tick bookkeeping (clear_trackers) drops the "removed component"
 * lists and advances the change tick.
 *
 ***/

import {
  get_entity_index,
  get_entity_generation,
  create_entity_id,
  MAX_GENERATION,
  type EntityID,
} from "./entity";
import {
  ComponentRegistry,
  as_component_id,
  type ComponentDef,
  type ComponentEntry,
  type ComponentID,
} from "./component";
import { Archetype, as_archetype_id, type ArchetypeID } from "./archetype";
import { BitSet } from "type_primitives";
import { SCHEDULER_ERROR, SchedulerError } from "./utils/error";
import { bucket_push } from "./utils/arrays";
import {
  INITIAL_CHANGE_TICK,
  INITIAL_GENERATION,
  UNASSIGNED,
} from "./utils/constants";

export class Store {
  readonly components = new ComponentRegistry();

  // --- Entity ID management ---
  // entity_generations[index] is the live generation of that slot;
  // freed slots are recycled through a stack.
  private entity_generations: number[] = [];
  private entity_high_water = 0;
  private entity_free_indices: number[] = [];
  private entity_alive_count = 0;

  // --- Archetypes ---
  private archetypes: Archetype[] = [];
  // BitSet.hash() → ArchetypeIDs with that hash
  private archetype_map: Map<number, ArchetypeID[]> = new Map();
  private readonly empty_archetype_id: ArchetypeID;

  // entity_index → ArchetypeID, UNASSIGNED while reserved but not placed
  private entity_archetype: number[] = [];
  private entity_row: number[] = [];

  // --- Trackers (reset once per tick) ---
  private removed_components: Map<number, EntityID[]> = new Map();
  private _change_tick = INITIAL_CHANGE_TICK;

  constructor() {
    this.empty_archetype_id = this.arch_get_or_create(new BitSet());
  }

  public register_component<T>(name: string): ComponentDef<T> {
    return this.components.register<T>(name);
  }

  // =======================================================
  // Archetype graph
  // =======================================================

  public get archetype_generation(): number {
    return this.archetypes.length;
  }

  /** Archetypes created after `generation`, oldest first. */
  public archetypes_since(generation: number): readonly Archetype[] {
    return this.archetypes.slice(generation);
  }

  public get all_archetypes(): readonly Archetype[] {
    return this.archetypes;
  }

  public get_archetype(id: ArchetypeID): Archetype {
    const archetype = this.archetypes[id];
    if (archetype === undefined) {
      throw new SchedulerError(
        SCHEDULER_ERROR.ARCHETYPE_NOT_FOUND,
        `Archetype with ID ${id} not found`,
      );
    }
    return archetype;
  }

  private arch_get_or_create(mask: BitSet): ArchetypeID {
    const hash = mask.hash();
    const bucket = this.archetype_map.get(hash);
    if (bucket !== undefined) {
      for (let i = 0; i < bucket.length; i++) {
        if (this.archetypes[bucket[i]].mask.equals(mask)) return bucket[i];
      }
    }

    const id = as_archetype_id(this.archetypes.length);
    const archetype = new Archetype(
      id,
      mask,
      mask.to_array().map(as_component_id),
    );
    this.archetypes.push(archetype);
    bucket_push(this.archetype_map, hash, id);
    return id;
  }

  private arch_resolve_add(
    archetype_id: ArchetypeID,
    component_id: ComponentID,
  ): ArchetypeID {
    const current = this.get_archetype(archetype_id);
    if (current.has_component(component_id)) return archetype_id;
    const edge = current.get_edge(component_id);
    if (edge?.add != null) return edge.add;
    const target_id = this.arch_get_or_create(current.mask.with(component_id));
    this.arch_cache_edge(current, this.get_archetype(target_id), component_id);
    return target_id;
  }

  private arch_resolve_remove(
    archetype_id: ArchetypeID,
    component_id: ComponentID,
  ): ArchetypeID {
    const current = this.get_archetype(archetype_id);
    if (!current.has_component(component_id)) return archetype_id;
    const edge = current.get_edge(component_id);
    if (edge?.remove != null) return edge.remove;
    const target_id = this.arch_get_or_create(
      current.mask.without(component_id),
    );
    this.arch_cache_edge(this.get_archetype(target_id), current, component_id);
    return target_id;
  }

  /** `to` is `from` plus component_id. */
  private arch_cache_edge(
    from: Archetype,
    to: Archetype,
    component_id: ComponentID,
  ): void {
    const from_edge = from.get_edge(component_id) ?? { add: null, remove: null };
    from_edge.add = to.id;
    from.set_edge(component_id, from_edge);

    const to_edge = to.get_edge(component_id) ?? { add: null, remove: null };
    to_edge.remove = from.id;
    to.set_edge(component_id, to_edge);
  }

  // =======================================================
  // Entity lifecycle
  // =======================================================

  /**
   * Allocate a live ID without placing it in any archetype. Used by the
   * command buffer so spawn() can hand out an ID before the flush.
   */
  public reserve_entity(): EntityID {
    let index: number;
    let generation: number;

    const recycled = this.entity_free_indices.pop();
    if (recycled !== undefined) {
      index = recycled;
      generation = this.entity_generations[index];
    } else {
      index = this.entity_high_water++;
      generation = INITIAL_GENERATION;
      this.entity_generations[index] = generation;
    }

    this.entity_alive_count++;
    this.entity_archetype[index] = UNASSIGNED;
    this.entity_row[index] = UNASSIGNED;
    return create_entity_id(index, generation);
  }

  public spawn(entries: readonly ComponentEntry[] = []): EntityID {
    const id = this.reserve_entity();
    this.insert_many(id, entries);
    return id;
  }

  public despawn(id: EntityID): void {
    this.assert_alive(id);
    const index = get_entity_index(id);
    const arch_id = this.entity_archetype[index];

    if (arch_id !== UNASSIGNED) {
      const arch = this.get_archetype(as_archetype_id(arch_id));
      for (const cid of arch.component_ids) this.track_removed(cid, id);
      this.detach(arch, this.entity_row[index]);
    }

    this.entity_archetype[index] = UNASSIGNED;
    this.entity_row[index] = UNASSIGNED;

    // Bump generation so stale IDs for this slot read as dead
    const generation = get_entity_generation(id);
    this.entity_generations[index] = (generation + 1) & MAX_GENERATION;
    this.entity_free_indices.push(index);
    this.entity_alive_count--;
  }

  public is_alive(id: EntityID): boolean {
    const index = get_entity_index(id);
    return (
      index < this.entity_high_water &&
      this.entity_generations[index] === get_entity_generation(id)
    );
  }

  public get entity_count(): number {
    return this.entity_alive_count;
  }

  // =======================================================
  // Components
  // =======================================================

  public insert<T>(id: EntityID, def: ComponentDef<T>, value: T): void {
    this.insert_many(id, [{ def, value }]);
  }

  /**
   * Add (or overwrite) several components with a single archetype move.
   * A reserved entity is placed by its first insert, even an empty one.
   */
  public insert_many(id: EntityID, entries: readonly ComponentEntry[]): void {
    this.assert_alive(id);
    const index = get_entity_index(id);
    const src_id = this.entity_archetype[index];
    const src =
      src_id === UNASSIGNED
        ? null
        : this.get_archetype(as_archetype_id(src_id));
    const src_row = this.entity_row[index];

    let target_id = src === null ? this.empty_archetype_id : src.id;
    const incoming = new Map<number, unknown>();
    for (const entry of entries) {
      if (__DEV__ && !this.components.has(entry.def)) {
        throw new SchedulerError(
          SCHEDULER_ERROR.COMPONENT_NOT_REGISTERED,
          `Component ${entry.def} is not registered`,
        );
      }
      target_id = this.arch_resolve_add(target_id, entry.def);
      incoming.set(entry.def, entry.value);
    }
    const target = this.get_archetype(target_id);

    if (src === target) {
      for (const entry of entries) target.write(src_row, entry.def, entry.value);
      return;
    }

    const row = target.push_row(id, (cid) =>
      src === null || incoming.has(cid)
        ? incoming.get(cid)
        : src.raw_value(src_row, cid),
    );
    if (src !== null) this.detach(src, src_row);
    this.entity_archetype[index] = target.id;
    this.entity_row[index] = row;
  }

  /** Returns false if the entity did not have the component. */
  public remove(id: EntityID, def: ComponentDef): boolean {
    this.assert_alive(id);
    const index = get_entity_index(id);
    const src_id = this.entity_archetype[index];
    if (src_id === UNASSIGNED) return false;

    const src = this.get_archetype(as_archetype_id(src_id));
    if (!src.has_component(def)) return false;

    const src_row = this.entity_row[index];
    const target = this.get_archetype(this.arch_resolve_remove(src.id, def));
    const row = target.push_row(id, (cid) => src.raw_value(src_row, cid));
    this.detach(src, src_row);
    this.entity_archetype[index] = target.id;
    this.entity_row[index] = row;
    this.track_removed(def, id);
    return true;
  }

  public get<T>(id: EntityID, def: ComponentDef<T>): T | undefined {
    const arch = this.archetype_of(id);
    if (arch === null || !arch.has_component(def)) return undefined;
    return arch.read(this.entity_row[get_entity_index(id)], def);
  }

  public has(id: EntityID, def: ComponentDef): boolean {
    const arch = this.archetype_of(id);
    return arch !== null && arch.has_component(def);
  }

  /** The entity's archetype, or null if it is dead or not yet placed. */
  public archetype_of(id: EntityID): Archetype | null {
    if (!this.is_alive(id)) return null;
    const arch_id = this.entity_archetype[get_entity_index(id)];
    return arch_id === UNASSIGNED
      ? null
      : this.get_archetype(as_archetype_id(arch_id));
  }

  // =======================================================
  // Trackers
  // =======================================================

  /** Entities that lost `def` (by removal or despawn) during this tick. */
  public removed(def: ComponentDef): readonly EntityID[] {
    return this.removed_components.get(def) ?? [];
  }

  public get change_tick(): number {
    return this._change_tick;
  }

  public clear_trackers(): void {
    this.removed_components.clear();
    this._change_tick++;
  }

  private track_removed(cid: ComponentID, id: EntityID): void {
    bucket_push(this.removed_components, cid, id);
  }

  private detach(arch: Archetype, row: number): void {
    const moved = arch.remove_row(row);
    if (moved !== null) this.entity_row[get_entity_index(moved)] = row;
  }

  private assert_alive(id: EntityID): void {
    if (!this.is_alive(id)) {
      throw new SchedulerError(
        SCHEDULER_ERROR.ENTITY_NOT_ALIVE,
        `Entity ${id} is not alive`,
      );
    }
  }
}
