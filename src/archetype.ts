/***
 * Archetype — Entities grouped by their exact set of component types.
 *
 * The mask holds one bit per ComponentID. Each component of the mask owns
 * one column (a plain array), and row i of every column belongs to
 * entities[i]. Rows stay packed: removing a row moves the last row into
 * the hole (swap-and-pop) and reports which entity moved, so the Store can
 * fix that entity's row index.
 *
 * Edges cache "add X" / "remove X" transitions to neighbouring archetypes,
 * so repeated structural changes resolve without re-hashing masks.
 *
 ***/

import {
  type Brand,
  type BitSet,
  is_non_negative_integer,
  unsafe_cast,
  validate_and_cast,
} from "type_primitives";
import type { ComponentDef, ComponentID } from "./component";
import type { EntityID } from "./entity";
import { SCHEDULER_ERROR, SchedulerError } from "./utils/error";

export type ArchetypeID = Brand<number, "archetype_id">;

export const as_archetype_id = (value: number) =>
  validate_and_cast<number, ArchetypeID>(
    value,
    is_non_negative_integer,
    "ArchetypeID must be a non-negative integer",
  );

export interface ArchetypeEdge {
  add: ArchetypeID | null;
  remove: ArchetypeID | null;
}

export class Archetype {
  readonly id: ArchetypeID;
  readonly mask: BitSet;
  readonly component_ids: readonly ComponentID[];

  private readonly _entities: EntityID[] = [];
  private readonly columns: Map<number, unknown[]> = new Map();
  private readonly edges: Map<number, ArchetypeEdge> = new Map();

  constructor(id: ArchetypeID, mask: BitSet, component_ids: ComponentID[]) {
    this.id = id;
    this.mask = mask;
    this.component_ids = component_ids;
    for (const cid of component_ids) this.columns.set(cid, []);
  }

  public get entity_count(): number {
    return this._entities.length;
  }

  public get entities(): readonly EntityID[] {
    return this._entities;
  }

  public has_component(id: ComponentID): boolean {
    return this.mask.has(id);
  }

  /** True if this archetype has every bit of `include` and none of `exclude`. */
  public matches(include: BitSet, exclude: BitSet | null): boolean {
    return (
      this.mask.contains(include) &&
      (exclude === null || !this.mask.overlaps(exclude))
    );
  }

  public get_column<T>(def: ComponentDef<T>): T[] {
    const column = this.columns.get(def);
    if (column === undefined) {
      throw new SchedulerError(
        SCHEDULER_ERROR.COMPONENT_NOT_REGISTERED,
        `Component ${def} not in archetype ${this.id}`,
      );
    }
    // type-erased storage: the column was created for exactly this def
    return unsafe_cast<T[]>(column);
  }

  public read<T>(row: number, def: ComponentDef<T>): T {
    return this.get_column(def)[row];
  }

  public write<T>(row: number, def: ComponentDef<T>, value: T): void {
    this.get_column(def)[row] = value;
  }

  /**
   * Append a row. `value_of` supplies the value of each component column,
   * in mask order. Returns the new row index.
   */
  public push_row(
    entity_id: EntityID,
    value_of: (component_id: ComponentID) => unknown,
  ): number {
    const row = this._entities.length;
    this._entities.push(entity_id);
    for (const cid of this.component_ids) {
      this.raw_column(cid).push(value_of(cid));
    }
    return row;
  }

  /**
   * Swap-and-pop a row. Returns the entity that now occupies `row`, or null
   * if the removed row was the last one.
   */
  public remove_row(row: number): EntityID | null {
    const last = this._entities.length - 1;
    let moved: EntityID | null = null;
    if (row !== last) {
      moved = this._entities[last];
      this._entities[row] = moved;
      for (const column of this.columns.values()) column[row] = column[last];
    }
    this._entities.pop();
    for (const column of this.columns.values()) column.pop();
    return moved;
  }

  /** Value of component `cid` at `row`, untyped (used when moving rows). */
  public raw_value(row: number, cid: ComponentID): unknown {
    return this.raw_column(cid)[row];
  }

  public get_edge(component_id: ComponentID): ArchetypeEdge | undefined {
    return this.edges.get(component_id);
  }

  public set_edge(component_id: ComponentID, edge: ArchetypeEdge): void {
    this.edges.set(component_id, edge);
  }

  private raw_column(cid: ComponentID): unknown[] {
    const column = this.columns.get(cid);
    if (column === undefined) {
      throw new SchedulerError(
        SCHEDULER_ERROR.ARCHETYPE_NOT_FOUND,
        `Archetype ${this.id} has no column for component ${cid}`,
      );
    }
    return column;
  }
}
