/***
 * Query — Cached, incrementally extended view over matching archetypes.
 *
 * A Query does not scan the store. It starts empty and is told about
 * archetypes one at a time (_on_new_archetype), keeping the ones whose
 * mask has every `with` component and no `without` component. The app
 * forwards each newly observed archetype to the queries a system declares
 * in its SystemConfig, so matching costs O(new archetypes) per tick rather
 * than O(entities).
 *
 * Usage (inside a system):
 *
 *   const movers = Query.with(Position, Velocity).without(Frozen);
 *
 *   builder.add_system({
 *     queries: [movers],
 *     fn(ctx) {
 *       movers.each((entity, pos, vel) => {
 *         pos.x += vel.x;
 *       });
 *     },
 *   });
 *
 ***/

import type { Archetype } from "./archetype";
import type { ComponentDef } from "./component";
import type { EntityID } from "./entity";
import { BitSet } from "type_primitives";

// [ComponentDef<Pos>, ComponentDef<Vel>] → [Pos, Vel]
type DefsToValues<Defs extends readonly ComponentDef[]> = {
  [K in keyof Defs]: Defs[K] extends ComponentDef<infer T> ? T : never;
};

type EachFn<Defs extends readonly ComponentDef[]> = (
  entity: EntityID,
  ...values: DefsToValues<Defs>
) => void;

export class Query<Defs extends readonly ComponentDef[] = readonly ComponentDef[]> {
  readonly defs: Defs;
  readonly excluded: readonly ComponentDef[];
  private readonly _include: BitSet;
  private readonly _exclude: BitSet | null;
  private readonly _archetypes: Archetype[] = [];
  // ArchetypeIDs already offered; one query may be declared by several systems
  private readonly _seen: Set<number> = new Set();
  // Reused for every each() call: [entity, value0, value1, ...]
  private readonly _args_buf: unknown[];

  constructor(defs: Defs, exclude: readonly ComponentDef[] = []) {
    this.defs = defs;
    this.excluded = exclude;
    this._include = BitSet.of(defs);
    this._exclude = exclude.length > 0 ? BitSet.of(exclude) : null;
    this._args_buf = new Array<unknown>(defs.length + 1);
  }

  static with<D extends readonly ComponentDef[]>(...defs: D): Query<D> {
    return new Query(defs);
  }

  /** A new, empty query that also rejects archetypes holding any of `defs`. */
  without(...defs: ComponentDef[]): Query<Defs> {
    return new Query(this.defs, [...this.excluded, ...defs]);
  }

  matches(archetype: Archetype): boolean {
    return archetype.matches(this._include, this._exclude);
  }

  /**
   * Returns true if the archetype was added to the match list. An archetype
   * offered a second time is ignored.
   */
  _on_new_archetype(archetype: Archetype): boolean {
    if (this._seen.has(archetype.id)) return false;
    this._seen.add(archetype.id);
    if (!this.matches(archetype)) return false;
    this._archetypes.push(archetype);
    return true;
  }

  /** Forget every match and re-match against `archetypes`. */
  _rebuild(archetypes: readonly Archetype[]): void {
    this._archetypes.length = 0;
    this._seen.clear();
    for (const archetype of archetypes) this._on_new_archetype(archetype);
  }

  /** Matching archetypes, including empty ones. */
  get archetypes(): readonly Archetype[] {
    return this._archetypes;
  }

  /** Total entity count across all matching archetypes. */
  count(): number {
    let total = 0;
    for (const archetype of this._archetypes) total += archetype.entity_count;
    return total;
  }

  /** Iterate non-empty matching archetypes. */
  *[Symbol.iterator](): Iterator<Archetype> {
    for (const archetype of this._archetypes) {
      if (archetype.entity_count > 0) yield archetype;
    }
  }

  /** Calls fn once per matching entity with the queried component values. */
  each(fn: EachFn<Defs>): void {
    const defs = this.defs;
    const buf = this._args_buf;
    for (const archetype of this._archetypes) {
      const count = archetype.entity_count;
      if (count === 0) continue;
      const columns = defs.map((def) => archetype.get_column(def));
      const entities = archetype.entities;
      for (let row = 0; row < count; row++) {
        buf[0] = entities[row];
        for (let i = 0; i < columns.length; i++) buf[i + 1] = columns[i][row];
        (fn as (...a: unknown[]) => void).apply(null, buf);
      }
    }
  }
}
