/***
 * Executor — Runs one system at a time against the shared context.
 *
 * Running a system means: bring its queries up to date, call it, flush
 * the commands it queued. The flush happens before the next system starts,
 * so every system sees the structural effects of all systems before it.
 *
 * Archetype tracking keeps, per system, the archetype generation it has
 * been told about. A system is caught up right before it runs and again in
 * the end-of-tick pass, so it hears about each archetype exactly once.
 * With tracking off, queries are rebuilt from every archetype before each
 * run and on_new_archetype is never called.
 *
 ***/

import type { SystemContext } from "./context";
import type { Schedule } from "./schedule";
import type { STATE_EDGE, StateValue } from "./state";
import type { Store } from "./store";
import { runs_in_sweep, type SystemDescriptor } from "./system";
import { INITIAL_ARCHETYPE_GENERATION } from "./utils/constants";

export class Executor<S extends StateValue> {
  // SystemID → archetype generation the system has been notified up to
  private readonly seen_generation: number[] = [];

  constructor(
    private readonly schedule: Schedule<S>,
    readonly ctx: SystemContext<S>,
    private readonly store: Store,
    private readonly track_archetypes: boolean,
  ) {}

  public run(system: SystemDescriptor<S>): void {
    this.prepare(system);
    system.fn(this.ctx);
    this.ctx.flush();
  }

  public run_all(systems: readonly SystemDescriptor<S>[]): void {
    for (const system of systems) this.run(system);
  }

  /** One pass over the stage systems, filtered by the state snapshot `current`. */
  public run_sweep(current: S): void {
    for (const system of this.schedule.sweep) {
      if (runs_in_sweep(system.kind, current)) this.run(system);
    }
  }

  public run_listeners(edge: STATE_EDGE, state: S): void {
    this.run_all(this.schedule.listeners(edge, state));
  }

  /**
   * Notify every registered system about archetypes it has not seen yet.
   * Returns the number of systems that were behind.
   */
  public notify_new_archetypes(): number {
    if (!this.track_archetypes) return 0;
    let notified = 0;
    for (const system of this.schedule.all) {
      if (this.catch_up(system)) notified++;
    }
    return notified;
  }

  public seen_by(system: SystemDescriptor<S>): number {
    return this.seen_generation[system.id] ?? INITIAL_ARCHETYPE_GENERATION;
  }

  private prepare(system: SystemDescriptor<S>): void {
    if (this.track_archetypes) {
      this.catch_up(system);
      return;
    }
    for (const query of system.queries ?? []) {
      query._rebuild(this.store.all_archetypes);
    }
  }

  private catch_up(system: SystemDescriptor<S>): boolean {
    const seen = this.seen_by(system);
    const generation = this.store.archetype_generation;
    if (seen === generation) return false;

    for (const archetype of this.store.archetypes_since(seen)) {
      for (const query of system.queries ?? []) {
        query._on_new_archetype(archetype);
      }
      system.on_new_archetype?.(archetype);
    }
    this.seen_generation[system.id] = generation;
    return true;
  }
}
