import { describe, expect, it } from "vitest";
import { component } from "../component";
import { get_entity_index } from "../entity";
import { Store } from "../store";
import { SCHEDULER_ERROR, SchedulerError } from "../utils/error";

function make_store() {
  const store = new Store();
  const Position = store.register_component<{ x: number; y: number }>("Position");
  const Velocity = store.register_component<{ x: number; y: number }>("Velocity");
  const Health = store.register_component<number>("Health");
  return { store, Position, Velocity, Health };
}

describe("Store", () => {
  //=========================================================
  // Components
  //=========================================================

  it("register_component hands out distinct defs with names", () => {
    const { store, Position, Health } = make_store();
    expect(Position).not.toBe(Health);
    expect(store.components.name_of(Health)).toBe("Health");
    expect(store.components.count).toBe(3);
  });

  it("name_of an unknown id is fatal", () => {
    const { store } = make_store();
    const other = new Store();
    for (let i = 0; i < 4; i++) other.register_component(`c${i}`);
    const Foreign = other.register_component<number>("Foreign");
    expect(() => store.components.name_of(Foreign)).toThrow(
      "Component 4 is not registered",
    );
  });

  //=========================================================
  // Spawn / get / has
  //=========================================================

  it("spawn stores every component value", () => {
    const { store, Position, Health } = make_store();
    const e = store.spawn([
      component(Position, { x: 1, y: 2 }),
      component(Health, 10),
    ]);

    expect(store.is_alive(e)).toBe(true);
    expect(store.get(e, Position)).toEqual({ x: 1, y: 2 });
    expect(store.get(e, Health)).toBe(10);
    expect(store.has(e, Position)).toBe(true);
    expect(store.entity_count).toBe(1);
  });

  it("get returns undefined for a component the entity lacks", () => {
    const { store, Position, Velocity } = make_store();
    const e = store.spawn([component(Position, { x: 0, y: 0 })]);
    expect(store.get(e, Velocity)).toBeUndefined();
    expect(store.has(e, Velocity)).toBe(false);
  });

  it("inserting an unregistered component is fatal", () => {
    const { store } = make_store();
    const other = new Store();
    for (let i = 0; i < 3; i++) other.register_component(`c${i}`);
    const Foreign = other.register_component<number>("Foreign");

    const e = store.spawn();
    try {
      store.insert(e, Foreign, 1);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(SchedulerError);
      expect((err as SchedulerError).category).toBe(
        SCHEDULER_ERROR.COMPONENT_NOT_REGISTERED,
      );
    }
  });

  //=========================================================
  // Archetype moves
  //=========================================================

  it("starts with only the empty archetype", () => {
    const { store } = make_store();
    expect(store.archetype_generation).toBe(1);
    expect(store.all_archetypes[0].component_ids).toEqual([]);
  });

  it("reuses the archetype of an existing component set", () => {
    const { store, Position, Velocity } = make_store();
    store.spawn([component(Position, { x: 0, y: 0 }), component(Velocity, { x: 1, y: 1 })]);
    const generation = store.archetype_generation;

    store.spawn([component(Position, { x: 3, y: 3 }), component(Velocity, { x: 2, y: 2 })]);
    expect(store.archetype_generation).toBe(generation);
  });

  it("archetypes_since returns only archetypes created after a generation", () => {
    const { store, Position, Health } = make_store();
    const before = store.archetype_generation;
    store.spawn([component(Health, 1)]);
    store.spawn([component(Position, { x: 0, y: 0 })]);

    const fresh = store.archetypes_since(before);
    expect(fresh.map((a) => a.component_ids)).toEqual([[Health], [Position]]);
  });

  it("insert moves the entity and keeps its other values", () => {
    const { store, Position, Velocity } = make_store();
    const e = store.spawn([component(Position, { x: 5, y: 6 })]);
    store.insert(e, Velocity, { x: 1, y: 0 });

    expect(store.archetype_of(e)?.component_ids).toEqual([Position, Velocity]);
    expect(store.get(e, Position)).toEqual({ x: 5, y: 6 });
    expect(store.get(e, Velocity)).toEqual({ x: 1, y: 0 });
  });

  it("insert of a present component overwrites in place", () => {
    const { store, Health } = make_store();
    const e = store.spawn([component(Health, 3)]);
    const arch = store.archetype_of(e);
    store.insert(e, Health, 9);

    expect(store.archetype_of(e)).toBe(arch);
    expect(store.get(e, Health)).toBe(9);
  });

  it("remove moves the entity back and reports whether anything changed", () => {
    const { store, Position, Health } = make_store();
    const e = store.spawn([component(Position, { x: 0, y: 0 }), component(Health, 4)]);

    expect(store.remove(e, Health)).toBe(true);
    expect(store.remove(e, Health)).toBe(false);
    expect(store.has(e, Health)).toBe(false);
    expect(store.get(e, Position)).toEqual({ x: 0, y: 0 });
  });

  it("swap-remove keeps the moved entity's values reachable", () => {
    const { store, Health } = make_store();
    const a = store.spawn([component(Health, 1)]);
    const b = store.spawn([component(Health, 2)]);
    const c = store.spawn([component(Health, 3)]);

    store.despawn(a);

    expect(store.get(b, Health)).toBe(2);
    expect(store.get(c, Health)).toBe(3);
    expect(store.archetype_of(c)?.entities).toEqual([c, b]);
  });

  //=========================================================
  // Lifecycle
  //=========================================================

  it("despawn kills the id and recycles its slot with a new generation", () => {
    const { store, Health } = make_store();
    const a = store.spawn([component(Health, 1)]);
    store.despawn(a);
    const b = store.spawn();

    expect(store.is_alive(a)).toBe(false);
    expect(store.is_alive(b)).toBe(true);
    expect(get_entity_index(b)).toBe(get_entity_index(a));
    expect(b).not.toBe(a);
    expect(store.get(a, Health)).toBeUndefined();
  });

  it("despawning a dead entity is fatal", () => {
    const { store } = make_store();
    const e = store.spawn();
    store.despawn(e);
    expect(() => store.despawn(e)).toThrow(`Entity ${e} is not alive`);
  });

  it("a reserved entity is alive but has no archetype until placed", () => {
    const { store, Health } = make_store();
    const e = store.reserve_entity();
    expect(store.is_alive(e)).toBe(true);
    expect(store.archetype_of(e)).toBeNull();

    store.insert_many(e, [component(Health, 7)]);
    expect(store.get(e, Health)).toBe(7);
  });

  //=========================================================
  // Trackers
  //=========================================================

  it("removed lists entities that lost a component until clear_trackers", () => {
    const { store, Position, Health } = make_store();
    const a = store.spawn([component(Health, 1)]);
    const b = store.spawn([component(Health, 2), component(Position, { x: 0, y: 0 })]);

    store.remove(a, Health);
    store.despawn(b);

    expect(store.removed(Health)).toEqual([a, b]);
    expect(store.removed(Position)).toEqual([b]);

    store.clear_trackers();
    expect(store.removed(Health)).toEqual([]);
  });

  it("clear_trackers advances the change tick", () => {
    const { store } = make_store();
    expect(store.change_tick).toBe(1);
    store.clear_trackers();
    store.clear_trackers();
    expect(store.change_tick).toBe(3);
  });
});
