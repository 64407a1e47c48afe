/***
 * Component — Typed handles for component types.
 *
 * At runtime a ComponentDef<T> is a ComponentID (branded number) that
 * indexes the archetype masks. T only exists at compile time and types the
 * values read from and written to the store:
 *
 *   const Position = builder.register_component<{ x: number; y: number }>("Position");
 *   ctx.spawn(component(Position, { x: 0, y: 0 }));
 *
 ***/

import {
  type Brand,
  is_non_negative_integer,
  unsafe_cast,
  validate_and_cast,
} from "type_primitives";
import { SCHEDULER_ERROR, SchedulerError } from "./utils/error";

export type ComponentID = Brand<number, "component_id">;
export const as_component_id = (value: number) =>
  validate_and_cast<number, ComponentID>(
    value,
    is_non_negative_integer,
    "ComponentID must be a non-negative integer",
  );

// Phantom slot for the value type; never exists at runtime.
declare const __component_value: unique symbol;

export type ComponentDef<T = unknown> = ComponentID & {
  readonly [__component_value]: T;
};

export type ComponentValue<D> = D extends ComponentDef<infer T> ? T : never;

/** A component handle paired with a value, as accepted by spawn/insert. */
export interface ComponentEntry {
  readonly def: ComponentDef;
  readonly value: unknown;
}

export function component<T>(def: ComponentDef<T>, value: T): ComponentEntry {
  return { def, value };
}

export class ComponentRegistry {
  private readonly names: string[] = [];

  public register<T>(name: string): ComponentDef<T> {
    const id = as_component_id(this.names.length);
    this.names.push(name);
    return unsafe_cast<ComponentDef<T>>(id);
  }

  public has(id: ComponentID): boolean {
    return id < this.names.length;
  }

  public name_of(id: ComponentID): string {
    const name = this.names[id];
    if (name === undefined) {
      throw new SchedulerError(
        SCHEDULER_ERROR.COMPONENT_NOT_REGISTERED,
        `Component ${id} is not registered`,
      );
    }
    return name;
  }

  public get count(): number {
    return this.names.length;
  }
}
