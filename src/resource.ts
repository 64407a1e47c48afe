/***
 * Resource — Singleton values addressed by their class.
 *
 * One live value per class. insert() keys the value by its constructor and
 * replaces whatever was there; init() constructs a default only when the
 * slot is empty. get() on an empty slot is fatal: a resource nobody
 * inserted is a wiring bug, not a runtime condition.
 *
 * Usage:
 *
 *   class Score { value = 0; }
 *
 *   resources.init(Score);
 *   resources.get(Score).value += 10;
 *
 ***/

import { assert } from "type_primitives";
import { SCHEDULER_ERROR, SchedulerError } from "./utils/error";

/** Any class whose instances can be stored as a resource. */
export type ResourceType<T extends object = object> = abstract new (
  ...args: never[]
) => T;

/** A resource class init() can construct without arguments. */
export type DefaultResourceType<T extends object = object> = new () => T;

function type_name(key: unknown): string {
  return typeof key === "function" ? key.name : String(key);
}

export class ResourceStore {
  private readonly values: Map<unknown, object> = new Map();

  /** Insert or replace. Returns the value it replaced, if any. */
  public insert<T extends object>(value: T): object | undefined {
    const key = resource_key(value);
    const previous = this.values.get(key);
    this.values.set(key, value);
    return previous;
  }

  /** Construct and insert `new type()` unless a value is already present. */
  public init<T extends object>(type: DefaultResourceType<T>): T {
    const existing = this.values.get(type);
    if (existing instanceof type) return existing;
    return this.insert_new(type, new type());
  }

  public get<T extends object>(type: ResourceType<T>): T {
    const value = this.values.get(type);
    if (!(value instanceof type)) {
      throw new SchedulerError(
        SCHEDULER_ERROR.RESOURCE_NOT_FOUND,
        `Resource not found: ${type.name}. Available: [${this.type_names().join(", ")}]`,
        { resource: type.name },
      );
    }
    return value;
  }

  public try_get<T extends object>(type: ResourceType<T>): T | undefined {
    const value = this.values.get(type);
    return value instanceof type ? value : undefined;
  }

  public has(type: ResourceType): boolean {
    return this.values.has(type);
  }

  public remove(type: ResourceType): boolean {
    return this.values.delete(type);
  }

  public type_names(): string[] {
    return [...this.values.keys()].map(type_name);
  }

  public get size(): number {
    return this.values.size;
  }

  public clear(): void {
    this.values.clear();
  }

  // Only reachable when the slot was checked empty; a hit here means two
  // paths stored the same resource.
  private insert_new<T extends object>(type: DefaultResourceType<T>, value: T): T {
    assert(!this.values.has(type), `duplicate resource slot for ${type.name}`, {
      category: SCHEDULER_ERROR.DUPLICATE_RESOURCE,
    });
    this.values.set(type, value);
    return value;
  }
}

/** The class a value is stored under. Plain objects and arrays have none. */
export function resource_key(value: object): unknown {
  const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
  if (typeof ctor !== "function" || ctor === Object || ctor === Array) {
    throw new SchedulerError(
      SCHEDULER_ERROR.INVALID_RESOURCE,
      "Resources and events must be class instances",
    );
  }
  return ctor;
}
