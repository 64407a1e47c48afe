/***
 * Event — Per-type append-only buffers with a single-tick window.
 *
 * Systems emit events during a tick and any number of later systems read
 * them, in emission order, without consuming them. Each registered event
 * type gets one clearing system in STAGE.EVENT_RESET, which runs after
 * every other stage, so a value is visible from its emission until the end
 * of the tick and never again.
 *
 * Event types are classes; the class is the channel's key:
 *
 *   class Scored { constructor(readonly points: number) {} }
 *
 *   builder.add_event(Scored);
 *   ctx.emit(new Scored(5));
 *   for (const e of ctx.read(Scored)) total += e.points;
 *
 ***/

import { unsafe_cast } from "type_primitives";
import { resource_key, type ResourceType } from "./resource";
import { SCHEDULER_ERROR, SchedulerError } from "./utils/error";

export type EventType<T extends object = object> = ResourceType<T>;

export class Events<T extends object> {
  private readonly values: T[] = [];

  constructor(readonly type: EventType<T>) {}

  public send(value: T): void {
    this.values.push(value);
  }

  /**
   * Everything emitted since the last clear, oldest first. A copy: values
   * emitted while the caller iterates are not part of it.
   */
  public read(): readonly T[] {
    return this.values.slice();
  }

  public get length(): number {
    return this.values.length;
  }

  public clear(): void {
    this.values.length = 0;
  }
}

export class EventRegistry {
  private readonly channels: Map<unknown, Events<object>> = new Map();

  /** Create the channel for `type`. Returns false if it already existed. */
  public register<T extends object>(type: EventType<T>): boolean {
    if (this.channels.has(type)) return false;
    this.channels.set(type, new Events(type));
    return true;
  }

  public has(type: EventType): boolean {
    return this.channels.has(type);
  }

  public emit(value: object): void {
    this.channel_for(resource_key(value)).send(value);
  }

  public get<T extends object>(type: EventType<T>): Events<T> {
    // type-erased storage: the channel under `type` was created as Events<T>
    return unsafe_cast<Events<T>>(this.channel_for(type));
  }

  public read<T extends object>(type: EventType<T>): readonly T[] {
    return this.get(type).read();
  }

  public clear_all(): void {
    for (const channel of this.channels.values()) channel.clear();
  }

  public get size(): number {
    return this.channels.size;
  }

  private channel_for(key: unknown): Events<object> {
    const channel = this.channels.get(key);
    if (channel === undefined) {
      const name = typeof key === "function" ? key.name : String(key);
      throw new SchedulerError(
        SCHEDULER_ERROR.EVENT_NOT_REGISTERED,
        `Event type ${name} was never registered with add_event`,
        { event: name },
      );
    }
    return channel;
  }
}
