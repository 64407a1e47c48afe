/***
 * Schedule — Registered systems and their execution order.
 *
 * Every registration gets a SystemID and a frozen SystemDescriptor, kept in
 * registration order. Stage systems (STATELESS, STATEFUL) form the sweep:
 * sorted by stage with a stable sort, so systems that share a stage keep
 * their registration order. Startup systems and state listeners never join
 * the sweep; listeners are bucketed by (edge, state) for the transition
 * step.
 *
 ***/

import { STATE_EDGE, type StateValue } from "./state";
import type { STAGE } from "./stage";
import {
  SYSTEM_KIND,
  as_system_id,
  to_config,
  type SystemDescriptor,
  type SystemInput,
  type SystemKind,
} from "./system";
import { stable_sort_by } from "./utils/arrays";

export class Schedule<S extends StateValue = StateValue> {
  private readonly systems: SystemDescriptor<S>[] = [];
  private readonly startup: SystemDescriptor<S>[] = [];
  private readonly stage_systems: SystemDescriptor<S>[] = [];
  private readonly enter_listeners: Map<S, SystemDescriptor<S>[]> = new Map();
  private readonly exit_listeners: Map<S, SystemDescriptor<S>[]> = new Map();
  private sorted = true;

  public add(
    stage: STAGE,
    kind: SystemKind<S>,
    input: SystemInput<S>,
  ): SystemDescriptor<S> {
    const descriptor: SystemDescriptor<S> = Object.freeze({
      ...to_config(input),
      id: as_system_id(this.systems.length),
      stage,
      kind,
    });
    this.systems.push(descriptor);

    switch (kind.type) {
      case SYSTEM_KIND.STARTUP:
        this.startup.push(descriptor);
        break;
      case SYSTEM_KIND.STATELESS:
      case SYSTEM_KIND.STATEFUL:
        this.stage_systems.push(descriptor);
        this.sorted = false;
        break;
      case SYSTEM_KIND.ON_ENTER:
        push_listener(this.enter_listeners, kind.state, descriptor);
        break;
      case SYSTEM_KIND.ON_EXIT:
        push_listener(this.exit_listeners, kind.state, descriptor);
        break;
    }
    return descriptor;
  }

  /** Stable-sort the sweep by stage. Idempotent. */
  public sort(): void {
    if (this.sorted) return;
    stable_sort_by(this.stage_systems, (d) => d.stage);
    this.sorted = true;
  }

  /** Stage systems in execution order. */
  public get sweep(): readonly SystemDescriptor<S>[] {
    this.sort();
    return this.stage_systems;
  }

  public get startup_systems(): readonly SystemDescriptor<S>[] {
    return this.startup;
  }

  public listeners(edge: STATE_EDGE, state: S): readonly SystemDescriptor<S>[] {
    const buckets =
      edge === STATE_EDGE.ENTER ? this.enter_listeners : this.exit_listeners;
    return buckets.get(state) ?? [];
  }

  /** Every system, in registration order. */
  public get all(): readonly SystemDescriptor<S>[] {
    return this.systems;
  }

  public get count(): number {
    return this.systems.length;
  }
}

function push_listener<S extends StateValue>(
  buckets: Map<S, SystemDescriptor<S>[]>,
  state: S,
  descriptor: SystemDescriptor<S>,
): void {
  const bucket = buckets.get(state);
  if (bucket !== undefined) {
    bucket.push(descriptor);
  } else {
    buckets.set(state, [descriptor]);
  }
}
