/***
 * System — Function-based units of behaviour.
 *
 * A system is a plain function of the SystemContext, or a SystemConfig
 * when it needs a name, cached queries or lifecycle hooks. Registration
 * wraps it into a frozen SystemDescriptor carrying its stage and kind:
 *
 *   STARTUP    — runs once, inside build(), before any tick
 *   STATELESS  — runs every tick in its stage
 *   STATEFUL   — runs every tick in its stage while the state matches
 *   ON_ENTER   — runs when the state is entered (never in the sweep)
 *   ON_EXIT    — runs when the state is left (never in the sweep)
 *
 ***/

import {
  type Brand,
  validate_and_cast,
  is_non_negative_integer,
} from "type_primitives";
import type { Archetype } from "./archetype";
import type { SystemContext } from "./context";
import type { Query } from "./query";
import type { STAGE } from "./stage";
import type { StateValue } from "./state";

export type SystemID = Brand<number, "system_id">;

export const as_system_id = (value: number) =>
  validate_and_cast<number, SystemID>(
    value,
    is_non_negative_integer,
    "SystemID must be a non-negative integer",
  );

export enum SYSTEM_KIND {
  STARTUP = "STARTUP",
  STATELESS = "STATELESS",
  STATEFUL = "STATEFUL",
  ON_ENTER = "ON_ENTER",
  ON_EXIT = "ON_EXIT",
}

export type SystemKind<S extends StateValue = StateValue> =
  | { readonly type: SYSTEM_KIND.STARTUP }
  | { readonly type: SYSTEM_KIND.STATELESS }
  | { readonly type: SYSTEM_KIND.STATEFUL; readonly state: S }
  | { readonly type: SYSTEM_KIND.ON_ENTER; readonly state: S }
  | { readonly type: SYSTEM_KIND.ON_EXIT; readonly state: S };

export const startup = (): SystemKind<never> => ({ type: SYSTEM_KIND.STARTUP });
export const stateless = (): SystemKind<never> => ({
  type: SYSTEM_KIND.STATELESS,
});
export const in_state = <S extends StateValue>(state: S): SystemKind<S> => ({
  type: SYSTEM_KIND.STATEFUL,
  state,
});
export const on_enter = <S extends StateValue>(state: S): SystemKind<S> => ({
  type: SYSTEM_KIND.ON_ENTER,
  state,
});
export const on_exit = <S extends StateValue>(state: S): SystemKind<S> => ({
  type: SYSTEM_KIND.ON_EXIT,
  state,
});

/** Whether a system of this kind runs in the per-stage sweep while `current` holds. */
export function runs_in_sweep<S extends StateValue>(
  kind: SystemKind<S>,
  current: S,
): boolean {
  switch (kind.type) {
    case SYSTEM_KIND.STATELESS:
      return true;
    case SYSTEM_KIND.STATEFUL:
      return kind.state === current;
    default:
      return false;
  }
}

export type SystemFn<S extends StateValue = StateValue> = (
  ctx: SystemContext<S>,
) => void;

export interface SystemConfig<S extends StateValue = StateValue> {
  fn: SystemFn<S>;
  name?: string;
  /** Queries kept up to date with every archetype the store creates. */
  queries?: readonly Query[];
  /** Called once per newly observed archetype, after the queries. */
  on_new_archetype?: (archetype: Archetype) => void;
  /** Called by App.dispose(). */
  dispose?: () => void;
}

export interface SystemDescriptor<S extends StateValue = StateValue>
  extends Readonly<SystemConfig<S>> {
  readonly id: SystemID;
  readonly stage: STAGE;
  readonly kind: SystemKind<S>;
}

export type SystemInput<S extends StateValue = StateValue> =
  | SystemFn<S>
  | SystemConfig<S>;

export function to_config<S extends StateValue>(
  input: SystemInput<S>,
): SystemConfig<S> {
  return typeof input === "function" ? { fn: input } : input;
}

export function system_label<S extends StateValue>(
  descriptor: SystemDescriptor<S>,
): string {
  return descriptor.name ?? `system_${descriptor.id}`;
}
