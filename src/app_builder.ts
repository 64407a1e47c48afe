/***
 * AppBuilder — Collects registrations, then freezes them into an App.
 *
 * Every method but build() and run() returns the builder for chaining.
 * Registration is only possible before build(); afterwards, and on a
 * second build(), the builder throws APP_ALREADY_BUILT.
 *
 * Usage:
 *
 *   type Mode = "menu" | "play";
 *
 *   const app = new AppBuilder<Mode>({ initial_state: "menu" })
 *     .add_event(Scored)
 *     .init_resource(Score)
 *     .add_startup_system(spawn_level)
 *     .add_system_stateful(STAGE.UPDATE, "play", move_players)
 *     .on_enter_state("play", reset_score)
 *     .build();
 *
 *   while (!app.exit_requested) app.tick();
 *
 ***/

import { App } from "./app";
import type { ComponentDef } from "./component";
import { resolve_app_config, type AppConfig, type AppOptions } from "./config";
import { SystemContext } from "./context";
import { EventRegistry, type EventType } from "./event";
import { Executor } from "./executor";
import { AppControl, AppExit, exit_on_app_exit } from "./exit";
import { ResourceStore, type DefaultResourceType } from "./resource";
import { run_once, type Runner } from "./runner";
import { Schedule } from "./schedule";
import { STAGE, is_reserved_stage, stage_name } from "./stage";
import { STATE_EDGE, State, type StateValue } from "./state";
import { Store } from "./store";
import {
  in_state,
  on_enter,
  on_exit,
  startup,
  stateless,
  system_label,
  type SystemInput,
  type SystemKind,
} from "./system";
import { DEFAULT_STATE } from "./utils/constants";
import { SCHEDULER_ERROR, SchedulerError } from "./utils/error";
import { createLogger, type Logger } from "./utils/logger";

export type Plugin<S extends StateValue = StateValue> = (
  builder: AppBuilder<S>,
) => void;

export class AppBuilder<S extends StateValue = typeof DEFAULT_STATE> {
  readonly config: AppConfig;
  readonly log: Logger;
  readonly initial_state: S;

  private readonly store = new Store();
  private readonly resources = new ResourceStore();
  private readonly event_registry = new EventRegistry();
  private readonly schedule = new Schedule<S>();
  private runner: Runner<S> = run_once;
  private built = false;

  /** A builder for apps that never declare their own states. */
  static create(
    options: Omit<AppOptions, "initial_state"> = {},
  ): AppBuilder<typeof DEFAULT_STATE> {
    return new AppBuilder({ ...options, initial_state: DEFAULT_STATE });
  }

  constructor(options: AppOptions<S> & { initial_state: S }) {
    this.config = resolve_app_config(options);
    this.initial_state = options.initial_state;
    this.log =
      options.logger ??
      createLogger({
        name: this.config.name,
        level: this.config.log_level,
        json: this.config.log_json,
      });

    // Exit detection must precede AppExit's clearing system in EVENT_RESET
    this.resources.init(AppControl);
    this.schedule.add(STAGE.EVENT_RESET, stateless(), {
      name: "exit_on_app_exit",
      fn: exit_on_app_exit,
    });
    this.add_event(AppExit);
  }

  // =======================================================
  // Systems
  // =======================================================

  /** Runs every tick in STAGE.UPDATE. */
  add_system(input: SystemInput<S>): this {
    return this.register_system(STAGE.UPDATE, stateless(), input);
  }

  add_system_to_stage(stage: STAGE, input: SystemInput<S>): this {
    return this.register_system(stage, stateless(), input);
  }

  /** Runs once inside build(), before the state exists. */
  add_startup_system(input: SystemInput<S>): this {
    return this.register_system(STAGE.FIRST, startup(), input);
  }

  add_system_stateful(stage: STAGE, state: S, input: SystemInput<S>): this {
    return this.register_system(stage, in_state(state), input);
  }

  on_enter_state(state: S, input: SystemInput<S>): this {
    return this.register_state_listener(state, STATE_EDGE.ENTER, input);
  }

  on_exit_state(state: S, input: SystemInput<S>): this {
    return this.register_state_listener(state, STATE_EDGE.EXIT, input);
  }

  register_state_listener(
    state: S,
    edge: STATE_EDGE,
    input: SystemInput<S>,
  ): this {
    const kind = edge === STATE_EDGE.ENTER ? on_enter(state) : on_exit(state);
    return this.register_system(STAGE.FIRST, kind, input);
  }

  register_system(stage: STAGE, kind: SystemKind<S>, input: SystemInput<S>): this {
    this.assert_not_built();
    if (is_reserved_stage(stage)) {
      throw new SchedulerError(
        SCHEDULER_ERROR.RESERVED_STAGE,
        `Stage ${stage_name(stage)} is reserved for event clearing`,
        { stage },
      );
    }
    this.schedule.add(stage, kind, input);
    return this;
  }

  // =======================================================
  // Events, resources, components
  // =======================================================

  /** Create the channel and its EVENT_RESET clearing system. Idempotent. */
  add_event<T extends object>(type: EventType<T>): this {
    this.assert_not_built();
    if (!this.event_registry.register(type)) return this;
    this.schedule.add(STAGE.EVENT_RESET, stateless(), {
      name: `clear_events<${type.name}>`,
      fn: (ctx) => ctx.events(type).clear(),
    });
    return this;
  }

  /** Insert or replace. */
  insert_resource(value: object): this {
    this.assert_not_built();
    this.resources.insert(value);
    return this;
  }

  /** Insert `new type()` only if no value is present. */
  init_resource(type: DefaultResourceType): this {
    this.assert_not_built();
    this.resources.init(type);
    return this;
  }

  register_component<T>(name: string): ComponentDef<T> {
    this.assert_not_built();
    return this.store.register_component<T>(name);
  }

  // =======================================================
  // Plugins and runners
  // =======================================================

  add_plugin(plugin: Plugin<S>): this {
    this.assert_not_built();
    plugin(this);
    return this;
  }

  set_runner(runner: Runner<S>): this {
    this.assert_not_built();
    this.runner = runner;
    return this;
  }

  /** Build, then hand the app to the runner. Returns the app once the runner returns. */
  run(): App<S> {
    const app = this.build();
    this.runner(app);
    return app;
  }

  // =======================================================
  // Build
  // =======================================================

  build(): App<S> {
    this.assert_not_built();
    this.built = true;

    const ctx = new SystemContext<S>(
      this.store,
      this.resources,
      this.event_registry,
      this.log,
    );
    const executor = new Executor(
      this.schedule,
      ctx,
      this.store,
      this.config.track_archetypes,
    );

    executor.run_all(this.schedule.startup_systems);

    const state = new State<S>(this.initial_state);
    ctx._install_state(state);

    this.schedule.sort();
    executor.run_listeners(STATE_EDGE.ENTER, state.current);

    this.log.debug("app built", {
      systems: this.schedule.count,
      resources: this.resources.size,
      events: this.event_registry.size,
      initial_state: state.current,
      sweep: this.schedule.sweep.map(system_label),
    });

    return new App(
      this.store,
      this.schedule,
      executor,
      this.resources,
      this.event_registry,
      state,
      this.log,
    );
  }

  private assert_not_built(): void {
    if (this.built) {
      throw new SchedulerError(
        SCHEDULER_ERROR.APP_ALREADY_BUILT,
        "AppBuilder.build() has already been called",
      );
    }
  }
}
