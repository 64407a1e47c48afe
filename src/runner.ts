/***
 * Runner — Host loops that drive a built App.
 *
 * The library never owns the outer loop: AppBuilder.run() builds the app
 * and hands it to whichever runner was set. run_once is the default.
 *
 ***/

import type { App } from "./app";
import type { StateValue } from "./state";

export type Runner<S extends StateValue = StateValue> = (app: App<S>) => void;

export function run_once<S extends StateValue>(app: App<S>): void {
  app.tick();
}

export interface RunLoopOptions {
  /** Stop after this many ticks even if no exit was requested. */
  max_ticks?: number;
}

/** Tick until a system emits AppExit or max_ticks is reached. Returns the ticks run. */
export function run_loop<S extends StateValue>(
  app: App<S>,
  options: RunLoopOptions = {},
): number {
  const max_ticks = options.max_ticks ?? Number.POSITIVE_INFINITY;
  app.log.info("run loop started", { max_ticks });

  let ticks = 0;
  while (!app.exit_requested && ticks < max_ticks) {
    app.tick();
    ticks++;
  }

  app.log.info("run loop stopped", {
    ticks,
    exit_requested: app.exit_requested,
  });
  return ticks;
}

/** A Runner bound to fixed run_loop options, for AppBuilder.set_runner. */
export const loop_runner =
  <S extends StateValue>(options: RunLoopOptions = {}): Runner<S> =>
  (app) => {
    run_loop(app, options);
  };
