/***
 * Exit — How systems ask the host to stop.
 *
 * Any system emits `new AppExit()`. A built-in system at EVENT_RESET,
 * registered ahead of every event clearing system, turns it into
 * AppControl.exit_requested before the event is dropped, so the host sees
 * the request after tick() returns no matter which stage emitted it.
 *
 ***/

import type { SystemContext } from "./context";

export class AppExit {
  constructor(readonly reason?: string) {}
}

export class AppControl {
  exit_requested = false;
  exit_reason: string | undefined = undefined;
}

export function exit_on_app_exit(ctx: SystemContext): void {
  const exits = ctx.read(AppExit);
  if (exits.length === 0) return;
  const control = ctx.resource(AppControl);
  control.exit_requested = true;
  control.exit_reason = exits[0].reason;
}
