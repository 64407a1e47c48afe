import { describe, expect, it } from "vitest";
import { Schedule } from "../schedule";
import { STAGE } from "../stage";
import { STATE_EDGE } from "../state";
import {
  in_state,
  on_enter,
  on_exit,
  startup,
  stateless,
  system_label,
  SYSTEM_KIND,
  type SystemFn,
} from "../system";

type Mode = "menu" | "play";

const noop: SystemFn<Mode> = () => {};

function names(list: readonly { name?: string }[]): (string | undefined)[] {
  return list.map((d) => d.name);
}

describe("Schedule", () => {
  //=========================================================
  // Registration
  //=========================================================

  it("assigns ids in registration order and freezes descriptors", () => {
    const schedule = new Schedule<Mode>();
    const a = schedule.add(STAGE.UPDATE, stateless(), noop);
    const b = schedule.add(STAGE.FIRST, stateless(), { fn: noop, name: "b" });

    expect(a.id).toBe(0);
    expect(b.id).toBe(1);
    expect(Object.isFrozen(a)).toBe(true);
    expect(schedule.count).toBe(2);
    expect(schedule.all).toEqual([a, b]);
  });

  it("system_label falls back to the id", () => {
    const schedule = new Schedule<Mode>();
    const a = schedule.add(STAGE.UPDATE, stateless(), noop);
    const b = schedule.add(STAGE.UPDATE, stateless(), { fn: noop, name: "move" });
    expect(system_label(a)).toBe("system_0");
    expect(system_label(b)).toBe("move");
  });

  //=========================================================
  // Sweep ordering
  //=========================================================

  it("sweep orders by stage, then registration order", () => {
    const schedule = new Schedule<Mode>();
    schedule.add(STAGE.LAST, stateless(), { fn: noop, name: "last" });
    schedule.add(STAGE.UPDATE, stateless(), { fn: noop, name: "update_1" });
    schedule.add(STAGE.FIRST, stateless(), { fn: noop, name: "first" });
    schedule.add(STAGE.UPDATE, in_state("play"), { fn: noop, name: "update_2" });
    schedule.add(STAGE.PRE_UPDATE, stateless(), { fn: noop, name: "pre" });

    expect(names(schedule.sweep)).toEqual([
      "first",
      "pre",
      "update_1",
      "update_2",
      "last",
    ]);
  });

  it("startup systems and listeners stay out of the sweep", () => {
    const schedule = new Schedule<Mode>();
    schedule.add(STAGE.FIRST, startup(), { fn: noop, name: "boot" });
    schedule.add(STAGE.FIRST, on_enter("play"), { fn: noop, name: "enter" });
    schedule.add(STAGE.FIRST, on_exit("play"), { fn: noop, name: "exit" });
    schedule.add(STAGE.UPDATE, stateless(), { fn: noop, name: "tick" });

    expect(names(schedule.sweep)).toEqual(["tick"]);
    expect(names(schedule.startup_systems)).toEqual(["boot"]);
  });

  //=========================================================
  // Listeners
  //=========================================================

  it("listeners are bucketed by edge and state", () => {
    const schedule = new Schedule<Mode>();
    schedule.add(STAGE.FIRST, on_enter("play"), { fn: noop, name: "enter_play_1" });
    schedule.add(STAGE.FIRST, on_exit("play"), { fn: noop, name: "exit_play" });
    schedule.add(STAGE.FIRST, on_enter("menu"), { fn: noop, name: "enter_menu" });
    schedule.add(STAGE.FIRST, on_enter("play"), { fn: noop, name: "enter_play_2" });

    expect(names(schedule.listeners(STATE_EDGE.ENTER, "play"))).toEqual([
      "enter_play_1",
      "enter_play_2",
    ]);
    expect(names(schedule.listeners(STATE_EDGE.EXIT, "play"))).toEqual(["exit_play"]);
    expect(schedule.listeners(STATE_EDGE.EXIT, "menu")).toEqual([]);
  });

  it("kind helpers carry the state they were given", () => {
    expect(in_state<Mode>("play")).toEqual({ type: SYSTEM_KIND.STATEFUL, state: "play" });
    expect(on_exit<Mode>("menu")).toEqual({ type: SYSTEM_KIND.ON_EXIT, state: "menu" });
  });
});
