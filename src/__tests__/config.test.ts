import { describe, expect, it } from "vitest";
import { resolve_app_config, type AppOptions } from "../config";
import { SCHEDULER_ERROR, SchedulerError } from "../utils/error";

describe("resolve_app_config", () => {
  it("fills in defaults", () => {
    expect(resolve_app_config({})).toEqual({
      name: "app",
      initial_state: "default",
      log_level: "warn",
      log_json: false,
      track_archetypes: true,
    });
  });

  it("keeps provided values and strips the logger", () => {
    const config = resolve_app_config({
      name: "arcade",
      initial_state: 2,
      log_level: "debug",
      log_json: true,
      track_archetypes: false,
      logger: { debug() {}, info() {}, warn() {}, error() {} },
    });
    expect(config).toEqual({
      name: "arcade",
      initial_state: 2,
      log_level: "debug",
      log_json: true,
      track_archetypes: false,
    });
  });

  it("rejects invalid options with every issue in the message", () => {
    // shape of options read from an untyped source
    const options: AppOptions = JSON.parse('{"name":"","log_level":"verbose"}');
    try {
      resolve_app_config(options);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(SchedulerError);
      const err = e as SchedulerError;
      expect(err.category).toBe(SCHEDULER_ERROR.INVALID_OPTIONS);
      expect(err.message).toMatch(/^Invalid app options: name: .+; log_level: .+$/);
    }
  });

  it("rejects a non-integer numeric state", () => {
    expect(() => resolve_app_config({ initial_state: 1.5 })).toThrow(
      /^Invalid app options: initial_state: /,
    );
  });
});
