import { describe, expect, it } from "vitest";
import { ResourceStore, resource_key } from "../resource";
import { SCHEDULER_ERROR, SchedulerError } from "../utils/error";

class Score {
  value = 0;
}

class Clock {
  constructor(public elapsed = 0) {}
}

class Base {}
class Derived extends Base {}

describe("ResourceStore", () => {
  //=========================================================
  // insert / get
  //=========================================================

  it("get returns the inserted instance", () => {
    const resources = new ResourceStore();
    const clock = new Clock(3);
    resources.insert(clock);
    expect(resources.get(Clock)).toBe(clock);
  });

  it("insert replaces and returns the previous value", () => {
    const resources = new ResourceStore();
    const first = new Clock(1);
    expect(resources.insert(first)).toBeUndefined();
    expect(resources.insert(new Clock(2))).toBe(first);
    expect(resources.get(Clock).elapsed).toBe(2);
    expect(resources.size).toBe(1);
  });

  it("mutations through get are visible to later readers", () => {
    const resources = new ResourceStore();
    resources.init(Score);
    resources.get(Score).value += 10;
    expect(resources.get(Score).value).toBe(10);
  });

  //=========================================================
  // init
  //=========================================================

  it("init constructs a default when absent", () => {
    const resources = new ResourceStore();
    const score = resources.init(Score);
    expect(score.value).toBe(0);
    expect(resources.get(Score)).toBe(score);
  });

  it("init never clobbers an existing value", () => {
    const resources = new ResourceStore();
    const clock = new Clock(42);
    resources.insert(clock);
    expect(resources.init(Clock)).toBe(clock);
    expect(resources.get(Clock).elapsed).toBe(42);
  });

  //=========================================================
  // Missing resources
  //=========================================================

  it("get on a missing resource is fatal and lists what exists", () => {
    const resources = new ResourceStore();
    resources.insert(new Clock());
    try {
      resources.get(Score);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(SchedulerError);
      const err = e as SchedulerError;
      expect(err.category).toBe(SCHEDULER_ERROR.RESOURCE_NOT_FOUND);
      expect(err.message).toBe("Resource not found: Score. Available: [Clock]");
      expect(err.context).toEqual({ resource: "Score" });
    }
  });

  it("try_get returns undefined instead of throwing", () => {
    const resources = new ResourceStore();
    expect(resources.try_get(Score)).toBeUndefined();
  });

  it("values are keyed by their exact class", () => {
    const resources = new ResourceStore();
    resources.insert(new Derived());
    expect(resources.has(Derived)).toBe(true);
    expect(resources.has(Base)).toBe(false);
    expect(() => resources.get(Base)).toThrow("Resource not found: Base");
  });

  it("remove and clear drop values", () => {
    const resources = new ResourceStore();
    resources.insert(new Clock());
    resources.init(Score);
    expect(resources.type_names()).toEqual(["Clock", "Score"]);

    expect(resources.remove(Clock)).toBe(true);
    expect(resources.remove(Clock)).toBe(false);
    resources.clear();
    expect(resources.size).toBe(0);
  });
});

describe("resource_key", () => {
  it("is the constructor of a class instance", () => {
    expect(resource_key(new Clock())).toBe(Clock);
  });

  it("rejects plain objects and arrays", () => {
    expect(() => resource_key({ value: 1 })).toThrow(
      "Resources and events must be class instances",
    );
    expect(() => resource_key([1, 2])).toThrow(SchedulerError);
    expect(() => resource_key(Object.create(null))).toThrow(SchedulerError);
  });
});
