import { describe, expect, it } from "vitest";
import { InMemoryScheduleStore } from "../src/store/schedule-store.js";
import { TeamWriteLock } from "../src/store/team-lock.js";
import { InMemoryViolationCache } from "../src/store/violation-cache.js";
import { validateSchedule } from "../src/validation/validator.js";
import { chenRepeatsMorning, namesOf, smallRoster } from "./helpers.js";

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe("InMemoryScheduleStore", () => {
  it("stores one schedule per team and hands out copies", async () => {
    const store = new InMemoryScheduleStore();
    const generatedOn = new Date("2025-01-01T00:00:00Z");
    await store.put({ teamId: "noc", schedule: chenRepeatsMorning(), generatedOn });

    const first = await store.get("noc");
    first?.schedule["January 2025"]?.Morning?.assigned_staff.pop();
    const second = await store.get("noc");

    expect(namesOf(second?.schedule["January 2025"]?.Morning?.assigned_staff)).toEqual(["Chen", "Asha"]);
    expect(second?.generatedOn).toEqual(generatedOn);
    expect(await store.get("other")).toBeUndefined();
  });

  it("reports whether a delete removed anything", async () => {
    const store = new InMemoryScheduleStore();
    await store.put({ teamId: "noc", schedule: chenRepeatsMorning(), generatedOn: new Date() });

    expect(await store.delete("noc")).toBe(true);
    expect(await store.delete("noc")).toBe(false);
  });
});

describe("InMemoryViolationCache", () => {
  it("keeps the last violations per team", () => {
    const cache = new InMemoryViolationCache();
    const { violations } = validateSchedule(chenRepeatsMorning(), smallRoster());
    const recordedAt = new Date("2025-02-01T00:00:00Z");

    cache.set("noc", violations, recordedAt);
    expect(cache.get("noc")).toEqual({ violations, recordedAt });

    cache.clear("noc");
    expect(cache.get("noc")).toBeUndefined();
  });
});

describe("TeamWriteLock", () => {
  it("runs work for one team in call order", async () => {
    const lock = new TeamWriteLock();
    const events: string[] = [];

    const first = lock.runExclusive("noc", async () => {
      events.push("first:start");
      await sleep(20);
      events.push("first:end");
    });
    const second = lock.runExclusive("noc", async () => {
      events.push("second");
    });
    await Promise.all([first, second]);

    expect(events).toEqual(["first:start", "first:end", "second"]);
    expect(lock.isLocked("noc")).toBe(false);
  });

  it("does not make other teams wait", async () => {
    const lock = new TeamWriteLock();
    const events: string[] = [];

    const slow = lock.runExclusive("noc", async () => {
      events.push("noc:start");
      await sleep(20);
      events.push("noc:end");
    });
    const other = lock.runExclusive("support", async () => {
      events.push("support");
    });
    await Promise.all([slow, other]);

    expect(events).toEqual(["noc:start", "support", "noc:end"]);
  });

  it("releases the lock when work fails", async () => {
    const lock = new TeamWriteLock();

    await expect(
      lock.runExclusive("noc", async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    await expect(lock.runExclusive("noc", async () => "next")).resolves.toBe("next");
  });
});
