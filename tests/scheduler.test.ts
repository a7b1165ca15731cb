import { test, describe } from "node:test";
import assert from "node:assert";
import { Scheduler } from "../src/scheduler.js";
import { StatTracker, type TrackerContext } from "../src/trackers/tracker.js";
import { DisplayPrinter } from "../src/display/printer.js";
import { DetachedTransport } from "../src/display/transport.js";
import { isFlapError } from "../src/errors.js";
import { FakeClock, MemorySource } from "./fakes.js";

class CountingTracker extends StatTracker {
  runs = 0;

  constructor(id: string, ctx: TrackerContext, updateRate: number, private readonly log: string[], private readonly onShow?: () => void) {
    super(id, ctx, { updateRate });
  }

  protected async fetch(): Promise<boolean> {
    return true;
  }

  protected async show(): Promise<void> {
    this.runs++;
    this.log.push(this.id);
    this.onShow?.();
  }
}

function context(clock: FakeClock): TrackerContext {
  return {
    source: new MemorySource(),
    clock,
    display: new DisplayPrinter(new DetachedTransport(), { clock }),
    channel: { id: "UC-test", title: "Test Channel", uploadsPlaylistId: "UU-test" },
  };
}

describe("Scheduler", () => {
  test("runs due trackers in registration order", async () => {
    const clock = new FakeClock();
    const ctx = context(clock);
    const log: string[] = [];
    const scheduler = new Scheduler(clock);
    scheduler.add(new CountingTracker("b", ctx, 30, log));
    scheduler.add(new CountingTracker("a", ctx, 10, log));
    await scheduler.runAll();
    assert.deepStrictEqual(log, ["b", "a"]);
  });

  test("sleep time is zero while anything has never run", () => {
    const clock = new FakeClock();
    const scheduler = new Scheduler(clock);
    assert.strictEqual(scheduler.sleepTime(), 0);
    scheduler.add(new CountingTracker("a", context(clock), 10, []));
    assert.strictEqual(scheduler.sleepTime(), 0);
  });

  test("sleep time is the soonest due tracker", async () => {
    const clock = new FakeClock(1000);
    const ctx = context(clock);
    const scheduler = new Scheduler(clock);
    const slow = new CountingTracker("slow", ctx, 30, []);
    const fast = new CountingTracker("fast", ctx, 10, []);
    scheduler.add(slow);
    scheduler.add(fast);
    await slow.run(1000);
    await fast.run(1000);
    assert.strictEqual(scheduler.sleepTime(1000), 10);
    assert.strictEqual(scheduler.sleepTime(1004), 6);
    assert.strictEqual(scheduler.sleepTime(1050), 0);
  });

  test("duplicate ids are refused, re-adding the same tracker is a no-op", () => {
    const clock = new FakeClock();
    const ctx = context(clock);
    const scheduler = new Scheduler(clock);
    const first = new CountingTracker("a", ctx, 10, []);
    scheduler.add(first);
    scheduler.add(first);
    assert.strictEqual(scheduler.size, 1);
    assert.throws(
      () => scheduler.add(new CountingTracker("a", ctx, 10, [])),
      (e: unknown) => isFlapError(e) && e.kind === "config_error",
    );
    assert.strictEqual(scheduler.get("a"), first);
    assert.strictEqual(scheduler.remove("a"), true);
    assert.strictEqual(scheduler.size, 0);
  });

  test("run loops and sleeps until aborted", async () => {
    const clock = new FakeClock(1000);
    const controller = new AbortController();
    const log: string[] = [];
    const tracker = new CountingTracker("a", context(clock), 10, log, () => {
      if (log.length === 3) controller.abort();
    });
    const scheduler = new Scheduler(clock);
    scheduler.add(tracker);
    await scheduler.run(controller.signal);
    assert.strictEqual(tracker.runs, 3);
    assert.deepStrictEqual(clock.sleeps, [10, 10]);
  });

  test("run returns at once with nothing registered", async () => {
    const clock = new FakeClock();
    await new Scheduler(clock).run();
    assert.deepStrictEqual(clock.sleeps, []);
  });
});
