/**
 * Tests for RateLimiter, on a manual clock.
 */

import { test, describe } from "node:test";
import assert from "node:assert";
import { RateLimiter } from "../src/utils/rate-limiter.js";
import { FakeClock } from "./fakes.js";

describe("RateLimiter", () => {
  test("first call goes straight through", async () => {
    const clock = new FakeClock();
    await new RateLimiter(clock).limit("api", 10);
    assert.deepStrictEqual(clock.sleeps, []);
  });

  test("back-to-back calls are spaced by the interval", async () => {
    const clock = new FakeClock();
    const limiter = new RateLimiter(clock);
    await limiter.limit("api", 2);
    await limiter.limit("api", 2);
    await limiter.limit("api", 2);
    assert.deepStrictEqual(clock.sleeps, [0.5, 0.5]);
  });

  test("no wait once the interval has passed", async () => {
    const clock = new FakeClock();
    const limiter = new RateLimiter(clock);
    await limiter.limit("api", 1);
    clock.advance(5);
    await limiter.limit("api", 1);
    assert.deepStrictEqual(clock.sleeps, []);
  });

  test("lanes are independent", async () => {
    const clock = new FakeClock();
    const limiter = new RateLimiter(clock);
    await limiter.limit("a", 1);
    await limiter.limit("b", 1);
    assert.deepStrictEqual(clock.sleeps, []);
  });

  test("concurrent callers queue in order", async () => {
    const clock = new FakeClock();
    const limiter = new RateLimiter(clock);
    const order: number[] = [];
    await Promise.all([1, 2, 3].map((n) => limiter.limit("api", 4).then(() => order.push(n))));
    assert.deepStrictEqual(order, [1, 2, 3]);
    assert.deepStrictEqual(clock.sleeps, [0.25, 0.25]);
  });

  test("throws on invalid throughput", async () => {
    const limiter = new RateLimiter(new FakeClock());
    for (const rps of [0, -1, Infinity, NaN]) {
      await assert.rejects(() => limiter.limit("bad", rps), /positive finite number/);
    }
  });

  test("reset clears one lane or all of them", async () => {
    const clock = new FakeClock();
    const limiter = new RateLimiter(clock);
    await limiter.limit("x1", 1);
    limiter.reset("x1");
    await limiter.limit("x1", 1);
    await limiter.limit("x2", 1);
    limiter.reset();
    await limiter.limit("x1", 1);
    await limiter.limit("x2", 1);
    assert.deepStrictEqual(clock.sleeps, []);
  });
});
