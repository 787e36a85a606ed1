import test from "node:test";
import assert from "node:assert/strict";
import { TokenBucketRateLimiter } from "../src/core/rateLimiter";

function fakeClock() {
  const clock: { now: number; sleeps: number[] } = { now: 0, sleeps: [] };
  return {
    clock,
    now: () => clock.now,
    sleep: async (ms: number) => {
      clock.sleeps.push(ms);
      clock.now += ms;
    },
  };
}

test("a full bucket admits a burst without waiting", async () => {
  const { clock, now, sleep } = fakeClock();
  const limiter = new TokenBucketRateLimiter({ maxRequests: 3, periodMs: 1000, now, sleep });

  await limiter.acquire();
  await limiter.acquire();
  await limiter.acquire();

  assert.deepEqual(clock.sleeps, []);
  assert.equal(limiter.availableTokens(), 0);
});

test("an empty bucket waits for exactly one token to refill", async () => {
  const { clock, now, sleep } = fakeClock();
  const waits: number[] = [];
  const limiter = new TokenBucketRateLimiter({
    maxRequests: 2,
    periodMs: 1000,
    now,
    sleep,
    onWait: (waitMs) => waits.push(waitMs),
  });

  await limiter.acquire();
  await limiter.acquire();
  await limiter.acquire();

  assert.deepEqual(clock.sleeps, [500]);
  assert.deepEqual(waits, [500]);
  assert.equal(clock.now, 500);
});

test("tokens refill with elapsed time up to capacity", async () => {
  const { clock, now, sleep } = fakeClock();
  const limiter = new TokenBucketRateLimiter({ maxRequests: 4, periodMs: 1000, now, sleep });

  await limiter.acquire();
  await limiter.acquire();
  assert.equal(limiter.availableTokens(), 2);

  clock.now += 250;
  assert.equal(limiter.availableTokens(), 3);

  clock.now += 10_000;
  assert.equal(limiter.availableTokens(), 4);
});

test("waiters are admitted in arrival order", async () => {
  const { now, sleep } = fakeClock();
  const limiter = new TokenBucketRateLimiter({ maxRequests: 1, periodMs: 100, now, sleep });
  const order: number[] = [];

  await Promise.all(
    [1, 2, 3, 4].map((id) =>
      limiter.acquire().then(() => {
        order.push(id);
      }),
    ),
  );

  assert.deepEqual(order, [1, 2, 3, 4]);
});
