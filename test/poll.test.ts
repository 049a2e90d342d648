import { describe, expect, it } from "vitest";
import { PollTimeout } from "../src/models/errors.js";
import { awaitCondition, pollBudgetMs } from "../src/utils/poll.js";
import { FakeClock, sequence } from "./helpers/fakes.js";

describe("awaitCondition", () => {
  it("observes exactly maxAttempts times before timing out", async () => {
    const clock = new FakeClock();
    let observations = 0;

    const result = awaitCondition(
      async () => ++observations,
      () => false,
      { intervalMs: 1000, maxAttempts: 5 },
      clock,
    );

    await expect(result).rejects.toBeInstanceOf(PollTimeout);
    await expect(result).rejects.toMatchObject({ attempts: 5, lastObservation: 5 });
    expect(observations).toBe(5);
    expect(clock.sleeps).toEqual([1000, 1000, 1000, 1000]);
    expect(clock.now()).toBe(4000);
  });

  it("returns on the fourth observation after three Pending phases", async () => {
    const clock = new FakeClock();
    const phases = sequence(["Pending", "Pending", "Pending", "Running"]);
    let observations = 0;

    const result = await awaitCondition(
      async () => {
        observations++;
        return phases();
      },
      (phase) => phase === "Running",
      { intervalMs: 5000, maxAttempts: 12 },
      clock,
    );

    expect(result).toEqual({ observation: "Running", attempts: 4 });
    expect(observations).toBe(4);
    expect(clock.sleeps).toEqual([5000, 5000, 5000]);
  });

  it("does not sleep when the first observation satisfies the predicate", async () => {
    const clock = new FakeClock();

    const result = await awaitCondition(
      async () => "ready",
      () => true,
      { intervalMs: 5000, maxAttempts: 3 },
      clock,
    );

    expect(result.attempts).toBe(1);
    expect(clock.sleeps).toEqual([]);
  });

  it("propagates an observation error without retrying", async () => {
    const clock = new FakeClock();
    let observations = 0;

    const result = awaitCondition(
      async () => {
        observations++;
        if (observations === 2) {
          throw new Error("kubectl not found");
        }
        return "Pending";
      },
      () => false,
      { intervalMs: 100, maxAttempts: 10 },
      clock,
    );

    await expect(result).rejects.toThrow("kubectl not found");
    await expect(result).rejects.not.toBeInstanceOf(PollTimeout);
    expect(observations).toBe(2);
    expect(clock.sleeps).toEqual([100]);
  });
});

describe("pollBudgetMs", () => {
  it("is interval times attempts", () => {
    expect(pollBudgetMs({ intervalMs: 5000, maxAttempts: 12 })).toBe(60_000);
    expect(pollBudgetMs({ intervalMs: 5000, maxAttempts: 24 })).toBe(120_000);
  });
});
