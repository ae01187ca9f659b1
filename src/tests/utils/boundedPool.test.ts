import { expect, test } from "vitest";
import { runBounded } from "../../utils/boundedPool.js";

const tick = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

test("never runs more than the limit at once and keeps input order", async () => {
  let inFlight = 0;
  let peak = 0;

  const outcomes = await runBounded([30, 10, 20, 5, 15], 2, async (ms, index) => {
    inFlight++;
    peak = Math.max(peak, inFlight);
    await tick(ms);
    inFlight--;
    return index * 10;
  });

  expect(peak).toBe(2);
  expect(outcomes).toEqual([0, 10, 20, 30, 40].map((value) => ({ status: "fulfilled", value })));
});

test("a failing item is reported without stopping the others", async () => {
  const boom = new Error("boom");

  const outcomes = await runBounded(["a", "b", "c"], 3, async (item) => {
    if (item === "b") throw boom;
    return item.toUpperCase();
  });

  expect(outcomes).toEqual([
    { status: "fulfilled", value: "A" },
    { status: "rejected", reason: boom },
    { status: "fulfilled", value: "C" },
  ]);
});

test("a limit below one still makes progress", async () => {
  const outcomes = await runBounded([1, 2], 0, async (n) => n + 1);
  expect(outcomes).toEqual([
    { status: "fulfilled", value: 2 },
    { status: "fulfilled", value: 3 },
  ]);
});

test("no items, no work", async () => {
  await expect(runBounded([], 4, async () => 1)).resolves.toEqual([]);
});
