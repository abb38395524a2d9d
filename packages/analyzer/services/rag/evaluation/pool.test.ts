import { mapWithConcurrency } from "./pool";
import { describe, expect, it } from "vitest";

const delay = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

describe("mapWithConcurrency", () => {
  it("should keep input order when later items finish first", async () => {
    const results = await mapWithConcurrency([30, 10, 20, 0], 4, async (ms, i) => {
      await delay(ms);
      return `item-${i}`;
    });

    expect(results).toEqual(["item-0", "item-1", "item-2", "item-3"]);
  });

  it("should never run more than the limit at once", async () => {
    let inFlight = 0;
    let peak = 0;

    await mapWithConcurrency([1, 2, 3, 4, 5, 6, 7], 3, async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await delay(5);
      inFlight--;
    });

    expect(peak).toBe(3);
  });

  it("should handle an empty list", async () => {
    expect(await mapWithConcurrency([], 2, async () => 1)).toEqual([]);
  });
});
