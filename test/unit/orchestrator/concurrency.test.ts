import { describe, it, expect } from "vitest";

import { chunk, settleAll } from "../../../src/orchestrator/concurrency.js";

describe("chunk", () => {
  it("splits into consecutive chunks with a short tail", () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  });

  it("returns no chunks for an empty list", () => {
    expect(chunk([], 3)).toEqual([]);
  });

  it("rejects a non-positive size", () => {
    expect(() => chunk([1], 0)).toThrow(RangeError);
  });
});

describe("settleAll", () => {
  it("returns results in input order and keeps going past rejections", async () => {
    const results = await settleAll([30, 10, 20], 2, async (ms) => {
      await new Promise((resolve) => setTimeout(resolve, ms));
      if (ms === 10) throw new Error("ten");
      return ms * 2;
    });

    expect(results[0]).toEqual({ status: "fulfilled", value: 60 });
    expect(results[1]?.status).toBe("rejected");
    expect(results[2]).toEqual({ status: "fulfilled", value: 40 });
  });

  it("bounds the number of calls in flight", async () => {
    let inFlight = 0;
    let max = 0;

    await settleAll([1, 2, 3, 4, 5, 6, 7], 3, async () => {
      inFlight++;
      max = Math.max(max, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 2));
      inFlight--;
    });

    expect(max).toBe(3);
  });
});
