import { describe, it, expect, vi, afterEach } from "vitest";
import { calculateBackoff, calculateDeliveryBackoff, calculateNatsBackoff } from "../../../domain/utils/backoff.js";

describe("calculateBackoff", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should double from the base delay up to the cap", () => {
    expect([0, 1, 2, 3, 4, 5, 12].map((attempt) => calculateBackoff(attempt))).toEqual([
      1000, 2000, 4000, 8000, 16000, 30000, 30000,
    ]);
  });

  it("should take a custom base and cap", () => {
    const options = { baseDelayMs: 100, maxDelayMs: 500 };
    expect([0, 1, 2, 3].map((attempt) => calculateBackoff(attempt, options))).toEqual([100, 200, 400, 500]);
  });

  it("should add up to jitterFactor of the delay", () => {
    vi.spyOn(Math, "random").mockReturnValueOnce(0).mockReturnValueOnce(0.5).mockReturnValueOnce(0.999);

    expect(calculateBackoff(2, { jitterFactor: 0.2 })).toBe(4000);
    expect(calculateBackoff(2, { jitterFactor: 0.2 })).toBe(4400);
    expect(calculateBackoff(2, { jitterFactor: 0.2 })).toBe(4799);
  });
});

describe("calculateNatsBackoff", () => {
  it("should treat the first delivery as attempt zero", () => {
    expect(calculateNatsBackoff(0)).toBe(1000);
    expect(calculateNatsBackoff(1)).toBe(1000);
    expect(calculateNatsBackoff(3)).toBe(4000);
  });
});

describe("calculateDeliveryBackoff", () => {
  it("should wait 1 minute, doubling up to 10 minutes", () => {
    expect([1, 2, 3, 4, 5, 9].map(calculateDeliveryBackoff)).toEqual([60000, 120000, 240000, 480000, 600000, 600000]);
  });
});
