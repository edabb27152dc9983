import { afterEach, describe, expect, test, vi } from "vitest";
import { CoefficientCache } from "../src/cache.ts";
import { createPeriod } from "../src/fourier/period.ts";
import type { CoefficientSet } from "../src/fourier/types.ts";

function coefficients(a0: number): CoefficientSet {
  return {
    a0,
    an: [],
    bn: [],
    period: createPeriod(2),
    nTerms: 1,
    symmetry: "none",
    source: "integrated",
    integration: "symbolic",
  };
}

describe("CoefficientCache", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  test("key ignores whitespace", () => {
    expect(CoefficientCache.key("x ** 2", 6.28, 10)).toBe("x**2|6.28|10");
  });

  test("hit and miss counting", () => {
    const cache = new CoefficientCache();
    cache.set("a", coefficients(1));
    expect(cache.get("a")?.a0).toBe(1);
    expect(cache.get("b")).toBeNull();
    expect(cache.stats()).toEqual({ hits: 1, misses: 1, size: 1, hitRate: 0.5 });
  });

  test("evicts the least recently used entry", () => {
    const cache = new CoefficientCache(2);
    cache.set("a", coefficients(1));
    cache.set("b", coefficients(2));
    cache.get("a");
    cache.set("c", coefficients(3));
    expect(cache.get("b")).toBeNull();
    expect(cache.get("a")?.a0).toBe(1);
    expect(cache.get("c")?.a0).toBe(3);
  });

  test("entries expire", () => {
    vi.useFakeTimers();
    const cache = new CoefficientCache(10, 1000);
    cache.set("a", coefficients(1));
    vi.advanceTimersByTime(999);
    expect(cache.get("a")).not.toBeNull();
    vi.advanceTimersByTime(2);
    expect(cache.get("a")).toBeNull();
    expect(cache.stats().size).toBe(0);
  });

  test("clear resets counters", () => {
    const cache = new CoefficientCache();
    cache.set("a", coefficients(1));
    cache.get("a");
    cache.clear();
    expect(cache.stats()).toEqual({ hits: 0, misses: 0, size: 0, hitRate: 0 });
  });
});
