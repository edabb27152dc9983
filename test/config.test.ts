import { describe, expect, test } from "vitest";
import { loadServerConfig, resolveAnalysisOptions, resolveEngineOptions } from "../src/config.ts";

describe("resolveEngineOptions", () => {
  test("defaults", () => {
    const options = resolveEngineOptions();
    expect(options.quadratureSamples).toBe(2000);
    expect(options.parallelThreshold).toBe(20);
    expect(options.symmetry.rtol).toBe(1e-4);
  });

  test("quadrature and pool size have floors", () => {
    const options = resolveEngineOptions({ quadratureSamples: 100, poolSize: 0 });
    expect(options.quadratureSamples).toBe(2000);
    expect(options.poolSize).toBe(1);
  });

  test("symmetry overrides merge with defaults", () => {
    const options = resolveEngineOptions({ symmetry: { atol: 1e-3 } });
    expect(options.symmetry.atol).toBe(1e-3);
    expect(options.symmetry.samples).toBe(25);
  });

  test("analysis overrides", () => {
    expect(resolveAnalysisOptions({ samples: 500 })).toEqual({
      samples: 500,
      jumpSigma: 5,
      mergeFraction: 0.01,
      degenerateRatio: 0.5,
    });
  });
});

describe("loadServerConfig", () => {
  test("defaults from an empty environment", () => {
    expect(loadServerConfig({})).toEqual({
      engine: { poolSize: 4, parallelThreshold: 20, quadratureSamples: 2000, formulaMaxTerms: 50 },
      cacheSize: 100,
    });
  });

  test("reads numbers from strings", () => {
    const config = loadServerConfig({ FOURIER_POOL_SIZE: "8", FOURIER_CACHE_SIZE: "5" });
    expect(config.engine.poolSize).toBe(8);
    expect(config.cacheSize).toBe(5);
  });

  test("rejects invalid values", () => {
    expect(() => loadServerConfig({ FOURIER_QUADRATURE_SAMPLES: "500" })).toThrow();
    expect(() => loadServerConfig({ FOURIER_POOL_SIZE: "many" })).toThrow();
  });
});
