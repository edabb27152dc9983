/**
 * Closed-form series for a handful of textbook functions.
 *
 * Matching is literal on whitespace-stripped text: "x**2" hits, "x*x" does not.
 * Anything that misses goes through integration, which produces the same
 * coefficients more slowly.
 */

export interface KnownSeries {
  name: string;
  a0: number;
  an: (n: number) => number;
  bn: (n: number) => number;
}

type KnownSeriesFactory = (halfPeriod: number) => KnownSeries | undefined;

const zero = (): number => 0;

/**
 * q when L = q·π for a positive integer q, else undefined.
 * sin(x) and cos(x) are single harmonics only on such periods.
 */
export function harmonicOfUnitFrequency(halfPeriod: number): number | undefined {
  const q = halfPeriod / Math.PI;
  const rounded = Math.round(q);
  if (rounded >= 1 && Math.abs(q - rounded) < 1e-9) return rounded;
  return undefined;
}

const CATALOG: Record<string, KnownSeriesFactory> = {
  "sin(x)": (L) => {
    const q = harmonicOfUnitFrequency(L);
    if (q === undefined) return undefined;
    return { name: "sine", a0: 0, an: zero, bn: (n) => (n === q ? 1 : 0) };
  },
  "cos(x)": (L) => {
    const q = harmonicOfUnitFrequency(L);
    if (q === undefined) return undefined;
    return { name: "cosine", a0: 0, an: (n) => (n === q ? 1 : 0), bn: zero };
  },
  "abs(x)": (L) => ({
    name: "absolute value",
    a0: L,
    an: (n) => (n % 2 === 1 ? (-4 * L) / (Math.PI ** 2 * n ** 2) : 0),
    bn: zero,
  }),
  "x**2": (L) => ({
    name: "parabola",
    a0: (2 * L ** 2) / 3,
    an: (n) => (4 * L ** 2 * (-1) ** n) / (Math.PI ** 2 * n ** 2),
    bn: zero,
  }),
  x: (L) => ({
    name: "sawtooth",
    a0: 0,
    an: zero,
    bn: (n) => (2 * L * (-1) ** (n + 1)) / (Math.PI * n),
  }),
  "sign(x)": () => ({
    name: "square wave",
    a0: 0,
    an: zero,
    bn: (n) => (n % 2 === 1 ? 4 / (Math.PI * n) : 0),
  }),
};

/** Find the closed-form series for a whitespace-stripped expression on [-L, L] */
export function lookupKnownSeries(normalizedText: string, halfPeriod: number): KnownSeries | undefined {
  if (!Object.hasOwn(CATALOG, normalizedText)) return undefined;
  return CATALOG[normalizedText](halfPeriod);
}
