/**
 * Discrete Fourier power spectrum of real samples.
 *
 * Plain O(M·bins) DFT with a shared twiddle table; sample counts here are in
 * the low thousands and rarely a power of two.
 */

/** |Y_k|² for k in [0, bins) of the M-point DFT of ys */
export function powerSpectrum(ys: readonly number[], bins: number = Math.floor(ys.length / 2)): number[] {
  const M = ys.length;
  const limit = Math.min(bins, M);
  const cosTable = new Float64Array(M);
  const sinTable = new Float64Array(M);
  for (let i = 0; i < M; i++) {
    const phi = (2 * Math.PI * i) / M;
    cosTable[i] = Math.cos(phi);
    sinTable[i] = Math.sin(phi);
  }

  const power = new Array<number>(limit);
  for (let k = 0; k < limit; k++) {
    let re = 0;
    let im = 0;
    let index = 0;
    for (let n = 0; n < M; n++) {
      // e^(-2πikn/M), index = k·n mod M
      re += ys[n] * cosTable[index];
      im -= ys[n] * sinTable[index];
      index += k;
      if (index >= M) index -= M;
    }
    power[k] = re * re + im * im;
  }
  return power;
}

/**
 * Share of spectral power in the upper half of the positive bins:
 * low = [0, ⌊mid/2⌋), high = [⌊mid/2⌋, mid) with mid = ⌊M/2⌋.
 * 0 when the total is below 1e-10.
 */
export function highFrequencyRatio(ys: readonly number[]): number {
  const mid = Math.floor(ys.length / 2);
  const power = powerSpectrum(ys, mid);
  const split = Math.floor(mid / 2);

  let low = 0;
  let high = 0;
  for (let k = 0; k < mid; k++) {
    if (k < split) low += power[k];
    else high += power[k];
  }
  const total = low + high;
  return total < 1e-10 ? 0 : high / total;
}
