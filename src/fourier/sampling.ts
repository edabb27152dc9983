/** `count` evenly spaced points from start to stop inclusive */
export function linspace(start: number, stop: number, count: number): number[] {
  if (count <= 0) return [];
  if (count === 1) return [start];
  const step = (stop - start) / (count - 1);
  const points = new Array<number>(count);
  for (let i = 0; i < count; i++) {
    points[i] = start + i * step;
  }
  points[count - 1] = stop;
  return points;
}

/** Composite trapezoidal rule over samples ys taken at xs */
export function trapezoid(ys: readonly number[], xs: readonly number[]): number {
  let sum = 0;
  for (let i = 1; i < xs.length; i++) {
    sum += ((ys[i] + ys[i - 1]) / 2) * (xs[i] - xs[i - 1]);
  }
  return sum;
}
