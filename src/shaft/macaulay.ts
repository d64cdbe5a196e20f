// ─── Singularity functions ───────────────────────────────────────────────────

/**
 * Macaulay bracket <x - a>^n. Zero left of `a`; a unit step for n = 0, a ramp
 * for n = 1, (x - a)^n for higher orders. Negative orders (impulses) are not
 * modelled and evaluate to zero.
 */
export function macaulay(x: number, a: number, n: number): number {
  if (x < a || n < 0) return 0;
  if (n === 0) return 1;
  if (n === 1) return x - a;
  return Math.pow(x - a, n);
}

export function macaulayArray(xs: readonly number[], a: number, n: number): number[] {
  return xs.map((x) => macaulay(x, a, n));
}

/** `count` evenly spaced samples from `start` to `end` inclusive. */
export function linspace(start: number, end: number, count: number): number[] {
  if (count <= 0) return [];
  if (count === 1) return [start];
  const step = (end - start) / (count - 1);
  const xs: number[] = [];
  for (let i = 0; i < count - 1; i++) xs.push(start + i * step);
  xs.push(end);
  return xs;
}
