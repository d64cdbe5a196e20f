/**
 * Standard shaft diameters (mm), ascending.
 */
export const STANDARD_DIAMETERS: readonly number[] = [
  10, 12, 15, 17, 20, 25, 30, 35, 40, 45, 50, 55, 60, 65, 70, 75, 80, 85, 90, 95, 100,
];

/**
 * Smallest catalog diameter >= `diameter`, or the largest entry when the
 * catalog has nothing big enough. Expects an ascending catalog.
 */
export function roundUpToStandard(
  diameter: number,
  catalog: readonly number[] = STANDARD_DIAMETERS,
): number {
  let largest = -Infinity;
  for (const d of catalog) {
    if (d >= diameter) return d;
    largest = Math.max(largest, d);
  }
  return catalog.length > 0 ? largest : diameter;
}

/**
 * Next catalog step above (or below) `current`. Stays at `current` past
 * either end of the catalog.
 */
export function nextStandardDiameter(
  current: number,
  stepUp = true,
  catalog: readonly number[] = STANDARD_DIAMETERS,
): number {
  const sorted = [...catalog].sort((a, b) => a - b);
  if (stepUp) {
    return sorted.find((d) => d > current) ?? current;
  }
  for (let i = sorted.length - 1; i >= 0; i--) {
    const d = sorted[i]!;
    if (d < current) return d;
  }
  return current;
}
