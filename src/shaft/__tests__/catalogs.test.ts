import { describe, it, expect } from "vitest";
import { nextStandardDiameter, roundUpToStandard, STANDARD_DIAMETERS } from "../catalogs.js";

describe("roundUpToStandard", () => {
  it("rounds up to the next catalog size", () => {
    expect(roundUpToStandard(26.9)).toBe(30);
    expect(roundUpToStandard(19.5)).toBe(20);
  });

  it("keeps an exact catalog size", () => {
    expect(roundUpToStandard(25)).toBe(25);
  });

  it("caps at the largest size", () => {
    expect(roundUpToStandard(140)).toBe(100);
  });

  it("returns the smallest size for tiny diameters", () => {
    expect(roundUpToStandard(0)).toBe(10);
  });

  it("uses a custom catalog", () => {
    expect(roundUpToStandard(13, [8, 16, 24])).toBe(16);
    expect(roundUpToStandard(13, [])).toBe(13);
  });

  const catalogs: Array<{ label: string; catalog: readonly number[] }> = [
    { label: "default", catalog: STANDARD_DIAMETERS },
    { label: "custom", catalog: [8, 16, 24] },
  ];

  it.each(catalogs)("picks the smallest entry at or above d, else the maximum, and is idempotent ($label)", ({ catalog }) => {
    const max = Math.max(...catalog);
    const samples = [0, 3.2, 9.99, 10, 12.5, 16, 17, 23.9, 24, 47.1, 100, 100.01, 140];

    for (const d of samples) {
      const rounded = roundUpToStandard(d, catalog);
      const expected = catalog.filter((c) => c >= d).reduce((a, b) => Math.min(a, b), Infinity);

      expect(rounded).toBe(Number.isFinite(expected) ? expected : max);
      expect(catalog).toContain(rounded);
      expect(roundUpToStandard(rounded, catalog)).toBe(rounded);
    }
  });

  it("keeps the maximum above the catalog range", () => {
    const once = roundUpToStandard(140);
    expect(once).toBe(100);
    expect(roundUpToStandard(once)).toBe(100);
    expect(roundUpToStandard(30, [8, 16, 24])).toBe(24);
    expect(roundUpToStandard(24, [8, 16, 24])).toBe(24);
  });
});

describe("nextStandardDiameter", () => {
  it("steps up and down the catalog", () => {
    expect(nextStandardDiameter(20)).toBe(25);
    expect(nextStandardDiameter(22)).toBe(25);
    expect(nextStandardDiameter(20, false)).toBe(17);
  });

  it("stays put past either end", () => {
    expect(nextStandardDiameter(100)).toBe(100);
    expect(nextStandardDiameter(10, false)).toBe(10);
  });
});
