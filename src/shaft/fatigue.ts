/**
 * Fatigue sizing of a solid circular shaft with the DE-ASME elliptic
 * criterion.
 *
 * Moments and torques are in N·m, strengths in Pa, diameters in mm. Callers
 * pass magnitudes; Se and Sy must be positive.
 */
import {
  calculateEnduranceLimit,
  DEFAULT_FATIGUE_CONFIG,
  type FatigueConfig,
} from "./fatigue-factors.js";
import type { Material } from "./materials.js";
import type { ShaftDiagrams } from "./statics.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface SectionLoads {
  ma: number;
  mm: number;
  ta: number;
  tm: number;
}

export interface FatigueStrengths {
  se: number; // Pa
  sy: number; // Pa
  /** Fatigue stress-concentration factor in bending. */
  kf?: number;
  /** Fatigue stress-concentration factor in torsion. */
  kfs?: number;
}

// ─── Criterion ───────────────────────────────────────────────────────────────

/**
 * √((A/Se)² + (B/Sy)²) with the alternating and mean von Mises load terms
 * A = √(4(Kf·Ma)² + 3(Kfs·Ta)²) and B = √(4(Kf·Mm)² + 3(Kfs·Tm)²).
 */
function ellipticLoadTerm(loads: SectionLoads, strengths: FatigueStrengths): number {
  const kf = strengths.kf ?? 1;
  const kfs = strengths.kfs ?? 1;
  const alternating = Math.sqrt(4 * (kf * loads.ma) ** 2 + 3 * (kfs * loads.ta) ** 2);
  const mean = Math.sqrt(4 * (kf * loads.mm) ** 2 + 3 * (kfs * loads.tm) ** 2);
  return Math.sqrt((alternating / strengths.se) ** 2 + (mean / strengths.sy) ** 2);
}

/** Smallest diameter (mm) that carries `loads` with safety factor `n`. */
export function calculateMinDiameter(
  loads: SectionLoads,
  strengths: FatigueStrengths,
  n: number,
): number {
  const dCubed = ((16 * n) / Math.PI) * ellipticLoadTerm(loads, strengths);
  return Math.cbrt(dCubed) * 1000;
}

/** Safety factor of a `diameter` mm section; Infinity when unloaded. */
export function calculateSafetyFactor(
  diameter: number,
  loads: SectionLoads,
  strengths: FatigueStrengths,
): number {
  const term = ellipticLoadTerm(loads, strengths);
  if (term === 0) return Infinity;
  const d = diameter / 1000;
  return (Math.PI * d ** 3) / (16 * term);
}

// ─── Along the shaft ─────────────────────────────────────────────────────────

export interface RequiredDiameterOptions {
  safetyFactor: number;
  fatigue?: Partial<FatigueConfig>;
  /** Diameter guess for the size factor, mm. */
  diameterGuess?: number;
  kf?: number;
  kfs?: number;
}

/**
 * Required diameter at every diagram sample. Moments arrive in N·mm and are
 * converted to N·m here; the endurance limit is evaluated once for the
 * diameter guess.
 */
export function requiredDiameters(
  diagrams: ShaftDiagrams,
  material: Material,
  options: RequiredDiameterOptions,
): number[] {
  const se = calculateEnduranceLimit(material.Sut, {
    diameter: options.diameterGuess ?? 50,
    config: { ...DEFAULT_FATIGUE_CONFIG, ...options.fatigue },
  });
  const strengths: FatigueStrengths = { se, sy: material.Sy, kf: options.kf, kfs: options.kfs };

  return diagrams.x.map((_, i) =>
    calculateMinDiameter(
      {
        ma: Math.abs(diagrams.ma[i] ?? 0) / 1000,
        mm: Math.abs(diagrams.mm[i] ?? 0) / 1000,
        ta: Math.abs(diagrams.ta[i] ?? 0),
        tm: Math.abs(diagrams.tm[i] ?? 0),
      },
      strengths,
      options.safetyFactor,
    ),
  );
}
