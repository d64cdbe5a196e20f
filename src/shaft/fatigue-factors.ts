/**
 * Marin correction factors for the rotating-beam endurance limit.
 *
 * Se = ka · kb · kc · kd · ke · kf · Se'
 *
 * Strengths are in Pa; the empirical surface-factor fit takes Sut in MPa.
 * Unknown categorical keys fall back to the defaults named on each table.
 */

// ─── Types ───────────────────────────────────────────────────────────────────

export type SurfaceFinish = "ground" | "machined" | "cold_rolled" | "hot_rolled" | "forged";

export type LoadType = "bending" | "axial" | "torsion";

export interface FatigueConfig {
  surface: string;
  reliability: string;
  /** Operating temperature, °C. */
  temperature: number;
  /** Miscellaneous-effects factor. */
  kf: number;
}

export interface MarinFactors {
  sePrime: number; // Pa
  ka: number;
  kb: number;
  kc: number;
  kd: number;
  ke: number;
  kf: number;
  se: number; // Pa
}

export const DEFAULT_FATIGUE_CONFIG: FatigueConfig = {
  surface: "machined",
  reliability: "99%",
  temperature: 20,
  kf: 1,
};

// ─── Tables ──────────────────────────────────────────────────────────────────

const SURFACE_COEFFICIENTS: Record<SurfaceFinish, { a: number; b: number }> = {
  ground: { a: 1.58, b: -0.085 },
  machined: { a: 4.51, b: -0.265 },
  cold_rolled: { a: 4.51, b: -0.265 },
  hot_rolled: { a: 57.7, b: -0.718 },
  forged: { a: 272, b: -0.995 },
};

const LOAD_FACTORS: Record<LoadType, number> = {
  bending: 1.0,
  axial: 0.85,
  torsion: 0.59,
};

// °C → kd
const TEMPERATURE_FACTORS = new Map<number, number>([
  [20, 1.0],
  [50, 1.01],
  [100, 1.02],
  [150, 1.025],
  [200, 1.02],
  [250, 1.0],
  [300, 0.975],
  [350, 0.943],
  [400, 0.9],
  [450, 0.843],
  [500, 0.768],
  [550, 0.672],
  [600, 0.549],
]);

export const RELIABILITY_FACTORS = new Map<string, number>([
  ["50%", 1.0],
  ["90%", 0.897],
  ["95%", 0.868],
  ["99%", 0.814],
  ["99.9%", 0.753],
  ["99.99%", 0.702],
  ["99.999%", 0.659],
  ["99.9999%", 0.62],
]);

const DEFAULT_RELIABILITY_FACTOR = 0.814;

export const SURFACE_FINISHES: SurfaceFinish[] = ["ground", "machined", "cold_rolled", "hot_rolled", "forged"];
export const LOAD_TYPES: LoadType[] = ["bending", "axial", "torsion"];

function isSurfaceFinish(key: string): key is SurfaceFinish {
  return Object.hasOwn(SURFACE_COEFFICIENTS, key);
}

function isLoadType(key: string): key is LoadType {
  return Object.hasOwn(LOAD_FACTORS, key);
}

// ─── Factors ─────────────────────────────────────────────────────────────────

/** Uncorrected rotating-beam limit Se'. */
export function uncorrectedEnduranceLimit(sut: number): number {
  return sut <= 1400e6 ? 0.5 * sut : 700e6;
}

/** ka. Unknown finishes use the machined fit. */
export function surfaceFactor(sut: number, surface: string): number {
  const { a, b } = isSurfaceFinish(surface) ? SURFACE_COEFFICIENTS[surface] : SURFACE_COEFFICIENTS.machined;
  return a * Math.pow(sut / 1e6, b);
}

/** kb for a diameter in mm. Axial loading has no size effect. */
export function sizeFactor(loadType: string, diameter: number): number {
  if (loadType === "axial") return 1;
  if (diameter < 2.79) return 1.24 * Math.pow(2.79, -0.107);
  if (diameter <= 51) return 1.24 * Math.pow(diameter, -0.107);
  if (diameter <= 254) return 1.51 * Math.pow(diameter, -0.157);
  return 0.6;
}

/** kc. Unknown load types count as bending. */
export function loadFactor(loadType: string): number {
  return isLoadType(loadType) ? LOAD_FACTORS[loadType] : 1.0;
}

/** kd: tabulated values, polynomial fit elsewhere. */
export function temperatureFactor(temperature: number): number {
  const tabulated = TEMPERATURE_FACTORS.get(temperature);
  if (tabulated !== undefined) return tabulated;

  const t = temperature;
  const kd =
    0.9877 +
    0.6507e-3 * t -
    0.3414e-5 * t ** 2 +
    0.562e-8 * t ** 3 -
    6.246e-12 * t ** 4;
  return Math.min(1.025, Math.max(0.1, kd));
}

/** ke. Unmatched keys use the 99% value. */
export function reliabilityFactor(reliability: string): number {
  return RELIABILITY_FACTORS.get(reliability) ?? DEFAULT_RELIABILITY_FACTOR;
}

export interface EnduranceOptions {
  /** Diameter guess for the size factor, mm. */
  diameter?: number;
  loadType?: string;
  config?: Partial<FatigueConfig>;
}

export function marinFactors(sut: number, options: EnduranceOptions = {}): MarinFactors {
  const config = { ...DEFAULT_FATIGUE_CONFIG, ...options.config };
  const loadType = options.loadType ?? "bending";

  const sePrime = uncorrectedEnduranceLimit(sut);
  const ka = surfaceFactor(sut, config.surface);
  const kb = sizeFactor(loadType, options.diameter ?? 50);
  const kc = loadFactor(loadType);
  const kd = temperatureFactor(config.temperature);
  const ke = reliabilityFactor(config.reliability);
  const kf = config.kf;

  return { sePrime, ka, kb, kc, kd, ke, kf, se: ka * kb * kc * kd * ke * kf * sePrime };
}

/** Corrected endurance limit Se, Pa. */
export function calculateEnduranceLimit(sut: number, options: EnduranceOptions = {}): number {
  return marinFactors(sut, options).se;
}
