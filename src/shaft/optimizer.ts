/**
 * Diameter optimizer.
 *
 * Fixed-point iteration: solve statics, size every segment for fatigue, round
 * up to the catalog, raise or lower each zone (start diameter or shoulder) to
 * the largest requirement found in it, rebuild, repeat until no zone changes
 * or the iteration cap is hit.
 */
import { buildShaft, shoulderFeatures, type ShaftDesign } from "./builder.js";
import { roundUpToStandard, STANDARD_DIAMETERS } from "./catalogs.js";
import { calculateMinDiameter, type FatigueStrengths, type SectionLoads } from "./fatigue.js";
import { calculateEnduranceLimit, DEFAULT_FATIGUE_CONFIG, type FatigueConfig } from "./fatigue-factors.js";
import { POSITION_TOLERANCE, type Shaft, type ShaftSegment } from "./geometry.js";
import { calculateDiagrams, DEFAULT_NUM_POINTS, type ShaftDiagrams } from "./statics.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface OptimizeOptions {
  safetyFactor?: number;
  maxIterations?: number;
  fatigue?: Partial<FatigueConfig>;
  /** Ascending standard diameters, mm. */
  catalog?: readonly number[];
}

export interface OptimizeResult {
  success: boolean;
  log: string[];
  message?: string;
  /** Design with the updated diameters. */
  design: ShaftDesign;
  /** Shaft built from `design`. */
  shaft: Shaft;
  iterations: number;
}

export interface SegmentRequirement {
  segment: ShaftSegment;
  /** Zone id: "START" or the controlling shoulder's feature id. */
  zone: string;
  /** Peak section loads over the segment, N·m. */
  loads: SectionLoads;
  strengths: FatigueStrengths;
  required: number; // mm
  rounded: number; // mm
}

export const START_ZONE = "START";
const DIAMETER_TOLERANCE = 1e-3; // mm

// ─── Zones ───────────────────────────────────────────────────────────────────

/** Zone that sets the diameter of a segment starting at `position`. */
export function controllingZone(design: ShaftDesign, position: number): string {
  let zone = START_ZONE;
  for (const shoulder of shoulderFeatures(design)) {
    if (shoulder.position <= position + POSITION_TOLERANCE) zone = shoulder.id;
    else break;
  }
  return zone;
}

function maxAbsWithin(values: number[], mask: boolean[]): number {
  let max = 0;
  values.forEach((v, i) => {
    if (mask[i]) max = Math.max(max, Math.abs(v));
  });
  return max;
}

function stressFactors(segment: ShaftSegment): { kf: number; kfs: number } {
  const features = [segment.startNode.stressConcentration, segment.endNode.stressConcentration];
  let kf = 1;
  let kfs = 1;
  for (const f of features) {
    if (!f) continue;
    kf = Math.max(kf, f.kfBending);
    kfs = Math.max(kfs, f.kfTorsion);
  }
  return { kf, kfs };
}

/**
 * Required and catalog-rounded diameter of every segment that contains at
 * least one diagram sample.
 */
export function segmentRequirements(
  design: ShaftDesign,
  shaft: Shaft,
  diagrams: ShaftDiagrams,
  options: OptimizeOptions = {},
): SegmentRequirement[] {
  const safetyFactor = options.safetyFactor ?? 2;
  const catalog = options.catalog ?? STANDARD_DIAMETERS;
  const config = { ...DEFAULT_FATIGUE_CONFIG, ...options.fatigue };
  const { Sut, Sy } = shaft.material;
  const requirements: SegmentRequirement[] = [];

  for (const segment of shaft.getSegments()) {
    const start = segment.startNode.position;
    const end = segment.endNode.position;
    const mask = diagrams.x.map((x) => x >= start && x <= end);
    if (!mask.some(Boolean)) continue;

    // Moments are N·mm, torques N·m.
    const loads: SectionLoads = {
      ma: maxAbsWithin(diagrams.ma, mask) / 1000,
      mm: maxAbsWithin(diagrams.mm, mask) / 1000,
      ta: maxAbsWithin(diagrams.ta, mask),
      tm: maxAbsWithin(diagrams.tm, mask),
    };

    // Size factor from the current diameter; not iterated to convergence.
    const se = calculateEnduranceLimit(Sut, { diameter: segment.diameter, config });
    const strengths: FatigueStrengths = { se, sy: Sy, ...stressFactors(segment) };
    const required = calculateMinDiameter(loads, strengths, safetyFactor);

    requirements.push({
      segment,
      zone: controllingZone(design, start),
      loads,
      strengths,
      required,
      rounded: roundUpToStandard(required, catalog),
    });
  }

  return requirements;
}

function zoneDiameter(design: ShaftDesign, zone: string): number | undefined {
  if (zone === START_ZONE) return design.startDiameter;
  const feature = design.features.find((f) => f.id === zone);
  return feature?.type === "shoulder" ? feature.diameter : undefined;
}

function withZoneDiameter(design: ShaftDesign, zone: string, diameter: number): ShaftDesign {
  if (zone === START_ZONE) return { ...design, startDiameter: diameter };
  return {
    ...design,
    features: design.features.map((f) =>
      f.id === zone && f.type === "shoulder" ? { ...f, diameter } : f,
    ),
  };
}

function zoneLabel(design: ShaftDesign, zone: string): string {
  if (zone === START_ZONE) return "Start Segments";
  const feature = design.features.find((f) => f.id === zone);
  return `Shoulder @ ${feature?.position ?? zone}`;
}

// ─── Optimizer ───────────────────────────────────────────────────────────────

/**
 * Sizes `design` for `safetyFactor`. Reaching `maxIterations` with changes
 * still pending counts as success; only an unsolvable shaft fails.
 */
export function optimizeShaft(design: ShaftDesign, options: OptimizeOptions = {}): OptimizeResult {
  const maxIterations = options.maxIterations ?? 5;
  const log: string[] = [];
  let current = design;
  let shaft = buildShaft(current);
  let iterations = 0;

  while (iterations < maxIterations) {
    iterations++;

    const diagrams = calculateDiagrams(shaft, DEFAULT_NUM_POINTS);
    if (diagrams.x.length === 0) {
      return {
        success: false,
        log,
        message: "Analysis failed to run.",
        design: current,
        shaft,
        iterations,
      };
    }

    const zoneRequirements = new Map<string, number>();
    for (const req of segmentRequirements(current, shaft, diagrams, options)) {
      zoneRequirements.set(req.zone, Math.max(zoneRequirements.get(req.zone) ?? 0, req.rounded));
    }

    let changed = false;
    for (const [zone, required] of zoneRequirements) {
      const existing = zoneDiameter(current, zone);
      if (existing === undefined || Math.abs(existing - required) <= DIAMETER_TOLERANCE) continue;
      log.push(`${zoneLabel(current, zone)}: ${existing} -> ${required}`);
      current = withZoneDiameter(current, zone, required);
      changed = true;
    }

    if (!changed) break;
    shaft = buildShaft(current);
  }

  return { success: true, log, design: current, shaft, iterations };
}
