/**
 * Shaft analysis tool.
 *
 * Solves bearing reactions and the shear, bending and torque distributions of
 * a stepped shaft, then checks every segment for fatigue with the DE-ASME
 * elliptic criterion. Optionally writes the profile and diagrams as SVG.
 */
import fs from "node:fs";
import path from "node:path";
import { buildShaft, type ShaftDesign } from "../../shaft/builder.js";
import { calculateSafetyFactor } from "../../shaft/fatigue.js";
import type { FatigueConfig } from "../../shaft/fatigue-factors.js";
import { segmentRequirements } from "../../shaft/optimizer.js";
import { calculateDiagrams, calculateReactions, DEFAULT_NUM_POINTS } from "../../shaft/statics.js";
import {
  clampedInteger,
  isRecord,
  parseFatigueConfig,
  parseSafetyFactor,
  parseShaftDesign,
  requireTwoBearings,
  round4,
} from "./design-input.js";
import { generateShaftSvg } from "./diagram-svg.js";
import { DESIGN_SCHEMA, FATIGUE_SCHEMA } from "./schema.js";

// ─── Types ───────────────────────────────────────────────────────────────────

interface ReactionResult {
  name: string;
  position_mm: number;
  ry_n: number;
  rz_n: number;
  resultant_n: number;
}

interface SegmentCheck {
  start_mm: number;
  end_mm: number;
  diameter_mm: number;
  kf: number;
  kfs: number;
  ma_nm: number;
  tm_nm: number;
  required_mm: number;
  standard_mm: number;
  safety_factor: number | null;
  status: "PASS" | "FAIL";
}

interface DiagramPoint {
  x_mm: number;
  shear_n: number;
  moment_nm: number;
  torque_mean_nm: number;
  torque_alt_nm: number;
}

export interface ShaftAnalysisResult {
  material: string;
  total_length_mm: number;
  safety_factor_target: number;
  reactions: ReactionResult[];
  max_shear_n: number;
  max_moment_nm: number;
  max_moment_at_mm: number;
  max_torque_nm: number;
  segments: SegmentCheck[];
  min_safety_factor: number | null;
  status: "PASS" | "FAIL";
  output_path?: string;
  diagram_points: DiagramPoint[];
}

export interface AnalysisOptions {
  numPoints?: number;
  safetyFactor?: number;
  fatigue?: Partial<FatigueConfig>;
  outputPath?: string;
  /** Maximum diagram points in the result; the analysis still uses numPoints. */
  maxOutputPoints?: number;
}

/** Infinity does not survive JSON; report an unloaded section as null. */
function finiteOrNull(n: number): number | null {
  return Number.isFinite(n) ? round4(n) : null;
}

// ─── Analysis ────────────────────────────────────────────────────────────────

export function analyzeShaft(design: ShaftDesign, options: AnalysisOptions = {}): ShaftAnalysisResult {
  const numPoints = options.numPoints ?? DEFAULT_NUM_POINTS;
  const target = options.safetyFactor ?? 2;

  const shaft = buildShaft(design);
  const reactions = calculateReactions(shaft);
  const diagrams = calculateDiagrams(shaft, numPoints);

  let maxShear = 0;
  let maxMoment = 0;
  let maxMomentAt = 0;
  let maxTorque = 0;
  diagrams.x.forEach((x, i) => {
    const shear = diagrams.shear[i] ?? 0;
    const moment = (diagrams.ma[i] ?? 0) / 1000;
    const torque = Math.max(Math.abs(diagrams.tm[i] ?? 0), Math.abs(diagrams.ta[i] ?? 0));
    if (shear > maxShear) maxShear = shear;
    if (moment > maxMoment) {
      maxMoment = moment;
      maxMomentAt = x;
    }
    if (torque > maxTorque) maxTorque = torque;
  });

  const segments: SegmentCheck[] = segmentRequirements(design, shaft, diagrams, {
    safetyFactor: target,
    fatigue: options.fatigue,
  }).map((req): SegmentCheck => {
    const n = calculateSafetyFactor(req.segment.diameter, req.loads, req.strengths);
    return {
      start_mm: req.segment.startNode.position,
      end_mm: req.segment.endNode.position,
      diameter_mm: req.segment.diameter,
      kf: req.strengths.kf ?? 1,
      kfs: req.strengths.kfs ?? 1,
      ma_nm: round4(req.loads.ma),
      tm_nm: round4(req.loads.tm),
      required_mm: round4(req.required),
      standard_mm: req.rounded,
      safety_factor: finiteOrNull(n),
      status: n >= target ? "PASS" : "FAIL",
    };
  });

  const factors = segments.map((s) => s.safety_factor).filter((n): n is number => n !== null);
  const minSafetyFactor = factors.length > 0 ? Math.min(...factors) : null;
  const status = segments.every((s) => s.status === "PASS") ? "PASS" : "FAIL";

  let savedPath: string | undefined;
  if (options.outputPath) {
    const title = `Shaft - L = ${design.totalLength} mm - ${design.material.name} - ${status}`;
    const svg = generateShaftSvg(shaft, diagrams, reactions, title);
    const resolvedPath = path.resolve(options.outputPath);
    fs.mkdirSync(path.dirname(resolvedPath), { recursive: true });
    fs.writeFileSync(resolvedPath, svg, "utf-8");
    savedPath = resolvedPath;
  }

  // Thin the diagram for the response, always keeping both ends.
  const maxOutput = options.maxOutputPoints ?? 50;
  const stride = Math.max(1, Math.ceil(diagrams.x.length / maxOutput));
  const diagramPoints: DiagramPoint[] = [];
  diagrams.x.forEach((x, i) => {
    if (i % stride !== 0 && i !== diagrams.x.length - 1) return;
    diagramPoints.push({
      x_mm: round4(x),
      shear_n: round4(diagrams.shear[i] ?? 0),
      moment_nm: round4((diagrams.ma[i] ?? 0) / 1000),
      torque_mean_nm: round4(diagrams.tm[i] ?? 0),
      torque_alt_nm: round4(diagrams.ta[i] ?? 0),
    });
  });

  return {
    material: design.material.name,
    total_length_mm: design.totalLength,
    safety_factor_target: target,
    reactions: reactions.map((r) => ({
      name: r.name,
      position_mm: r.position,
      ry_n: round4(r.ry),
      rz_n: round4(r.rz),
      resultant_n: round4(Math.hypot(r.ry, r.rz)),
    })),
    max_shear_n: round4(maxShear),
    max_moment_nm: round4(maxMoment),
    max_moment_at_mm: round4(maxMomentAt),
    max_torque_nm: round4(maxTorque),
    segments,
    min_safety_factor: minSafetyFactor,
    status,
    output_path: savedPath,
    diagram_points: diagramPoints,
  };
}

// ─── Tool definition ─────────────────────────────────────────────────────────

export function createShaftAnalysisToolDefinition() {
  return {
    name: "shaft_analysis",
    label: "Shaft Analysis",
    description:
      "Analyze a stepped rotating shaft on two bearings. Computes bearing reactions, shear, " +
      "resultant bending moment and torque along the shaft, and checks each segment for fatigue " +
      "(DE-ASME elliptic, Marin-corrected endurance limit) against a target safety factor. " +
      "Can save the shaft profile with moment and torque diagrams as SVG.",
    parameters: {
      type: "object",
      properties: {
        design: DESIGN_SCHEMA,
        safety_factor: {
          type: "number",
          description: "Target fatigue safety factor (default: 2).",
          exclusiveMinimum: 0,
        },
        fatigue: FATIGUE_SCHEMA,
        num_points: {
          type: "number",
          description: "Number of sample points along the shaft (default: 200).",
          minimum: 10,
          maximum: 2000,
        },
        output_path: {
          type: "string",
          description: "File path to save the shaft diagram as SVG. If not provided, no SVG is generated.",
        },
      },
      required: ["design"],
    },
    execute: async (
      _toolCallId: string,
      args: unknown,
    ): Promise<{ content: Array<{ type: string; text: string }>; details?: unknown }> => {
      const params = isRecord(args) ? args : {};

      const design = parseShaftDesign(params.design);
      requireTwoBearings(design);
      const safetyFactor = parseSafetyFactor(params.safety_factor);
      const fatigue = parseFatigueConfig(params.fatigue);
      const numPoints = clampedInteger(params.num_points, DEFAULT_NUM_POINTS, 10, 2000);
      const outputPath =
        typeof params.output_path === "string" ? params.output_path.trim() || undefined : undefined;

      const result = analyzeShaft(design, { numPoints, safetyFactor, fatigue, outputPath });

      const summary = [
        `Shaft Analysis: L = ${design.totalLength} mm | Material: ${result.material}`,
        ``,
        `Reactions:`,
        ...result.reactions.map(
          (r) => `  ${r.name} @ ${r.position_mm} mm: Ry = ${r.ry_n} N, Rz = ${r.rz_n} N (|R| = ${r.resultant_n} N)`,
        ),
        ``,
        `Extremes:`,
        `  Max Shear: ${result.max_shear_n} N`,
        `  Max Moment: ${result.max_moment_nm} N·m @ ${result.max_moment_at_mm} mm`,
        `  Max Torque: ${result.max_torque_nm} N·m`,
        ``,
        `Segments (target n = ${safetyFactor}):`,
        ...result.segments.map(
          (s) =>
            `  ${s.start_mm}-${s.end_mm} mm, Ø${s.diameter_mm}: required ${s.required_mm.toFixed(2)} mm ` +
            `(standard ${s.standard_mm}), n = ${s.safety_factor === null ? "∞" : s.safety_factor.toFixed(2)} ${s.status}`,
        ),
        ``,
        `Status: ${result.status}`,
      ];

      if (result.output_path) {
        summary.push(`Diagram saved to: ${result.output_path}`);
      }

      return {
        content: [
          { type: "text", text: summary.join("\n") },
          { type: "text", text: JSON.stringify(result, null, 2) },
        ],
        details: {
          status: result.status,
          min_safety_factor: result.min_safety_factor,
          max_moment_nm: result.max_moment_nm,
          max_torque_nm: result.max_torque_nm,
          failing_segments: result.segments.filter((s) => s.status === "FAIL").length,
        },
      };
    },
  };
}
