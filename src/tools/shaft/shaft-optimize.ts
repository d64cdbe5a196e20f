/**
 * Shaft diameter optimization tool.
 *
 * Iteratively resizes the start diameter and every shoulder to the smallest
 * standard diameter that meets the fatigue safety factor, keeping length,
 * shoulder positions and loads fixed.
 */
import type { ShaftDesign } from "../../shaft/builder.js";
import { STANDARD_DIAMETERS } from "../../shaft/catalogs.js";
import { optimizeShaft, START_ZONE } from "../../shaft/optimizer.js";
import {
  clampedInteger,
  isRecord,
  parseFatigueConfig,
  parseSafetyFactor,
  parseShaftDesign,
  requireTwoBearings,
} from "./design-input.js";
import { DESIGN_SCHEMA, FATIGUE_SCHEMA } from "./schema.js";

interface ZoneDiameter {
  zone: string;
  position_mm: number;
  before_mm: number;
  after_mm: number;
}

/** Start diameter and every shoulder, before and after. */
function zoneDiameters(before: ShaftDesign, after: ShaftDesign): ZoneDiameter[] {
  const zones: ZoneDiameter[] = [
    { zone: START_ZONE, position_mm: 0, before_mm: before.startDiameter, after_mm: after.startDiameter },
  ];
  for (const feature of after.features) {
    if (feature.type !== "shoulder") continue;
    const original = before.features.find((f) => f.id === feature.id);
    zones.push({
      zone: feature.id,
      position_mm: feature.position,
      before_mm: original?.type === "shoulder" ? original.diameter : feature.diameter,
      after_mm: feature.diameter,
    });
  }
  return zones.sort((a, b) => a.position_mm - b.position_mm);
}

function parseCatalog(raw: unknown): number[] | undefined {
  if (raw === undefined || raw === null) return undefined;
  if (!Array.isArray(raw) || raw.length === 0) {
    throw new Error("catalog_mm must be a non-empty array of diameters.");
  }
  const catalog = raw.map((d: unknown) => Number(d));
  if (catalog.some((d) => !Number.isFinite(d) || d <= 0)) {
    throw new Error("catalog_mm must contain only positive numbers.");
  }
  return catalog.sort((a, b) => a - b);
}

export function createShaftOptimizeToolDefinition() {
  return {
    name: "shaft_optimize",
    label: "Shaft Optimize",
    description:
      "Size a stepped shaft for fatigue. Repeats statics and DE-ASME elliptic sizing, rounding " +
      "each segment up to a standard diameter and updating the start diameter and every shoulder " +
      "until nothing changes or the iteration limit is reached. Returns the change log and the " +
      "resulting design.",
    parameters: {
      type: "object",
      properties: {
        design: DESIGN_SCHEMA,
        safety_factor: {
          type: "number",
          description: "Target fatigue safety factor (default: 2).",
          exclusiveMinimum: 0,
        },
        max_iterations: {
          type: "number",
          description: "Maximum number of resize passes (default: 5).",
          minimum: 1,
          maximum: 50,
        },
        fatigue: FATIGUE_SCHEMA,
        catalog_mm: {
          type: "array",
          items: { type: "number" },
          description: `Standard diameters in mm (default: ${STANDARD_DIAMETERS.join(", ")}).`,
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
      const maxIterations = clampedInteger(params.max_iterations, 5, 1, 50);
      const fatigue = parseFatigueConfig(params.fatigue);
      const catalog = parseCatalog(params.catalog_mm);

      const result = optimizeShaft(design, { safetyFactor, maxIterations, fatigue, catalog });
      const zones = zoneDiameters(design, result.design);

      const summary = [
        `Shaft Optimization: L = ${design.totalLength} mm | Material: ${design.material.name} | n = ${safetyFactor}`,
        ``,
        result.success
          ? `Finished after ${result.iterations} iteration${result.iterations === 1 ? "" : "s"}.`
          : `Failed: ${result.message ?? "unknown error"}`,
        ``,
        `Changes:`,
        ...(result.log.length > 0 ? result.log.map((entry) => `  ${entry}`) : ["  (none)"]),
        ``,
        `Diameters:`,
        ...zones.map(
          (z) =>
            `  ${z.zone === START_ZONE ? "Start" : `Shoulder ${z.zone} @ ${z.position_mm} mm`}: ` +
            `${z.before_mm} -> ${z.after_mm} mm`,
        ),
      ];

      const output = {
        success: result.success,
        message: result.message,
        iterations: result.iterations,
        log: result.log,
        zones,
        start_diameter_mm: result.design.startDiameter,
      };

      return {
        content: [
          { type: "text", text: summary.join("\n") },
          { type: "text", text: JSON.stringify(output, null, 2) },
        ],
        details: {
          success: result.success,
          iterations: result.iterations,
          changes: result.log.length,
        },
      };
    },
  };
}
