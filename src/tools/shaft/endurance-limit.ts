/**
 * Endurance limit tool: Marin factor breakdown of Se for a material and
 * diameter.
 */
import { LOAD_TYPES, marinFactors, RELIABILITY_FACTORS, SURFACE_FINISHES } from "../../shaft/fatigue-factors.js";
import { isRecord, parseFatigueConfig, parseMaterial, round4 } from "./design-input.js";
import { FATIGUE_SCHEMA, MATERIAL_SCHEMA } from "./schema.js";

export function createEnduranceLimitToolDefinition() {
  return {
    name: "shaft_endurance_limit",
    label: "Endurance Limit",
    description:
      "Compute the corrected endurance limit Se of a steel shaft section with the Marin equation " +
      "(surface, size, load, temperature, reliability and miscellaneous factors). " +
      "Returns every factor and Se in MPa.",
    parameters: {
      type: "object",
      properties: {
        material: MATERIAL_SCHEMA,
        diameter_mm: {
          type: "number",
          description: "Section diameter in mm for the size factor (default: 50).",
          exclusiveMinimum: 0,
        },
        load_type: {
          type: "string",
          enum: LOAD_TYPES,
          description: "Loading for the load and size factors (default: bending).",
        },
        fatigue: FATIGUE_SCHEMA,
      },
      required: [],
    },
    execute: async (
      _toolCallId: string,
      args: unknown,
    ): Promise<{ content: Array<{ type: string; text: string }>; details?: unknown }> => {
      const params = isRecord(args) ? args : {};

      const material = parseMaterial(params.material);
      const diameter = Number(params.diameter_mm ?? 50);
      if (!Number.isFinite(diameter) || diameter <= 0) {
        throw new Error("diameter_mm must be a positive number.");
      }
      const loadType = String(params.load_type ?? "bending");
      if (!LOAD_TYPES.some((t) => t === loadType)) {
        throw new Error(`Invalid load_type '${loadType}'. Must be one of: ${LOAD_TYPES.join(", ")}.`);
      }
      const config = parseFatigueConfig(params.fatigue);
      if (config.surface !== undefined && !SURFACE_FINISHES.some((s) => s === config.surface)) {
        throw new Error(`Invalid fatigue.surface '${config.surface}'. Must be one of: ${SURFACE_FINISHES.join(", ")}.`);
      }
      if (config.reliability !== undefined && !RELIABILITY_FACTORS.has(config.reliability)) {
        throw new Error(
          `Invalid fatigue.reliability '${config.reliability}'. Must be one of: ${[...RELIABILITY_FACTORS.keys()].join(", ")}.`,
        );
      }

      const factors = marinFactors(material.Sut, { diameter, loadType, config });
      const result = {
        material: material.name,
        sut_mpa: round4(material.Sut / 1e6),
        diameter_mm: diameter,
        load_type: loadType,
        se_prime_mpa: round4(factors.sePrime / 1e6),
        ka: round4(factors.ka),
        kb: round4(factors.kb),
        kc: round4(factors.kc),
        kd: round4(factors.kd),
        ke: round4(factors.ke),
        kf: round4(factors.kf),
        se_mpa: round4(factors.se / 1e6),
      };

      const summary = [
        `Endurance Limit: ${result.material} (Sut = ${result.sut_mpa} MPa), Ø${diameter} mm, ${loadType}`,
        `  Se' = ${result.se_prime_mpa} MPa`,
        `  ka = ${result.ka}, kb = ${result.kb}, kc = ${result.kc}, kd = ${result.kd}, ke = ${result.ke}, kf = ${result.kf}`,
        `  Se = ${result.se_mpa} MPa`,
      ];

      return {
        content: [
          { type: "text", text: summary.join("\n") },
          { type: "text", text: JSON.stringify(result, null, 2) },
        ],
        details: { se_mpa: result.se_mpa },
      };
    },
  };
}
