/**
 * Parses the JSON shaft description the shaft tools accept into a
 * ShaftDesign. Lengths are mm, forces N, torques N·m, angles degrees and
 * strengths MPa on the wire; the model works in Pa.
 *
 * Every malformed field throws an Error naming the field.
 */
import {
  buildShaft,
  type ShaftDesign,
  type ShaftFeature,
  type PowerRole,
  type PulleyFeature,
  type SpurGearFeature,
} from "../../shaft/builder.js";
import type { FatigueConfig } from "../../shaft/fatigue-factors.js";
import { POSITION_TOLERANCE, type StressFeature, type StressFeatureKind } from "../../shaft/geometry.js";
import { DEFAULT_MATERIAL, findMaterial, MATERIALS, type Material } from "../../shaft/materials.js";

type RawObject = Record<string, unknown>;

export function isRecord(value: unknown): value is RawObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ─── Field readers ───────────────────────────────────────────────────────────

function readNumber(raw: RawObject, key: string, field: string): number | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  const n = Number(value);
  if (typeof value === "boolean" || !Number.isFinite(n)) {
    throw new Error(`${field} must be a number.`);
  }
  return n;
}

function requirePositive(raw: RawObject, key: string, field: string): number {
  const n = readNumber(raw, key, field);
  if (n === undefined || n <= 0) throw new Error(`${field} must be a positive number.`);
  return n;
}

function optionalPositive(raw: RawObject, key: string, field: string): number | undefined {
  const n = readNumber(raw, key, field);
  if (n !== undefined && n <= 0) throw new Error(`${field} must be a positive number.`);
  return n;
}

export function round4(n: number): number {
  return Math.round(n * 10000) / 10000;
}

function optionalString(raw: RawObject, key: string): string | undefined {
  const value = raw[key];
  return typeof value === "string" && value.trim() !== "" ? value.trim() : undefined;
}

// ─── Material ────────────────────────────────────────────────────────────────

export function parseMaterial(raw: unknown, field = "material"): Material {
  if (raw === undefined || raw === null) return DEFAULT_MATERIAL;

  if (typeof raw === "string") {
    const found = findMaterial(raw);
    if (!found) {
      throw new Error(
        `Unknown ${field} '${raw}'. Must be one of: ${Object.keys(MATERIALS).join(", ")}, ` +
          "or an object with sut_mpa and sy_mpa.",
      );
    }
    return found;
  }

  if (!isRecord(raw)) throw new Error(`${field} must be a material name or an object.`);

  const sut = requirePositive(raw, "sut_mpa", `${field}.sut_mpa`);
  const sy = requirePositive(raw, "sy_mpa", `${field}.sy_mpa`);
  const e = optionalPositive(raw, "e_gpa", `${field}.e_gpa`) ?? 207;
  if (sy > sut) throw new Error(`${field}.sy_mpa must not exceed ${field}.sut_mpa.`);

  return {
    name: optionalString(raw, "name") ?? "Custom steel",
    Sut: sut * 1e6,
    Sy: sy * 1e6,
    E: e * 1e9,
  };
}

// ─── Fatigue settings ────────────────────────────────────────────────────────

export function parseFatigueConfig(raw: unknown, field = "fatigue"): Partial<FatigueConfig> {
  if (raw === undefined || raw === null) return {};
  if (!isRecord(raw)) throw new Error(`${field} must be an object.`);

  const config: Partial<FatigueConfig> = {};
  const surface = optionalString(raw, "surface");
  if (surface) config.surface = surface;
  const reliability = optionalString(raw, "reliability");
  if (reliability) config.reliability = reliability;
  const temperature = readNumber(raw, "temperature_c", `${field}.temperature_c`);
  if (temperature !== undefined) config.temperature = temperature;
  const kf = optionalPositive(raw, "misc_factor", `${field}.misc_factor`);
  if (kf !== undefined) config.kf = kf;
  return config;
}

// ─── Features ────────────────────────────────────────────────────────────────

const STRESS_KINDS: StressFeatureKind[] = ["fillet", "keyway", "groove", "general"];

function parseStress(raw: unknown, field: string): StressFeature | undefined {
  if (raw === undefined || raw === null) return undefined;
  if (!isRecord(raw)) throw new Error(`${field} must be an object.`);

  const kindRaw = optionalString(raw, "kind") ?? "general";
  const kind = STRESS_KINDS.find((k) => k === kindRaw);
  if (!kind) throw new Error(`Invalid ${field}.kind '${kindRaw}'. Must be one of: ${STRESS_KINDS.join(", ")}.`);

  const kfBending = readNumber(raw, "kf_bending", `${field}.kf_bending`) ?? 1;
  const kfTorsion = readNumber(raw, "kf_torsion", `${field}.kf_torsion`) ?? 1;
  if (kfBending < 1) throw new Error(`${field}.kf_bending must be at least 1.`);
  if (kfTorsion < 1) throw new Error(`${field}.kf_torsion must be at least 1.`);

  return {
    kind,
    description: optionalString(raw, "description") ?? kind,
    kfBending,
    kfTorsion,
    radius: optionalPositive(raw, "radius_mm", `${field}.radius_mm`),
    width: optionalPositive(raw, "width_mm", `${field}.width_mm`),
    depth: optionalPositive(raw, "depth_mm", `${field}.depth_mm`),
  };
}

function parseRole(raw: RawObject, field: string): PowerRole | undefined {
  const role = optionalString(raw, "role");
  if (role === undefined) return undefined;
  if (role !== "input" && role !== "output") {
    throw new Error(`${field}.role must be 'input' or 'output'.`);
  }
  return role;
}

function parseTorqueValues(raw: RawObject, field: string) {
  return {
    mean: readNumber(raw, "mean_nm", `${field}.mean_nm`),
    alternating: readNumber(raw, "alternating_nm", `${field}.alternating_nm`),
    magnitude: readNumber(raw, "magnitude_nm", `${field}.magnitude_nm`),
  };
}

function parsePowerFields(raw: RawObject, field: string) {
  const torque = isRecord(raw.torque) ? parseTorqueValues(raw.torque, `${field}.torque`) : undefined;
  return {
    name: optionalString(raw, "name"),
    width: optionalPositive(raw, "width_mm", `${field}.width_mm`),
    contactAngle: readNumber(raw, "contact_angle_deg", `${field}.contact_angle_deg`),
    powerKw: optionalPositive(raw, "power_kw", `${field}.power_kw`),
    rpm: optionalPositive(raw, "rpm", `${field}.rpm`),
    role: parseRole(raw, field),
    fy: readNumber(raw, "fy_n", `${field}.fy_n`),
    fz: readNumber(raw, "fz_n", `${field}.fz_n`),
    torque,
    stress: parseStress(raw.stress, `${field}.stress`),
  };
}

function parseFeature(raw: unknown, index: number, totalLength: number): ShaftFeature {
  const field = `design.features[${index}]`;
  if (!isRecord(raw)) throw new Error(`${field} must be an object.`);

  const type = String(raw.type);
  const id = optionalString(raw, "id") ?? `${type}-${index + 1}`;
  const position = readNumber(raw, "position_mm", `${field}.position_mm`);
  if (position === undefined) throw new Error(`${field}.position_mm is required.`);
  if (position < 0 || position > totalLength) {
    throw new Error(`${field}.position_mm must be between 0 and design.total_length_mm (${totalLength}).`);
  }

  switch (type) {
    case "shoulder":
      if (position >= totalLength) {
        throw new Error(`${field}.position_mm must be less than design.total_length_mm (${totalLength}) for a shoulder.`);
      }
      return {
        id,
        type: "shoulder",
        position,
        diameter: requirePositive(raw, "diameter_mm", `${field}.diameter_mm`),
        stress: parseStress(raw.stress, `${field}.stress`),
      };
    case "bearing":
      return {
        id,
        type: "bearing",
        position,
        name: optionalString(raw, "name"),
        width: optionalPositive(raw, "width_mm", `${field}.width_mm`),
        fixedAxial: typeof raw.fixed_axial === "boolean" ? raw.fixed_axial : undefined,
        bearingType: optionalString(raw, "bearing_type"),
      };
    case "spur_gear": {
      const gear: SpurGearFeature = {
        id,
        type: "spur_gear",
        position,
        pitchDiameter: requirePositive(raw, "pitch_diameter_mm", `${field}.pitch_diameter_mm`),
        pressureAngle: readNumber(raw, "pressure_angle_deg", `${field}.pressure_angle_deg`),
        ...parsePowerFields(raw, field),
      };
      return gear;
    }
    case "pulley": {
      const pulley: PulleyFeature = {
        id,
        type: "pulley",
        position,
        diameter: requirePositive(raw, "diameter_mm", `${field}.diameter_mm`),
        ...parsePowerFields(raw, field),
      };
      return pulley;
    }
    case "force": {
      const magnitude = readNumber(raw, "magnitude_n", `${field}.magnitude_n`);
      if (magnitude === undefined) throw new Error(`${field}.magnitude_n is required.`);
      return {
        id,
        type: "force",
        position,
        magnitude,
        angle: readNumber(raw, "angle_deg", `${field}.angle_deg`),
        name: optionalString(raw, "name"),
      };
    }
    case "torque":
      return { id, type: "torque", position, name: optionalString(raw, "name"), ...parseTorqueValues(raw, field) };
    case "stress_raiser": {
      const stress = parseStress(raw.stress, `${field}.stress`);
      if (!stress) throw new Error(`${field}.stress is required.`);
      return { id, type: "stress_raiser", position, stress };
    }
    default:
      throw new Error(
        `Invalid ${field}.type '${type}'. Must be one of: shoulder, bearing, spur_gear, pulley, force, torque, stress_raiser.`,
      );
  }
}

// ─── Design ──────────────────────────────────────────────────────────────────

export function parseShaftDesign(raw: unknown): ShaftDesign {
  if (!isRecord(raw)) throw new Error("design is required and must be an object.");

  const startDiameter = requirePositive(raw, "start_diameter_mm", "design.start_diameter_mm");
  const totalLength = requirePositive(raw, "total_length_mm", "design.total_length_mm");
  const material = parseMaterial(raw.material, "design.material");

  const rawFeatures: unknown = raw.features ?? [];
  if (!Array.isArray(rawFeatures)) throw new Error("design.features must be an array.");
  const features = rawFeatures.map((f: unknown, i) => parseFeature(f, i, totalLength));

  const seen = new Set<string>();
  for (const f of features) {
    if (seen.has(f.id)) throw new Error(`Duplicate feature id '${f.id}'.`);
    seen.add(f.id);
  }
  checkElementPositions(features);

  return { startDiameter, totalLength, material, features };
}

const ELEMENT_TYPES: ReadonlySet<string> = new Set(["bearing", "spur_gear", "pulley"]);

/** A node holds one element; a second one at the same position would replace the first. */
function checkElementPositions(features: ShaftFeature[]): void {
  features.forEach((feature, i) => {
    if (!ELEMENT_TYPES.has(feature.type)) return;
    const j = features.findIndex(
      (other, k) =>
        k < i && ELEMENT_TYPES.has(other.type) && Math.abs(other.position - feature.position) < POSITION_TOLERANCE,
    );
    if (j !== -1) {
      throw new Error(
        `design.features[${i}].position_mm coincides with design.features[${j}] (${features[j]?.type}); ` +
          "bearings, gears and pulleys need distinct positions.",
      );
    }
  });
}

/** Statics needs exactly two supports at distinct positions; anything else yields no reactions. */
export function requireTwoBearings(design: ShaftDesign): void {
  const count = design.features.filter((f) => f.type === "bearing").length;
  if (count !== 2) {
    throw new Error(`design.features must contain exactly 2 bearings (found ${count}).`);
  }

  const nodes = buildShaft(design).getBearingNodes();
  const [a, b] = nodes;
  if (nodes.length !== 2 || !a || !b || Math.abs(b.position - a.position) < POSITION_TOLERANCE) {
    throw new Error(`design.features bearings must sit on 2 distinct shaft positions (found ${nodes.length}).`);
  }
}

// ─── Options ─────────────────────────────────────────────────────────────────

/** Rounded, clamped integer option; `fallback` when absent or not finite. */
export function clampedInteger(value: unknown, fallback: number, min: number, max: number): number {
  return typeof value === "number" && Number.isFinite(value)
    ? Math.max(min, Math.min(max, Math.round(value)))
    : fallback;
}

export function parseSafetyFactor(value: unknown): number {
  if (value === undefined || value === null) return 2;
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) throw new Error("safety_factor must be a positive number.");
  return n;
}
