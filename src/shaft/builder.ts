/**
 * Builds a Shaft from a flat list of design features.
 *
 * The design is plain data (start diameter, length, material, features) so it
 * can be edited, serialized and rebuilt between optimizer iterations without
 * touching a live model.
 */
import { Shaft, type Bearing, type Pulley, type SpurGear, type StressFeature } from "./geometry.js";
import { createTorque, RadialForce, type Torque, type TorqueInput } from "./loads.js";
import type { Material } from "./materials.js";

// ─── Features ────────────────────────────────────────────────────────────────

interface FeatureBase {
  id: string;
  position: number; // mm
}

/** Diameter change: from `position` on, the shaft has `diameter`. */
export interface ShoulderFeature extends FeatureBase {
  type: "shoulder";
  diameter: number;
  stress?: StressFeature;
}

export interface BearingFeature extends FeatureBase {
  type: "bearing";
  name?: string;
  width?: number;
  fixedAxial?: boolean;
  bearingType?: string;
}

/** Role of a power-transmitting element: input drives the shaft, output is driven by it. */
export type PowerRole = "input" | "output";

interface PowerElementFields {
  name?: string;
  width?: number;
  /** Direction of the transmitted force, deg, 0 = +Y. */
  contactAngle?: number;
  powerKw?: number;
  rpm?: number;
  role?: PowerRole;
  /** Manually specified force components, N. */
  fy?: number;
  fz?: number;
  torque?: Omit<TorqueInput, "position" | "name">;
  stress?: StressFeature;
}

export interface SpurGearFeature extends FeatureBase, PowerElementFields {
  type: "spur_gear";
  pitchDiameter: number;
  pressureAngle?: number;
}

export interface PulleyFeature extends FeatureBase, PowerElementFields {
  type: "pulley";
  diameter: number;
}

export interface ForceFeature extends FeatureBase {
  type: "force";
  magnitude: number;
  angle?: number;
  name?: string;
}

export interface TorqueFeature extends FeatureBase, Omit<TorqueInput, "position"> {
  type: "torque";
}

/** Keyway, groove or other stress raiser away from a shoulder. */
export interface StressRaiserFeature extends FeatureBase {
  type: "stress_raiser";
  stress: StressFeature;
}

export type ShaftFeature =
  | ShoulderFeature
  | BearingFeature
  | SpurGearFeature
  | PulleyFeature
  | ForceFeature
  | TorqueFeature
  | StressRaiserFeature;

export interface ShaftDesign {
  startDiameter: number; // mm
  totalLength: number; // mm
  material: Material;
  features: ShaftFeature[];
}

const MIN_LOAD = 1e-6;

// ─── Helpers ─────────────────────────────────────────────────────────────────

/** Shoulders that fall on the shaft, sorted by position. */
export function shoulderFeatures(design: ShaftDesign): ShoulderFeature[] {
  return design.features
    .filter((f): f is ShoulderFeature => f.type === "shoulder")
    .filter((f) => f.position >= 0 && f.position < design.totalLength)
    .sort((a, b) => a.position - b.position);
}

/** Torque (N·m) carried at `powerKw` and `rpm`; zero without both. */
export function transmittedTorque(powerKw: number | undefined, rpm: number | undefined): number {
  if (!powerKw || !rpm) return 0;
  const omega = (rpm * 2 * Math.PI) / 60;
  return (powerKw * 1000) / omega;
}

interface ElementLoads {
  forces: RadialForce[];
  torques: Torque[];
}

/**
 * Loads a gear or pulley puts on the shaft: the force and torque from the
 * transmitted power, plus any manual components.
 */
export function elementLoads(feature: SpurGearFeature | PulleyFeature, name: string): ElementLoads {
  const forces: RadialForce[] = [];
  const torques: Torque[] = [];
  const { position } = feature;

  const torque = transmittedTorque(feature.powerKw, feature.rpm);
  const diameter = feature.type === "spur_gear" ? feature.pitchDiameter : feature.diameter;
  if (torque !== 0 && diameter > 0) {
    const tangential = (2 * torque) / (diameter / 1000);
    const radial =
      feature.type === "spur_gear"
        ? tangential * Math.tan(((feature.pressureAngle ?? 20) * Math.PI) / 180)
        : 0;
    const transverse = Math.sqrt(tangential ** 2 + radial ** 2);
    forces.push(new RadialForce(position, transverse, feature.contactAngle ?? 0, name));

    const sign = (feature.role ?? "input") === "input" ? 1 : -1;
    torques.push(createTorque({ position, mean: sign * torque, name }));
  }

  const manual = RadialForce.fromComponents(position, feature.fy ?? 0, feature.fz ?? 0, name);
  if (manual.magnitude > MIN_LOAD) forces.push(manual);

  if (feature.torque) {
    const t = createTorque({ ...feature.torque, position, name });
    if (Math.abs(t.mean) > MIN_LOAD || Math.abs(t.alternating) > MIN_LOAD) torques.push(t);
  }

  return { forces, torques };
}

// ─── Builder ─────────────────────────────────────────────────────────────────

export function buildShaft(design: ShaftDesign): Shaft {
  const shaft = new Shaft(design.material);
  const start = design.startDiameter;

  shaft.addNode(0, { diameterLeft: start, diameterRight: start });

  let current = start;
  for (const shoulder of shoulderFeatures(design)) {
    shaft.addNode(shoulder.position, {
      diameterLeft: current,
      diameterRight: shoulder.diameter,
      stressConcentration: shoulder.stress,
    });
    current = shoulder.diameter;
  }
  shaft.addNode(design.totalLength, { diameterLeft: current, diameterRight: current });

  const bearings = design.features
    .filter((f): f is BearingFeature => f.type === "bearing")
    .sort((a, b) => a.position - b.position);
  bearings.forEach((feature, index) => {
    const bearing: Bearing = {
      kind: "bearing",
      name: feature.name ?? `Bearing ${String.fromCharCode(65 + index)}`,
      width: feature.width ?? 20,
      fixedAxial: feature.fixedAxial ?? false,
      bearingType: feature.bearingType ?? "ball",
    };
    shaft.addNode(feature.position, { element: bearing });
  });

  for (const feature of design.features) {
    switch (feature.type) {
      case "spur_gear": {
        const name = feature.name ?? "Gear";
        const gear: SpurGear = {
          kind: "spur_gear",
          name,
          pitchDiameter: feature.pitchDiameter,
          width: feature.width ?? 20,
          pressureAngle: feature.pressureAngle ?? 20,
          contactAngle: feature.contactAngle ?? 0,
          powerKw: feature.powerKw,
          rpm: feature.rpm,
          ...elementLoads(feature, name),
        };
        shaft.addNode(feature.position, { element: gear, stressConcentration: feature.stress });
        break;
      }
      case "pulley": {
        const name = feature.name ?? "Pulley";
        const pulley: Pulley = {
          kind: "pulley",
          name,
          diameter: feature.diameter,
          width: feature.width ?? 20,
          powerKw: feature.powerKw,
          rpm: feature.rpm,
          ...elementLoads(feature, name),
        };
        shaft.addNode(feature.position, { element: pulley, stressConcentration: feature.stress });
        break;
      }
      case "stress_raiser":
        shaft.addNode(feature.position, { stressConcentration: feature.stress });
        break;
      case "force":
        shaft.forces.push(
          new RadialForce(feature.position, feature.magnitude, feature.angle ?? 0, feature.name ?? "Force"),
        );
        break;
      case "torque":
        shaft.torques.push(createTorque(feature));
        break;
      case "shoulder":
      case "bearing":
        break;
    }
  }

  return shaft;
}
