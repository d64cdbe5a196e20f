/**
 * Geometry model of a stepped circular shaft.
 *
 * The shaft is an ordered list of nodes. Each node carries the diameter on
 * either side and may hold a machine element (bearing, gear, pulley) or a
 * stress raiser. Segments between consecutive nodes are derived on demand.
 */
import { RadialForce, type Torque } from "./loads.js";
import type { Material } from "./materials.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface Bearing {
  kind: "bearing";
  name: string;
  width: number; // mm
  fixedAxial: boolean;
  bearingType: string;
}

export interface SpurGear {
  kind: "spur_gear";
  name: string;
  pitchDiameter: number; // mm
  width: number; // mm
  pressureAngle: number; // deg
  contactAngle: number; // deg, 0 = +Y
  powerKw?: number;
  rpm?: number;
  forces: RadialForce[];
  torques: Torque[];
}

export interface Pulley {
  kind: "pulley";
  name: string;
  diameter: number; // mm
  width: number; // mm
  powerKw?: number;
  rpm?: number;
  forces: RadialForce[];
  torques: Torque[];
}

export type ShaftElement = Bearing | SpurGear | Pulley;

export type StressFeatureKind = "fillet" | "keyway" | "groove" | "general";

export interface StressFeature {
  kind: StressFeatureKind;
  description: string;
  kfBending: number;
  kfTorsion: number;
  /** Fillet radius (mm). */
  radius?: number;
  /** Groove width and depth (mm). */
  width?: number;
  depth?: number;
}

export interface ShaftNode {
  position: number; // mm
  diameterLeft: number; // mm
  diameterRight: number; // mm
  element?: ShaftElement;
  stressConcentration?: StressFeature;
}

export interface ShaftSegment {
  startNode: ShaftNode;
  endNode: ShaftNode;
  length: number;
  diameter: number;
}

export interface NodeFields {
  diameterLeft?: number;
  diameterRight?: number;
  element?: ShaftElement;
  stressConcentration?: StressFeature;
}

export interface ShaftLoads {
  forces: RadialForce[];
  torques: Torque[];
}

export const POSITION_TOLERANCE = 1e-5; // mm
export const DEFAULT_DIAMETER = 20; // mm

export function isShoulder(node: ShaftNode): boolean {
  return node.diameterLeft !== node.diameterRight;
}

export function isBearing(element: ShaftElement | undefined): element is Bearing {
  return element?.kind === "bearing";
}

// ─── Shaft ───────────────────────────────────────────────────────────────────

export class Shaft {
  nodes: ShaftNode[] = [];
  forces: RadialForce[] = [];
  torques: Torque[] = [];

  constructor(public material: Material) {}

  /**
   * Inserts a node, or merges the given fields into a node already within
   * POSITION_TOLERANCE of `position`.
   */
  addNode(position: number, fields: NodeFields = {}): ShaftNode {
    const existing = this.nodes.find((n) => Math.abs(n.position - position) < POSITION_TOLERANCE);
    if (existing) {
      if (fields.diameterLeft !== undefined) existing.diameterLeft = fields.diameterLeft;
      if (fields.diameterRight !== undefined) existing.diameterRight = fields.diameterRight;
      if (fields.element !== undefined) existing.element = fields.element;
      if (fields.stressConcentration !== undefined) {
        existing.stressConcentration = fields.stressConcentration;
      }
      return existing;
    }

    const nearest = this.diameterAt(position);
    const node: ShaftNode = {
      position,
      diameterLeft: fields.diameterLeft ?? nearest,
      diameterRight: fields.diameterRight ?? nearest,
      element: fields.element,
      stressConcentration: fields.stressConcentration,
    };
    this.nodes.push(node);
    this.nodes.sort((a, b) => a.position - b.position);
    return node;
  }

  /**
   * Diameter of the material at `position`: the segment it falls into, the
   * nearest end past either end of the shaft, DEFAULT_DIAMETER when empty.
   */
  diameterAt(position: number): number {
    const first = this.nodes[0];
    if (!first) return DEFAULT_DIAMETER;
    if (position < first.position) return first.diameterLeft;

    let diameter = first.diameterRight;
    for (const node of this.nodes) {
      if (node.position > position) break;
      diameter = node.diameterRight;
    }
    return diameter;
  }

  getSegments(): ShaftSegment[] {
    const segments: ShaftSegment[] = [];
    for (let i = 0; i < this.nodes.length - 1; i++) {
      const startNode = this.nodes[i]!;
      const endNode = this.nodes[i + 1]!;
      segments.push({
        startNode,
        endNode,
        length: endNode.position - startNode.position,
        diameter: startNode.diameterRight,
      });
    }
    return segments;
  }

  getTotalLength(): number {
    const first = this.nodes[0];
    const last = this.nodes[this.nodes.length - 1];
    if (!first || !last) return 0;
    return last.position - first.position;
  }

  getBearingNodes(): ShaftNode[] {
    return this.nodes.filter((n) => isBearing(n.element));
  }

  /** Shaft-level loads plus loads carried by gears and pulleys. */
  getAllLoads(): ShaftLoads {
    const forces = [...this.forces];
    const torques = [...this.torques];

    for (const node of this.nodes) {
      const element = node.element;
      if (!element || element.kind === "bearing") continue;
      for (const f of element.forces) forces.push(f.at(node.position));
      for (const t of element.torques) torques.push({ ...t, position: node.position });
    }

    return { forces, torques };
  }

  reset(): void {
    this.nodes = [];
    this.forces = [];
    this.torques = [];
  }
}
