/**
 * Statics of a shaft on two bearings.
 *
 * Reactions come from moment and force balance in the vertical (Y) and
 * horizontal (Z) bending planes. Shear, bending and torque along the shaft are
 * superposed with Macaulay brackets.
 *
 * Units: positions mm, forces N, bending moments N·mm, torques N·m (as given
 * on the torque inputs). Divide moments by 1000 before comparing with torques.
 */
import type { Shaft } from "./geometry.js";
import { linspace, macaulay } from "./macaulay.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface BearingReaction {
  name: string;
  position: number;
  ry: number; // N
  rz: number; // N
}

export interface ShaftDiagrams {
  x: number[];
  /** Resultant shear magnitude √(Vy² + Vz²). */
  shear: number[];
  /** Alternating bending moment: the whole resultant moment on a rotating shaft. */
  ma: number[];
  /** Mean bending moment, always zero for transverse loads. */
  mm: number[];
  ta: number[];
  tm: number[];
  shearY: number[];
  shearZ: number[];
  momentY: number[];
  momentZ: number[];
}

export const DEFAULT_NUM_POINTS = 200;

// ─── Reactions ───────────────────────────────────────────────────────────────

/**
 * Reactions at the two bearings, ordered by position. Returns an empty list
 * unless the shaft has exactly two bearing nodes.
 */
export function calculateReactions(shaft: Shaft): BearingReaction[] {
  const bearings = shaft.getBearingNodes();
  const nodeA = bearings[0];
  const nodeB = bearings[1];
  if (bearings.length !== 2 || !nodeA || !nodeB) return [];

  const nameA = nodeA.element?.name ?? "Bearing A";
  const nameB = nodeB.element?.name ?? "Bearing B";
  const posA = nodeA.position;
  const posB = nodeB.position;
  const span = posB - posA;

  if (span === 0) {
    return [
      { name: nameA, position: posA, ry: 0, rz: 0 },
      { name: nameB, position: posB, ry: 0, rz: 0 },
    ];
  }

  const { forces } = shaft.getAllLoads();

  let momentY = 0;
  let sumY = 0;
  let momentZ = 0;
  let sumZ = 0;
  for (const f of forces) {
    const arm = f.position - posA;
    momentY += f.fy * arm;
    sumY += f.fy;
    momentZ += f.fz * arm;
    sumZ += f.fz;
  }

  const rby = -momentY / span;
  const ray = -rby - sumY;
  const rbz = -momentZ / span;
  const raz = -rbz - sumZ;

  return [
    { name: nameA, position: posA, ry: ray, rz: raz },
    { name: nameB, position: posB, ry: rby, rz: rbz },
  ];
}

// ─── Diagrams ────────────────────────────────────────────────────────────────

function emptyDiagrams(x: number[]): ShaftDiagrams {
  const zeros = () => x.map(() => 0);
  return {
    x,
    shear: zeros(),
    ma: zeros(),
    mm: zeros(),
    ta: zeros(),
    tm: zeros(),
    shearY: zeros(),
    shearZ: zeros(),
    momentY: zeros(),
    momentZ: zeros(),
  };
}

/**
 * Samples shear, bending and torque at `numPoints` evenly spaced positions
 * from 0 to the shaft length.
 *
 * A zero-length shaft gives empty arrays; a shaft whose reactions cannot be
 * solved gives zero-filled arrays over the sampled positions.
 */
export function calculateDiagrams(shaft: Shaft, numPoints = DEFAULT_NUM_POINTS): ShaftDiagrams {
  const length = shaft.getTotalLength();
  if (length === 0) return emptyDiagrams([]);

  const x = linspace(0, length, numPoints);
  const reactions = calculateReactions(shaft);
  if (reactions.length !== 2) return emptyDiagrams(x);

  const { forces, torques } = shaft.getAllLoads();
  const pointLoads = [
    ...reactions.map((r) => ({ position: r.position, fy: r.ry, fz: r.rz })),
    ...forces.map((f) => ({ position: f.position, fy: f.fy, fz: f.fz })),
  ];

  const result = emptyDiagrams(x);

  for (let i = 0; i < x.length; i++) {
    const xi = x[i]!;
    let vy = 0;
    let vz = 0;
    let my = 0;
    let mz = 0;

    for (const p of pointLoads) {
      const step = macaulay(xi, p.position, 0);
      const ramp = macaulay(xi, p.position, 1);
      vy += p.fy * step;
      vz += p.fz * step;
      my += p.fy * ramp;
      mz += p.fz * ramp;
    }

    let ta = 0;
    let tm = 0;
    for (const t of torques) {
      const step = macaulay(xi, t.position, 0);
      ta += t.alternating * step;
      tm += t.mean * step;
    }

    result.shearY[i] = vy;
    result.shearZ[i] = vz;
    result.shear[i] = Math.sqrt(vy * vy + vz * vz);
    result.momentY[i] = my;
    result.momentZ[i] = mz;
    // A static moment vector sweeps a fully reversed cycle on a rotating shaft.
    result.ma[i] = Math.sqrt(my * my + mz * mz);
    result.mm[i] = 0;
    result.ta[i] = ta;
    result.tm[i] = tm;
  }

  return result;
}
