import { describe, it, expect } from "vitest";
import { buildShaft, type ShaftDesign } from "../builder.js";
import { Shaft } from "../geometry.js";
import { linspace, macaulay, macaulayArray } from "../macaulay.js";
import { DEFAULT_MATERIAL } from "../materials.js";
import { calculateDiagrams, calculateReactions } from "../statics.js";

const steel = DEFAULT_MATERIAL;

/** 500 mm shaft on bearings at both ends with a 1000 N vertical load at mid-span. */
function simplySupported(): ShaftDesign {
  return {
    startDiameter: 30,
    totalLength: 500,
    material: steel,
    features: [
      { id: "ba", type: "bearing", position: 0 },
      { id: "bb", type: "bearing", position: 500 },
      { id: "f1", type: "force", position: 250, magnitude: 1000, angle: 0 },
    ],
  };
}

describe("macaulay", () => {
  it("is a unit step for n = 0", () => {
    expect(macaulayArray([0, 4.999, 5, 7], 5, 0)).toEqual([0, 0, 1, 1]);
  });

  it("is a ramp starting at zero for n = 1", () => {
    expect(macaulayArray([0, 5, 6, 8], 5, 1)).toEqual([0, 0, 1, 3]);
  });

  it("raises to the power for higher orders", () => {
    expect(macaulay(8, 5, 2)).toBe(9);
    expect(macaulay(4, 5, 2)).toBe(0);
  });

  it("ignores negative orders", () => {
    expect(macaulay(8, 5, -1)).toBe(0);
  });
});

describe("linspace", () => {
  it("samples both ends", () => {
    expect(linspace(0, 10, 5)).toEqual([0, 2.5, 5, 7.5, 10]);
    expect(linspace(0, 10, 1)).toEqual([0]);
    expect(linspace(0, 10, 0)).toEqual([]);
  });
});

describe("calculateReactions", () => {
  it("solves the simply supported case", () => {
    const reactions = calculateReactions(buildShaft(simplySupported()));
    expect(reactions.map((r) => r.name)).toEqual(["Bearing A", "Bearing B"]);
    expect(reactions[0]!.ry).toBeCloseTo(-500);
    expect(reactions[1]!.ry).toBeCloseTo(-500);
    expect(reactions[0]!.rz).toBeCloseTo(0);
    expect(reactions[1]!.rz).toBeCloseTo(0);
  });

  it("balances forces in both planes", () => {
    const design: ShaftDesign = {
      ...simplySupported(),
      features: [
        { id: "ba", type: "bearing", position: 50 },
        { id: "bb", type: "bearing", position: 420 },
        { id: "f1", type: "force", position: 120, magnitude: 800, angle: 30 },
        { id: "f2", type: "force", position: 480, magnitude: 450, angle: 200 },
        { id: "g1", type: "pulley", position: 300, diameter: 150, fy: -200, fz: 350 },
      ],
    };
    const shaft = buildShaft(design);
    const [a, b] = calculateReactions(shaft);
    const { forces } = shaft.getAllLoads();
    const sumFy = forces.reduce((s, f) => s + f.fy, 0);
    const sumFz = forces.reduce((s, f) => s + f.fz, 0);

    expect(a!.ry + b!.ry + sumFy).toBeCloseTo(0, 6);
    expect(a!.rz + b!.rz + sumFz).toBeCloseTo(0, 6);
  });

  it("is empty without exactly two bearings", () => {
    const design = simplySupported();
    design.features = design.features.filter((f) => f.id !== "bb");
    expect(calculateReactions(buildShaft(design))).toEqual([]);
  });

  it("returns zero reactions for a zero span", () => {
    const shaft = new Shaft(steel);
    const bearing = { kind: "bearing" as const, width: 20, fixedAxial: false, bearingType: "ball" };
    shaft.nodes = [
      { position: 100, diameterLeft: 30, diameterRight: 30, element: { ...bearing, name: "A" } },
      { position: 100, diameterLeft: 30, diameterRight: 30, element: { ...bearing, name: "B" } },
    ];
    expect(calculateReactions(shaft)).toEqual([
      { name: "A", position: 100, ry: 0, rz: 0 },
      { name: "B", position: 100, ry: 0, rz: 0 },
    ]);
  });
});

describe("calculateDiagrams", () => {
  it("peaks at 125 N·m under the load", () => {
    const diagrams = calculateDiagrams(buildShaft(simplySupported()), 201);
    expect(diagrams.x).toHaveLength(201);
    expect(diagrams.x[100]).toBe(250);
    expect(diagrams.ma[100]).toBeCloseTo(125000);
    expect(Math.max(...diagrams.ma)).toBeCloseTo(125000);
  });

  it("steps the shear at the load and closes at the far bearing", () => {
    const diagrams = calculateDiagrams(buildShaft(simplySupported()), 201);
    expect(diagrams.shearY[0]).toBeCloseTo(-500);
    expect(diagrams.shearY[99]).toBeCloseTo(-500);
    expect(diagrams.shearY[100]).toBeCloseTo(500);
    expect(diagrams.shear[200]).toBeCloseTo(0);
    expect(diagrams.ma[200]).toBeCloseTo(0);
  });

  it("treats all transverse bending as alternating", () => {
    const design = simplySupported();
    design.features.push({ id: "f2", type: "force", position: 100, magnitude: 600, angle: 90 });
    const diagrams = calculateDiagrams(buildShaft(design));

    expect(diagrams.mm.every((m) => m === 0)).toBe(true);
    diagrams.ma.forEach((ma, i) => {
      expect(ma).toBeCloseTo(Math.hypot(diagrams.momentY[i]!, diagrams.momentZ[i]!));
    });
  });

  it("steps torque at its position without balancing it", () => {
    const design = simplySupported();
    design.features.push({ id: "t1", type: "torque", position: 100, mean: 50, alternating: 5 });
    const diagrams = calculateDiagrams(buildShaft(design), 201);

    expect(diagrams.x[39]).toBe(97.5);
    expect(diagrams.tm[39]).toBe(0);
    expect(diagrams.tm[40]).toBe(50);
    expect(diagrams.ta[40]).toBe(5);
    expect(diagrams.tm[200]).toBe(50);
  });

  it("returns zero-filled arrays when reactions cannot be solved", () => {
    const design = simplySupported();
    design.features = design.features.filter((f) => f.type !== "bearing");
    const diagrams = calculateDiagrams(buildShaft(design), 50);

    expect(diagrams.x).toHaveLength(50);
    expect(diagrams.ma).toHaveLength(50);
    expect(diagrams.shear.every((v) => v === 0)).toBe(true);
    expect(diagrams.ma.every((v) => v === 0)).toBe(true);
  });

  it("returns empty arrays for a shaft without length", () => {
    const empty = calculateDiagrams(new Shaft(steel));
    expect(empty.x).toEqual([]);
    expect(empty.ma).toEqual([]);
    expect(empty.tm).toEqual([]);
  });
});
