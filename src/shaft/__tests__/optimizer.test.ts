import { describe, it, expect } from "vitest";
import { buildShaft, type ShaftDesign } from "../builder.js";
import { DEFAULT_MATERIAL } from "../materials.js";
import { controllingZone, optimizeShaft, segmentRequirements, START_ZONE } from "../optimizer.js";
import { calculateDiagrams } from "../statics.js";

/** 500 mm AISI 1020 shaft, bearings at the ends, 1000 N at mid-span. */
function centerLoaded(extra: ShaftDesign["features"] = []): ShaftDesign {
  return {
    startDiameter: 20,
    totalLength: 500,
    material: DEFAULT_MATERIAL,
    features: [
      { id: "ba", type: "bearing", position: 0 },
      { id: "bb", type: "bearing", position: 500 },
      { id: "f1", type: "force", position: 250, magnitude: 1000 },
      ...extra,
    ],
  };
}

describe("controllingZone", () => {
  it("assigns positions to the last shoulder at or before them", () => {
    const design = centerLoaded([
      { id: "s1", type: "shoulder", position: 100, diameter: 25 },
      { id: "s2", type: "shoulder", position: 400, diameter: 15 },
    ]);
    expect(controllingZone(design, 0)).toBe(START_ZONE);
    expect(controllingZone(design, 99)).toBe(START_ZONE);
    expect(controllingZone(design, 100)).toBe("s1");
    expect(controllingZone(design, 450)).toBe("s2");
  });
});

describe("segmentRequirements", () => {
  it("rounds each segment's requirement up to the catalog", () => {
    const design = centerLoaded([{ id: "s1", type: "shoulder", position: 400, diameter: 15 }]);
    const shaft = buildShaft(design);
    const requirements = segmentRequirements(design, shaft, calculateDiagrams(shaft));

    expect(requirements.map((r) => [r.zone, r.rounded])).toEqual([
      [START_ZONE, 30],
      ["s1", 20],
    ]);
    expect(requirements[1]!.required).toBeCloseTo(19.5238, 3);
  });

  it("raises the requirement at a stress raiser", () => {
    const design = centerLoaded();
    const plain = buildShaft(design);
    const plainReq = segmentRequirements(design, plain, calculateDiagrams(plain));

    const notched = centerLoaded([
      {
        id: "k",
        type: "stress_raiser",
        position: 250,
        stress: { kind: "keyway", description: "keyway", kfBending: 1.5, kfTorsion: 1.5 },
      },
    ]);
    const shaft = buildShaft(notched);
    const notchedReq = segmentRequirements(notched, shaft, calculateDiagrams(shaft));

    expect(plainReq).toHaveLength(1);
    expect(notchedReq).toHaveLength(2);
    expect(notchedReq[0]!.required / plainReq[0]!.required).toBeCloseTo(1.144714, 5);
  });
});

describe("optimizeShaft", () => {
  it("grows an undersized shaft to a catalog size and stops", () => {
    const result = optimizeShaft(centerLoaded());

    expect(result.success).toBe(true);
    expect(result.log).toEqual(["Start Segments: 20 -> 30"]);
    expect(result.iterations).toBe(2);
    expect(result.design.startDiameter).toBe(30);
    expect(result.shaft.nodes[0]!.diameterRight).toBe(30);
  });

  it("leaves an optimized design alone", () => {
    const first = optimizeShaft(centerLoaded());
    const second = optimizeShaft(first.design);

    expect(second.log).toEqual([]);
    expect(second.iterations).toBe(1);
    expect(second.design).toEqual(first.design);
  });

  it("sizes every zone separately", () => {
    const design = centerLoaded([{ id: "s1", type: "shoulder", position: 400, diameter: 15 }]);
    const result = optimizeShaft(design);

    expect(result.log).toEqual(["Start Segments: 20 -> 30", "Shoulder @ 400: 15 -> 20"]);
    expect(result.design.startDiameter).toBe(30);
    expect(result.design.features.find((f) => f.id === "s1")).toMatchObject({ diameter: 20 });
  });

  it("does not modify the input design", () => {
    const design = centerLoaded([{ id: "s1", type: "shoulder", position: 400, diameter: 15 }]);
    optimizeShaft(design);
    expect(design.startDiameter).toBe(20);
    expect(design.features.find((f) => f.id === "s1")).toMatchObject({ diameter: 15 });
  });

  it("shrinks an oversized shaft", () => {
    const result = optimizeShaft({ ...centerLoaded(), startDiameter: 60 });
    expect(result.log).toEqual(["Start Segments: 60 -> 30"]);
  });

  it("stops at the iteration cap", () => {
    const result = optimizeShaft(centerLoaded(), { maxIterations: 1 });
    expect(result.success).toBe(true);
    expect(result.iterations).toBe(1);
    expect(result.design.startDiameter).toBe(30);
  });

  it("fails when there is nothing to analyse", () => {
    const result = optimizeShaft({ ...centerLoaded(), totalLength: 0, features: [] });
    expect(result.success).toBe(false);
    expect(result.message).toBe("Analysis failed to run.");
    expect(result.iterations).toBe(1);
  });
});
