import { describe, it, expect } from "vitest";
import { isShoulder, Shaft, type Pulley } from "../geometry.js";
import { createTorque, RadialForce } from "../loads.js";
import { MATERIALS, findMaterial } from "../materials.js";

const steel = MATERIALS["AISI 1045"]!;

function steppedShaft(): Shaft {
  const shaft = new Shaft(steel);
  shaft.addNode(0, { diameterLeft: 30, diameterRight: 30 });
  shaft.addNode(100, { diameterLeft: 30, diameterRight: 40 });
  shaft.addNode(200, { diameterLeft: 40, diameterRight: 40 });
  return shaft;
}

describe("RadialForce", () => {
  it("splits the force into Y and Z components", () => {
    const vertical = new RadialForce(0, 100, 0);
    expect(vertical.fy).toBeCloseTo(100);
    expect(vertical.fz).toBeCloseTo(0);

    const horizontal = new RadialForce(0, 100, 90);
    expect(horizontal.fy).toBeCloseTo(0);
    expect(horizontal.fz).toBeCloseTo(100);
  });

  it("builds a force from its components", () => {
    const f = RadialForce.fromComponents(50, 3, 4);
    expect(f.magnitude).toBeCloseTo(5);
    expect(f.angle).toBeCloseTo((Math.atan2(4, 3) * 180) / Math.PI);
    expect(f.fy).toBeCloseTo(3);
    expect(f.fz).toBeCloseTo(4);
  });
});

describe("createTorque", () => {
  it("reads a lone magnitude as mean torque", () => {
    const t = createTorque({ position: 10, magnitude: 50 });
    expect(t.mean).toBe(50);
    expect(t.alternating).toBe(0);
  });

  it("keeps an explicit mean over the magnitude", () => {
    const t = createTorque({ position: 10, magnitude: 50, mean: 20, alternating: 5 });
    expect(t.mean).toBe(20);
    expect(t.alternating).toBe(5);
  });
});

describe("Shaft.addNode", () => {
  it("defaults an empty shaft to 20 mm", () => {
    const shaft = new Shaft(steel);
    const node = shaft.addNode(0);
    expect(node.diameterLeft).toBe(20);
    expect(node.diameterRight).toBe(20);
  });

  it("merges nodes within the position tolerance", () => {
    const shaft = steppedShaft();
    shaft.addNode(100.000001, { diameterRight: 45 });

    expect(shaft.nodes).toHaveLength(3);
    expect(shaft.nodes[1]!.diameterLeft).toBe(30);
    expect(shaft.nodes[1]!.diameterRight).toBe(45);
  });

  it("keeps an existing element when merging without one", () => {
    const shaft = steppedShaft();
    shaft.addNode(100, {
      element: { kind: "bearing", name: "B1", width: 20, fixedAxial: true, bearingType: "ball" },
    });
    shaft.addNode(100, { diameterLeft: 32 });

    expect(shaft.nodes[1]!.element?.name).toBe("B1");
    expect(shaft.nodes[1]!.diameterLeft).toBe(32);
  });

  it("inherits the diameter of the segment a new node falls into", () => {
    const shaft = steppedShaft();
    expect(shaft.addNode(50).diameterRight).toBe(30);
    expect(shaft.addNode(150).diameterLeft).toBe(40);
    expect(shaft.addNode(-10).diameterRight).toBe(30);
    expect(shaft.addNode(250).diameterRight).toBe(40);
  });

  it("keeps nodes sorted by position", () => {
    const shaft = steppedShaft();
    shaft.addNode(150);
    shaft.addNode(50);
    expect(shaft.nodes.map((n) => n.position)).toEqual([0, 50, 100, 150, 200]);
  });
});

describe("Shaft segments", () => {
  it("derives segments from consecutive nodes", () => {
    const segments = steppedShaft().getSegments();
    expect(segments).toHaveLength(2);
    expect(segments[0]!.diameter).toBe(30);
    expect(segments[1]!.diameter).toBe(40);
    expect(segments[1]!.length).toBe(100);
  });

  it("has no segments below two nodes", () => {
    const shaft = new Shaft(steel);
    shaft.addNode(0);
    expect(shaft.getSegments()).toEqual([]);
  });

  it("measures length from first to last node", () => {
    const shaft = new Shaft(steel);
    expect(shaft.getTotalLength()).toBe(0);
    shaft.addNode(10);
    shaft.addNode(210);
    expect(shaft.getTotalLength()).toBe(200);
  });

  it("flags shoulders", () => {
    const shaft = steppedShaft();
    expect(shaft.nodes.map(isShoulder)).toEqual([false, true, false]);
  });
});

describe("Shaft.getAllLoads", () => {
  it("adds element loads at the element's node", () => {
    const shaft = steppedShaft();
    const pulley: Pulley = {
      kind: "pulley",
      name: "Pulley",
      diameter: 120,
      width: 30,
      forces: [new RadialForce(0, 300, 90)],
      torques: [createTorque({ position: 0, mean: 40 })],
    };
    shaft.addNode(150, { element: pulley });
    shaft.forces.push(new RadialForce(50, 100));

    const { forces, torques } = shaft.getAllLoads();
    expect(forces.map((f) => f.position)).toEqual([50, 150]);
    expect(torques).toHaveLength(1);
    expect(torques[0]!.position).toBe(150);
    expect(torques[0]!.mean).toBe(40);
  });

  it("clears everything on reset", () => {
    const shaft = steppedShaft();
    shaft.forces.push(new RadialForce(50, 100));
    shaft.reset();
    expect(shaft.nodes).toEqual([]);
    expect(shaft.getAllLoads()).toEqual({ forces: [], torques: [] });
  });
});

describe("findMaterial", () => {
  it("looks materials up by name, ignoring case", () => {
    expect(findMaterial("aisi 1020")?.Sut).toBe(380e6);
    expect(findMaterial("unobtainium")).toBeUndefined();
  });
});
