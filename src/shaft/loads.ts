/**
 * Load records applied to the shaft: radial forces and torques.
 *
 * Positions are in mm along the shaft axis, forces in N, torques in N·m.
 */

// ─── Radial force ────────────────────────────────────────────────────────────

/**
 * A force in the shaft's transverse plane. Angle 0 points along +Y,
 * 90 along +Z. On a rotating shaft a static radial force produces a
 * fully reversed bending cycle.
 */
export class RadialForce {
  constructor(
    public position: number,
    public magnitude: number,
    public angle = 0,
    public name = "Force",
  ) {}

  /** Builds a force from its plane components. */
  static fromComponents(position: number, fy: number, fz: number, name = "Force"): RadialForce {
    const magnitude = Math.sqrt(fy * fy + fz * fz);
    const angle = (Math.atan2(fz, fy) * 180) / Math.PI;
    return new RadialForce(position, magnitude, angle, name);
  }

  get fy(): number {
    return this.magnitude * Math.cos((this.angle * Math.PI) / 180);
  }

  get fz(): number {
    return this.magnitude * Math.sin((this.angle * Math.PI) / 180);
  }

  /** Same force moved to another position. */
  at(position: number): RadialForce {
    return new RadialForce(position, this.magnitude, this.angle, this.name);
  }
}

// ─── Torque ──────────────────────────────────────────────────────────────────

export interface Torque {
  name: string;
  position: number;
  alternating: number;
  mean: number;
}

export interface TorqueInput {
  position: number;
  alternating?: number;
  mean?: number;
  /** Older single-value input, read as the mean torque. */
  magnitude?: number;
  name?: string;
}

export function createTorque(input: TorqueInput): Torque {
  const magnitude = input.magnitude ?? 0;
  let mean = input.mean ?? 0;
  if (magnitude !== 0 && mean === 0) mean = magnitude;
  return {
    name: input.name ?? "Torque",
    position: input.position,
    alternating: input.alternating ?? 0,
    mean,
  };
}
