/**
 * JSON schemas shared by the shaft tools.
 */

const STRESS_SCHEMA = {
  type: "object",
  description:
    "Stress raiser at this location. Kf values come from charts for the actual geometry " +
    "(e.g. shoulder fillet r/d and D/d, profile or sled-runner keyway, retaining-ring groove).",
  properties: {
    kind: { type: "string", enum: ["fillet", "keyway", "groove", "general"] },
    description: { type: "string" },
    kf_bending: { type: "number", description: "Fatigue stress-concentration factor in bending (>= 1).", minimum: 1 },
    kf_torsion: { type: "number", description: "Fatigue stress-concentration factor in torsion (>= 1).", minimum: 1 },
    radius_mm: { type: "number", description: "Fillet radius in mm." },
    width_mm: { type: "number", description: "Groove width in mm." },
    depth_mm: { type: "number", description: "Groove depth in mm." },
  },
};

const TORQUE_PROPERTIES = {
  mean_nm: { type: "number", description: "Mean (steady) torque in N·m." },
  alternating_nm: { type: "number", description: "Alternating torque amplitude in N·m." },
  magnitude_nm: { type: "number", description: "Single torque value in N·m, read as mean torque." },
};

export const MATERIAL_SCHEMA = {
  description:
    "Material name ('AISI 1020', 'AISI 1045', 'AISI 1018 CD', 'AISI 1040 CD', 'AISI 1050 CD', " +
    "'AISI 1095 HR') or an object { name?, sut_mpa, sy_mpa, e_gpa? }. Default: AISI 1020.",
  oneOf: [
    { type: "string" },
    {
      type: "object",
      properties: {
        name: { type: "string" },
        sut_mpa: { type: "number", description: "Ultimate tensile strength in MPa." },
        sy_mpa: { type: "number", description: "Yield strength in MPa." },
        e_gpa: { type: "number", description: "Modulus of elasticity in GPa (default: 207)." },
      },
      required: ["sut_mpa", "sy_mpa"],
    },
  ],
};

export const FATIGUE_SCHEMA = {
  type: "object",
  description: "Endurance-limit settings (Marin factors).",
  properties: {
    surface: {
      type: "string",
      enum: ["ground", "machined", "cold_rolled", "hot_rolled", "forged"],
      description: "Surface finish (default: machined).",
    },
    reliability: {
      type: "string",
      enum: ["50%", "90%", "95%", "99%", "99.9%", "99.99%", "99.999%", "99.9999%"],
      description: "Reliability (default: 99%).",
    },
    temperature_c: { type: "number", description: "Operating temperature in °C (default: 20)." },
    misc_factor: { type: "number", description: "Miscellaneous-effects factor (default: 1)." },
  },
};

export const DESIGN_SCHEMA = {
  type: "object",
  description:
    "Shaft description. Positions are measured in mm from the left end. The shaft starts with " +
    "start_diameter_mm; each shoulder sets the diameter from its position to the next shoulder. " +
    "Exactly two bearings are required.",
  properties: {
    start_diameter_mm: { type: "number", description: "Diameter at the left end in mm.", exclusiveMinimum: 0 },
    total_length_mm: { type: "number", description: "Shaft length in mm.", exclusiveMinimum: 0 },
    material: MATERIAL_SCHEMA,
    features: {
      type: "array",
      description: "Shoulders, bearings, gears, pulleys, loads and stress raisers along the shaft.",
      items: {
        type: "object",
        properties: {
          type: {
            type: "string",
            enum: ["shoulder", "bearing", "spur_gear", "pulley", "force", "torque", "stress_raiser"],
          },
          id: { type: "string", description: "Unique id (default: '<type>-<index>')." },
          position_mm: { type: "number", description: "Position from the left end in mm." },
          name: { type: "string" },
          diameter_mm: { type: "number", description: "Shoulder: new diameter. Pulley: pitch diameter." },
          pitch_diameter_mm: { type: "number", description: "Spur gear pitch diameter in mm." },
          pressure_angle_deg: { type: "number", description: "Spur gear pressure angle (default: 20)." },
          width_mm: { type: "number", description: "Face or bearing width in mm (default: 20)." },
          contact_angle_deg: {
            type: "number",
            description: "Direction of the transmitted force in the transverse plane; 0 = +Y, 90 = +Z.",
          },
          power_kw: { type: "number", description: "Power through a gear or pulley in kW." },
          rpm: { type: "number", description: "Shaft speed in rpm." },
          role: {
            type: "string",
            enum: ["input", "output"],
            description: "'input' drives the shaft (+torque), 'output' is driven by it (-torque). Default: input.",
          },
          fy_n: { type: "number", description: "Manual force component along Y in N." },
          fz_n: { type: "number", description: "Manual force component along Z in N." },
          torque: { type: "object", description: "Manual torque on a gear or pulley.", properties: TORQUE_PROPERTIES },
          magnitude_n: { type: "number", description: "Force magnitude in N." },
          angle_deg: { type: "number", description: "Force direction; 0 = +Y, 90 = +Z (default: 0)." },
          ...TORQUE_PROPERTIES,
          fixed_axial: { type: "boolean", description: "Bearing locates the shaft axially." },
          bearing_type: { type: "string", description: "Bearing type (default: ball)." },
          stress: STRESS_SCHEMA,
        },
        required: ["type", "position_mm"],
      },
    },
  },
  required: ["start_diameter_mm", "total_length_mm"],
};
