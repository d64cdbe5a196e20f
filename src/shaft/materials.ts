/**
 * Shaft steels. Strengths and modulus in Pa.
 */

export interface Material {
  name: string;
  Sut: number;
  Sy: number;
  E: number;
}

export const DEFAULT_MATERIAL: Material = { name: "AISI 1020", Sut: 380e6, Sy: 205e6, E: 207e9 };

export const MATERIALS: Record<string, Material> = {
  "AISI 1020": DEFAULT_MATERIAL,
  "AISI 1045": { name: "AISI 1045", Sut: 565e6, Sy: 310e6, E: 207e9 },
  "AISI 1018 CD": { name: "AISI 1018 CD", Sut: 440e6, Sy: 370e6, E: 207e9 },
  "AISI 1040 CD": { name: "AISI 1040 CD", Sut: 590e6, Sy: 490e6, E: 207e9 },
  "AISI 1050 CD": { name: "AISI 1050 CD", Sut: 690e6, Sy: 580e6, E: 207e9 },
  "AISI 1095 HR": { name: "AISI 1095 HR", Sut: 830e6, Sy: 460e6, E: 207e9 },
};

/** Case-insensitive lookup by name. */
export function findMaterial(name: string): Material | undefined {
  const wanted = name.trim().toLowerCase();
  return Object.values(MATERIALS).find((m) => m.name.toLowerCase() === wanted);
}
