import type { TSszPhysicalConstants } from "@shared/ssz";

type GravityConstants = Pick<TSszPhysicalConstants, "G" | "c">;

/** r_s = 2GM/c² in metres. */
export function schwarzschildRadius(M_kg: number, constants: GravityConstants): number {
  if (M_kg < 0) {
    throw new RangeError(`mass cannot be negative: ${M_kg} kg`);
  }
  return (2 * constants.G * M_kg) / (constants.c * constants.c);
}

export const solarMassesToKg = (mass_Msun: number, constants: Pick<TSszPhysicalConstants, "M_sun">): number =>
  mass_Msun * constants.M_sun;

export const schwarzschildRadiusSolar = (mass_Msun: number, constants: TSszPhysicalConstants): number =>
  schwarzschildRadius(solarMassesToKg(mass_Msun, constants), constants);
