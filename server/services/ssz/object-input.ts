import {
  SszCelestialObject,
  type TSszCelestialObject,
  type TSszPhysicalConstants,
} from "@shared/ssz";
import { SszInputError } from "../../../modules/ssz/errors";

const describeValue = (value: unknown): string => {
  if (typeof value === "string") return JSON.stringify(value);
  if (value === undefined) return "undefined";
  return String(value);
};

const readField = (raw: unknown, key: string): unknown => {
  if (!raw || typeof raw !== "object") return undefined;
  return Object.getOwnPropertyDescriptor(raw, key)?.value;
};

/**
 * Validate one input row at the engine boundary. Out-of-range values are
 * rejected with the offending field named; only an absent or NaN velocity is
 * read as zero.
 */
export function parseCelestialObject(
  raw: unknown,
  constants: Pick<TSszPhysicalConstants, "c">,
): TSszCelestialObject {
  const parsed = SszCelestialObject.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.length ? issue.path.join(".") : "object";
    const received = issue.path.length === 1 ? readField(raw, String(issue.path[0])) : raw;
    throw new SszInputError(`invalid ${field} (${describeValue(received)}): ${issue.message}`, field);
  }
  const object = parsed.data;
  if (Math.abs(object.velocity_mps) >= constants.c) {
    throw new SszInputError(
      `invalid velocity_mps (${object.velocity_mps}): speed must stay below c = ${constants.c} m/s`,
      "velocity_mps",
    );
  }
  if (Math.abs(object.velocity_los_mps) > Math.abs(object.velocity_mps)) {
    throw new SszInputError(
      `invalid velocity_los_mps (${object.velocity_los_mps}): line-of-sight speed exceeds total speed`,
      "velocity_los_mps",
    );
  }
  return Object.freeze(object);
}
