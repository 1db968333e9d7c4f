import type { ResourceNames } from "./types";

const SUFFIX_LENGTH = 8;

/**
 * Derive short, per-instance resource names from the instance OCID.
 */
export function deriveResourceNames(instanceId: string): ResourceNames {
  const suffix = instanceId.slice(-SUFFIX_LENGTH);
  return {
    suffix,
    vnicName: `vnic-${suffix}`,
    publicIpName: `ip-${suffix}`,
  };
}
