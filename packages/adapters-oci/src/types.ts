/**
 * OCI adapter types.
 */

export type { LogCallback as OciLogCallback } from "@reserved-vnic/core";

/**
 * Instance identity read from the instance metadata service.
 */
export interface InstanceMetadata {
  instanceId: string;
  compartmentId: string;
  region: string;
}

export interface ResourceNames {
  /** Last 8 characters of the instance OCID */
  suffix: string;
  vnicName: string;
  publicIpName: string;
}

export interface ProvisioningRequest extends InstanceMetadata {
  subnetId: string;
  /** BYOIP pool to allocate the reserved IP from */
  publicIpPoolId?: string;
  names: ResourceNames;
}

export interface ReservedPublicIp {
  id: string;
  ipAddress: string;
}

/**
 * Everything the operator needs after provisioning.
 */
export interface ProvisioningSummary {
  vnicName: string;
  vnicId: string;
  privateIpId: string;
  publicIp: string;
  publicIpId: string;
  region: string;
  /** False when the association could not be confirmed yet */
  associationVerified: boolean;
}
