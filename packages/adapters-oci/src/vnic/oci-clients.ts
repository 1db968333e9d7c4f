/**
 * OCI SDK client construction.
 *
 * Only the operations the provisioner calls are exposed, so tests can stand
 * in for the SDK clients with plain method stubs.
 */

import * as common from "oci-common";
import * as core from "oci-core";

export type OciNetworkApi = Pick<
  core.VirtualNetworkClient,
  "createPublicIp" | "getPublicIp" | "updatePublicIp" | "getVnic" | "listPrivateIps"
>;

export type OciComputeApi = Pick<
  core.ComputeClient,
  "attachVnic" | "listVnicAttachments" | "getVnicAttachment"
>;

export interface OciClients {
  network: OciNetworkApi;
  compute: OciComputeApi;
}

/**
 * Build region-scoped clients authenticated as the instance itself
 * (instance principals).
 */
export async function createInstancePrincipalClients(region: string): Promise<OciClients> {
  const provider = await new common.InstancePrincipalsAuthenticationDetailsProviderBuilder().build();

  const network = new core.VirtualNetworkClient({ authenticationDetailsProvider: provider });
  const compute = new core.ComputeClient({ authenticationDetailsProvider: provider });
  network.regionId = region;
  compute.regionId = region;

  return { network, compute };
}
