// Types
export type {
  InstanceMetadata,
  OciLogCallback,
  ProvisioningRequest,
  ProvisioningSummary,
  ReservedPublicIp,
  ResourceNames,
} from "./types";

// Errors
export { ProviderError, ProviderErrorType, toProviderError } from "./errors/provider-error";

// Metadata
export {
  INSTANCE_METADATA_URL,
  InstanceMetadataClient,
  resolveRegion,
  type FetchFn,
} from "./metadata/instance-metadata";

// Naming
export { deriveResourceNames } from "./naming";

// VNIC provisioning
export {
  createInstancePrincipalClients,
  type OciClients,
  type OciComputeApi,
  type OciNetworkApi,
} from "./vnic/oci-clients";
export { OciVnicProvisioner, type OciVnicProvisionerOptions } from "./vnic/oci-vnic-provisioner";
