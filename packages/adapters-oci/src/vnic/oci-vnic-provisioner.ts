/**
 * OCI VNIC Provisioner
 *
 * Creates a reserved public IP, attaches a secondary VNIC without an
 * ephemeral public IP, and binds the reserved IP to the VNIC's primary
 * private IP. Control-plane calls are single-shot: any failure aborts the run.
 * The only loops are the visibility waits for the new VNIC and its attachment.
 */

import * as core from "oci-core";
import type { LogCallback, SleepFn } from "@reserved-vnic/core";
import { sleep as defaultSleep } from "@reserved-vnic/core";
import { ProviderError, ProviderErrorType, toProviderError } from "../errors/provider-error";
import type {
  ProvisioningRequest,
  ProvisioningSummary,
  ReservedPublicIp,
} from "../types";
import type { OciComputeApi, OciNetworkApi } from "./oci-clients";

const DEFAULT_POLL_INTERVAL_MS = 1_000;
const DEFAULT_MAX_POLLS = 90;

const DETACHED_STATES: readonly core.models.VnicAttachment.LifecycleState[] = [
  core.models.VnicAttachment.LifecycleState.Detaching,
  core.models.VnicAttachment.LifecycleState.Detached,
];

export interface OciVnicProvisionerOptions {
  /** Wait between visibility polls */
  pollIntervalMs?: number;
  /** Visibility polls before giving up */
  maxPolls?: number;
  sleep?: SleepFn;
}

export class OciVnicProvisioner {
  private readonly pollIntervalMs: number;
  private readonly maxPolls: number;
  private readonly sleep: SleepFn;

  constructor(
    private readonly network: OciNetworkApi,
    private readonly compute: OciComputeApi,
    private readonly log: LogCallback,
    options: OciVnicProvisionerOptions = {}
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.maxPolls = options.maxPolls ?? DEFAULT_MAX_POLLS;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Run the full provisioning sequence.
   */
  async provision(request: ProvisioningRequest): Promise<ProvisioningSummary> {
    const publicIp = await this.createReservedPublicIp(request);
    const attachmentId = await this.attachSecondaryVnic(request);
    const vnicId = await this.waitForVnic(request);
    await this.waitForAttachment(attachmentId);
    const privateIpId = await this.findPrimaryPrivateIp(vnicId);
    await this.associatePublicIp(publicIp.id, privateIpId);
    const associationVerified = await this.verifyAssociation(publicIp.id, privateIpId);

    return {
      vnicName: request.names.vnicName,
      vnicId,
      privateIpId,
      publicIp: publicIp.ipAddress,
      publicIpId: publicIp.id,
      region: request.region,
      associationVerified,
    };
  }

  async createReservedPublicIp(request: ProvisioningRequest): Promise<ReservedPublicIp> {
    this.log("Creating Reserved Public IP...", "stdout");
    if (request.publicIpPoolId) {
      this.log(`→ Using Public IP Pool: ${request.publicIpPoolId}`, "stdout");
    }

    const response = await this.call("create reserved public IP", () =>
      this.network.createPublicIp({
        createPublicIpDetails: {
          compartmentId: request.compartmentId,
          lifetime: core.models.CreatePublicIpDetails.Lifetime.Reserved,
          displayName: request.names.publicIpName,
          publicIpPoolId: request.publicIpPoolId,
        },
      })
    );

    const { id, ipAddress } = response.publicIp;
    if (!id || !ipAddress) {
      throw new ProviderError(
        "Reserved public IP was created without an id or address",
        ProviderErrorType.UNKNOWN
      );
    }

    this.log(`✅ Reserved IP created: ${ipAddress} (${id})`, "stdout");
    return { id, ipAddress };
  }

  /**
   * Attach a secondary VNIC in the subnet. No ephemeral public IP is
   * assigned; the reserved IP is bound later.
   *
   * @returns The VNIC attachment id
   */
  async attachSecondaryVnic(request: ProvisioningRequest): Promise<string> {
    this.log("Attaching Secondary VNIC (no ephemeral public IP)...", "stdout");

    const response = await this.call("attach VNIC", () =>
      this.compute.attachVnic({
        attachVnicDetails: {
          instanceId: request.instanceId,
          createVnicDetails: {
            subnetId: request.subnetId,
            displayName: request.names.vnicName,
            assignPublicIp: false,
          },
        },
      })
    );

    return response.vnicAttachment.id;
  }

  /**
   * Poll until a VNIC with the expected display name and subnet is attached
   * to the instance.
   *
   * @returns The VNIC id
   */
  async waitForVnic(request: ProvisioningRequest): Promise<string> {
    const waitSeconds = Math.round((this.maxPolls * this.pollIntervalMs) / 1000);
    this.log(`Waiting for new VNIC to appear on the instance (up to ${waitSeconds}s)...`, "stdout");

    for (let poll = 1; poll <= this.maxPolls; poll++) {
      const vnicId = await this.findVnicId(request);
      if (vnicId) {
        this.log(`✅ Found VNIC: ${vnicId}`, "stdout");
        return vnicId;
      }
      this.log("  → Not visible yet, waiting...", "stdout");
      await this.sleep(this.pollIntervalMs);
    }

    throw new ProviderError(
      `Could not find the new VNIC after ${waitSeconds} seconds`,
      ProviderErrorType.TIMEOUT,
      undefined,
      ["Check 'Attached VNICs' in the Console to confirm it exists and its display name"]
    );
  }

  /**
   * Wait for the attachment to reach ATTACHED. One that never settles is
   * reported but does not stop provisioning.
   *
   * @returns The last observed lifecycle state
   */
  async waitForAttachment(attachmentId: string): Promise<string> {
    this.log("Verifying VNIC attachment state...", "stdout");

    let state = "UNKNOWN";
    for (let poll = 1; poll <= this.maxPolls; poll++) {
      const response = await this.call("get VNIC attachment", () =>
        this.compute.getVnicAttachment({ vnicAttachmentId: attachmentId })
      );
      state = response.vnicAttachment.lifecycleState;
      this.log(`  → Attachment state: ${state}`, "stdout");
      if (response.vnicAttachment.lifecycleState === core.models.VnicAttachment.LifecycleState.Attached) {
        return state;
      }
      if (poll < this.maxPolls) {
        await this.sleep(this.pollIntervalMs);
      }
    }

    this.log(`⚠️  VNIC attachment is still ${state}; continuing`, "stderr");
    return state;
  }

  /**
   * The VNIC's primary private IP, or its first one if none is flagged primary.
   */
  async findPrimaryPrivateIp(vnicId: string): Promise<string> {
    this.log("Locating primary private IP on the new VNIC...", "stdout");

    const response = await this.call("list private IPs", () =>
      this.network.listPrivateIps({ vnicId })
    );
    const privateIp = response.items.find((ip) => ip.isPrimary) ?? response.items[0];
    if (!privateIp?.id) {
      throw new ProviderError(
        "Failed to locate the VNIC's primary private IP",
        ProviderErrorType.NOT_FOUND
      );
    }

    this.log(`✅ Private IP ID: ${privateIp.id}`, "stdout");
    return privateIp.id;
  }

  async associatePublicIp(publicIpId: string, privateIpId: string): Promise<void> {
    this.log("Associating reserved public IP to the VNIC's private IP...", "stdout");
    await this.call("associate reserved public IP", () =>
      this.network.updatePublicIp({
        publicIpId,
        updatePublicIpDetails: { privateIpId },
      })
    );
  }

  /**
   * Re-read the public IP and check it points at the private IP. The control
   * plane may lag, so a mismatch is a warning rather than an error.
   */
  async verifyAssociation(publicIpId: string, privateIpId: string): Promise<boolean> {
    const response = await this.call("get public IP", () =>
      this.network.getPublicIp({ publicIpId })
    );
    const assignedTo = response.publicIp.assignedEntityId;

    if (assignedTo !== privateIpId) {
      this.log(
        "⚠️  Association verification inconclusive. Public IP may take a moment to reflect assignment.",
        "stderr"
      );
      return false;
    }

    this.log(`✅ Public IP is now assigned to private IP: ${assignedTo}`, "stdout");
    return true;
  }

  private async findVnicId(request: ProvisioningRequest): Promise<string | null> {
    const attachments = await this.listAttachments(request);

    for (const attachment of attachments) {
      const vnicId = attachment.vnicId;
      if (!vnicId || DETACHED_STATES.includes(attachment.lifecycleState)) continue;

      const response = await this.call("get VNIC", () => this.network.getVnic({ vnicId }));
      const vnic = response.vnic;
      if (vnic.displayName === request.names.vnicName && vnic.subnetId === request.subnetId) {
        return vnicId;
      }
    }

    return null;
  }

  private async listAttachments(
    request: ProvisioningRequest
  ): Promise<core.models.VnicAttachment[]> {
    const attachments: core.models.VnicAttachment[] = [];
    let page: string | undefined;

    do {
      const response = await this.call("list VNIC attachments", () =>
        this.compute.listVnicAttachments({
          compartmentId: request.compartmentId,
          instanceId: request.instanceId,
          page,
        })
      );
      attachments.push(...response.items);
      page = response.opcNextPage;
    } while (page);

    return attachments;
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw toProviderError(error, operation);
    }
  }
}
