/**
 * Provision Command
 *
 * Creates a reserved public IP and a secondary VNIC for this instance,
 * associates them, then waits for the host to bring the interface up with
 * the expected addresses.
 */

import { summarizeOutcome, verifyConvergence, type LogCallback } from "@reserved-vnic/core";
import {
  InstanceMetadataClient,
  OciVnicProvisioner,
  createInstancePrincipalClients,
  deriveResourceNames,
  type InstanceMetadata,
  type OciClients,
  type ProvisioningRequest,
  type ProvisioningSummary,
} from "@reserved-vnic/adapters-oci";
import type { IOutputService } from "../interfaces/output.interface";
import { reportCommandError } from "./command-errors";
import { resolveConvergenceConfig, type ConvergenceCliOptions } from "./options";

export interface VnicProvisioner {
  provision(request: ProvisioningRequest): Promise<ProvisioningSummary>;
}

export interface ProvisionDeps {
  metadata: { getInstanceMetadata(): Promise<InstanceMetadata> };
  createClients: (region: string) => Promise<OciClients>;
  createProvisioner: (clients: OciClients, log: LogCallback) => VnicProvisioner;
  verify: typeof verifyConvergence;
  env: NodeJS.ProcessEnv;
}

export function defaultProvisionDeps(): ProvisionDeps {
  return {
    metadata: new InstanceMetadataClient(),
    createClients: createInstancePrincipalClients,
    createProvisioner: (clients, log) =>
      new OciVnicProvisioner(clients.network, clients.compute, log),
    verify: verifyConvergence,
    env: process.env,
  };
}

export class ProvisionHandler {
  private readonly deps: ProvisionDeps;

  constructor(
    private readonly output: IOutputService,
    deps: Partial<ProvisionDeps> = {}
  ) {
    this.deps = { ...defaultProvisionDeps(), ...deps };
  }

  /**
   * @returns Process exit code
   */
  async execute(
    subnetId: string,
    publicIpPoolId: string | undefined,
    options: ConvergenceCliOptions = {}
  ): Promise<number> {
    try {
      // Validate settings before touching the control plane
      const config = await resolveConvergenceConfig(options, this.deps.env);

      this.output.header("Reserved VNIC Provisioning", "🌐");

      const metadata = await this.step(
        "Fetching instance metadata...",
        "Instance metadata loaded",
        "Could not read instance metadata",
        () => this.deps.metadata.getInstanceMetadata()
      );

      const names = deriveResourceNames(metadata.instanceId);
      const entries: Array<[string, string]> = [
        ["Compartment ID", metadata.compartmentId],
        ["Region", metadata.region],
        ["Instance ID", metadata.instanceId],
        ["VNIC Name", names.vnicName],
        ["Public IP Name", names.publicIpName],
        ["Subnet ID", subnetId],
      ];
      if (publicIpPoolId) {
        entries.push(["Public IP Pool", publicIpPoolId]);
      }
      this.output.keyValues(entries);

      const clients = await this.step(
        "Authenticating with instance principals...",
        "Authenticated as instance principal",
        "Instance principal authentication failed",
        () => this.deps.createClients(metadata.region)
      );

      const provisioner = this.deps.createProvisioner(clients, this.output.log);
      const summary = await provisioner.provision({
        ...metadata,
        subnetId,
        publicIpPoolId,
        names,
      });

      this.output.newline();
      this.output.success("✅ Reserved Public IP successfully assigned to the secondary VNIC!");
      this.output.keyValues([
        ["VNIC Name", summary.vnicName],
        ["VNIC ID", summary.vnicId],
        ["Private IP ID", summary.privateIpId],
        ["Public IP", summary.publicIp],
        ["Public IP OCID", summary.publicIpId],
        ["Region", summary.region],
      ]);
      if (!summary.associationVerified) {
        this.output.warn("⚠️  Association not confirmed yet; check the console if traffic fails.");
      }

      this.output.newline();
      this.output.header("Configuring Network Interfaces");
      const { outcome, exitCode } = await this.deps.verify(config, { log: this.output.log });

      if (options.json) {
        this.output.json({ provisioning: summary, convergence: summarizeOutcome(outcome) });
      }
      return exitCode;
    } catch (error) {
      return reportCommandError(this.output, error);
    }
  }

  private async step<T>(
    text: string,
    doneText: string,
    failText: string,
    fn: () => Promise<T>
  ): Promise<T> {
    this.output.startSpinner(text);
    try {
      const result = await fn();
      this.output.succeedSpinner(doneText);
      return result;
    } catch (error) {
      this.output.failSpinner(failText);
      throw error;
    }
  }
}
