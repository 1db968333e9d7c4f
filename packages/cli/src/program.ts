/**
 * Command definitions for the `reserved-vnic` CLI.
 */

import { Command } from "commander";
import { RESERVED_VNIC_VERSION } from "@reserved-vnic/core";
import { ProvisionHandler } from "./commands/provision";
import { addConvergenceOptions, type ConvergenceCliOptions } from "./commands/options";
import { VerifyHandler } from "./commands/verify";
import type { IOutputService } from "./interfaces/output.interface";
import { ConsoleOutputService } from "./services/console-output.service";

export interface ProgramHandlers {
  provision: Pick<ProvisionHandler, "execute">;
  verify: Pick<VerifyHandler, "execute">;
}

export function createProgram(
  output: IOutputService = new ConsoleOutputService(),
  handlers: Partial<ProgramHandlers> = {}
): Command {
  const provision = handlers.provision ?? new ProvisionHandler(output);
  const verify = handlers.verify ?? new VerifyHandler(output);

  const program = new Command();

  program
    .name("reserved-vnic")
    .description("Attach a secondary VNIC with a reserved public IP and wait for the OS to configure it")
    .version(RESERVED_VNIC_VERSION)
    // Before any subcommand is added, so they inherit it
    .exitOverride();

  addConvergenceOptions(
    program
      .command("provision")
      .description("Create a reserved public IP and secondary VNIC, then verify OS configuration")
      .argument("<subnetId>", "OCID of the subnet for the secondary VNIC")
      .argument("[publicIpPoolId]", "OCID of a BYOIP public IP pool")
  ).action(
    async (subnetId: string, publicIpPoolId: string | undefined, options: ConvergenceCliOptions) => {
      process.exitCode = await provision.execute(subnetId, publicIpPoolId, options);
    }
  );

  addConvergenceOptions(
    program
      .command("verify")
      .description("Poll the network configuration agent until the OS matches its table")
  ).action(async (options: ConvergenceCliOptions) => {
    process.exitCode = await verify.execute(options);
  });

  return program;
}

export { ConsoleOutputService } from "./services/console-output.service";
export type { IOutputService } from "./interfaces/output.interface";
