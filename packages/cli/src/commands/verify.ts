/**
 * Verify Command
 *
 * Runs the convergence loop against the host as it is now, without
 * provisioning anything.
 */

import { summarizeOutcome, verifyConvergence } from "@reserved-vnic/core";
import type { IOutputService } from "../interfaces/output.interface";
import { reportCommandError } from "./command-errors";
import { resolveConvergenceConfig, type ConvergenceCliOptions } from "./options";

export class VerifyHandler {
  constructor(
    private readonly output: IOutputService,
    private readonly verify: typeof verifyConvergence = verifyConvergence,
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  /**
   * @returns Process exit code
   */
  async execute(options: ConvergenceCliOptions = {}): Promise<number> {
    try {
      const config = await resolveConvergenceConfig(options, this.env);

      this.output.header("Configuring Network Interfaces");
      const { outcome, exitCode } = await this.verify(config, { log: this.output.log });

      if (options.json) {
        this.output.json(summarizeOutcome(outcome));
      }
      return exitCode;
    } catch (error) {
      return reportCommandError(this.output, error);
    }
  }
}
