import { ConfigError } from "@reserved-vnic/core";
import { ProviderError } from "@reserved-vnic/adapters-oci";
import type { IOutputService } from "../interfaces/output.interface";

/**
 * Print a known failure and return the exit code. Unknown errors are rethrown
 * for the top-level handler.
 */
export function reportCommandError(output: IOutputService, error: unknown): number {
  if (error instanceof ProviderError) {
    output.error(`❌ ${error.message}`);
    for (const suggestion of error.suggestions ?? []) {
      output.dim(`   Tip: ${suggestion}`);
    }
    return 1;
  }

  if (error instanceof ConfigError) {
    output.error(`❌ ${error.message}`);
    return 1;
  }

  throw error;
}
