/**
 * Diagnostic Reporter
 *
 * Turns a poller outcome into operator-facing output and a process exit code.
 */

import type { LogCallback } from "../types";
import type { ConvergenceOutcome } from "./types";

export const EXIT_CONVERGED = 0;
export const EXIT_EXHAUSTED = 1;

export interface UnmatchedInterface {
  name: string;
  expectedIp: string;
  observed: string[];
}

/**
 * Structured view of the final cycle, for logs and `--json` output.
 */
export interface DiagnosticSummary {
  status: ConvergenceOutcome["status"];
  attempts: number;
  lastAttempt: number | null;
  agentExitCode: number | null;
  totalRows: number;
  missingExpectedIpCount: number;
  unmatchedCount: number;
  /** Interfaces whose expected IP is not bound at the OS level */
  unmatchedInterfaces: UnmatchedInterface[];
  /** Interfaces the agent has not assigned an IP to */
  pendingInterfaces: string[];
  /** Last OS-level table, verbatim */
  block: string;
}

export function summarizeOutcome(outcome: ConvergenceOutcome): DiagnosticSummary {
  const cycle = outcome.lastCycle;

  return {
    status: outcome.status,
    attempts: outcome.attempts,
    lastAttempt: cycle?.attempt ?? null,
    agentExitCode: cycle?.agentExitCode ?? null,
    totalRows: cycle?.result.totalRows ?? 0,
    missingExpectedIpCount: cycle?.result.missingExpectedIpCount ?? 0,
    unmatchedCount: cycle?.result.unmatchedCount ?? 0,
    unmatchedInterfaces: (cycle?.verdicts ?? [])
      .filter((verdict) => !verdict.matched)
      .map((verdict) => ({
        name: verdict.row.name,
        expectedIp: verdict.row.expectedIp ?? "-",
        observed: verdict.observed,
      })),
    pendingInterfaces: (cycle?.rows ?? [])
      .filter((row) => row.expectedIp === null)
      .map((row) => row.name),
    block: cycle?.block ?? "",
  };
}

/**
 * Print the outcome and return the exit code the process should end with.
 */
export function reportOutcome(outcome: ConvergenceOutcome, log: LogCallback): number {
  if (outcome.status === "CONVERGED") {
    log("", "stdout");
    log("✅ Network Interfaces Configured and Verified!", "stdout");
    return EXIT_CONVERGED;
  }

  const summary = summarizeOutcome(outcome);

  log(`❌ Network configuration incomplete after ${summary.attempts} attempts.`, "stderr");
  log("Last OCI table snapshot:", "stderr");
  log(summary.block, "stderr");
  log(
    `→ Last cycle: attempt=${summary.lastAttempt ?? "-"}, ` +
      `agent_exit_code=${summary.agentExitCode ?? "-"}, ` +
      `total_rows=${summary.totalRows}, ` +
      `no_ip_rows=${summary.missingExpectedIpCount}, ` +
      `missing_on_os=${summary.unmatchedCount}`,
    "stderr"
  );

  if (summary.totalRows === 0) {
    log("  The agent never reported an OS-level interface table.", "stderr");
  }
  for (const name of summary.pendingInterfaces) {
    log(`  ${name}: agent has not assigned an IP`, "stderr");
  }
  for (const iface of summary.unmatchedInterfaces) {
    const observed = iface.observed.length > 0 ? iface.observed.join(", ") : "none";
    log(`  ${iface.name}: expected ${iface.expectedIp}, OS has ${observed}`, "stderr");
  }

  return EXIT_EXHAUSTED;
}
