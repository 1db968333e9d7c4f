/**
 * Convergence Evaluator
 *
 * Cross-references the agent's expected interface addresses with what the OS
 * actually has bound. Interfaces are probed one at a time, in report order,
 * so verdict lines read in the same order as the agent's table.
 */

import type { IAddressProber } from "../probe/address-prober.interface";
import type { InterfaceExpectation } from "../report/types";
import type { LogCallback } from "../types";
import type { CycleEvaluation, CycleResult, RowVerdict } from "./types";

/**
 * A cycle converged when the agent reported at least one interface, assigned
 * an IP to all of them, and every IP is bound at the OS level.
 */
export function isConverged(result: CycleResult): boolean {
  return (
    result.totalRows > 0 && result.missingExpectedIpCount === 0 && result.unmatchedCount === 0
  );
}

export function formatVerdict(verdict: RowVerdict): string {
  const { name, expectedIp } = verdict.row;
  if (verdict.matched) {
    return `  ✅ ${name} has ${expectedIp}`;
  }
  const observed = verdict.observed.length > 0 ? verdict.observed.join(", ") : "none";
  return `  ❌ ${name} missing ${expectedIp} (has: ${observed})`;
}

export function formatCycleSummary(result: CycleResult): string {
  return (
    `→ Summary: total_rows=${result.totalRows}, ` +
    `no_ip_rows=${result.missingExpectedIpCount}, ` +
    `missing_on_os=${result.unmatchedCount}`
  );
}

/**
 * A lookup that fails counts as "no addresses" so the cycle can still finish.
 */
async function lookupAddresses(prober: IAddressProber, name: string, log: LogCallback): Promise<string[]> {
  try {
    return await prober.getIpv4Addresses(name);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log(`  Address lookup for ${name} failed: ${message}`, "stderr");
    return [];
  }
}

export async function evaluateCycle(
  rows: readonly InterfaceExpectation[],
  prober: IAddressProber,
  log: LogCallback = () => {}
): Promise<CycleEvaluation> {
  let missingExpectedIpCount = 0;
  let unmatchedCount = 0;
  const verdicts: RowVerdict[] = [];

  for (const row of rows) {
    if (row.expectedIp === null) {
      missingExpectedIpCount++;
      continue;
    }

    const observed = await lookupAddresses(prober, row.name, log);
    const verdict: RowVerdict = {
      row,
      matched: observed.includes(row.expectedIp),
      observed,
    };
    if (!verdict.matched) {
      unmatchedCount++;
    }

    verdicts.push(verdict);
    log(formatVerdict(verdict), "stdout");
  }

  const result: CycleResult = {
    totalRows: rows.length,
    missingExpectedIpCount,
    unmatchedCount,
  };
  log(formatCycleSummary(result), "stdout");

  return { result, verdicts };
}
