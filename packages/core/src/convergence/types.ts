/**
 * Convergence Types
 */

import type { InterfaceExpectation } from "../report/types";

/**
 * Aggregate outcome of one poll cycle.
 */
export interface CycleResult {
  /** Interfaces reported by the agent */
  totalRows: number;
  /** Rows for which the agent itself has no IP yet */
  missingExpectedIpCount: number;
  /** Rows whose expected IP is not bound at the OS level */
  unmatchedCount: number;
}

export const EMPTY_CYCLE_RESULT: Readonly<CycleResult> = Object.freeze({
  totalRows: 0,
  missingExpectedIpCount: 0,
  unmatchedCount: 0,
});

/**
 * Verdict for one interface row that had an expected IP.
 */
export interface RowVerdict {
  row: InterfaceExpectation;
  matched: boolean;
  /** Addresses the OS reported for the interface */
  observed: string[];
}

export interface CycleEvaluation {
  result: CycleResult;
  verdicts: RowVerdict[];
}

export type PollState =
  | "POLLING"
  | "RETRY_EMPTY"
  | "RETRY_MISMATCH"
  | "CONVERGED"
  | "EXHAUSTED";

/**
 * Why a cycle did not converge. Selects the wait before the next cycle.
 */
export type RetryReason = "EmptyTable" | "Mismatch";

/**
 * Everything known after one cycle, threaded forward by the poller.
 */
export interface CycleSnapshot {
  attempt: number;
  agentExitCode: number;
  /** Raw OS-level table text; empty when the header never appeared */
  block: string;
  rows: readonly InterfaceExpectation[];
  result: CycleResult;
  verdicts: RowVerdict[];
  /** Absent when the cycle converged */
  retryReason?: RetryReason;
}

export type ConvergenceOutcome =
  | { status: "CONVERGED"; attempts: number; lastCycle: CycleSnapshot }
  | { status: "EXHAUSTED"; attempts: number; lastCycle: CycleSnapshot | null };

export interface StateTransition {
  from: PollState;
  to: PollState;
  attempt: number;
}
