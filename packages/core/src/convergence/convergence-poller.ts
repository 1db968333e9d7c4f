/**
 * Convergence Poller
 *
 * Bounded reconciliation loop: run the agent, parse its OS-level table,
 * compare against the host, and retry until every interface has its expected
 * address or the attempt budget runs out.
 *
 *   POLLING ──empty table──▶ RETRY_EMPTY ──wait emptyTableWaitMs──▶ POLLING
 *   POLLING ──mismatch─────▶ RETRY_MISMATCH ──wait mismatchWaitMs──▶ POLLING
 *   POLLING ──all matched──▶ CONVERGED
 *   POLLING ──last attempt not converged──▶ EXHAUSTED
 *
 * Waits are constant per retry reason; there is no backoff growth.
 */

import type { AgentInvocation, IAgentRunner } from "../agent/agent-runner";
import type { ConvergenceConfig } from "../config/convergence-config";
import type { IAddressProber } from "../probe/address-prober.interface";
import { parseAgentReport } from "../report/report-parser";
import type { ReportParserOptions } from "../report/types";
import { sleep as defaultSleep, type LogCallback, type SleepFn } from "../types";
import { evaluateCycle, isConverged } from "./convergence-evaluator";
import {
  EMPTY_CYCLE_RESULT,
  type ConvergenceOutcome,
  type CycleSnapshot,
  type PollState,
  type RetryReason,
  type StateTransition,
} from "./types";

export interface ConvergencePollerDeps {
  agent: IAgentRunner;
  prober: IAddressProber;
  log?: LogCallback;
  sleep?: SleepFn;
  /** Called on every state change */
  onTransition?: (transition: StateTransition) => void;
}

/**
 * Wait before the next cycle, per retry reason.
 */
export function retryWaitTable(
  config: Pick<ConvergenceConfig, "emptyTableWaitMs" | "mismatchWaitMs">
): Record<RetryReason, number> {
  return {
    EmptyTable: config.emptyTableWaitMs,
    Mismatch: config.mismatchWaitMs,
  };
}

const RETRY_STATE: Record<RetryReason, PollState> = {
  EmptyTable: "RETRY_EMPTY",
  Mismatch: "RETRY_MISMATCH",
};

export function formatWait(ms: number): string {
  return ms % 1000 === 0 ? `${ms / 1000}s` : `${ms}ms`;
}

export class ConvergencePoller {
  private state: PollState = "POLLING";
  private readonly waits: Record<RetryReason, number>;
  private readonly parserOptions: ReportParserOptions;
  private readonly agent: IAgentRunner;
  private readonly prober: IAddressProber;
  private readonly log: LogCallback;
  private readonly sleep: SleepFn;
  private readonly onTransition?: (transition: StateTransition) => void;

  constructor(
    private readonly config: ConvergenceConfig,
    deps: ConvergencePollerDeps
  ) {
    this.agent = deps.agent;
    this.prober = deps.prober;
    this.log = deps.log ?? (() => {});
    this.sleep = deps.sleep ?? defaultSleep;
    this.onTransition = deps.onTransition;
    this.waits = retryWaitTable(config);
    this.parserOptions = {
      sectionHeader: config.sectionHeader,
      interfacePrefixes: config.interfacePrefixes,
      minColumns: config.minColumns,
    };
  }

  get currentState(): PollState {
    return this.state;
  }

  async run(): Promise<ConvergenceOutcome> {
    const { maxAttempts } = this.config;
    let lastCycle: CycleSnapshot | null = null;
    this.state = "POLLING";

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      this.transition("POLLING", attempt);

      const cycle = await this.pollOnce(attempt);
      lastCycle = cycle;

      if (cycle.retryReason === undefined) {
        this.transition("CONVERGED", attempt);
        this.log("✅ All network interfaces have their expected IPs at OS level.", "stdout");
        return { status: "CONVERGED", attempts: attempt, lastCycle: cycle };
      }

      if (attempt === maxAttempts) {
        break;
      }

      const reason = cycle.retryReason;
      const waitMs = this.waits[reason];
      this.transition(RETRY_STATE[reason], attempt);
      this.log(
        reason === "EmptyTable"
          ? `⚙️  No OS-level interfaces yet. Retrying in ${formatWait(waitMs)}...`
          : `⚙️  Not ready yet (attempt ${attempt}). Waiting ${formatWait(waitMs)}...`,
        "stdout"
      );
      await this.sleep(waitMs);
    }

    this.transition("EXHAUSTED", maxAttempts);
    return { status: "EXHAUSTED", attempts: maxAttempts, lastCycle };
  }

  private async pollOnce(attempt: number): Promise<CycleSnapshot> {
    const commandLine = [this.config.agentCommand, ...this.config.agentArgs].join(" ");
    this.log(`→ [Attempt ${attempt}/${this.config.maxAttempts}] Running ${commandLine}...`, "stdout");

    const invocation = await this.invokeAgent();
    this.log(
      `↪️  ${this.config.agentCommand} exit code: ${invocation.exitCode}`,
      invocation.exitCode === 0 ? "stdout" : "stderr"
    );
    if (invocation.timedOut) {
      this.log(
        `  ${this.config.agentCommand} timed out after ${formatWait(this.config.agentTimeoutMs)}; using its partial output`,
        "stderr"
      );
    } else if (invocation.error) {
      this.log(`  Could not start ${this.config.agentCommand}: ${invocation.error}`, "stderr");
    }
    if (this.config.echoAgentOutput && invocation.output) {
      this.log(invocation.output, "stdout");
    }

    const report = parseAgentReport(invocation.output, this.parserOptions);
    if (report.kind === "empty") {
      return {
        attempt,
        agentExitCode: invocation.exitCode,
        block: report.block,
        rows: [],
        result: { ...EMPTY_CYCLE_RESULT },
        verdicts: [],
        retryReason: "EmptyTable",
      };
    }

    const { result, verdicts } = await evaluateCycle(report.rows, this.prober, this.log);
    const snapshot: CycleSnapshot = {
      attempt,
      agentExitCode: invocation.exitCode,
      block: report.block,
      rows: report.rows,
      result,
      verdicts,
    };
    if (!isConverged(result)) {
      snapshot.retryReason = "Mismatch";
    }
    return snapshot;
  }

  private async invokeAgent(): Promise<AgentInvocation> {
    try {
      return await this.agent.run();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.log(`  Agent invocation failed: ${message}`, "stderr");
      return { output: "", exitCode: 1 };
    }
  }

  private transition(to: PollState, attempt: number): void {
    if (this.state === to) return;
    const from = this.state;
    this.state = to;
    this.onTransition?.({ from, to, attempt });
  }
}
