/**
 * Wires the default agent runner and prober to the poller and reporter.
 */

import { CommandAgentRunner, type IAgentRunner } from "../agent/agent-runner";
import type { ConvergenceConfig } from "../config/convergence-config";
import type { IAddressProber } from "../probe/address-prober.interface";
import { IpCommandProber } from "../probe/ip-command-prober";
import type { LogCallback, SleepFn } from "../types";
import { ConvergencePoller } from "./convergence-poller";
import { reportOutcome } from "./diagnostic-reporter";
import type { ConvergenceOutcome, StateTransition } from "./types";

export interface VerifyConvergenceOptions {
  log: LogCallback;
  agent?: IAgentRunner;
  prober?: IAddressProber;
  sleep?: SleepFn;
  onTransition?: (transition: StateTransition) => void;
}

export interface VerifyConvergenceResult {
  outcome: ConvergenceOutcome;
  exitCode: number;
}

export async function verifyConvergence(
  config: ConvergenceConfig,
  options: VerifyConvergenceOptions
): Promise<VerifyConvergenceResult> {
  const { log } = options;
  const agent =
    options.agent ??
    new CommandAgentRunner(config.agentCommand, config.agentArgs, config.agentTimeoutMs);
  const prober = options.prober ?? new IpCommandProber({ log });

  const poller = new ConvergencePoller(config, {
    agent,
    prober,
    log,
    sleep: options.sleep,
    onTransition: options.onTransition,
  });

  const outcome = await poller.run();
  return { outcome, exitCode: reportOutcome(outcome, log) };
}
