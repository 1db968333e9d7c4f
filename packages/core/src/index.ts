// Types
export type { LogCallback, LogStream, SleepFn } from "./types";
export type {
  InterfaceExpectation,
  ParsedReport,
  ReportParserOptions,
} from "./report/types";
export type {
  CycleResult,
  CycleEvaluation,
  CycleSnapshot,
  ConvergenceOutcome,
  PollState,
  RetryReason,
  RowVerdict,
  StateTransition,
} from "./convergence/types";
export type { IAddressProber } from "./probe/address-prober.interface";
export type { AgentInvocation, IAgentRunner } from "./agent/agent-runner";

// Constants
export * from "./constants";

// Config
export {
  ConvergenceConfigFileSchema,
  ConvergenceConfigSchema,
  loadConvergenceConfig,
  parseConvergenceConfigFile,
  type ConvergenceConfig,
  type ConvergenceConfigInput,
} from "./config/convergence-config";
export { ConfigError } from "./errors";
export { sleep } from "./types";

// Report parsing
export {
  DEFAULT_PARSER_OPTIONS,
  extractSectionLines,
  parseAgentReport,
  parseRow,
  tokenize,
} from "./report/report-parser";

// OS probing
export { IpCommandProber, parseInetAddresses, stripPrefixLength } from "./probe/ip-command-prober";

// Agent
export { CommandAgentRunner, AGENT_TIMEOUT_EXIT_CODE } from "./agent/agent-runner";

// Convergence
export { EMPTY_CYCLE_RESULT } from "./convergence/types";
export {
  evaluateCycle,
  formatCycleSummary,
  formatVerdict,
  isConverged,
} from "./convergence/convergence-evaluator";
export { ConvergencePoller, retryWaitTable, formatWait } from "./convergence/convergence-poller";
export {
  EXIT_CONVERGED,
  EXIT_EXHAUSTED,
  reportOutcome,
  summarizeOutcome,
  type DiagnosticSummary,
  type UnmatchedInterface,
} from "./convergence/diagnostic-reporter";
export {
  verifyConvergence,
  type VerifyConvergenceOptions,
  type VerifyConvergenceResult,
} from "./convergence/verify-convergence";
