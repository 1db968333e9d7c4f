/**
 * Options shared by every command that runs the convergence loop.
 */

import { Command, InvalidArgumentError } from "commander";
import fs from "fs-extra";
import {
  ConfigError,
  loadConvergenceConfig,
  parseConvergenceConfigFile,
  type ConvergenceConfig,
  type ConvergenceConfigInput,
} from "@reserved-vnic/core";

export interface ConvergenceCliOptions {
  maxAttempts?: number;
  emptyWaitMs?: number;
  mismatchWaitMs?: number;
  agentCommand?: string;
  config?: string;
  quietAgent?: boolean;
  json?: boolean;
}

export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed;
}

export function addConvergenceOptions(command: Command): Command {
  return command
    .option("--max-attempts <n>", "Poll cycles before giving up (default 120)", parseNonNegativeInt)
    .option(
      "--empty-wait-ms <ms>",
      "Wait after a cycle with no OS-level table (default 3000)",
      parseNonNegativeInt
    )
    .option(
      "--mismatch-wait-ms <ms>",
      "Wait after a cycle with unmatched interfaces (default 1000)",
      parseNonNegativeInt
    )
    .option("--agent-command <path>", "Network configuration agent to run")
    .option("-c, --config <file>", "JSON file with convergence settings")
    .option("--quiet-agent", "Do not echo the raw agent output on every cycle")
    .option("--json", "Print a JSON diagnostic summary when done");
}

async function readConfigFile(path: string): Promise<ConvergenceConfigInput> {
  let raw: unknown;
  try {
    raw = await fs.readJson(path);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read config file ${path}: ${message}`);
  }
  return parseConvergenceConfigFile(raw, path);
}

/**
 * Resolve settings with precedence: flags, config file, environment, defaults.
 */
export async function resolveConvergenceConfig(
  options: ConvergenceCliOptions,
  env: NodeJS.ProcessEnv = process.env
): Promise<ConvergenceConfig> {
  const fromFile = options.config ? await readConfigFile(options.config) : {};
  const fromFlags: ConvergenceConfigInput = {};
  if (options.maxAttempts !== undefined) fromFlags.maxAttempts = options.maxAttempts;
  if (options.emptyWaitMs !== undefined) fromFlags.emptyTableWaitMs = options.emptyWaitMs;
  if (options.mismatchWaitMs !== undefined) fromFlags.mismatchWaitMs = options.mismatchWaitMs;
  if (options.agentCommand !== undefined) fromFlags.agentCommand = options.agentCommand;
  if (options.quietAgent) fromFlags.echoAgentOutput = false;

  return loadConvergenceConfig({ ...fromFile, ...fromFlags }, env);
}
