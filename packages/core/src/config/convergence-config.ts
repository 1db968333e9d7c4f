import { z } from "zod";
import {
  AGENT_TIMEOUT_MS,
  DEFAULT_AGENT_ARGS,
  DEFAULT_AGENT_COMMAND,
  EMPTY_TABLE_WAIT_MS,
  INTERFACE_NAME_COLUMN,
  MAX_CONVERGENCE_ATTEMPTS,
  MIN_REPORT_COLUMNS,
  MISMATCH_WAIT_MS,
  OS_SECTION_HEADER,
  PHYSICAL_INTERFACE_PREFIXES,
} from "../constants";
import { ConfigError } from "../errors";

export const ConvergenceConfigSchema = z.object({
  maxAttempts: z.number().int().min(1).default(MAX_CONVERGENCE_ATTEMPTS),
  emptyTableWaitMs: z.number().int().nonnegative().default(EMPTY_TABLE_WAIT_MS),
  mismatchWaitMs: z.number().int().nonnegative().default(MISMATCH_WAIT_MS),
  agentCommand: z.string().min(1).default(DEFAULT_AGENT_COMMAND),
  agentArgs: z.array(z.string()).default([...DEFAULT_AGENT_ARGS]),
  agentTimeoutMs: z.number().int().positive().default(AGENT_TIMEOUT_MS),
  sectionHeader: z.string().min(1).default(OS_SECTION_HEADER),
  interfacePrefixes: z
    .array(z.string().min(1))
    .min(1)
    .default([...PHYSICAL_INTERFACE_PREFIXES]),
  /** Must reach the interface-name column */
  minColumns: z.number().int().min(INTERFACE_NAME_COLUMN).default(MIN_REPORT_COLUMNS),
  /** Print the raw agent output on every cycle */
  echoAgentOutput: z.boolean().default(true),
});

export type ConvergenceConfig = z.infer<typeof ConvergenceConfigSchema>;
export type ConvergenceConfigInput = z.input<typeof ConvergenceConfigSchema>;

const NUMERIC_ENV = {
  maxAttempts: "RESERVED_VNIC_MAX_ATTEMPTS",
  emptyTableWaitMs: "RESERVED_VNIC_EMPTY_WAIT_MS",
  mismatchWaitMs: "RESERVED_VNIC_MISMATCH_WAIT_MS",
} as const;

const AGENT_COMMAND_ENV = "RESERVED_VNIC_AGENT_COMMAND";

function readEnv(env: NodeJS.ProcessEnv): ConvergenceConfigInput {
  const input: ConvergenceConfigInput = {};

  for (const [key, name] of Object.entries(NUMERIC_ENV) as Array<
    [keyof typeof NUMERIC_ENV, string]
  >) {
    const raw = env[name]?.trim();
    if (raw) {
      input[key] = Number(raw);
    }
  }

  const agentCommand = env[AGENT_COMMAND_ENV]?.trim();
  if (agentCommand) {
    input.agentCommand = agentCommand;
  }

  return input;
}

function definedOnly(input: ConvergenceConfigInput): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(input)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Resolve the convergence configuration.
 *
 * Precedence: explicit overrides, then `RESERVED_VNIC_*` environment
 * variables, then schema defaults.
 */
export function loadConvergenceConfig(
  overrides: ConvergenceConfigInput = {},
  env: NodeJS.ProcessEnv = process.env
): ConvergenceConfig {
  const parsed = ConvergenceConfigSchema.safeParse({
    ...readEnv(env),
    ...definedOnly(overrides),
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    throw new ConfigError(`Invalid convergence configuration: ${issues.join("; ")}`, issues);
  }

  return parsed.data;
}

/**
 * Shape of a JSON config file: any subset of the settings, no unknown keys.
 */
export const ConvergenceConfigFileSchema = ConvergenceConfigSchema.partial().strict();

/**
 * Validate the parsed contents of a config file.
 *
 * @param source - File path, used in the error message
 */
export function parseConvergenceConfigFile(raw: unknown, source: string): ConvergenceConfigInput {
  const parsed = ConvergenceConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    throw new ConfigError(`Invalid config file ${source}: ${issues.join("; ")}`, issues);
  }
  return parsed.data;
}
