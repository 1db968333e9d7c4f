/**
 * Agent Runner
 *
 * Invokes the network configuration agent and captures its combined output
 * and exit code. The exit code is informational: the agent may exit non-zero
 * and still print a usable partial report.
 */

import { spawn } from "child_process";
import { AGENT_SPAWN_FAILURE_EXIT_CODE, AGENT_TIMEOUT_MS } from "../constants";

/** Exit code reported when the agent was killed for running too long */
export const AGENT_TIMEOUT_EXIT_CODE = 124;

export interface AgentInvocation {
  /** stdout and stderr interleaved in arrival order, trailing newlines removed */
  output: string;
  exitCode: number;
  /** Set when the process could not be started */
  error?: string;
  timedOut?: boolean;
}

export interface IAgentRunner {
  run(): Promise<AgentInvocation>;
}

export class CommandAgentRunner implements IAgentRunner {
  constructor(
    private readonly command: string,
    private readonly args: readonly string[] = [],
    private readonly timeoutMs: number = AGENT_TIMEOUT_MS
  ) {}

  run(): Promise<AgentInvocation> {
    return new Promise((resolve) => {
      const chunks: Buffer[] = [];
      let settled = false;
      const collected = (): string => Buffer.concat(chunks).toString("utf8").replace(/\n+$/, "");

      const child = spawn(this.command, [...this.args], {
        stdio: ["ignore", "pipe", "pipe"],
      });

      // Resolve without waiting for "close": a grandchild that inherited the
      // pipes would hold them open long after the agent itself is gone.
      const timer = setTimeout(() => {
        child.kill("SIGKILL");
        child.stdout?.destroy();
        child.stderr?.destroy();
        finish({ output: collected(), exitCode: AGENT_TIMEOUT_EXIT_CODE, timedOut: true });
      }, this.timeoutMs);

      const finish = (result: AgentInvocation): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(result);
      };

      const collect = (chunk: Buffer): void => {
        chunks.push(chunk);
      };
      child.stdout?.on("data", collect);
      child.stderr?.on("data", collect);

      child.on("error", (error: Error) => {
        const output = Buffer.concat(chunks).toString("utf8");
        finish({
          output: (output ? `${output}\n${error.message}` : error.message).replace(/\n+$/, ""),
          exitCode: AGENT_SPAWN_FAILURE_EXIT_CODE,
          error: error.message,
        });
      });

      child.on("close", (code: number | null) => {
        finish({ output: collected(), exitCode: code ?? 1 });
      });
    });
  }
}
