/**
 * `ip` command prober
 *
 * Queries the kernel through iproute2 (`ip -4 addr show dev <iface>`).
 */

import { execFile } from "child_process";
import type { LogCallback } from "../types";
import type { IAddressProber } from "./address-prober.interface";

const DEFAULT_TIMEOUT_MS = 10_000;

export interface IpCommandProberOptions {
  /** Path or name of the iproute2 binary */
  ipBinary?: string;
  timeoutMs?: number;
  log?: LogCallback;
}

/**
 * Drop a trailing `/prefixlen` from an address.
 */
export function stripPrefixLength(address: string): string {
  const slash = address.indexOf("/");
  return slash === -1 ? address : address.slice(0, slash);
}

/**
 * Collect every `inet` address from `ip addr show` output.
 */
export function parseInetAddresses(output: string): string[] {
  const addresses: string[] = [];
  for (const line of output.split("\n")) {
    const match = /^\s*inet\s+(\S+)/.exec(line);
    if (match?.[1]) {
      addresses.push(stripPrefixLength(match[1]));
    }
  }
  return addresses;
}

function runCommand(cmd: string, args: string[], timeoutMs: number): Promise<string> {
  return new Promise((resolve, reject) => {
    execFile(cmd, args, { timeout: timeoutMs }, (error, stdout, stderr) => {
      if (error) {
        reject(new Error(stderr.trim() || error.message));
        return;
      }
      resolve(stdout);
    });
  });
}

export class IpCommandProber implements IAddressProber {
  private readonly ipBinary: string;
  private readonly timeoutMs: number;
  private readonly log?: LogCallback;

  constructor(options: IpCommandProberOptions = {}) {
    this.ipBinary = options.ipBinary ?? "ip";
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.log = options.log;
  }

  async getIpv4Addresses(interfaceName: string): Promise<string[]> {
    try {
      const output = await runCommand(
        this.ipBinary,
        ["-4", "addr", "show", "dev", interfaceName],
        this.timeoutMs
      );
      return parseInetAddresses(output);
    } catch (error) {
      // A missing device is an expected transient state, not a failure
      this.log?.(`  ip addr show dev ${interfaceName}: ${(error as Error).message}`, "stderr");
      return [];
    }
  }
}
