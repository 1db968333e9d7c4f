import { ConfigError } from "../errors";
import {
  ConvergenceConfigSchema,
  loadConvergenceConfig,
  parseConvergenceConfigFile,
} from "./convergence-config";

describe("loadConvergenceConfig", () => {
  it("falls back to the built-in defaults", () => {
    expect(loadConvergenceConfig({}, {})).toEqual({
      maxAttempts: 120,
      emptyTableWaitMs: 3000,
      mismatchWaitMs: 1000,
      agentCommand: "oci-network-config",
      agentArgs: ["-c"],
      agentTimeoutMs: 60_000,
      sectionHeader: "Operating System level network configuration:",
      interfacePrefixes: ["ens", "enp", "eno", "eth"],
      minColumns: 8,
      echoAgentOutput: true,
    });
  });

  it("reads RESERVED_VNIC_* environment variables", () => {
    const config = loadConvergenceConfig(
      {},
      {
        RESERVED_VNIC_MAX_ATTEMPTS: "30",
        RESERVED_VNIC_EMPTY_WAIT_MS: "5000",
        RESERVED_VNIC_MISMATCH_WAIT_MS: "500",
        RESERVED_VNIC_AGENT_COMMAND: "/usr/bin/oci-network-config",
      }
    );

    expect(config.maxAttempts).toBe(30);
    expect(config.emptyTableWaitMs).toBe(5000);
    expect(config.mismatchWaitMs).toBe(500);
    expect(config.agentCommand).toBe("/usr/bin/oci-network-config");
  });

  it("lets explicit overrides win over the environment", () => {
    const config = loadConvergenceConfig(
      { maxAttempts: 10, mismatchWaitMs: undefined },
      { RESERVED_VNIC_MAX_ATTEMPTS: "30", RESERVED_VNIC_MISMATCH_WAIT_MS: "250" }
    );

    expect(config.maxAttempts).toBe(10);
    expect(config.mismatchWaitMs).toBe(250);
  });

  it("ignores blank environment values", () => {
    expect(loadConvergenceConfig({}, { RESERVED_VNIC_MAX_ATTEMPTS: "  " }).maxAttempts).toBe(120);
  });

  it("rejects a non-numeric attempt budget", () => {
    expect(() => loadConvergenceConfig({}, { RESERVED_VNIC_MAX_ATTEMPTS: "lots" })).toThrow(
      ConfigError
    );
  });

  it("lists every invalid field", () => {
    try {
      loadConvergenceConfig({ maxAttempts: 0, mismatchWaitMs: -1 }, {});
      throw new Error("expected ConfigError");
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      const paths = (error as ConfigError).issues.map((issue) => issue.split(":")[0]);
      expect(paths).toEqual(["maxAttempts", "mismatchWaitMs"]);
    }
  });

  it("requires the row minimum to reach the interface column", () => {
    expect(ConvergenceConfigSchema.safeParse({ minColumns: 7 }).success).toBe(false);
  });
});

describe("parseConvergenceConfigFile", () => {
  it("accepts a partial config without applying defaults", () => {
    expect(parseConvergenceConfigFile({ maxAttempts: 60 }, "vnic.json")).toEqual({ maxAttempts: 60 });
  });

  it("rejects unknown keys", () => {
    expect(() => parseConvergenceConfigFile({ retries: 3 }, "vnic.json")).toThrow(
      /^Invalid config file vnic\.json: /
    );
  });

  it("rejects values of the wrong type", () => {
    expect(() => parseConvergenceConfigFile({ mismatchWaitMs: "1s" }, "vnic.json")).toThrow(ConfigError);
  });
});
