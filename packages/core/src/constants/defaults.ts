/**
 * Default values for the convergence engine.
 */

/** Marker line that opens the OS-level table in the agent report */
export const OS_SECTION_HEADER = "Operating System level network configuration:";

/** Name prefixes of physical (non-virtual) interfaces */
export const PHYSICAL_INTERFACE_PREFIXES = ["ens", "enp", "eno", "eth"] as const;

/** A qualifying report row has at least this many columns */
export const MIN_REPORT_COLUMNS = 8;

/** 1-indexed column holding the expected IPv4 address */
export const EXPECTED_IP_COLUMN = 2;

/** 1-indexed column holding the interface name */
export const INTERFACE_NAME_COLUMN = 8;

/** Literal the agent prints when no IP has been assigned yet */
export const NO_IP_MARKER = "-";

export const RESERVED_VNIC_VERSION = "0.1.0";

export const DEFAULT_AGENT_COMMAND = "oci-network-config";
export const DEFAULT_AGENT_ARGS = ["-c"] as const;
