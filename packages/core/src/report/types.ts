/**
 * Report types.
 */

/**
 * One interface row from the agent's OS-level table.
 */
export interface InterfaceExpectation {
  /** Interface name as the kernel knows it, e.g. `ens5` */
  readonly name: string;
  /** Expected IPv4 address; null when the agent has not assigned one yet */
  readonly expectedIp: string | null;
}

/**
 * Outcome of parsing one agent report.
 * `block` is the raw table text, kept verbatim for diagnostics.
 */
export type ParsedReport =
  | { readonly kind: "empty"; readonly block: string }
  | {
      readonly kind: "rows";
      readonly block: string;
      readonly rows: readonly InterfaceExpectation[];
    };

export interface ReportParserOptions {
  /** Substring identifying the line that opens the table */
  sectionHeader: string;
  /** Accepted interface-name prefixes */
  interfacePrefixes: readonly string[];
  /** Minimum column count for a data row */
  minColumns: number;
}
