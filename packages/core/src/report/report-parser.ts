/**
 * Agent Report Parser
 *
 * Turns the free-form output of the network configuration agent into typed
 * interface rows. Only the OS-level table is read: it starts on the line after
 * the section header and runs until the first blank line.
 */

import {
  EXPECTED_IP_COLUMN,
  INTERFACE_NAME_COLUMN,
  MIN_REPORT_COLUMNS,
  NO_IP_MARKER,
  OS_SECTION_HEADER,
  PHYSICAL_INTERFACE_PREFIXES,
} from "../constants";
import type { InterfaceExpectation, ParsedReport, ReportParserOptions } from "./types";

export const DEFAULT_PARSER_OPTIONS: ReportParserOptions = {
  sectionHeader: OS_SECTION_HEADER,
  interfacePrefixes: PHYSICAL_INTERFACE_PREFIXES,
  minColumns: MIN_REPORT_COLUMNS,
};

/**
 * Split a line into whitespace-delimited columns.
 */
export function tokenize(line: string): string[] {
  const trimmed = line.trim();
  return trimmed === "" ? [] : trimmed.split(/\s+/);
}

/**
 * Return the lines of the first section opened by `header`, excluding the
 * header line and the terminating blank line.
 */
export function extractSectionLines(raw: string, header: string): string[] {
  const lines = raw.split(/\r?\n/);
  const start = lines.findIndex((line) => line.includes(header));
  if (start === -1) {
    return [];
  }

  const section: string[] = [];
  for (const line of lines.slice(start + 1)) {
    if (tokenize(line).length === 0) {
      break;
    }
    section.push(line);
  }
  return section;
}

/**
 * Build a row from tokenized columns, or null if the line is not an
 * interface row (header, separator, virtual interface, short line).
 */
export function parseRow(
  columns: readonly string[],
  options: ReportParserOptions = DEFAULT_PARSER_OPTIONS
): InterfaceExpectation | null {
  if (columns.length < Math.max(options.minColumns, INTERFACE_NAME_COLUMN)) {
    return null;
  }

  const name = columns[INTERFACE_NAME_COLUMN - 1];
  const ip = columns[EXPECTED_IP_COLUMN - 1];
  if (name === undefined || ip === undefined) {
    return null;
  }
  if (!options.interfacePrefixes.some((prefix) => name.startsWith(prefix))) {
    return null;
  }

  return { name, expectedIp: ip === NO_IP_MARKER ? null : ip };
}

/**
 * Parse one agent report.
 *
 * A report without the section header, or whose section holds no interface
 * rows, parses as `empty`: the agent is treated as not ready yet.
 */
export function parseAgentReport(
  raw: string,
  options: ReportParserOptions = DEFAULT_PARSER_OPTIONS
): ParsedReport {
  const lines = extractSectionLines(raw, options.sectionHeader);
  const block = lines.join("\n");

  const rows: InterfaceExpectation[] = [];
  for (const line of lines) {
    const row = parseRow(tokenize(line), options);
    if (row) {
      rows.push(row);
    }
  }

  if (rows.length === 0) {
    return { kind: "empty", block };
  }
  return { kind: "rows", block, rows };
}
