/**
 * Output Service Interface
 *
 * Everything the commands print goes through this, so handlers can be tested
 * without a terminal.
 */

import type { LogCallback } from "@reserved-vnic/core";

export interface IOutputService {
  header(title: string, icon?: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  dim(message: string): void;
  newline(): void;

  /** Print aligned `label: value` lines between separator rules */
  keyValues(entries: Array<[string, string]>): void;

  /** Print a value as indented JSON */
  json(value: unknown): void;

  startSpinner(text: string): void;
  succeedSpinner(text: string): void;
  failSpinner(text: string): void;

  /** Callback handed to the engine and adapters */
  readonly log: LogCallback;
}
