/**
 * Console Output Service
 *
 * Terminal implementation of IOutputService using chalk and ora.
 */

import chalk from "chalk";
import ora from "ora";
import type { LogCallback, LogStream } from "@reserved-vnic/core";
import type { IOutputService } from "../interfaces/output.interface";

const RULE = "-".repeat(42);

export class ConsoleOutputService implements IOutputService {
  private spinner: ora.Ora | null = null;

  constructor(private readonly colors: chalk.Chalk = chalk) {}

  readonly log: LogCallback = (message: string, stream: LogStream): void => {
    if (stream === "stderr") {
      console.error(this.colors.yellow(message));
    } else {
      console.log(message);
    }
  };

  header(title: string, icon?: string): void {
    console.log(this.colors.blue.bold(icon ? `${icon} ${title}` : title));
  }

  success(message: string): void {
    console.log(this.colors.green(message));
  }

  warn(message: string): void {
    console.log(this.colors.yellow(message));
  }

  error(message: string): void {
    console.error(this.colors.red(message));
  }

  dim(message: string): void {
    console.log(this.colors.gray(message));
  }

  newline(): void {
    console.log();
  }

  keyValues(entries: Array<[string, string]>): void {
    const width = Math.max(0, ...entries.map(([label]) => label.length + 1));
    console.log(RULE);
    for (const [label, value] of entries) {
      console.log(`${`${label}:`.padEnd(width)} ${value}`);
    }
    console.log(RULE);
  }

  json(value: unknown): void {
    console.log(JSON.stringify(value, null, 2));
  }

  startSpinner(text: string): void {
    this.spinner = ora(text).start();
  }

  succeedSpinner(text: string): void {
    this.spinner?.succeed(text);
    this.spinner = null;
  }

  failSpinner(text: string): void {
    this.spinner?.fail(text);
    this.spinner = null;
  }
}
