/**
 * Shared callback types.
 */

export type LogStream = "stdout" | "stderr";

/**
 * Receives every line the engine and adapters want to show the operator.
 */
export type LogCallback = (message: string, stream: LogStream) => void;

/**
 * Suspends the caller for the given number of milliseconds.
 */
export type SleepFn = (ms: number) => Promise<void>;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
