/**
 * Timing constants for the convergence loop.
 */

/** Maximum poll cycles before giving up */
export const MAX_CONVERGENCE_ATTEMPTS = 120;

/** Wait after a cycle where the agent reported no interfaces (control plane still syncing) */
export const EMPTY_TABLE_WAIT_MS = 3_000;

/** Wait after a cycle where rows exist but do not match yet */
export const MISMATCH_WAIT_MS = 1_000;

/** Kill the agent if a single invocation runs longer than this */
export const AGENT_TIMEOUT_MS = 60_000;

/** Exit code reported when the agent binary could not be started */
export const AGENT_SPAWN_FAILURE_EXIT_CODE = 127;
