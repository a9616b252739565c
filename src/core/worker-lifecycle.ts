/**
 * Worker Lifecycle — allowed states and transitions of the log worker.
 *
 * "draining" is entered on the shutdown signal; the worker sweeps the queue
 * until it observes it empty, then settles in "stopped", which is terminal.
 */

export const WORKER_STATES = ["idle", "running", "draining", "stopped"] as const;

export type WorkerState = (typeof WORKER_STATES)[number];

const ALLOWED_TRANSITIONS: Record<WorkerState, ReadonlySet<WorkerState>> = {
  idle: new Set(["running", "draining"]),
  running: new Set(["draining"]),
  draining: new Set(["stopped"]),
  stopped: new Set<WorkerState>(),
};

export function isWorkerTransitionAllowed(from: WorkerState, to: WorkerState): boolean {
  return ALLOWED_TRANSITIONS[from].has(to);
}
