import type { ExecutionRecord } from "../state/executions.js";
import type { StatusLabel } from "./types.js";

export interface ExecutionSummary {
  isRunning: boolean;
  isScheduled: boolean;
}

export const summarizeExecutions = ({
  executions,
}: {
  executions: ExecutionRecord[];
}): ExecutionSummary => ({
  isRunning: executions.some((execution) => execution.state === "in_progress"),
  isScheduled: executions.some((execution) => execution.state === "waiting"),
});

/**
 * Picks the single label shown for a processor.
 *
 * A degraded queue reports `Running` even without a confirmed in-progress execution: with that
 * many tasks waiting the processor is almost certainly busy, and only in-progress records were
 * fetched.
 */
export const deriveStatusLabel = ({
  isRunning,
  isScheduled,
  degraded,
}: ExecutionSummary & { degraded: boolean }): StatusLabel => {
  if (isRunning || degraded) {
    return "Running";
  }
  if (isScheduled) {
    return "Scheduled";
  }
  return "Stopped";
};
