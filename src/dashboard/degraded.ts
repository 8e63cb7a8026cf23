import { DEGRADED_THRESHOLD } from "../constants.js";

// Strictly greater than: a backlog sitting exactly at the threshold is not degraded.
export const isDegraded = ({
  waitingCount,
  threshold = DEGRADED_THRESHOLD,
}: {
  waitingCount: number;
  threshold?: number;
}): boolean => waitingCount > threshold;

export const formatDegradedNotice = ({
  waitingCount,
  threshold,
}: {
  waitingCount: number;
  threshold: number;
}): string =>
  `${waitingCount} tasks are waiting in this queue (more than ${threshold}); only running executions are shown.`;
