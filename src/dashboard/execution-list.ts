import { EXECUTION_HISTORY_LIMIT } from "../constants.js";
import type { RecurrenceConfig } from "../recurrence/recurrence.js";
import type { ExecutionRecord } from "../state/executions.js";
import type { ExecutionListBlock } from "./types.js";

const toTime = ({ value }: { value: string | undefined }): number => {
  if (!value) {
    return 0;
  }
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? 0 : parsed;
};

const isFinished = ({ execution }: { execution: ExecutionRecord }): boolean =>
  execution.state === "completed" || execution.state === "failed" || execution.state === "canceled";

export const buildExecutionListBlock = ({
  executions,
  recurrence,
  limit = EXECUTION_HISTORY_LIMIT,
}: {
  executions: ExecutionRecord[];
  recurrence?: RecurrenceConfig;
  limit?: number;
}): ExecutionListBlock => {
  const running = executions
    .filter((execution) => execution.state === "in_progress")
    .sort(
      (a, b) =>
        toTime({ value: a.startedAt ?? a.createdAt }) - toTime({ value: b.startedAt ?? b.createdAt }),
    );
  const scheduled = executions
    .filter((execution) => execution.state === "waiting")
    .sort(
      (a, b) =>
        toTime({ value: a.runAfter ?? a.createdAt }) - toTime({ value: b.runAfter ?? b.createdAt }),
    );
  const recent = executions
    .filter((execution) => isFinished({ execution }))
    .sort(
      (a, b) =>
        toTime({ value: b.completedAt ?? b.createdAt }) -
        toTime({ value: a.completedAt ?? a.createdAt }),
    )
    .slice(0, limit);
  return {
    kind: "executions",
    recurrence,
    running,
    scheduled,
    recent,
  };
};
