import { DEGRADED_THRESHOLD, ON_DEMAND_NOTICE } from "../constants.js";
import { describeRecurrence, type RecurrenceProvider } from "../recurrence/recurrence.js";
import type { TaskStore } from "../state/executions.js";
import { formatDegradedNotice, isDegraded } from "./degraded.js";
import { buildExecutionListBlock } from "./execution-list.js";
import { composeQueueTaskKey, hasText } from "./identity.js";
import { makeRunCommandKey, type RunCommandLookup } from "./run-command-registry.js";
import { deriveStatusLabel, summarizeExecutions } from "./status.js";
import type { BodyBlock, CommandRef, DashboardListItem } from "./types.js";

export interface DashboardCollaborators {
  taskStore: TaskStore;
  recurrence: RecurrenceProvider;
  runCommands: RunCommandLookup;
  threshold?: number;
}

export interface DashboardItemInput {
  queueId: string;
  taskType: string;
  displayName?: string;
  description?: string;
  showRunCommand: boolean;
}

const findRunCommand = ({
  runCommands,
  queueId,
  taskType,
}: {
  runCommands: RunCommandLookup;
  queueId: string;
  taskType: string;
}): CommandRef[] => {
  const command = runCommands.get(makeRunCommandKey({ queueId, taskType }));
  if (!command) {
    return [];
  }
  return [{ commandId: command.id, title: command.displayName, style: "link" }];
};

export const buildDashboardItem = async ({
  input,
  collaborators,
}: {
  input: DashboardItemInput;
  collaborators: DashboardCollaborators;
}): Promise<DashboardListItem> => {
  const { queueId, taskType, displayName, description, showRunCommand } = input;
  const { taskStore, recurrence, runCommands } = collaborators;
  const threshold = collaborators.threshold ?? DEGRADED_THRESHOLD;

  const waitingCount = await taskStore.countWaiting(queueId);
  const degraded = isDegraded({ waitingCount, threshold });

  const body: BodyBlock[] = [];
  if (hasText(description)) {
    body.push({ kind: "description", text: description });
  }
  if (degraded) {
    body.push({
      kind: "degraded",
      waitingCount,
      threshold,
      text: formatDegradedNotice({ waitingCount, threshold }),
    });
  }

  const recurrenceConfig = await recurrence.lookupRecurrence(queueId, taskType);
  body.push(
    recurrenceConfig
      ? { kind: "schedule", onDemand: false, text: describeRecurrence({ config: recurrenceConfig }) }
      : { kind: "schedule", onDemand: true, text: ON_DEMAND_NOTICE },
  );

  // A large backlog makes the full history expensive to read; only in-progress work is fetched.
  const executions = degraded
    ? await taskStore.fetchInProgressExecutions(queueId, taskType)
    : await taskStore.fetchAllExecutions(queueId, taskType);
  const summary = summarizeExecutions({ executions });

  const commands = showRunCommand ? findRunCommand({ runCommands, queueId, taskType }) : [];

  body.push(buildExecutionListBlock({ executions, recurrence: recurrenceConfig }));

  return {
    id: composeQueueTaskKey({ queueId, taskType }),
    title: hasText(displayName) ? displayName : taskType,
    statusLabel: deriveStatusLabel({ ...summary, degraded }),
    body,
    commands,
  };
};
