import { randomUUID } from "node:crypto";
import type { RunCommandRegistry } from "../dashboard/run-command-registry.js";
import { UnknownRunCommandError } from "../errors.js";
import { getProjectRoot } from "../repo-root.js";
import { ensureStateDirs } from "../state/ensure-state.js";
import { recordEvent } from "../state/events.js";
import { saveExecution, type ExecutionRecord } from "../state/executions.js";
import { startQueueboard } from "../startup.js";

export const triggerRunCommand = async ({
  commandId,
  runCommands,
  tasksDir,
  now = () => new Date(),
  makeId = () => `exec-${randomUUID()}`,
}: {
  commandId: string;
  runCommands: Pick<RunCommandRegistry, "findById">;
  tasksDir: string;
  now?: () => Date;
  makeId?: () => string;
}): Promise<ExecutionRecord> => {
  const command = runCommands.findById(commandId);
  if (!command) {
    throw new UnknownRunCommandError({ commandId });
  }
  const ts = now().toISOString();
  const record: ExecutionRecord = {
    id: makeId(),
    queueId: command.queueId,
    taskType: command.taskType,
    state: "waiting",
    createdAt: ts,
    runAfter: ts,
  };
  await saveExecution({ tasksDir, record });
  return record;
};

export const runRun = async ({ args }: { args: string[] }): Promise<void> => {
  const [commandId] = args;
  if (!commandId) {
    throw new Error("usage: queueboard run <commandId>");
  }
  const runtime = await startQueueboard({ repoRoot: getProjectRoot() });
  await ensureStateDirs({ paths: runtime.paths });
  const record = await triggerRunCommand({
    commandId,
    runCommands: runtime.runCommands,
    tasksDir: runtime.paths.tasksDir,
  });
  await recordEvent({
    eventsLog: runtime.paths.eventsLog,
    event: {
      ts: record.createdAt,
      type: "RUN_COMMAND",
      msg: `queued ${record.id} via ${commandId}`,
      queueId: record.queueId,
      taskType: record.taskType,
    },
  });
  console.log(`queued ${record.id} on ${record.queueId}/${record.taskType}`);
};
