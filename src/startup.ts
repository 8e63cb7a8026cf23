import { loadConfig, parseStringValue, type QueueboardConfig } from "./config.js";
import type { DashboardSources } from "./dashboard/content.js";
import { hasText } from "./dashboard/identity.js";
import {
  getRunCommandRegistry,
  makeRunCommandId,
  makeRunCommandKey,
  type RunCommandRegistry,
} from "./dashboard/run-command-registry.js";
import { createEventLogger } from "./log/logger.js";
import { getQueueboardPaths, type QueueboardPaths } from "./paths.js";
import { createConfigRecurrenceProvider } from "./recurrence/config-provider.js";
import { asRawEntry, readEntryId } from "./registry/metadata.js";
import { createConfigQueueRegistry, listProcessorEntries } from "./registry/queue-registry.js";
import { createFileTaskStore } from "./state/executions.js";

export const registerConfiguredRunCommands = ({
  queues,
  runCommands,
}: {
  queues: unknown[];
  runCommands: RunCommandRegistry;
}): number => {
  let registered = 0;
  // Repeated queue ids or processor types are shadowed by their first entry.
  const seenQueues = new Set<string>();
  for (const value of queues) {
    const queue = asRawEntry(value);
    const queueId = readEntryId({ value, field: "id" });
    if (!queue || !hasText(queueId) || seenQueues.has(queueId)) {
      continue;
    }
    seenQueues.add(queueId);
    const seenTypes = new Set<string>();
    for (const processorValue of listProcessorEntries({ queue })) {
      const taskType = readEntryId({ value: processorValue, field: "type" });
      if (!hasText(taskType) || seenTypes.has(taskType)) {
        continue;
      }
      seenTypes.add(taskType);
      const title = parseStringValue({ value: asRawEntry(processorValue)?.runCommand });
      if (!title) {
        continue;
      }
      runCommands.register({
        key: makeRunCommandKey({ queueId, taskType }),
        command: {
          id: makeRunCommandId({ queueId, taskType }),
          displayName: title,
          queueId,
          taskType,
        },
      });
      registered += 1;
    }
  }
  return registered;
};

export interface QueueboardRuntime {
  paths: QueueboardPaths;
  config: QueueboardConfig;
  runCommands: RunCommandRegistry;
  sources: DashboardSources;
}

export const startQueueboard = async ({
  repoRoot,
  runCommands = getRunCommandRegistry(),
  writeLine,
}: {
  repoRoot: string;
  runCommands?: RunCommandRegistry;
  writeLine?: (line: string) => void;
}): Promise<QueueboardRuntime> => {
  const paths = getQueueboardPaths({ repoRoot });
  const config = await loadConfig({ repoRoot });
  registerConfiguredRunCommands({ queues: config.queues, runCommands });
  return {
    paths,
    config,
    runCommands,
    sources: {
      registry: createConfigQueueRegistry({ queues: config.queues }),
      taskStore: createFileTaskStore({ tasksDir: paths.tasksDir }),
      recurrence: createConfigRecurrenceProvider({ queues: config.queues }),
      runCommands,
      threshold: config.degradedThreshold,
      logger: createEventLogger({ eventsLog: paths.eventsLog, writeLine }),
    },
  };
};
