import type { DashboardLogger } from "../log/logger.js";
import type { EntryMetadata } from "../registry/metadata.js";
import type { QueueRegistry } from "../registry/queue-registry.js";
import { hasText } from "./identity.js";
import { buildDashboardItem, type DashboardCollaborators } from "./item-builder.js";
import type { DashboardListItem } from "./types.js";

export interface DashboardSources extends DashboardCollaborators {
  registry: QueueRegistry;
  logger: DashboardLogger;
}

const describeError = ({ error }: { error: unknown }): string =>
  error instanceof Error ? error.message : String(error);

const tryResolve = async ({
  resolve,
  onError,
}: {
  resolve: () => Promise<EntryMetadata>;
  onError: (error: unknown) => Promise<void>;
}): Promise<EntryMetadata | null> => {
  try {
    return await resolve();
  } catch (error) {
    await onError(error);
    return null;
  }
};

/**
 * Yields one item per visible queue/processor pair, queues first and processors within each
 * queue, both in registry order.
 *
 * A queue or processor whose metadata cannot be resolved is logged and left out; its siblings
 * still render. Failures from the task store or any other collaborator are not caught and end
 * the iteration. Every call starts from scratch against the current collaborator state.
 */
export async function* getDashboardContent({
  sources,
}: {
  sources: DashboardSources;
}): AsyncGenerator<DashboardListItem, void, undefined> {
  const { registry, logger } = sources;

  for (const queueId of await registry.listQueues()) {
    if (!hasText(queueId)) {
      continue;
    }

    const queue = await tryResolve({
      resolve: () => registry.resolveQueueMetadata(queueId),
      onError: (error) =>
        logger.warn({
          msg: `Cannot load details for queue ${queueId}; it is left off the dashboard.`,
          queueId,
          data: { error: describeError({ error }) },
        }),
    });
    if (!queue || queue.hidden) {
      continue;
    }

    for (const taskType of await registry.listProcessors(queueId)) {
      if (!hasText(taskType)) {
        continue;
      }

      const processor = await tryResolve({
        resolve: () => registry.resolveProcessorMetadata(queueId, taskType),
        onError: (error) =>
          logger.warn({
            msg: `Cannot load processor details for task type ${taskType} on queue ${queueId}.`,
            queueId,
            taskType,
            data: { error: describeError({ error }) },
          }),
      });
      if (!processor || processor.hidden) {
        continue;
      }

      yield await buildDashboardItem({
        input: {
          queueId,
          taskType,
          displayName: processor.displayName,
          description: processor.description,
          showRunCommand: processor.showRunCommand,
        },
        collaborators: sources,
      });
    }
  }
}

export const collectDashboardContent = async ({
  sources,
}: {
  sources: DashboardSources;
}): Promise<DashboardListItem[]> => {
  const items: DashboardListItem[] = [];
  for await (const item of getDashboardContent({ sources })) {
    items.push(item);
  }
  return items;
};
