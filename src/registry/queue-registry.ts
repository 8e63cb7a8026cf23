import { MetadataResolutionError } from "../errors.js";
import {
  asRawEntry,
  readEntryId,
  resolveProcessorEntry,
  resolveQueueEntry,
  type EntryMetadata,
  type RawEntry,
} from "./metadata.js";

export interface QueueRegistry {
  listQueues: () => Promise<string[]>;
  resolveQueueMetadata: (queueId: string) => Promise<EntryMetadata>;
  listProcessors: (queueId: string) => Promise<string[]>;
  resolveProcessorMetadata: (queueId: string, taskType: string) => Promise<EntryMetadata>;
}

export const findQueueEntry = ({
  queues,
  queueId,
}: {
  queues: unknown[];
  queueId: string;
}): RawEntry | null => {
  const match = queues.find((value) => readEntryId({ value, field: "id" }) === queueId);
  return asRawEntry(match);
};

export const listProcessorEntries = ({ queue }: { queue: RawEntry }): unknown[] =>
  Array.isArray(queue.processors) ? queue.processors : [];

export const findProcessorEntry = ({
  queue,
  taskType,
}: {
  queue: RawEntry;
  taskType: string;
}): RawEntry | null => {
  const match = listProcessorEntries({ queue }).find(
    (value) => readEntryId({ value, field: "type" }) === taskType,
  );
  return asRawEntry(match);
};

// Later entries repeating an id are shadowed by the first one, so they are listed once.
const uniqueIds = ({ ids }: { ids: string[] }): string[] => [...new Set(ids)];

const notFound = ({ entry, reason }: { entry: string; reason: string }): MetadataResolutionError =>
  new MetadataResolutionError({ kind: "not_found", entry, reason });

export const createConfigQueueRegistry = ({ queues }: { queues: unknown[] }): QueueRegistry => {
  const requireQueue = ({ queueId }: { queueId: string }): RawEntry => {
    const queue = findQueueEntry({ queues, queueId });
    if (!queue) {
      throw notFound({ entry: `queue ${queueId}`, reason: "no queue entry with this id" });
    }
    return queue;
  };

  return {
    listQueues: async () =>
      uniqueIds({ ids: queues.map((value) => readEntryId({ value, field: "id" })) }),
    resolveQueueMetadata: async (queueId) =>
      resolveQueueEntry({ entry: requireQueue({ queueId }), label: `queue ${queueId}` }),
    listProcessors: async (queueId) => {
      const queue = findQueueEntry({ queues, queueId });
      if (!queue) {
        return [];
      }
      return uniqueIds({
        ids: listProcessorEntries({ queue }).map((value) => readEntryId({ value, field: "type" })),
      });
    },
    resolveProcessorMetadata: async (queueId, taskType) => {
      const label = `processor ${taskType} on queue ${queueId}`;
      const processor = findProcessorEntry({ queue: requireQueue({ queueId }), taskType });
      if (!processor) {
        throw notFound({ entry: label, reason: "no processor entry with this type" });
      }
      return resolveProcessorEntry({ entry: processor, label });
    },
  };
};
