import { findProcessorEntry, findQueueEntry } from "../registry/queue-registry.js";
import { parseRecurrence, type RecurrenceProvider } from "./recurrence.js";

export const createConfigRecurrenceProvider = ({
  queues,
}: {
  queues: unknown[];
}): RecurrenceProvider => ({
  lookupRecurrence: async (queueId, taskType) => {
    const queue = findQueueEntry({ queues, queueId });
    const processor = queue ? findProcessorEntry({ queue, taskType }) : null;
    if (!processor || processor.recurrence === undefined) {
      return undefined;
    }
    return parseRecurrence({ value: processor.recurrence }) ?? undefined;
  },
});
