export const hasText = (value: string | null | undefined): value is string =>
  typeof value === "string" && value.trim().length > 0;

/**
 * Joins a queue id and task type with a bare hyphen. Used for both dashboard item ids and run
 * command keys, so the two always line up.
 *
 * Nothing is escaped: `("a", "b-c")` and `("a-b", "c")` produce the same key. Existing item ids
 * and registered commands depend on this exact format; new identifiers should not reuse it.
 */
export const composeQueueTaskKey = ({
  queueId,
  taskType,
}: {
  queueId: string;
  taskType: string;
}): string => `${queueId}-${taskType}`;
