import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";

export type QueueboardEventType = "DASHBOARD_WARN" | "RUN_COMMAND" | "FATAL";

export interface QueueboardEvent {
  ts: string;
  type: QueueboardEventType;
  msg: string;
  queueId?: string;
  taskType?: string;
  data?: Record<string, unknown>;
}

export type QueueboardEventInput = Omit<QueueboardEvent, "ts"> & { ts?: string };

export const serializeEvent = ({ event }: { event: QueueboardEvent }): string =>
  `${JSON.stringify(event)}\n`;

// Stamps the event when no ts is given; creates the log's directory on first write.
export const recordEvent = async ({
  eventsLog,
  event,
  now = () => new Date(),
}: {
  eventsLog: string;
  event: QueueboardEventInput;
  now?: () => Date;
}): Promise<QueueboardEvent> => {
  const stamped: QueueboardEvent = { ...event, ts: event.ts ?? now().toISOString() };
  await mkdir(dirname(eventsLog), { recursive: true });
  await appendFile(eventsLog, serializeEvent({ event: stamped }), "utf-8");
  return stamped;
};
