import { recordEvent } from "../state/events.js";

export interface LogEntry {
  msg: string;
  queueId?: string;
  taskType?: string;
  data?: Record<string, unknown>;
}

export interface DashboardLogger {
  warn: (entry: LogEntry) => Promise<void>;
}

export const WARN_EVENT_TYPE = "DASHBOARD_WARN";

const formatConsoleLine = ({ entry }: { entry: LogEntry }): string => {
  const scope = [entry.queueId, entry.taskType].filter((part) => part !== undefined).join("/");
  return scope.length > 0 ? `warn [${scope}] ${entry.msg}` : `warn ${entry.msg}`;
};

/**
 * Writes to the console and the JSON-lines events log. A failed event write is reported on the
 * console and never rejects, so a broken state directory cannot turn a warning into a failure.
 */
export const createEventLogger = ({
  eventsLog,
  writeLine = (line) => console.warn(line),
}: {
  eventsLog: string;
  writeLine?: (line: string) => void;
}): DashboardLogger => ({
  warn: async (entry) => {
    writeLine(formatConsoleLine({ entry }));
    try {
      await recordEvent({
        eventsLog,
        event: {
          type: WARN_EVENT_TYPE,
          msg: entry.msg,
          queueId: entry.queueId,
          taskType: entry.taskType,
          data: entry.data,
        },
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      writeLine(`warn could not record event in ${eventsLog}: ${reason}`);
    }
  },
});
