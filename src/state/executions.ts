import { readFile, readdir, writeFile } from "node:fs/promises";
import { join } from "node:path";

export type ExecutionState = "waiting" | "in_progress" | "completed" | "failed" | "canceled";

export interface ExecutionRecord {
  id: string;
  queueId: string;
  taskType: string;
  state: ExecutionState;
  createdAt: string;
  startedAt?: string;
  completedAt?: string;
  runAfter?: string;
  error?: string;
}

export interface TaskStore {
  countWaiting: (queueId: string) => Promise<number>;
  fetchInProgressExecutions: (queueId: string, taskType: string) => Promise<ExecutionRecord[]>;
  fetchAllExecutions: (queueId: string, taskType: string) => Promise<ExecutionRecord[]>;
}

export const isExecutionState = (value: unknown): value is ExecutionState => {
  return (
    value === "waiting" ||
    value === "in_progress" ||
    value === "completed" ||
    value === "failed" ||
    value === "canceled"
  );
};

const isOptionalString = (value: unknown): boolean =>
  value === undefined || typeof value === "string";

const isNonEmptyString = (value: unknown): value is string =>
  typeof value === "string" && value.length > 0;

export const parseExecutionRecord = ({ value }: { value: unknown }): ExecutionRecord | null => {
  if (!value || typeof value !== "object") {
    return null;
  }
  const record = value as Partial<Record<keyof ExecutionRecord, unknown>>;
  if (!isNonEmptyString(record.id) || !isNonEmptyString(record.queueId)) {
    return null;
  }
  if (!isNonEmptyString(record.taskType) || !isNonEmptyString(record.createdAt)) {
    return null;
  }
  if (!isExecutionState(record.state)) {
    return null;
  }
  if (
    !isOptionalString(record.startedAt) ||
    !isOptionalString(record.completedAt) ||
    !isOptionalString(record.runAfter) ||
    !isOptionalString(record.error)
  ) {
    return null;
  }
  return {
    id: record.id,
    queueId: record.queueId,
    taskType: record.taskType,
    state: record.state,
    createdAt: record.createdAt,
    startedAt: typeof record.startedAt === "string" ? record.startedAt : undefined,
    completedAt: typeof record.completedAt === "string" ? record.completedAt : undefined,
    runAfter: typeof record.runAfter === "string" ? record.runAfter : undefined,
    error: typeof record.error === "string" ? record.error : undefined,
  };
};

const isMissingFile = (error: unknown): boolean => {
  const err = error as NodeJS.ErrnoException;
  return err?.code === "ENOENT";
};

// A file removed after the directory listing, or one that is not JSON, is skipped.
// Any other read failure propagates.
const readExecutionFile = async ({ path }: { path: string }): Promise<ExecutionRecord | null> => {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) {
      return null;
    }
    throw error;
  }
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    if (error instanceof SyntaxError) {
      return null;
    }
    throw error;
  }
  return parseExecutionRecord({ value });
};

export const listExecutions = async ({
  tasksDir,
}: {
  tasksDir: string;
}): Promise<ExecutionRecord[]> => {
  let files: string[];
  try {
    files = await readdir(tasksDir);
  } catch (error) {
    if (isMissingFile(error)) {
      return [];
    }
    throw error;
  }
  const records: ExecutionRecord[] = [];
  // One file open at a time; a large backlog must not exhaust file handles.
  for (const file of files.filter((name) => name.endsWith(".json")).sort()) {
    const record = await readExecutionFile({ path: join(tasksDir, file) });
    if (record) {
      records.push(record);
    }
  }
  return records;
};

export const saveExecution = async ({
  tasksDir,
  record,
}: {
  tasksDir: string;
  record: ExecutionRecord;
}): Promise<void> => {
  if (!parseExecutionRecord({ value: record })) {
    throw new Error(`Invalid execution record: ${record.id}`);
  }
  const path = join(tasksDir, `${record.id}.json`);
  await writeFile(path, JSON.stringify(record, null, 2), "utf-8");
};

export const createFileTaskStore = ({ tasksDir }: { tasksDir: string }): TaskStore => {
  const forProcessor = async ({
    queueId,
    taskType,
  }: {
    queueId: string;
    taskType: string;
  }): Promise<ExecutionRecord[]> => {
    const records = await listExecutions({ tasksDir });
    return records.filter((record) => record.queueId === queueId && record.taskType === taskType);
  };

  return {
    countWaiting: async (queueId) => {
      const records = await listExecutions({ tasksDir });
      return records.filter((record) => record.queueId === queueId && record.state === "waiting")
        .length;
    },
    fetchInProgressExecutions: async (queueId, taskType) => {
      const records = await forProcessor({ queueId, taskType });
      return records.filter((record) => record.state === "in_progress");
    },
    fetchAllExecutions: async (queueId, taskType) => forProcessor({ queueId, taskType }),
  };
};
