import { composeQueueTaskKey } from "./identity.js";

export interface RunCommandDescriptor {
  id: string;
  displayName: string;
  queueId: string;
  taskType: string;
}

export interface RunCommandLookup {
  get: (key: string) => RunCommandDescriptor | undefined;
}

export interface RunCommandRegistry extends RunCommandLookup {
  register: ({ key, command }: { key: string; command: RunCommandDescriptor }) => void;
  findById: (commandId: string) => RunCommandDescriptor | undefined;
  size: () => number;
}

export const makeRunCommandKey = composeQueueTaskKey;

export const makeRunCommandId = ({
  queueId,
  taskType,
}: {
  queueId: string;
  taskType: string;
}): string => `run-${composeQueueTaskKey({ queueId, taskType })}`;

// Every access is a single synchronous map operation, so no reader can observe a half-applied
// write and nothing is held across an await. Readers get copies, never the stored object.
export const createRunCommandRegistry = (): RunCommandRegistry => {
  const commands = new Map<string, RunCommandDescriptor>();
  return {
    register: ({ key, command }) => {
      commands.set(key, { ...command });
    },
    get: (key) => {
      const command = commands.get(key);
      return command ? { ...command } : undefined;
    },
    findById: (commandId) => {
      for (const command of commands.values()) {
        if (command.id === commandId) {
          return { ...command };
        }
      }
      return undefined;
    },
    size: () => commands.size,
  };
};

let processRegistry: RunCommandRegistry | null = null;

export const getRunCommandRegistry = (): RunCommandRegistry => {
  if (!processRegistry) {
    processRegistry = createRunCommandRegistry();
  }
  return processRegistry;
};
