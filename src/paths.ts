import { join } from "node:path";
import { CONFIG_FILE_NAME } from "./constants.js";

export interface QueueboardPaths {
  repoRoot: string;
  configPath: string;
  stateDir: string;
  eventsLog: string;
  tasksDir: string;
}

export const getQueueboardPaths = ({ repoRoot }: { repoRoot: string }): QueueboardPaths => {
  const stateDir = join(repoRoot, ".queueboard");
  return {
    repoRoot,
    configPath: join(repoRoot, CONFIG_FILE_NAME),
    stateDir,
    eventsLog: join(stateDir, "events.log"),
    tasksDir: join(stateDir, "tasks"),
  };
};
