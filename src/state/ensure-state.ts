import { mkdir } from "node:fs/promises";
import type { QueueboardPaths } from "../paths.js";

export const ensureStateDirs = async ({ paths }: { paths: QueueboardPaths }): Promise<void> => {
  await mkdir(paths.stateDir, { recursive: true });
  await mkdir(paths.tasksDir, { recursive: true });
};
