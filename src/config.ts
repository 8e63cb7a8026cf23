import { readFile } from "node:fs/promises";
import { parse } from "yaml";
import { DEGRADED_THRESHOLD } from "./constants.js";
import { getQueueboardPaths } from "./paths.js";

export interface QueueboardConfig {
  degradedThreshold: number;
  // Entries stay raw here; the queue registry validates them one at a time.
  queues: unknown[];
}

export const DEFAULT_CONFIG = {
  degradedThreshold: DEGRADED_THRESHOLD,
  queues: [],
} satisfies QueueboardConfig;

type ParsedConfig = { degradedThreshold?: unknown; queues?: unknown };

export const parseNumberValue = ({ value }: { value: unknown }): number | undefined => {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (trimmed.length === 0) {
      return undefined;
    }
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
};

export const parseBooleanValue = ({ value }: { value: unknown }): boolean | undefined => {
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value === "string") {
    const trimmed = value.trim().toLowerCase();
    if (trimmed === "true") {
      return true;
    }
    if (trimmed === "false") {
      return false;
    }
  }
  return undefined;
};

export const parseStringValue = ({ value }: { value: unknown }): string | undefined => {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }
  return undefined;
};

const resolveThreshold = ({ value }: { value: unknown }): number => {
  const parsed = parseNumberValue({ value });
  if (parsed === undefined || !Number.isInteger(parsed) || parsed <= 0) {
    return DEFAULT_CONFIG.degradedThreshold;
  }
  return parsed;
};

export const parseConfigFile = ({ raw }: { raw: string }): ParsedConfig | null => {
  if (!raw.trim()) {
    return null;
  }
  try {
    const parsed: unknown = parse(raw);
    if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
      return null;
    }
    return parsed as ParsedConfig;
  } catch {
    return null;
  }
};

export const resolveConfig = ({ parsed }: { parsed: ParsedConfig | null }): QueueboardConfig => {
  const queues = parsed?.queues;
  return {
    degradedThreshold: resolveThreshold({ value: parsed?.degradedThreshold }),
    queues: Array.isArray(queues) ? queues : [],
  } satisfies QueueboardConfig;
};

export const loadConfig = async ({ repoRoot }: { repoRoot: string }): Promise<QueueboardConfig> => {
  const { configPath } = getQueueboardPaths({ repoRoot });
  let raw: string;
  try {
    raw = await readFile(configPath, "utf-8");
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err?.code === "ENOENT") {
      return { ...DEFAULT_CONFIG, queues: [] };
    }
    throw error;
  }
  return resolveConfig({ parsed: parseConfigFile({ raw }) });
};
