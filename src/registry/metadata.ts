import { parseBooleanValue, parseStringValue } from "../config.js";
import { MetadataResolutionError } from "../errors.js";
import { parseRecurrence } from "../recurrence/recurrence.js";

export interface EntryMetadata {
  displayName?: string;
  description?: string;
  hidden: boolean;
  showRunCommand: boolean;
}

export type RawEntry = Record<string, unknown>;

export const asRawEntry = (value: unknown): RawEntry | null => {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    return null;
  }
  return value as RawEntry;
};

export const readEntryId = ({ value, field }: { value: unknown; field: string }): string => {
  const entry = asRawEntry(value);
  const id = entry?.[field];
  return typeof id === "string" ? id : "";
};

const invalid = ({ entry, reason }: { entry: string; reason: string }): MetadataResolutionError =>
  new MetadataResolutionError({ kind: "invalid", entry, reason });

const readFlag = ({
  entry,
  field,
  label,
}: {
  entry: RawEntry;
  field: string;
  label: string;
}): boolean => {
  const value = entry[field];
  if (value === undefined || value === null) {
    return false;
  }
  const parsed = parseBooleanValue({ value });
  if (parsed === undefined) {
    throw invalid({ entry: label, reason: `${field} must be a boolean` });
  }
  return parsed;
};

const readText = ({
  entry,
  field,
  label,
}: {
  entry: RawEntry;
  field: string;
  label: string;
}): string | undefined => {
  const value = entry[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw invalid({ entry: label, reason: `${field} must be a string` });
  }
  return parseStringValue({ value });
};

export const resolveQueueEntry = ({
  entry,
  label,
}: {
  entry: RawEntry;
  label: string;
}): EntryMetadata => ({
  displayName: readText({ entry, field: "displayName", label }),
  description: readText({ entry, field: "description", label }),
  hidden: readFlag({ entry, field: "hidden", label }),
  showRunCommand: false,
});

export const resolveProcessorEntry = ({
  entry,
  label,
}: {
  entry: RawEntry;
  label: string;
}): EntryMetadata => {
  readText({ entry, field: "runCommand", label });
  if (entry.recurrence !== undefined && parseRecurrence({ value: entry.recurrence }) === null) {
    throw invalid({ entry: label, reason: "recurrence is not a valid schedule" });
  }
  return {
    displayName: readText({ entry, field: "displayName", label }),
    description: readText({ entry, field: "description", label }),
    hidden: readFlag({ entry, field: "hidden", label }),
    showRunCommand: readFlag({ entry, field: "showRunCommand", label }),
  };
};
