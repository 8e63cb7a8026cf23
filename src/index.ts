export { collectDashboardContent, getDashboardContent } from "./dashboard/content.js";
export type { DashboardSources } from "./dashboard/content.js";
export { buildDashboardItem } from "./dashboard/item-builder.js";
export type { DashboardCollaborators, DashboardItemInput } from "./dashboard/item-builder.js";
export { formatDegradedNotice, isDegraded } from "./dashboard/degraded.js";
export { deriveStatusLabel, summarizeExecutions } from "./dashboard/status.js";
export { buildExecutionListBlock } from "./dashboard/execution-list.js";
export { composeQueueTaskKey } from "./dashboard/identity.js";
export {
  createRunCommandRegistry,
  getRunCommandRegistry,
  makeRunCommandId,
  makeRunCommandKey,
} from "./dashboard/run-command-registry.js";
export type {
  RunCommandDescriptor,
  RunCommandLookup,
  RunCommandRegistry,
} from "./dashboard/run-command-registry.js";
export type * from "./dashboard/types.js";
export { createConfigQueueRegistry } from "./registry/queue-registry.js";
export type { QueueRegistry } from "./registry/queue-registry.js";
export type { EntryMetadata } from "./registry/metadata.js";
export { createConfigRecurrenceProvider } from "./recurrence/config-provider.js";
export { describeRecurrence, parseRecurrence } from "./recurrence/recurrence.js";
export type { RecurrenceConfig, RecurrenceProvider } from "./recurrence/recurrence.js";
export { createFileTaskStore, listExecutions, saveExecution } from "./state/executions.js";
export type { ExecutionRecord, ExecutionState, TaskStore } from "./state/executions.js";
export { createEventLogger } from "./log/logger.js";
export type { DashboardLogger, LogEntry } from "./log/logger.js";
export { MetadataResolutionError, UnknownRunCommandError } from "./errors.js";
export { loadConfig } from "./config.js";
export type { QueueboardConfig } from "./config.js";
export { startQueueboard, registerConfiguredRunCommands } from "./startup.js";
export { formatDashboard, formatDashboardItem } from "./format/dashboard-text.js";
export { DEGRADED_THRESHOLD } from "./constants.js";
