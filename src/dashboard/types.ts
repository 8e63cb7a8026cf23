import type { ExecutionRecord } from "../state/executions.js";
import type { RecurrenceConfig } from "../recurrence/recurrence.js";

export type StatusLabel = "Running" | "Scheduled" | "Stopped";

export type CommandStyle = "link" | "button";

export interface CommandRef {
  commandId: string;
  title: string;
  style: CommandStyle;
}

export interface DescriptionBlock {
  kind: "description";
  text: string;
}

export interface DegradedBlock {
  kind: "degraded";
  waitingCount: number;
  threshold: number;
  text: string;
}

export interface ScheduleBlock {
  kind: "schedule";
  onDemand: boolean;
  text: string;
}

export interface ExecutionListBlock {
  kind: "executions";
  recurrence?: RecurrenceConfig;
  running: ExecutionRecord[];
  scheduled: ExecutionRecord[];
  recent: ExecutionRecord[];
}

export type BodyBlock = DescriptionBlock | DegradedBlock | ScheduleBlock | ExecutionListBlock;

export interface DashboardListItem {
  id: string;
  title: string;
  statusLabel: StatusLabel;
  body: BodyBlock[];
  commands: CommandRef[];
}
