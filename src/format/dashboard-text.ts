import type { ExecutionRecord } from "../state/executions.js";
import type { BodyBlock, DashboardListItem, ExecutionListBlock } from "../dashboard/types.js";

const INDENT = "  ";

const formatExecution = ({ execution }: { execution: ExecutionRecord }): string => {
  switch (execution.state) {
    case "in_progress":
      return `${execution.id} running since ${execution.startedAt ?? execution.createdAt}`;
    case "waiting":
      return `${execution.id} due ${execution.runAfter ?? execution.createdAt}`;
    case "failed":
      return execution.error
        ? `${execution.id} failed ${execution.completedAt ?? "-"}: ${execution.error}`
        : `${execution.id} failed ${execution.completedAt ?? "-"}`;
    case "completed":
    case "canceled":
      return `${execution.id} ${execution.state} ${execution.completedAt ?? "-"}`;
  }
};

const formatExecutionList = ({ block }: { block: ExecutionListBlock }): string[] => {
  const groups = [
    { label: "running", executions: block.running },
    { label: "scheduled", executions: block.scheduled },
    { label: "recent", executions: block.recent },
  ];
  const lines = groups.flatMap(({ label, executions }) =>
    executions.map((execution) => `${label}: ${formatExecution({ execution })}`),
  );
  return lines.length > 0 ? lines : ["no executions"];
};

const formatBlock = ({ block }: { block: BodyBlock }): string[] => {
  switch (block.kind) {
    case "description":
      return [block.text];
    case "degraded":
      return [`! ${block.text}`];
    case "schedule":
      return [block.text];
    case "executions":
      return formatExecutionList({ block });
  }
};

export const formatDashboardItem = ({ item }: { item: DashboardListItem }): string[] => {
  const lines = [`[${item.statusLabel}] ${item.title} (${item.id})`];
  for (const block of item.body) {
    lines.push(...formatBlock({ block }).map((line) => `${INDENT}${line}`));
  }
  if (item.commands.length > 0) {
    const commands = item.commands.map((command) => `${command.title} [${command.commandId}]`);
    lines.push(`${INDENT}commands: ${commands.join(", ")}`);
  }
  return lines;
};

export const formatDashboard = ({ items }: { items: DashboardListItem[] }): string => {
  if (items.length === 0) {
    return "No queues to show.";
  }
  return items.map((item) => formatDashboardItem({ item }).join("\n")).join("\n\n");
};
