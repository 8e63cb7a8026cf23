import { collectDashboardContent } from "../dashboard/content.js";
import { formatDashboard } from "../format/dashboard-text.js";
import { getProjectRoot } from "../repo-root.js";
import { startQueueboard } from "../startup.js";

export const runStatus = async ({ json }: { json: boolean }): Promise<void> => {
  const runtime = await startQueueboard({ repoRoot: getProjectRoot() });
  const items = await collectDashboardContent({ sources: runtime.sources });
  if (json) {
    console.log(JSON.stringify(items, null, 2));
    return;
  }
  console.log(formatDashboard({ items }));
};
