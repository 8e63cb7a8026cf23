export const DEGRADED_THRESHOLD = 3000;
export const EXECUTION_HISTORY_LIMIT = 10;
export const CONFIG_FILE_NAME = "queueboard.yaml";
export const ON_DEMAND_NOTICE = "Runs on demand only.";
