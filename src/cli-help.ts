export const getCliHelp = (): string => `queueboard: task queue status dashboard

Usage:
  queueboard [command] [options]

Commands:
  (default) status
  status              show every visible queue processor and its status
  run <commandId>     queue a task through a registered run command
  help

Options:
  --json              print dashboard items as JSON (status)
  -h, --help

Environment:
  QUEUEBOARD_ROOT     project directory holding queueboard.yaml (default: cwd)
`;
