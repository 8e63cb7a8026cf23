#!/usr/bin/env node

import { parseArgs } from "./cli-args.js";
import { getCliHelp } from "./cli-help.js";
import { runRun } from "./commands/run.js";
import { runStatus } from "./commands/status.js";
import { getQueueboardPaths } from "./paths.js";
import { getProjectRoot } from "./repo-root.js";
import { ensureStateDirs } from "./state/ensure-state.js";
import { recordEvent } from "./state/events.js";

const reportFatal = async ({ label, error }: { label: string; error: unknown }): Promise<void> => {
  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;
  console.error(`${label}: ${message}`);
  if (stack) {
    console.error(stack);
  }
  try {
    const paths = getQueueboardPaths({ repoRoot: getProjectRoot() });
    await ensureStateDirs({ paths });
    await recordEvent({
      eventsLog: paths.eventsLog,
      event: {
        type: "FATAL",
        msg: `${label}: ${message}`,
        data: stack ? { stack } : undefined,
      },
    });
  } catch (logError) {
    const reason = logError instanceof Error ? logError.message : String(logError);
    console.error(`could not record fatal event: ${reason}`);
  }
};

process.on("unhandledRejection", (error) => {
  void reportFatal({ label: "unhandledRejection", error }).finally(() => {
    process.exit(1);
  });
});

const main = async ({ argv }: { argv: string[] }): Promise<void> => {
  const parsed = parseArgs({ argv });
  if (parsed.helpRequested || parsed.command.name === "help") {
    console.log(getCliHelp());
    return;
  }
  const command = parsed.command;

  switch (command.name) {
    case "run": {
      await runRun({ args: command.args });
      return;
    }
    case "":
    case "status": {
      await runStatus({ json: parsed.json });
      return;
    }
    default: {
      console.error(`unknown command: ${command.name}`);
      console.log(getCliHelp());
      process.exitCode = 1;
      return;
    }
  }
};

void main({ argv: process.argv.slice(2) }).catch((error) => {
  void reportFatal({ label: "command failed", error }).finally(() => {
    process.exit(1);
  });
});
