import { mkdir, mkdtemp } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { triggerRunCommand } from "../commands/run.js";
import { createRunCommandRegistry } from "../dashboard/run-command-registry.js";
import { UnknownRunCommandError } from "../errors.js";
import { createFileTaskStore } from "../state/executions.js";

const makeRegistry = () => {
  const runCommands = createRunCommandRegistry();
  runCommands.register({
    key: "mail-send",
    command: { id: "run-mail-send", displayName: "Send now", queueId: "mail", taskType: "send" },
  });
  return runCommands;
};

describe("triggerRunCommand", () => {
  test("queues a waiting execution for the command's processor", async () => {
    const root = await mkdtemp(join(tmpdir(), "queueboard-run-"));
    const tasksDir = join(root, "tasks");
    await mkdir(tasksDir, { recursive: true });

    const record = await triggerRunCommand({
      commandId: "run-mail-send",
      runCommands: makeRegistry(),
      tasksDir,
      now: () => new Date("2026-03-01T12:00:00.000Z"),
      makeId: () => "exec-1",
    });

    expect(record).toEqual({
      id: "exec-1",
      queueId: "mail",
      taskType: "send",
      state: "waiting",
      createdAt: "2026-03-01T12:00:00.000Z",
      runAfter: "2026-03-01T12:00:00.000Z",
    });
    const store = createFileTaskStore({ tasksDir });
    await expect(store.countWaiting("mail")).resolves.toBe(1);
  });

  test("rejects unknown command ids", async () => {
    const root = await mkdtemp(join(tmpdir(), "queueboard-run-"));
    await expect(
      triggerRunCommand({
        commandId: "run-missing",
        runCommands: makeRegistry(),
        tasksDir: root,
      }),
    ).rejects.toBeInstanceOf(UnknownRunCommandError);
  });
});
