import { buildDashboardItem, type DashboardItemInput } from "../dashboard/item-builder.js";
import { createRunCommandRegistry } from "../dashboard/run-command-registry.js";
import type { ExecutionListBlock } from "../dashboard/types.js";
import {
  makeExecution,
  makeFakeRecurrence,
  makeFakeTaskStore,
} from "./helpers/dashboard-fakes.js";

const baseInput: DashboardItemInput = {
  queueId: "Q1",
  taskType: "P1",
  showRunCommand: false,
};

const registerRunNow = () => {
  const runCommands = createRunCommandRegistry();
  runCommands.register({
    key: "Q1-P1",
    command: { id: "run-Q1-P1", displayName: "Run now", queueId: "Q1", taskType: "P1" },
  });
  return runCommands;
};

const executionBlock = (body: { kind: string }[]): ExecutionListBlock | undefined =>
  body.find((block): block is ExecutionListBlock => block.kind === "executions");

describe("buildDashboardItem", () => {
  test("degraded queue reports running with a banner and run command", async () => {
    const taskStore = makeFakeTaskStore({
      waiting: { Q1: 5000 },
      executions: [makeExecution({ id: "e1", state: "waiting" })],
    });
    const item = await buildDashboardItem({
      input: { ...baseInput, showRunCommand: true },
      collaborators: {
        taskStore,
        recurrence: makeFakeRecurrence(),
        runCommands: registerRunNow(),
        threshold: 3000,
      },
    });

    expect(item.statusLabel).toBe("Running");
    expect(item.body).toContainEqual({
      kind: "degraded",
      waitingCount: 5000,
      threshold: 3000,
      text: "5000 tasks are waiting in this queue (more than 3000); only running executions are shown.",
    });
    expect(item.commands).toEqual([{ commandId: "run-Q1-P1", title: "Run now", style: "link" }]);
  });

  test("idle processor without schedule is stopped and on demand", async () => {
    const item = await buildDashboardItem({
      input: baseInput,
      collaborators: {
        taskStore: makeFakeTaskStore({ waiting: { Q1: 10 } }),
        recurrence: makeFakeRecurrence(),
        runCommands: createRunCommandRegistry(),
      },
    });

    expect(item.statusLabel).toBe("Stopped");
    expect(item.body).toEqual([
      { kind: "schedule", onDemand: true, text: "Runs on demand only." },
      { kind: "executions", recurrence: undefined, running: [], scheduled: [], recent: [] },
    ]);
  });

  test("degraded queues only read in-progress executions", async () => {
    const taskStore = makeFakeTaskStore({
      waiting: { Q1: 3001 },
      executions: [
        makeExecution({ id: "e1", state: "in_progress", startedAt: "2026-03-01T10:05:00.000Z" }),
        makeExecution({ id: "e2", state: "completed" }),
      ],
    });
    const item = await buildDashboardItem({
      input: baseInput,
      collaborators: {
        taskStore,
        recurrence: makeFakeRecurrence(),
        runCommands: createRunCommandRegistry(),
      },
    });

    expect(taskStore.fetchInProgressExecutions).toHaveBeenCalledWith("Q1", "P1");
    expect(taskStore.fetchAllExecutions).not.toHaveBeenCalled();
    expect(executionBlock(item.body)?.running.map((execution) => execution.id)).toEqual(["e1"]);
    expect(executionBlock(item.body)?.recent).toEqual([]);
  });

  test("healthy queues read the full history", async () => {
    const taskStore = makeFakeTaskStore({
      waiting: { Q1: 3000 },
      executions: [
        makeExecution({ id: "e1", state: "waiting" }),
        makeExecution({ id: "e2", state: "completed", completedAt: "2026-03-01T09:00:00.000Z" }),
      ],
    });
    const item = await buildDashboardItem({
      input: baseInput,
      collaborators: {
        taskStore,
        recurrence: makeFakeRecurrence(),
        runCommands: createRunCommandRegistry(),
      },
    });

    expect(taskStore.fetchAllExecutions).toHaveBeenCalledWith("Q1", "P1");
    expect(taskStore.fetchInProgressExecutions).not.toHaveBeenCalled();
    expect(item.statusLabel).toBe("Scheduled");
    expect(item.body.some((block) => block.kind === "degraded")).toBe(false);
  });

  test("in-progress execution reports running", async () => {
    const item = await buildDashboardItem({
      input: baseInput,
      collaborators: {
        taskStore: makeFakeTaskStore({
          executions: [makeExecution({ id: "e1", state: "in_progress" })],
        }),
        recurrence: makeFakeRecurrence(),
        runCommands: createRunCommandRegistry(),
      },
    });
    expect(item.statusLabel).toBe("Running");
  });

  test("uses the display name and description when present", async () => {
    const item = await buildDashboardItem({
      input: { ...baseInput, displayName: "Send digest", description: "Sends the digest." },
      collaborators: {
        taskStore: makeFakeTaskStore({}),
        recurrence: makeFakeRecurrence(),
        runCommands: createRunCommandRegistry(),
      },
    });
    expect(item.id).toBe("Q1-P1");
    expect(item.title).toBe("Send digest");
    expect(item.body[0]).toEqual({ kind: "description", text: "Sends the digest." });
  });

  test("falls back to the task type for blank display names and skips blank descriptions", async () => {
    const item = await buildDashboardItem({
      input: { ...baseInput, displayName: "   ", description: " \t" },
      collaborators: {
        taskStore: makeFakeTaskStore({}),
        recurrence: makeFakeRecurrence(),
        runCommands: createRunCommandRegistry(),
      },
    });
    expect(item.title).toBe("P1");
    expect(item.body.map((block) => block.kind)).toEqual(["schedule", "executions"]);
  });

  test("renders the recurrence description and passes it to the execution list", async () => {
    const recurrence = makeFakeRecurrence({
      schedules: { "Q1-P1": { kind: "interval", everyMs: 15 * 60 * 1000 } },
    });
    const item = await buildDashboardItem({
      input: baseInput,
      collaborators: {
        taskStore: makeFakeTaskStore({}),
        recurrence,
        runCommands: createRunCommandRegistry(),
      },
    });
    expect(recurrence.lookupRecurrence).toHaveBeenCalledWith("Q1", "P1");
    expect(item.body[0]).toEqual({
      kind: "schedule",
      onDemand: false,
      text: "Runs every 15 minutes.",
    });
    expect(executionBlock(item.body)?.recurrence).toEqual({
      kind: "interval",
      everyMs: 15 * 60 * 1000,
    });
  });

  test("hides the run command unless requested", async () => {
    const item = await buildDashboardItem({
      input: { ...baseInput, showRunCommand: false },
      collaborators: {
        taskStore: makeFakeTaskStore({}),
        recurrence: makeFakeRecurrence(),
        runCommands: registerRunNow(),
      },
    });
    expect(item.commands).toEqual([]);
  });

  test("attaches nothing when no command is registered", async () => {
    const item = await buildDashboardItem({
      input: { ...baseInput, showRunCommand: true },
      collaborators: {
        taskStore: makeFakeTaskStore({}),
        recurrence: makeFakeRecurrence(),
        runCommands: createRunCommandRegistry(),
      },
    });
    expect(item.commands).toEqual([]);
  });

  test("keeps hyphenated ids unescaped", async () => {
    const item = await buildDashboardItem({
      input: { queueId: "a", taskType: "b-c", showRunCommand: false },
      collaborators: {
        taskStore: makeFakeTaskStore({}),
        recurrence: makeFakeRecurrence(),
        runCommands: createRunCommandRegistry(),
      },
    });
    expect(item.id).toBe("a-b-c");
  });

  test("task store failures propagate", async () => {
    const taskStore = makeFakeTaskStore({});
    taskStore.countWaiting.mockRejectedValueOnce(new Error("store offline"));
    await expect(
      buildDashboardItem({
        input: baseInput,
        collaborators: {
          taskStore,
          recurrence: makeFakeRecurrence(),
          runCommands: createRunCommandRegistry(),
        },
      }),
    ).rejects.toThrow("store offline");
  });
});
