import { mkdir, mkdtemp, readFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createEventLogger, WARN_EVENT_TYPE } from "../log/logger.js";

describe("createEventLogger", () => {
  test("writes a console line and an event", async () => {
    const root = await mkdtemp(join(tmpdir(), "queueboard-log-"));
    const eventsLog = join(root, ".queueboard", "events.log");
    const lines: string[] = [];
    const logger = createEventLogger({ eventsLog, writeLine: (line) => lines.push(line) });

    await logger.warn({
      msg: "Cannot load processor details for task type P2 on queue Q1.",
      queueId: "Q1",
      taskType: "P2",
      data: { error: "boom" },
    });

    expect(lines).toEqual([
      "warn [Q1/P2] Cannot load processor details for task type P2 on queue Q1.",
    ]);
    const [raw] = (await readFile(eventsLog, "utf-8")).trim().split("\n");
    const event = JSON.parse(raw ?? "{}") as Record<string, unknown>;
    expect(event.type).toBe(WARN_EVENT_TYPE);
    expect(event.queueId).toBe("Q1");
    expect(event.taskType).toBe("P2");
    expect(event.data).toEqual({ error: "boom" });
    expect(typeof event.ts).toBe("string");
  });

  test("omits the scope when no queue is named", async () => {
    const root = await mkdtemp(join(tmpdir(), "queueboard-log-"));
    const lines: string[] = [];
    const logger = createEventLogger({
      eventsLog: join(root, "events.log"),
      writeLine: (line) => lines.push(line),
    });
    await logger.warn({ msg: "config reloaded" });
    expect(lines).toEqual(["warn config reloaded"]);
  });

  test("reports a failed event write on the console instead of rejecting", async () => {
    const root = await mkdtemp(join(tmpdir(), "queueboard-log-"));
    const eventsLog = join(root, "events.log");
    await mkdir(eventsLog);
    const lines: string[] = [];
    const logger = createEventLogger({ eventsLog, writeLine: (line) => lines.push(line) });

    await expect(logger.warn({ msg: "queue missing", queueId: "Q1" })).resolves.toBeUndefined();

    expect(lines).toHaveLength(2);
    expect(lines[0]).toBe("warn [Q1] queue missing");
    expect(lines[1]).toMatch(/^warn could not record event in .*events\.log: EISDIR/);
  });
});
