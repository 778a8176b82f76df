import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { JsonlTelemetrySink, type TelemetryRecord } from "../TelemetrySink.js";

function sample(taskId: string): TelemetryRecord {
  return {
    taskId,
    status: "ok_answer",
    outcome: "ok_answer",
    stages: { context: 3, executor: 12 },
    usage: null,
    steps: 2,
    durationMs: 20,
    finishedAt: "2026-03-16T09:00:00.000Z",
  };
}

describe("JsonlTelemetrySink", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "orgdesk-telemetry-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("appends one line per record and creates missing directories", async () => {
    const file = path.join(dir, "nested", "runs.jsonl");
    const sink = new JsonlTelemetrySink(file);

    await sink.record(sample("t-1"));
    await sink.record(sample("t-2"));

    const lines = (await readFile(file, "utf8")).trimEnd().split("\n");
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[1])).toEqual(sample("t-2"));
  });

  it("retries the directory after a failed attempt", async () => {
    const blocker = path.join(dir, "runs");
    await writeFile(blocker, "not a directory", "utf8");
    const file = path.join(blocker, "runs.jsonl");
    const sink = new JsonlTelemetrySink(file);

    await expect(sink.record(sample("t-1"))).rejects.toThrow();

    await rm(blocker);
    await sink.record(sample("t-2"));

    expect(await readFile(file, "utf8")).toBe(`${JSON.stringify(sample("t-2"))}\n`);
  });
});
