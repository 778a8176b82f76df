import { describe, expect, it } from "vitest";
import type { BusEvent, FinalRecord } from "../../types/index.js";
import { createWorld, inbound, silentLogger } from "../../__tests__/harness.js";
import { SessionRunner, summarize } from "../SessionRunner.js";

describe("SessionRunner", () => {
  it("selects tasks by code and by name filter", async () => {
    const world = await createWorld({ taskCodes: ["hr-1"], taskNameFilter: "salary" });
    const runner = new SessionRunner({
      pipeline: world.pipeline,
      config: world.config,
      logger: silentLogger,
    });

    const selected = runner.selectTasks([
      { ...inbound("a", "What is Sara Romano's salary?"), spec_id: "hr-1" },
      { ...inbound("b", "Who is Ana?"), spec_id: "hr-1" },
      { ...inbound("c", "Luca's salary please"), spec_id: "pm-2" },
      inbound("d", "My salary"),
    ]);

    expect(selected).toEqual([
      { ...inbound("a", "What is Sara Romano's salary?"), spec_id: "hr-1" },
    ]);
  });

  it("runs every task, keeps input order and summarizes the session", async () => {
    const world = await createWorld({ concurrency: 2 });
    let clock = 0;
    const runner = new SessionRunner({
      pipeline: world.pipeline,
      config: world.config,
      logger: silentLogger,
      now: () => (clock += 50),
    });
    const finished: BusEvent[] = [];
    const subscription = world.pipeline.eventBus
      .eventsOfType("session.finished")
      .subscribe((event) => finished.push(event));

    const summary = await runner.run([
      inbound("s1", "What is Sara Romano's salary?", "emp_luca_conti"),
      inbound("s2", "What is Sara Romano's salary?", "guest"),
      { task_id: "s3", caller_id: "emp_luca_conti" },
    ]);
    subscription.unsubscribe();

    expect(summary.records.map((record) => record.taskId)).toEqual(["s1", "s2", "s3"]);
    expect(summary).toMatchObject({
      total: 3,
      skipped: 0,
      byOutcome: { denied_security: 2, error_internal: 1 },
      byStatus: { denied_security: 2, error_internal: 1 },
      durationMs: 50,
      totalTokens: 0,
      modelCalls: 0,
    });
    expect(world.telemetry.records).toHaveLength(3);
    expect(finished).toHaveLength(1);
    expect(finished[0].payload).toEqual({
      total: 3,
      skipped: 0,
      byOutcome: { denied_security: 2, error_internal: 1 },
      durationMs: 50,
    });
  });
});

describe("summarize", () => {
  it("adds up usage across records", () => {
    const usage = {
      promptTokens: 80,
      completionTokens: 20,
      totalTokens: 100,
      calls: 2,
      failures: 0,
      durationMs: 10,
      byPurpose: {},
    };
    const record = (taskId: string): FinalRecord => ({
      taskId,
      status: "ok_answer",
      outcome: "ok_answer",
      response: { outcome: "ok_answer", message: "Done.", links: [] },
      usage,
      finalizedAt: 0,
    });

    expect(summarize([record("a"), record("b")], 1, 5)).toMatchObject({
      total: 2,
      skipped: 1,
      byOutcome: { ok_answer: 2 },
      totalTokens: 200,
      modelCalls: 4,
    });
  });
});
