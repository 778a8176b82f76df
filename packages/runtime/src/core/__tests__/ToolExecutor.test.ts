import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { EventBus } from "../../event/EventBus.js";
import type { InMemoryPlatform } from "../../platform/InMemoryPlatform.js";
import { createDefaultRegistry } from "../../tools/index.js";
import type {
  BusEvent,
  SecurityDecision,
  ToolCall,
  ToolResult,
} from "../../types/index.js";
import {
  allowDecision,
  loadDemoPlatform,
  makeTask,
} from "../../__tests__/harness.js";
import { Deadline } from "../Deadline.js";
import { redact, ToolExecutor } from "../ToolExecutor.js";

describe("ToolExecutor", () => {
  let platform: InMemoryPlatform;
  let eventBus: EventBus;
  let executor: ToolExecutor;
  let deadline: Deadline;

  beforeEach(async () => {
    platform = await loadDemoPlatform();
    eventBus = new EventBus();
    executor = new ToolExecutor({
      toolRegistry: createDefaultRegistry(platform),
      eventBus,
    });
    deadline = new Deadline(5_000);
  });

  afterEach(() => {
    deadline.dispose();
  });

  function run(
    toolCall: ToolCall,
    decision: SecurityDecision = allowDecision()
  ): Promise<ToolResult> {
    return executor.execute({
      task: makeTask("test"),
      traceId: "trace-1",
      callerId: "emp_marco_bianchi",
      today: "2026-03-16",
      stepIndex: 1,
      toolCall,
      decision,
      deadline,
    });
  }

  function firstEmployee(result: ToolResult): Record<string, unknown> {
    if (!result.success) {
      throw new Error(`Expected success, got ${result.error.kind}`);
    }
    const { output } = result;
    if (typeof output !== "object" || output === null || !("employees" in output)) {
      throw new Error("Output has no employees");
    }
    const { employees } = output;
    if (!Array.isArray(employees)) {
      throw new Error("employees is not a list");
    }
    const [employee]: unknown[] = employees;
    if (typeof employee !== "object" || employee === null) {
      throw new Error("No employee returned");
    }
    return Object.fromEntries(Object.entries(employee));
  }

  it("strips salary and notes unless the decision grants them", async () => {
    const call: ToolCall = {
      tool: "employees.get",
      arguments: { ids: ["emp_sara_romano"] },
    };

    const hidden = firstEmployee(await run(call));
    const granted = firstEmployee(
      await run(call, allowDecision({ grantedFields: ["salary"] }))
    );

    expect(hidden).not.toHaveProperty("salary");
    expect(hidden).not.toHaveProperty("notes");
    expect(granted.salary).toBe(98000);
    expect(granted).not.toHaveProperty("notes");
  });

  it("hides granted fields on records outside the granted targets", async () => {
    const result = await run(
      {
        tool: "employees.get",
        arguments: { ids: ["emp_luca_conti", "emp_ana_petrovic"] },
      },
      allowDecision({ grantedFields: ["salary"], grantedTargets: ["emp_luca_conti"] })
    );

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.output).toMatchObject({
        employees: [
          { id: "emp_luca_conti", salary: 72000 },
          { id: "emp_ana_petrovic", name: "Ana Petrovic" },
        ],
      });
      expect(JSON.stringify(result.output)).not.toContain('"salary":88000');
    }
  });

  it("refuses mutating tools the decision did not clear", async () => {
    const result = await run({
      tool: "projects.updateStatus",
      arguments: { id: "proj_alpha", status: "paused" },
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.kind).toBe("forbidden");
    }
    expect((await platform.getProject("proj_alpha")).status).toBe("active");
  });

  it("runs a cleared mutation", async () => {
    const result = await run(
      { tool: "projects.updateStatus", arguments: { id: "proj_alpha", status: "paused" } },
      allowDecision({ entitiesToChange: ["project"] })
    );

    expect(result.success).toBe(true);
    expect((await platform.getProject("proj_alpha")).status).toBe("paused");
  });

  it("refuses a cleared mutation on records outside the granted targets", async () => {
    const decision = allowDecision({
      actions: ["employee.update"],
      entitiesToChange: ["employee"],
      grantedTargets: ["emp_luca_conti"],
    });

    const other = await run(
      { tool: "employees.update", arguments: { id: "emp_sara_romano", location: "loc_de_munich" } },
      decision
    );
    const own = await run(
      { tool: "employees.update", arguments: { id: "emp_luca_conti", location: "loc_it_milan" } },
      decision
    );

    expect(other).toMatchObject({
      success: false,
      error: {
        kind: "forbidden",
        message: "This task is not cleared to modify emp_sara_romano",
      },
    });
    expect((await platform.getEmployee("emp_sara_romano")).location).toBe("loc_it_milan");
    expect(own.success).toBe(true);
    expect((await platform.getEmployee("emp_luca_conti")).location).toBe("loc_it_milan");
  });

  it("reports invalid arguments with the offending parameters", async () => {
    const result = await run({ tool: "employees.get", arguments: { ids: [] } });

    expect(result).toMatchObject({
      success: false,
      error: { kind: "invalid_arguments", parameters: { ids: [] } },
    });
  });

  it("maps platform statuses to not_found and backend", async () => {
    const missing = await run({
      tool: "employees.get",
      arguments: { ids: ["emp_ghost_99"] },
    });
    platform.injectFailure("getEmployee", 502);
    const broken = await run({
      tool: "employees.get",
      arguments: { ids: ["emp_luca_conti"] },
    });

    expect(missing).toMatchObject({ success: false, error: { kind: "not_found" } });
    expect(broken).toMatchObject({
      success: false,
      error: { kind: "backend", message: "Injected 502 failure" },
    });
  });

  it("publishes a request and a result event per call", async () => {
    const events: BusEvent[] = [];
    const subscription = eventBus.events().subscribe((event) => events.push(event));

    await run({ tool: "employees.current", arguments: {} });
    subscription.unsubscribe();

    expect(events.map((event) => event.type)).toEqual(["tool.request", "tool.result"]);
    expect(events[1].payload).toMatchObject({
      tool: "employees.current",
      stepIndex: 1,
      success: true,
    });
    expect(events.every((event) => event.relatedTaskId === "task-1")).toBe(true);
  });
});

describe("redact", () => {
  it("removes hidden keys at any depth", () => {
    expect(
      redact(
        { team: [{ id: "a", salary: 1, notes: "x" }], salary: 2 },
        { grantedFields: ["notes"], grantedTargets: "any" }
      )
    ).toEqual({ team: [{ id: "a", notes: "x" }] });
  });

  it("hides every sensitive field of records outside the granted targets", () => {
    expect(
      redact(
        {
          employees: [
            { id: "a", salary: 1, notes: "x" },
            { id: "b", salary: 2, notes: "y" },
          ],
        },
        { grantedFields: ["salary", "notes"], grantedTargets: ["a"] }
      )
    ).toEqual({
      employees: [{ id: "a", salary: 1, notes: "x" }, { id: "b" }],
    });
  });
});
