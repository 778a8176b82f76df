import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { Deadline } from "../../core/Deadline.js";
import { IdentityLoadError } from "../../errors/PipelineError.js";
import { loadReferenceData } from "../../platform/referenceData.js";
import type { ResolutionResult, ResolvedEntity } from "../../types/index.js";
import {
  allowDecision,
  loadDemoPlatform,
  makeTask,
  testConfig,
} from "../../__tests__/harness.js";
import { ContextBuilder, tagText } from "../ContextBuilder.js";

function resolved(
  kind: ResolvedEntity["kind"],
  id: string,
  start: number,
  end: number
): ResolvedEntity {
  return { mention: id, kind, id, name: id, score: 100, via: "exact", spans: [{ start, end }] };
}

function resolution(
  entities: ResolvedEntity[],
  isAboutCaller = false,
  unresolved: ResolutionResult["unresolved"] = []
): ResolutionResult {
  return {
    entities,
    unresolved,
    clarification: null,
    isAboutCaller,
    modelCalls: 0,
  };
}

describe("ContextBuilder", () => {
  let builder: ContextBuilder;
  let deadline: Deadline;

  beforeEach(async () => {
    const config = testConfig();
    builder = new ContextBuilder({
      platform: await loadDemoPlatform(config),
      reference: await loadReferenceData(config.dataDir),
    });
    deadline = new Deadline(5_000);
  });

  afterEach(() => {
    deadline.dispose();
  });

  it("builds the caller's security view from the directory", async () => {
    const context = await builder.build(
      makeTask("Which projects am I on?", "emp_luca_conti"),
      deadline
    );

    expect(context.callerKind).toBe("employee");
    expect(context.today).toBe("2026-03-16");
    expect(context.securityContext.requester).toBe("{employee:emp_luca_conti} (Engineering)");
    expect(context.securityContext.caller).toEqual({
      kind: "employee",
      employee: {
        id: "emp_luca_conti",
        name: "Luca Conti",
        department: "Engineering",
        location: "loc_de_munich",
        isExecutive: false,
        isOperational: false,
        managerChain: ["emp_marco_bianchi", "emp_elena_ferri"],
        projects: [{ projectId: "proj_alpha", role: "Engineer" }],
      },
      roles: ["employee"],
      department: "Engineering",
      permissions: [],
    });
  });

  it("adds executive and permission roles", async () => {
    const ceo = await builder.build(makeTask("Hi", "emp_elena_ferri"), deadline);
    const hr = await builder.build(makeTask("Hi", "emp_giulia_marino"), deadline);
    const plant = await builder.build(makeTask("Hi", "emp_ana_petrovic"), deadline);

    expect(ceo.securityContext.caller.roles).toEqual(["employee", "executive"]);
    expect(hr.securityContext.caller.roles).toEqual(["employee", "hr_admin"]);
    expect(plant.securityContext.caller.employee?.isOperational).toBe(true);
  });

  it("gives guests an empty identity", async () => {
    const context = await builder.build(makeTask("Where are you?", "guest", true), deadline);

    expect(context.callerKind).toBe("guest");
    expect(context.identity).toBeNull();
    expect(context.securityContext.requester).toBe("public guest");
    expect(context.securityContext.caller.roles).toEqual(["guest"]);
  });

  it("rejects an unknown employee caller", async () => {
    await expect(
      builder.build(makeTask("Hi", "emp_nobody"), deadline)
    ).rejects.toBeInstanceOf(IdentityLoadError);
  });

  it("projects resolved entities into both views", async () => {
    const text = "Is Sara Romano on Project Alpha?";
    const base = await builder.build(makeTask(text), deadline);

    const context = await builder.withEntities(
      base,
      resolution([
        resolved("employee", "emp_sara_romano", 3, 14),
        resolved("project", "proj_alpha", 18, 31),
      ]),
      deadline
    );

    expect(context.securityContext.taggedText).toBe(
      "Is {employee:emp_sara_romano} on {project:proj_alpha}?"
    );
    expect(context.securityContext.targets.map((target) => target.kind)).toEqual([
      "employee",
      "project",
    ]);
    expect(context.securityContext.targets[1]).toEqual({
      kind: "project",
      id: "proj_alpha",
      projectLeads: ["emp_sara_romano"],
      projectTeam: ["emp_sara_romano", "emp_luca_conti"],
    });
    expect(context.solverContext.caller).toBeNull();
    expect(context.solverContext.objects.map((object) => object.id)).toEqual([
      "emp_sara_romano",
      "proj_alpha",
    ]);
  });

  it("drops entities that disappeared since resolution", async () => {
    const base = await builder.build(makeTask("Who is emp_gone?"), deadline);
    const context = await builder.withEntities(
      base,
      resolution([resolved("employee", "emp_gone", 7, 15)]),
      deadline
    );
    expect(context.securityContext.targets).toEqual([]);
  });

  it("exposes the caller to the solver only for requests about them", async () => {
    const base = await builder.build(makeTask("What is my salary?", "emp_luca_conti"), deadline);
    const context = await builder.withEntities(base, resolution([], true), deadline);

    expect(context.solverContext.taggedText).toBe(
      "Requester {employee:emp_luca_conti}: What is my salary?"
    );
    expect(context.solverContext.caller).toMatchObject({ id: "emp_luca_conti" });
  });

  it("hides sensitive fields the decision did not grant", async () => {
    const base = await builder.build(makeTask("What is my salary?", "emp_luca_conti"), deadline);
    const context = await builder.withEntities(base, resolution([], true), deadline);

    const hidden = builder.scopeSolverContext(context, allowDecision());
    const granted = builder.scopeSolverContext(
      context,
      allowDecision({ grantedFields: ["salary"] })
    );

    expect(hidden.solverContext.caller).not.toHaveProperty("salary");
    expect(granted.solverContext.caller).toHaveProperty("salary", 72000);
    expect(granted.solverContext.caller).not.toHaveProperty("notes");
  });

  it("passes unresolved mentions to the security view", async () => {
    const text = "What is my salary and what does the plant boss earn?";
    const base = await builder.build(makeTask(text, "emp_luca_conti"), deadline);
    const context = await builder.withEntities(
      base,
      resolution([], true, [
        {
          mention: "plant boss",
          reason: "no_match",
          candidates: [],
          spans: [{ start: 36, end: 46 }],
        },
      ]),
      deadline
    );

    expect(context.securityContext.unresolved).toEqual(["plant boss"]);
    expect(context.solverContext.unresolved).toEqual(["plant boss"]);
  });

  it("keeps granted fields only on the granted records", async () => {
    const text = "What is my salary and Sara Romano's?";
    const base = await builder.build(makeTask(text, "emp_luca_conti"), deadline);
    const context = await builder.withEntities(
      base,
      resolution([resolved("employee", "emp_sara_romano", 22, 33)], true),
      deadline
    );

    const scoped = builder.scopeSolverContext(
      context,
      allowDecision({ grantedFields: ["salary"], grantedTargets: ["emp_luca_conti"] })
    );

    expect(scoped.solverContext.caller).toHaveProperty("salary", 72000);
    expect(scoped.solverContext.objects[0].id).toBe("emp_sara_romano");
    expect(scoped.solverContext.objects[0].record).not.toHaveProperty("salary");
    expect(scoped.solverContext.objects[0].record).toHaveProperty("name", "Sara Romano");
  });
});

describe("tagText", () => {
  it("replaces every span of every entity", () => {
    expect(
      tagText("Alpha and alpha", [
        {
          mention: "Alpha",
          kind: "project",
          id: "proj_alpha",
          name: "Project Alpha",
          score: 100,
          via: "exact",
          spans: [
            { start: 0, end: 5 },
            { start: 10, end: 15 },
          ],
        },
      ])
    ).toBe("{project:proj_alpha} and {project:proj_alpha}");
  });
});
