import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { Deadline } from "../../core/Deadline.js";
import { scripted, ScriptedModel } from "../../llm/ScriptedModel.js";
import type {
  EmployeeSecurityView,
  SecurityContext,
  SecurityTarget,
} from "../../types/index.js";
import { silentLogger, testConfig } from "../../__tests__/harness.js";
import { readRulebook, RulebookStore, type PolicyRulebook } from "../PolicyRulebook.js";
import {
  classifyByKeywords,
  decide,
  evaluateConditions,
  SecurityWatchdog,
} from "../SecurityWatchdog.js";

function view(
  id: string,
  overrides: Partial<EmployeeSecurityView> = {}
): EmployeeSecurityView {
  return {
    id,
    name: id,
    department: "Engineering",
    location: "loc_it_milan",
    isExecutive: false,
    isOperational: false,
    managerChain: [],
    projects: [],
    ...overrides,
  };
}

function employeeTarget(employee: EmployeeSecurityView): SecurityTarget {
  return { kind: "employee", id: employee.id, employee };
}

function contextFor(
  caller: EmployeeSecurityView | null,
  targets: SecurityTarget[] = [],
  options: {
    roles?: string[];
    isAboutCaller?: boolean;
    text?: string;
    unresolved?: string[];
  } = {}
): SecurityContext {
  return {
    requester: caller ? `{employee:${caller.id}} (${caller.department})` : "public guest",
    taggedText: options.text ?? "",
    caller: caller
      ? {
          kind: "employee",
          employee: caller,
          roles: options.roles ?? ["employee"],
          department: caller.department,
          permissions: [],
        }
      : {
          kind: "guest",
          employee: null,
          roles: ["guest"],
          department: null,
          permissions: [],
        },
    targets,
    isAboutCaller: options.isAboutCaller ?? false,
    unresolved: options.unresolved ?? [],
  };
}

describe("SecurityWatchdog", () => {
  let rulebook: PolicyRulebook;

  beforeEach(async () => {
    rulebook = await readRulebook(testConfig().rulebookPath);
  });

  describe("classifyByKeywords", () => {
    it("matches keywords on word boundaries only", () => {
      const categories = rulebook.listCategories();
      expect(
        classifyByKeywords("What is {employee:emp_sara_romano}'s salary?", categories)
      ).toEqual(["compensation.read"]);
      expect(classifyByKeywords("Who handles payroll?", categories)).toEqual([]);
    });
  });

  describe("evaluateConditions", () => {
    it("requires a target condition to hold for every target", () => {
      const caller = view("emp_marco");
      const report = view("emp_sara", { managerChain: ["emp_marco"] });
      const stranger = view("emp_ana", { department: "Production" });

      expect(
        evaluateConditions(contextFor(caller, [employeeTarget(report)]))
      ).toEqual(new Set(["caller_manages_target", "caller_in_target_department"]));
      expect(
        evaluateConditions(
          contextFor(caller, [employeeTarget(report), employeeTarget(stranger)])
        )
      ).toEqual(new Set());
    });

    it("treats a request about the caller with no targets as self", () => {
      const caller = view("emp_luca");
      expect(
        evaluateConditions(contextFor(caller, [], { isAboutCaller: true })).has(
          "target_is_self"
        )
      ).toBe(true);
    });

    it("does not assume self while a mention is still unresolved", () => {
      const caller = view("emp_luca");
      expect(
        evaluateConditions(
          contextFor(caller, [], { isAboutCaller: true, unresolved: ["plant boss"] })
        ).has("target_is_self")
      ).toBe(false);
    });
  });

  describe("decide", () => {
    it("denies guests and allows employees when no action is detected", () => {
      expect(decide(contextFor(null), rulebook, [])).toMatchObject({
        verdict: "deny",
        reason: "Guests may only ask about public company information",
      });
      expect(decide(contextFor(view("emp_luca")), rulebook, [])).toMatchObject({
        verdict: "allow",
        reason: "No restricted action detected",
      });
    });

    it("grants salary fields to HR", () => {
      const hr = view("emp_giulia", { department: "Human Resources" });
      const decision = decide(
        contextFor(hr, [employeeTarget(view("emp_sara"))], {
          roles: ["employee", "hr_admin"],
        }),
        rulebook,
        ["compensation.read"]
      );
      expect(decision).toEqual({
        verdict: "allow",
        reason: "HR manages compensation.",
        concerns: false,
        matchedRules: ["compensation-hr"],
        actions: ["compensation.read"],
        entitiesToChange: [],
        grantedFields: ["salary"],
        grantedTargets: "any",
      });
    });

    it("lets employees read their own salary", () => {
      const decision = decide(
        contextFor(view("emp_luca"), [], { isAboutCaller: true }),
        rulebook,
        ["compensation.read"]
      );
      expect(decision.verdict).toBe("allow");
      expect(decision.matchedRules).toEqual(["compensation-self"]);
      expect(decision.grantedTargets).toEqual(["emp_luca"]);
    });

    it("limits a manager's grant to the reports named in the request", () => {
      const report = view("emp_sara", { managerChain: ["emp_marco"] });
      const decision = decide(
        contextFor(view("emp_marco"), [employeeTarget(report)]),
        rulebook,
        ["directory.read", "compensation.read"]
      );
      expect(decision.matchedRules).toEqual(["compensation-manager"]);
      expect(decision.grantedFields).toEqual(["salary"]);
      expect(decision.grantedTargets).toEqual(["emp_sara"]);
    });

    it("flags concerns for project changes by non-leads", () => {
      const target: SecurityTarget = {
        kind: "project",
        id: "proj_alpha",
        projectLeads: ["emp_sara"],
        projectTeam: ["emp_sara", "emp_luca"],
      };
      const decision = decide(contextFor(view("emp_luca"), [target]), rulebook, [
        "project.update",
      ]);
      expect(decision.verdict).toBe("allow");
      expect(decision.concerns).toBe(true);
      expect(decision.entitiesToChange).toEqual(["project"]);
      expect(decision.reason).toBe(
        "The caller does not lead this project; double-check the change is intended."
      );

      const lead = decide(contextFor(view("emp_sara"), [target]), rulebook, [
        "project.update",
      ]);
      expect(lead.concerns).toBe(false);
      expect(lead.matchedRules).toEqual(["project-update-lead"]);
      expect(lead.grantedTargets).toEqual(["proj_alpha"]);
      expect(decision.grantedTargets).toBe("any");
    });

    it("denies the whole request when one action is denied", () => {
      const decision = decide(
        contextFor(view("emp_luca"), [employeeTarget(view("emp_sara"))]),
        rulebook,
        ["directory.read", "compensation.read"]
      );
      expect(decision.verdict).toBe("deny");
      expect(decision.reason).toBe(
        "salary data is only visible to the employee, their managers, executives and HR."
      );
      expect(decision.entitiesToChange).toEqual([]);
      expect(decision.grantedFields).toEqual([]);
      expect(decision.grantedTargets).toEqual([]);
    });
  });

  describe("evaluate", () => {
    let deadline: Deadline;
    let model: ScriptedModel;
    let watchdog: SecurityWatchdog;

    beforeEach(() => {
      deadline = new Deadline(5_000);
      model = new ScriptedModel();
      watchdog = new SecurityWatchdog({
        rulebook: new RulebookStore(rulebook),
        model,
        config: testConfig(),
        logger: silentLogger,
      });
    });

    afterEach(() => {
      deadline.dispose();
    });

    it("skips the model when keywords classify the request", async () => {
      const decision = await watchdog.evaluate(
        contextFor(view("emp_luca"), [], { text: "Who is the plant manager?" }),
        deadline
      );
      expect(decision.actions).toEqual(["directory.read"]);
      expect(model.calls).toHaveLength(0);
    });

    it("asks the model and re-prompts on unknown categories", async () => {
      model.enqueue(
        "watchdog",
        scripted.json({ categories: ["payroll.run"] }),
        scripted.json({ categories: ["time.log", "time.log"], reason: "Books hours" })
      );

      const decision = await watchdog.evaluate(
        contextFor(view("emp_luca"), [], { text: "Put 3h on Alpha for yesterday" }),
        deadline
      );

      expect(model.callsFor("watchdog")).toHaveLength(2);
      expect(decision.actions).toEqual(["time.log"]);
      expect(decision.verdict).toBe("allow");
      expect(decision.entitiesToChange).toEqual(["timeentry"]);
    });
  });
});
