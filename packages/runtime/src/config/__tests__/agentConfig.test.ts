import path from "node:path";
import { describe, expect, it } from "vitest";
import { DEFAULT_DATA_DIR, loadAgentConfig } from "../agentConfig.js";

describe("loadAgentConfig", () => {
  it("applies defaults and derives the rulebook path", () => {
    const config = loadAgentConfig({});

    expect(config.maxSteps).toBe(10);
    expect(config.taskTimeoutMs).toBe(300_000);
    expect(config.historyKeepRecent).toBe(4);
    expect(config.concurrency).toBe(1);
    expect(config.taskCodes).toEqual([]);
    expect(config.dataDir).toBe(DEFAULT_DATA_DIR);
    expect(config.rulebookPath).toBe(path.join(DEFAULT_DATA_DIR, "security_rules.json"));
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("reads and coerces environment variables", () => {
    const config = loadAgentConfig({
      ORGDESK_MAX_STEPS: "7",
      ORGDESK_RESOLVER_FUZZY_THRESHOLD: "0.75",
      ORGDESK_TASK_CODES: "hr-1, pm-2,,wiki-3",
      ORGDESK_TASK_FILTER: "salary",
      ORGDESK_RULEBOOK: "/etc/orgdesk/rules.json",
    });

    expect(config.maxSteps).toBe(7);
    expect(config.resolverFuzzyThreshold).toBe(0.75);
    expect(config.taskCodes).toEqual(["hr-1", "pm-2", "wiki-3"]);
    expect(config.taskNameFilter).toBe("salary");
    expect(config.rulebookPath).toBe("/etc/orgdesk/rules.json");
  });

  it("lets explicit overrides win over the environment", () => {
    const config = loadAgentConfig(
      { ORGDESK_MAX_STEPS: "7", ORGDESK_CONCURRENCY: "2" },
      { maxSteps: 3 }
    );

    expect(config.maxSteps).toBe(3);
    expect(config.concurrency).toBe(2);
  });

  it("ignores blank environment values", () => {
    expect(loadAgentConfig({ ORGDESK_MAX_STEPS: "  " }).maxSteps).toBe(10);
  });

  it("rejects invalid values with the offending field", () => {
    expect(() => loadAgentConfig({ ORGDESK_MAX_STEPS: "0" })).toThrow(
      /^Invalid agent configuration: maxSteps: /
    );
    expect(() => loadAgentConfig({}, { resolverFuzzyThreshold: 2 })).toThrow(
      /resolverFuzzyThreshold/
    );
  });
});
