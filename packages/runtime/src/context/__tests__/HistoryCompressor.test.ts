import { describe, expect, it } from "vitest";
import type { HistoryEntry, Step, ToolResult } from "../../types/index.js";
import { compactHistory, History, truncate } from "../HistoryCompressor.js";

const step: Step = {
  rationale: "Look the employee up",
  plan: [],
  taskCompleted: false,
  toolCall: { tool: "employees.get", arguments: { ids: ["emp_luca_conti"] } },
  answer: null,
};

function ok(n: number): ToolResult {
  return { success: true, tool: "employees.get", output: { n }, latencyMs: 1 };
}

const missing: ToolResult = {
  success: false,
  tool: "employees.get",
  error: { kind: "not_found", message: "Employee emp_x not found", parameters: {} },
  latencyMs: 1,
};

function verbatim(index: number, result: ToolResult = ok(index)): HistoryEntry {
  return { kind: "verbatim", index, step, result, recordedAt: 1_000 + index };
}

describe("compactHistory", () => {
  const policy = { keepRecent: 2, previewChars: 40 };

  it("summarizes everything older than the recency window, in order", () => {
    const entries = [verbatim(0), verbatim(1, missing), verbatim(2), verbatim(3)];

    const compacted = compactHistory(entries, policy);

    expect(compacted.map((entry) => [entry.index, entry.kind])).toEqual([
      [0, "summary"],
      [1, "summary"],
      [2, "verbatim"],
      [3, "verbatim"],
    ]);
    expect(compacted[0]).toEqual({
      kind: "summary",
      index: 0,
      tool: "employees.get",
      success: true,
      preview: '{"n":0}',
      recordedAt: 1_000,
    });
    expect(compacted[1]).toMatchObject({ success: false, errorKind: "not_found" });
  });

  it("is idempotent", () => {
    const once = compactHistory([verbatim(0), verbatim(1), verbatim(2)], policy);
    expect(compactHistory(once, policy)).toEqual(once);
  });

  it("leaves short histories untouched", () => {
    const entries = [verbatim(0), verbatim(1)];
    expect(compactHistory(entries, policy)).toEqual(entries);
  });
});

describe("truncate", () => {
  it("cuts long previews and notes how much was dropped", () => {
    expect(truncate("abcdef", 3)).toBe("abc…(+3 chars)");
    expect(truncate("abc", 3)).toBe("abc");
  });
});

describe("History", () => {
  it("numbers entries and reports newly compacted ones", () => {
    let clock = 0;
    const history = new History({ keepRecent: 2, previewChars: 40 }, () => ++clock);

    history.append(step, ok(0));
    history.append(step, ok(1));
    expect(history.compact()).toBe(0);

    history.append(step, ok(2));
    expect(history.compact()).toBe(1);
    history.append(step, ok(3));
    expect(history.compact()).toBe(1);

    expect(history.size).toBe(4);
    expect(history.list().map((entry) => entry.kind)).toEqual([
      "summary",
      "summary",
      "verbatim",
      "verbatim",
    ]);
    expect(history.list()[3]).toMatchObject({ index: 3, recordedAt: 4 });
  });
});
