import type { HistoryEntry, Step, ToolResult } from "../types/index.js";

export interface CompactionPolicy {
  /** 最近 N 条始终保持原样 */
  keepRecent: number;
  /** 摘要中保留的输出字符数 */
  previewChars: number;
}

/**
 * Replaces every verbatim entry older than the recency window with a
 * fixed-size summary. Order is preserved; summaries pass through as-is.
 */
export function compactHistory(
  entries: readonly HistoryEntry[],
  policy: CompactionPolicy
): HistoryEntry[] {
  const boundary = Math.max(0, entries.length - policy.keepRecent);
  return entries.map((entry, position) =>
    position < boundary && entry.kind === "verbatim"
      ? summarizeEntry(entry, policy.previewChars)
      : entry
  );
}

export function summarizeEntry(
  entry: Extract<HistoryEntry, { kind: "verbatim" }>,
  previewChars: number
): HistoryEntry {
  const { result } = entry;
  const payload = result.success ? result.output : result.error;
  return {
    kind: "summary",
    index: entry.index,
    tool: result.tool,
    success: result.success,
    ...(result.success ? {} : { errorKind: result.error.kind }),
    preview: truncate(JSON.stringify(payload) ?? "null", previewChars),
    recordedAt: entry.recordedAt,
  };
}

export function truncate(text: string, limit: number): string {
  if (text.length <= limit) {
    return text;
  }
  return `${text.slice(0, limit)}…(+${text.length - limit} chars)`;
}

/**
 * Append-only transcript of one task's loop. Compaction is explicit and
 * invoked by the loop after each observation.
 */
export class History {
  private entries: HistoryEntry[] = [];

  private nextIndex = 0;

  constructor(
    private readonly policy: CompactionPolicy,
    private readonly now: () => number = Date.now
  ) {}

  public append(step: Step, result: ToolResult): HistoryEntry {
    const entry: HistoryEntry = {
      kind: "verbatim",
      index: this.nextIndex++,
      step,
      result,
      recordedAt: this.now(),
    };
    this.entries.push(entry);
    return entry;
  }

  /** 返回本次新压缩的条目数 */
  public compact(): number {
    const before = this.entries.filter((entry) => entry.kind === "summary").length;
    this.entries = compactHistory(this.entries, this.policy);
    const after = this.entries.filter((entry) => entry.kind === "summary").length;
    return after - before;
  }

  public list(): readonly HistoryEntry[] {
    return this.entries;
  }

  public get size(): number {
    return this.entries.length;
  }
}
