import type { AgentConfig } from "../config/agentConfig.js";
import type { EventBus } from "../event/EventBus.js";
import type { FinalRecord, Logger, OutcomeKind, TerminalStatus } from "../types/index.js";
import type { AgentPipeline } from "./AgentPipeline.js";

export interface SessionSummary {
  total: number;
  /** 被 taskCodes / taskNameFilter 过滤掉的任务数 */
  skipped: number;
  byOutcome: Partial<Record<OutcomeKind, number>>;
  byStatus: Partial<Record<TerminalStatus, number>>;
  durationMs: number;
  totalTokens: number;
  modelCalls: number;
  records: FinalRecord[];
}

export interface SessionRunnerOptions {
  pipeline: AgentPipeline;
  config: AgentConfig;
  logger?: Logger;
  now?: () => number;
}

/**
 * Runs a batch of inbound task records through one pipeline with a
 * bounded number of tasks in flight. Tasks never share mutable state.
 */
export class SessionRunner {
  private readonly logger: Logger;

  private readonly now: () => number;

  constructor(private readonly options: SessionRunnerOptions) {
    this.logger = options.logger ?? console;
    this.now = options.now ?? Date.now;
  }

  public selectTasks(records: readonly unknown[]): unknown[] {
    const { taskCodes, taskNameFilter } = this.options.config;
    return records.filter((record) => {
      if (taskCodes.length > 0) {
        const code = readField(record, "spec_id");
        if (!code || !taskCodes.includes(code)) return false;
      }
      if (taskNameFilter) {
        const id = readField(record, "task_id") ?? "";
        const text = readField(record, "text") ?? "";
        if (!id.includes(taskNameFilter) && !text.includes(taskNameFilter)) {
          return false;
        }
      }
      return true;
    });
  }

  public async run(records: readonly unknown[]): Promise<SessionSummary> {
    const startedAt = this.now();
    const selected = this.selectTasks(records);
    const results = new Array<FinalRecord>(selected.length);
    const { pipeline, config } = this.options;
    this.logger.info("[SessionRunner] Session started", {
      tasks: selected.length,
      skipped: records.length - selected.length,
      concurrency: config.concurrency,
    });

    let cursor = 0;
    const worker = async () => {
      while (cursor < selected.length) {
        const position = cursor;
        cursor += 1;
        results[position] = await pipeline.run(selected[position]);
      }
    };
    const workers = Array.from(
      { length: Math.min(config.concurrency, selected.length) },
      () => worker()
    );
    await Promise.all(workers);
    await pipeline.finalizer.flush();

    const summary = summarize(
      results,
      records.length - selected.length,
      this.now() - startedAt
    );
    this.logger.info("[SessionRunner] Session finished", {
      total: summary.total,
      byOutcome: summary.byOutcome,
      totalTokens: summary.totalTokens,
      durationMs: summary.durationMs,
    });
    publishSummary(pipeline.eventBus, summary);
    return summary;
  }
}

export function summarize(
  records: FinalRecord[],
  skipped: number,
  durationMs: number
): SessionSummary {
  const byOutcome: Partial<Record<OutcomeKind, number>> = {};
  const byStatus: Partial<Record<TerminalStatus, number>> = {};
  let totalTokens = 0;
  let modelCalls = 0;
  for (const record of records) {
    byOutcome[record.outcome] = (byOutcome[record.outcome] ?? 0) + 1;
    byStatus[record.status] = (byStatus[record.status] ?? 0) + 1;
    totalTokens += record.usage?.totalTokens ?? 0;
    modelCalls += record.usage?.calls ?? 0;
  }
  return {
    total: records.length,
    skipped,
    byOutcome,
    byStatus,
    durationMs,
    totalTokens,
    modelCalls,
    records,
  };
}

function publishSummary(eventBus: EventBus, summary: SessionSummary): void {
  eventBus.publish("session.finished", "session", {
    total: summary.total,
    skipped: summary.skipped,
    byOutcome: summary.byOutcome,
    durationMs: summary.durationMs,
  });
}

function readField(record: unknown, field: string): string | null {
  if (typeof record !== "object" || record === null) {
    return null;
  }
  const value: unknown = Reflect.get(record, field);
  return typeof value === "string" ? value : null;
}
