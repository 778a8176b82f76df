import type { EventBus } from "../event/EventBus.js";
import type { UsageSnapshot } from "../llm/UsageMeter.js";
import type { PlatformClient } from "../platform/PlatformClient.js";
import type {
  TelemetryRecord,
  TelemetrySink,
} from "../telemetry/TelemetrySink.js";
import {
  OutcomeKindSchema,
  type FinalRecord,
  type Link,
  type Logger,
  type OutcomeKind,
  type PipelineOutcome,
  type PipelineStage,
  type TerminalStatus,
} from "../types/index.js";

export interface TaskFinalizerOptions {
  platform: PlatformClient;
  eventBus: EventBus;
  telemetry?: TelemetrySink;
  logger?: Logger;
  now?: () => number;
}

export interface FinalizeInput {
  taskId: string;
  traceId: string;
  outcome: PipelineOutcome;
  stages: Partial<Record<PipelineStage, number>>;
  usage: UsageSnapshot | null;
  startedAt: number;
}

/** 对外固定文案：内部失败原因只进日志和遥测 */
const FIXED_MESSAGES: Partial<Record<TerminalStatus, string>> = {
  timeout: "The request could not be completed within the time limit.",
  rate_limit_exhausted:
    "The assistant is temporarily over capacity. Please try again later.",
  max_steps_exceeded: "The request needed more steps than allowed and was stopped.",
  server_error: "A backend service failed while processing the request.",
  error_internal: "An internal error prevented the request from being completed.",
};

const DEFAULT_MESSAGES: Record<OutcomeKind, string> = {
  ok_answer: "Done.",
  ok_not_found: "No matching record was found.",
  denied_security: "This request is not permitted by the security policy.",
  none_clarification_needed: "Please clarify your request.",
  none_unsupported: "This request is not supported.",
  error_internal: "An internal error prevented the request from being completed.",
};

const LINKED_OUTCOMES: ReadonlySet<OutcomeKind> = new Set([
  "ok_answer",
  "none_clarification_needed",
  "none_unsupported",
]);

export function toOutcomeKind(status: TerminalStatus): OutcomeKind {
  const parsed = OutcomeKindSchema.safeParse(status);
  return parsed.success ? parsed.data : "error_internal";
}

export function dedupeLinks(links: readonly Link[]): Link[] {
  const seen = new Set<string>();
  return links.filter((link) => {
    const key = `${link.type}:${link.id}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/**
 * The single exit of every task. The first call for a task id sends the
 * response; later calls return that record unchanged.
 */
export class TaskFinalizer {
  private readonly finalized = new Map<string, FinalRecord>();

  private readonly pending = new Set<Promise<void>>();

  private readonly logger: Logger;

  private readonly now: () => number;

  constructor(private readonly options: TaskFinalizerOptions) {
    this.logger = options.logger ?? console;
    this.now = options.now ?? Date.now;
  }

  public isFinalized(taskId: string): boolean {
    return this.finalized.has(taskId);
  }

  public get(taskId: string): FinalRecord | undefined {
    return this.finalized.get(taskId);
  }

  public async finalize(input: FinalizeInput): Promise<FinalRecord> {
    const existing = this.finalized.get(input.taskId);
    if (existing) {
      this.logger.warn("[TaskFinalizer] Task already finalized, ignoring", {
        taskId: input.taskId,
        firstStatus: existing.status,
        ignoredStatus: input.outcome.status,
      });
      return existing;
    }

    const { outcome } = input;
    const kind = toOutcomeKind(outcome.status);
    const record: FinalRecord = {
      taskId: input.taskId,
      status: outcome.status,
      outcome: kind,
      response: {
        outcome: kind,
        message: this.messageFor(outcome),
        links: LINKED_OUTCOMES.has(kind) ? dedupeLinks(outcome.links) : [],
      },
      usage: input.usage,
      finalizedAt: this.now(),
    };
    // 先登记再发送，保证并发调用也只发送一次
    this.finalized.set(input.taskId, record);

    const log = kind === "error_internal" ? this.logger.error : this.logger.info;
    log.call(this.logger, "[TaskFinalizer] Task finalized", {
      taskId: input.taskId,
      status: outcome.status,
      outcome: kind,
      stage: outcome.stage,
      reason: outcome.reason,
      steps: outcome.steps,
    });

    try {
      await this.options.platform.provideResponse(input.taskId, record.response);
    } catch (error) {
      this.logger.error("[TaskFinalizer] Failed to deliver response", {
        taskId: input.taskId,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    this.options.eventBus.publish(
      "task.finalized",
      input.traceId,
      { status: outcome.status, outcome: kind, steps: outcome.steps },
      input.taskId
    );
    this.persistTelemetry(input, record);
    return record;
  }

  /** 等待尚未写完的遥测记录 */
  public async flush(): Promise<void> {
    await Promise.all(Array.from(this.pending));
  }

  private messageFor(outcome: PipelineOutcome): string {
    const fixed = FIXED_MESSAGES[outcome.status];
    if (fixed) {
      return fixed;
    }
    const kind = toOutcomeKind(outcome.status);
    const message = outcome.message?.trim();
    return message && message.length > 0 ? message : DEFAULT_MESSAGES[kind];
  }

  private persistTelemetry(input: FinalizeInput, record: FinalRecord): void {
    const sink = this.options.telemetry;
    if (!sink) {
      return;
    }
    const finishedAt = this.now();
    const telemetry: TelemetryRecord = {
      taskId: input.taskId,
      status: record.status,
      outcome: record.outcome,
      stages: { ...input.stages },
      usage: input.usage,
      steps: input.outcome.steps,
      durationMs: finishedAt - input.startedAt,
      finishedAt: new Date(finishedAt).toISOString(),
      ...(input.outcome.reason
        ? {
            error: {
              ...(input.outcome.stage ? { stage: input.outcome.stage } : {}),
              message: input.outcome.reason,
            },
          }
        : {}),
    };
    // 遥测不阻塞也不影响响应路径
    const write = Promise.resolve()
      .then(() => sink.record(telemetry))
      .catch((error: unknown) => {
        this.logger.warn("[TaskFinalizer] Telemetry write failed", {
          taskId: input.taskId,
          error: error instanceof Error ? error.message : String(error),
        });
      })
      .finally(() => {
        this.pending.delete(write);
      });
    this.pending.add(write);
  }
}
