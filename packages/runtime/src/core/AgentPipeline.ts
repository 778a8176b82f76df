import { nanoid } from "nanoid";
import type { AgentConfig } from "../config/agentConfig.js";
import { ContextBuilder } from "../context/ContextBuilder.js";
import type { ContextManager } from "../context/DefaultContextManager.interface.js";
import { toPipelineError } from "../errors/PipelineError.js";
import { EventBus } from "../event/EventBus.js";
import { GuestHandler } from "../guest/GuestHandler.js";
import type { StructuredModel } from "../llm/StructuredModel.js";
import { UsageMeter } from "../llm/UsageMeter.js";
import type { PlatformClient } from "../platform/PlatformClient.js";
import type { ReferenceData } from "../platform/referenceData.js";
import { StepPlanner } from "../planner/StepPlanner.js";
import { EntityResolver } from "../resolver/EntityResolver.js";
import type { Retriever } from "../retrieval/KeywordWikiRetriever.js";
import type { RulebookStore } from "../security/PolicyRulebook.js";
import { SecurityWatchdog } from "../security/SecurityWatchdog.js";
import type { TelemetrySink } from "../telemetry/TelemetrySink.js";
import { createDefaultRegistry } from "../tools/index.js";
import {
  InboundTaskSchema,
  type EntityKind,
  type FinalRecord,
  type InboundTaskRecord,
  type Link,
  type LinkType,
  type Logger,
  type PipelineOutcome,
  type ResolutionResult,
  type Task,
  type ToolRegistry,
} from "../types/index.js";
import { Deadline } from "./Deadline.js";
import { StageTimer } from "./StageTimer.js";
import { StepExecutor } from "./StepExecutor.js";
import { TaskFinalizer } from "./TaskFinalizer.js";

export interface AgentPipelineOptions {
  config: AgentConfig;
  platform: PlatformClient;
  reference: ReferenceData;
  rulebook: RulebookStore;
  model: StructuredModel;
  toolRegistry?: ToolRegistry;
  retriever?: Retriever;
  contextManager?: ContextManager;
  eventBus?: EventBus;
  telemetry?: TelemetrySink;
  logger?: Logger;
}

const LINK_TYPES: Partial<Record<EntityKind, LinkType>> = {
  employee: "employee",
  customer: "customer",
  project: "project",
  wiki: "wiki",
  location: "location",
  skill: "skill_id",
  will: "will_id",
};

/**
 * Context → resolver → watchdog → step loop, with the guest short-cut.
 * Every path, including thrown failures, ends in exactly one finalize.
 */
export class AgentPipeline {
  public readonly eventBus: EventBus;

  public readonly finalizer: TaskFinalizer;

  private readonly config: AgentConfig;

  private readonly contextBuilder: ContextBuilder;

  private readonly resolver: EntityResolver;

  private readonly watchdog: SecurityWatchdog;

  private readonly guestHandler: GuestHandler;

  private readonly stepExecutor: StepExecutor;

  private readonly logger: Logger;

  constructor(options: AgentPipelineOptions) {
    const { config, platform, reference, model } = options;
    const logger = options.logger ?? console;
    this.config = config;
    this.logger = logger;
    this.eventBus = options.eventBus ?? new EventBus();

    const toolRegistry =
      options.toolRegistry ?? createDefaultRegistry(platform, options.retriever);
    this.contextBuilder = new ContextBuilder({ platform, reference });
    this.resolver = new EntityResolver({ platform, reference, model, config, logger });
    this.watchdog = new SecurityWatchdog({
      rulebook: options.rulebook,
      model,
      config,
      logger,
    });
    this.guestHandler = new GuestHandler({
      watchdog: this.watchdog,
      model,
      reference,
      config,
      logger,
    });
    this.stepExecutor = new StepExecutor({
      planner: new StepPlanner({
        model,
        toolRegistry,
        config,
        logger,
        ...(options.contextManager
          ? { contextManager: options.contextManager }
          : {}),
      }),
      toolRegistry,
      eventBus: this.eventBus,
      config,
      logger,
    });
    this.finalizer = new TaskFinalizer({
      platform,
      eventBus: this.eventBus,
      logger,
      ...(options.telemetry ? { telemetry: options.telemetry } : {}),
    });
  }

  public async run(record: unknown): Promise<FinalRecord> {
    const startedAt = Date.now();
    const parsed = InboundTaskSchema.safeParse(record);
    if (!parsed.success) {
      const taskId = readTaskId(record) ?? `invalid-${nanoid(8)}`;
      this.logger.error("[AgentPipeline] Rejected inbound task", {
        taskId,
        issues: parsed.error.issues.map((issue) => issue.message),
      });
      return this.finalizer.finalize({
        taskId,
        traceId: nanoid(),
        outcome: {
          status: "error_internal",
          links: [],
          reason: "Inbound task record is malformed",
          stage: "intake",
          steps: 0,
        },
        stages: {},
        usage: null,
        startedAt,
      });
    }

    const task = toTask(parsed.data, startedAt);
    const traceId = nanoid();
    const deadline = new Deadline(this.config.taskTimeoutMs);
    const meter = new UsageMeter();
    const timer = new StageTimer(this.eventBus, traceId, task.taskId);
    this.eventBus.publish(
      "task.received",
      traceId,
      { callerId: task.callerId, callerIsPublic: task.callerIsPublic },
      task.taskId
    );

    let outcome: PipelineOutcome;
    try {
      outcome = await this.process(task, traceId, deadline, meter, timer);
    } catch (error) {
      const failure = toPipelineError(error, timer.current ?? "intake");
      this.logger.error("[AgentPipeline] Task failed", {
        taskId: task.taskId,
        stage: failure.stage,
        status: failure.status,
        error: failure.message,
        cause: failure.cause instanceof Error ? failure.cause.message : undefined,
      });
      outcome = {
        status: failure.status,
        links: [],
        reason: failure.message,
        stage: failure.stage,
        steps: 0,
      };
    } finally {
      deadline.dispose();
    }

    return this.finalizer.finalize({
      taskId: task.taskId,
      traceId,
      outcome,
      stages: timer.snapshot(),
      usage: meter.snapshot(),
      startedAt,
    });
  }

  private async process(
    task: Task,
    traceId: string,
    deadline: Deadline,
    meter: UsageMeter,
    timer: StageTimer
  ): Promise<PipelineOutcome> {
    const base = await timer.measure("context", () =>
      this.contextBuilder.build(task, deadline)
    );
    if (base.callerKind === "guest") {
      return timer.measure("guest", () =>
        this.guestHandler.handle(base, deadline, meter)
      );
    }

    const resolution = await timer.measure("resolver", () =>
      this.resolver.resolve(task, deadline, meter)
    );
    const context = await timer.measure("context", () =>
      this.contextBuilder.withEntities(base, resolution, deadline)
    );

    // 即使解析器已标记歧义也先过安全检查：拒绝优先于澄清
    const decision = await timer.measure("watchdog", () =>
      this.watchdog.evaluate(context.securityContext, deadline, meter)
    );
    if (decision.verdict === "deny") {
      return {
        status: "denied_security",
        message: `I can't help with that: ${decision.reason}`,
        links: [],
        reason: `Denied by ${decision.matchedRules.join(", ") || "default policy"}`,
        stage: "watchdog",
        steps: 0,
      };
    }
    if (decision.verdict === "needs_clarification") {
      return {
        status: "none_clarification_needed",
        message: decision.reason,
        links: [],
        stage: "watchdog",
        steps: 0,
      };
    }
    if (resolution.clarification) {
      return {
        status: "none_clarification_needed",
        message: resolution.clarification.message,
        links: clarificationLinks(resolution),
        stage: "resolver",
        steps: 0,
      };
    }

    const scoped = this.contextBuilder.scopeSolverContext(context, decision);
    const result = await timer.measure("executor", () =>
      this.stepExecutor.run({
        task,
        traceId,
        solver: scoped.solverContext,
        decision,
        callerId: context.securityContext.caller.employee?.id ?? null,
        deadline,
        meter,
      })
    );
    if (result.status === "completed") {
      return {
        status: result.answer.outcome,
        message: result.answer.message,
        links: result.answer.links,
        stage: "executor",
        steps: result.steps,
      };
    }
    return {
      status: result.terminal,
      links: [],
      reason: result.reason,
      stage: "executor",
      steps: result.steps,
    };
  }
}

export function toTask(record: InboundTaskRecord, receivedAt: number): Task {
  const { task_id, text, caller_id, caller_is_public, ...metadata } = record;
  return {
    taskId: task_id,
    text,
    callerId: caller_id,
    callerIsPublic: caller_is_public,
    createdAt: receivedAt,
    metadata,
  };
}

function readTaskId(record: unknown): string | null {
  if (
    typeof record === "object" &&
    record !== null &&
    "task_id" in record &&
    typeof record.task_id === "string" &&
    record.task_id.length > 0
  ) {
    return record.task_id;
  }
  return null;
}

function clarificationLinks(resolution: ResolutionResult): Link[] {
  const ambiguous = new Set(resolution.clarification?.mentions ?? []);
  return resolution.unresolved
    .filter((item) => ambiguous.has(item.mention))
    .flatMap((item) => item.candidates)
    .flatMap((candidate) => {
      const type = LINK_TYPES[candidate.kind];
      return type ? [{ type, id: candidate.id }] : [];
    });
}
