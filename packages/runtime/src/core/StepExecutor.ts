import { createActor } from "xstate";
import type { AgentConfig } from "../config/agentConfig.js";
import { History } from "../context/HistoryCompressor.js";
import type { EventBus } from "../event/EventBus.js";
import { createStepMachine, type StepMachine } from "../fsm/stepMachine.js";
import type { UsageMeter } from "../llm/UsageMeter.js";
import type { StepPlanner } from "../planner/StepPlanner.js";
import { StepReflector } from "../reflector/StepReflector.js";
import type {
  Logger,
  SecurityDecision,
  SolverContext,
  StepRunResult,
  Task,
  ToolRegistry,
} from "../types/index.js";
import type { Deadline } from "./Deadline.js";
import { ToolExecutor } from "./ToolExecutor.js";

export interface StepExecutorOptions {
  planner: StepPlanner;
  toolRegistry: ToolRegistry;
  eventBus: EventBus;
  config: AgentConfig;
  logger?: Logger;
}

export interface StepRunInput {
  task: Task;
  traceId: string;
  solver: SolverContext;
  decision: SecurityDecision;
  callerId: string | null;
  deadline: Deadline;
  meter?: UsageMeter;
}

/**
 * Drives the bounded plan/dispatch loop for one task and reports how it
 * ended. It never throws for outcomes the loop itself classifies.
 */
export class StepExecutor {
  private readonly machine: StepMachine;

  private readonly eventBus: EventBus;

  private readonly config: AgentConfig;

  constructor(options: StepExecutorOptions) {
    const logger = options.logger ?? console;
    this.eventBus = options.eventBus;
    this.config = options.config;
    this.machine = createStepMachine({
      planner: options.planner,
      executor: new ToolExecutor({
        toolRegistry: options.toolRegistry,
        eventBus: options.eventBus,
        logger,
      }),
      reflector: new StepReflector(options.config.maxConsecutiveFailures),
      eventBus: options.eventBus,
      maxSteps: options.config.maxSteps,
      logger,
    });
  }

  public async run(input: StepRunInput): Promise<StepRunResult> {
    const history = new History({
      keepRecent: this.config.historyKeepRecent,
      previewChars: this.config.historyPayloadPreviewChars,
    });
    const actor = createActor(this.machine, {
      input: {
        task: input.task,
        traceId: input.traceId,
        solver: input.solver,
        decision: input.decision,
        callerId: input.callerId,
        deadline: input.deadline,
        history,
        ...(input.meter ? { meter: input.meter } : {}),
      },
    });

    return new Promise<StepRunResult>((resolve, reject) => {
      const subscription = actor.subscribe({
        next: (snapshot) => {
          // 每次状态变化都广播出去，便于外部观测循环进度
          this.eventBus.publish(
            "agent.transition",
            input.traceId,
            {
              state: snapshot.value,
              stepIndex: snapshot.context.stepIndex,
            },
            input.task.taskId
          );
          if (snapshot.status !== "done") {
            return;
          }
          subscription.unsubscribe();
          const { context } = snapshot;
          if (snapshot.matches("done") && context.answer) {
            resolve({
              status: "completed",
              answer: context.answer,
              steps: context.stepIndex,
              history: [...history.list()],
            });
            return;
          }
          const failure = context.failure;
          resolve({
            status: "aborted",
            terminal: failure?.status ?? "error_internal",
            reason: failure?.message ?? "Step loop ended without an answer",
            steps: context.stepIndex,
            history: [...history.list()],
          });
        },
        error: (error) => {
          subscription.unsubscribe();
          reject(error);
        },
      });

      try {
        actor.start();
      } catch (error) {
        subscription.unsubscribe();
        reject(error);
      }
    });
  }
}
