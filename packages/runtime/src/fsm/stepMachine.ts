import { assign, setup } from "xstate";
import type { ToolExecutor } from "../core/ToolExecutor.js";
import {
  DeadlineExceededError,
  PipelineError,
  StepLimitExceededError,
  toPipelineError,
} from "../errors/PipelineError.js";
import type { EventBus } from "../event/EventBus.js";
import type { StepPlanner } from "../planner/StepPlanner.js";
import {
  EMPTY_STREAK,
  type StepReflector,
} from "../reflector/StepReflector.js";
import type { Logger } from "../types/index.js";
import {
  createDispatchToolService,
  createPlanStepService,
} from "./stepServices.js";
import type { StepMachineContext, StepMachineInput } from "./stepTypes.js";

export type { StepMachineContext, StepMachineInput } from "./stepTypes.js";

export interface StepMachineDeps {
  planner: StepPlanner;
  executor: ToolExecutor;
  reflector: StepReflector;
  eventBus: EventBus;
  maxSteps: number;
  logger: Logger;
}

/**
 * checking → planning → dispatching → observing → checking … until a
 * completed step (done) or a limit, fatal tool error or deadline (aborted).
 */
export function createStepMachine(deps: StepMachineDeps) {
  const { eventBus, reflector, maxSteps, logger } = deps;

  return setup({
    types: {} as {
      context: StepMachineContext;
      input: StepMachineInput;
    },
    actors: {
      planStep: createPlanStepService(deps.planner),
      dispatchTool: createDispatchToolService(deps.executor),
    },
    guards: {
      deadlineExpired: ({ context }) => context.deadline.expired,
      stepBudgetSpent: ({ context }) => context.stepIndex >= maxSteps,
      hasFailure: ({ context }) => context.failure !== null,
    },
  }).createMachine({
    id: "step-loop",
    initial: "checking",
    context: ({ input }) => ({
      ...input,
      stepIndex: 0,
      currentStep: null,
      lastResult: null,
      streak: EMPTY_STREAK,
      answer: null,
      failure: null,
    }),
    states: {
      checking: {
        always: [
          {
            guard: "deadlineExpired",
            target: "aborted",
            actions: assign({
              failure: ({ context }) =>
                new DeadlineExceededError("executor", context.deadline.budgetMs),
            }),
          },
          {
            guard: "stepBudgetSpent",
            target: "aborted",
            actions: assign({
              failure: () => new StepLimitExceededError(maxSteps),
            }),
          },
          { target: "planning" },
        ],
      },
      planning: {
        invoke: {
          id: "planner",
          src: "planStep",
          input: ({ context }) => ({ context }),
          onDone: [
            {
              guard: ({ event }) => event.output.taskCompleted,
              target: "done",
              actions: assign({
                currentStep: ({ event }) => event.output,
                answer: ({ event }) => event.output.answer,
                stepIndex: ({ context }) => context.stepIndex + 1,
              }),
            },
            {
              target: "dispatching",
              actions: [
                assign({
                  currentStep: ({ event }) => event.output,
                  stepIndex: ({ context }) => context.stepIndex + 1,
                }),
                ({ context }) => {
                  eventBus.publish(
                    "step.planned",
                    context.traceId,
                    {
                      stepIndex: context.stepIndex,
                      tool: context.currentStep?.toolCall?.tool ?? null,
                      rationale: context.currentStep?.rationale ?? "",
                    },
                    context.task.taskId
                  );
                },
              ],
            },
          ],
          onError: {
            target: "aborted",
            actions: assign({
              failure: ({ event }) => toPipelineError(event.error, "executor"),
            }),
          },
        },
      },
      dispatching: {
        invoke: {
          id: "dispatcher",
          src: "dispatchTool",
          input: ({ context }) => ({ context }),
          onDone: {
            target: "observing",
            actions: assign({ lastResult: ({ event }) => event.output }),
          },
          onError: {
            target: "aborted",
            actions: assign({
              failure: ({ event }) => toPipelineError(event.error, "executor"),
            }),
          },
        },
      },
      observing: {
        entry: assign(({ context }) => {
          const { currentStep, lastResult, history } = context;
          if (!currentStep || !lastResult) {
            return {
              failure: new PipelineError("Observation reached without a tool result", {
                status: "error_internal",
                stage: "executor",
              }),
            };
          }
          history.append(currentStep, lastResult);
          const compacted = history.compact();
          if (compacted > 0) {
            eventBus.publish(
              "history.compacted",
              context.traceId,
              { compacted, size: history.size },
              context.task.taskId
            );
          }
          const reflection = reflector.reflect(lastResult, context.streak);
          if (reflection.directive === "abort") {
            logger.warn("[stepMachine] Aborting loop", {
              taskId: context.task.taskId,
              tool: lastResult.tool,
              reason: reflection.error.message,
            });
            return { streak: reflection.streak, failure: reflection.error };
          }
          return { streak: reflection.streak };
        }),
        always: [
          { guard: "hasFailure", target: "aborted" },
          { target: "checking" },
        ],
      },
      done: { type: "final" },
      aborted: { type: "final" },
    },
  });
}

export type StepMachine = ReturnType<typeof createStepMachine>;
