import { fromPromise } from "xstate";
import type { ToolExecutor } from "../core/ToolExecutor.js";
import type { StepPlanner } from "../planner/StepPlanner.js";
import type { Step, ToolResult } from "../types/index.js";
import type { StepServiceInput } from "./stepTypes.js";

export function createPlanStepService(planner: StepPlanner) {
  return fromPromise<Step, StepServiceInput>(async ({ input }) => {
    const { context } = input;
    return planner.plan({
      solver: context.solver,
      history: context.history.list(),
      decision: context.decision,
      stepIndex: context.stepIndex,
      deadline: context.deadline,
      ...(context.meter ? { meter: context.meter } : {}),
    });
  });
}

export function createDispatchToolService(executor: ToolExecutor) {
  return fromPromise<ToolResult, StepServiceInput>(async ({ input }) => {
    const { context } = input;
    const toolCall = context.currentStep?.toolCall;
    if (!toolCall) {
      throw new Error("Dispatch reached without a tool call on the current step");
    }
    return executor.execute({
      task: context.task,
      traceId: context.traceId,
      callerId: context.callerId,
      today: context.solver.today,
      stepIndex: context.stepIndex,
      toolCall,
      decision: context.decision,
      deadline: context.deadline,
    });
  });
}
