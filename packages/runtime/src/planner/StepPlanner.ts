import { z, type ZodType, type ZodTypeDef } from "zod";
import type { AgentConfig } from "../config/agentConfig.js";
import { DefaultContextManager } from "../context/DefaultContextManager.js";
import type { ContextManager } from "../context/DefaultContextManager.interface.js";
import type { Deadline } from "../core/Deadline.js";
import { callWithRetries } from "../llm/callWithRetries.js";
import type { StructuredModel } from "../llm/StructuredModel.js";
import type { UsageMeter } from "../llm/UsageMeter.js";
import { describeTool } from "../registry/ToolRegistry.js";
import {
  StepSchema,
  type HistoryEntry,
  type Logger,
  type SecurityDecision,
  type SolverContext,
  type Step,
  type ToolRegistry,
} from "../types/index.js";

export interface StepPlannerOptions {
  model: StructuredModel;
  toolRegistry: ToolRegistry;
  config: AgentConfig;
  contextManager?: ContextManager;
  systemPrompt?: string;
  logger?: Logger;
}

export interface StepPlanInput {
  solver: SolverContext;
  history: readonly HistoryEntry[];
  decision: SecurityDecision;
  stepIndex: number;
  deadline: Deadline;
  meter?: UsageMeter;
}

const DEFAULT_SYSTEM_PROMPT = [
  "You are the solver of a company assistant for HR and project questions.",
  "Work in small steps. Each reply is exactly one step: either one tool call, or the final answer.",
  "Objects in the task are tagged as {kind:id}; use those ids directly.",
  "Only call tools from the list, with arguments matching their signature.",
  "If a lookup finds nothing, try another identifier or search once before giving up with outcome ok_not_found.",
  "If the request is ambiguous, finish with outcome none_clarification_needed. If it asks for something the tools cannot do, finish with none_unsupported.",
  "Attach links only for records the answer is about.",
  "Reply with a single JSON object:",
  '{"previousStepError"?: string, "rationale": string, "plan": string[], "taskCompleted": boolean,',
  ' "toolCall": {"tool": string, "arguments": object} | null,',
  ' "answer": {"outcome": string, "message": string, "links": [{"type": string, "id": string}]} | null}',
].join("\n");

/**
 * Extends the base step shape with registry checks: the tool must be
 * registered and its arguments must pass the tool's own input schema.
 */
export function createStepSchema(
  registry: ToolRegistry
): ZodType<Step, ZodTypeDef, unknown> {
  return StepSchema.superRefine((step, ctx) => {
    if (!step.toolCall) {
      return;
    }
    const tool = registry.get(step.toolCall.tool);
    if (!tool) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["toolCall", "tool"],
        message: `Tool ${step.toolCall.tool} is not available`,
      });
      return;
    }
    const args = tool.inputSchema.safeParse(step.toolCall.arguments);
    if (!args.success) {
      args.error.issues.forEach((issue) => {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["toolCall", "arguments", ...issue.path],
          message: issue.message,
        });
      });
    }
  });
}

export class StepPlanner {
  private readonly contextManager: ContextManager;

  private readonly systemPrompt: string;

  private readonly schema: ZodType<Step, ZodTypeDef, unknown>;

  private readonly logger: Logger;

  constructor(private readonly options: StepPlannerOptions) {
    this.contextManager =
      options.contextManager ?? new DefaultContextManager();
    this.systemPrompt = options.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;
    this.schema = createStepSchema(options.toolRegistry);
    this.logger = options.logger ?? console;
  }

  async plan(input: StepPlanInput): Promise<Step> {
    const { config, toolRegistry } = this.options;
    const planningContext = await this.contextManager.preparePlanningContext({
      solver: input.solver,
      history: input.history,
      decision: input.decision,
      stepIndex: input.stepIndex,
      maxSteps: config.maxSteps,
    });
    const contextText = this.contextManager.formatPlanningContext(
      planningContext,
      { tools: toolRegistry.list().map(describeTool) }
    );

    const step = await callWithRetries({
      model: this.options.model,
      request: {
        purpose: "step",
        schema: this.schema,
        temperature: 0,
        messages: [
          { role: "system", content: this.systemPrompt },
          { role: "user", content: contextText },
        ],
      },
      policy: {
        maxSchemaRetries: config.maxSchemaRetries,
        maxTransportRetries: config.maxTransportRetries,
        retryBackoffMs: config.retryBackoffMs,
      },
      deadline: input.deadline,
      stage: "executor",
      logger: this.logger,
      ...(input.meter ? { meter: input.meter } : {}),
    });

    this.logger.info("[StepPlanner] Step accepted", {
      stepIndex: input.stepIndex,
      taskCompleted: step.taskCompleted,
      tool: step.toolCall?.tool ?? null,
      rationale: step.rationale,
    });
    return step;
  }
}
