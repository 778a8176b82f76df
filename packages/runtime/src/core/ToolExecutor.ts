import { nanoid } from "nanoid";
// 执行器：校验并调用工具，把所有失败折叠为带类型的 ToolResult，同时在总线上广播请求/结果事件
import { formatZodIssues } from "../llm/StructuredModel.js";
import { PlatformError } from "../platform/PlatformClient.js";
import { ToolFailure } from "../registry/ToolRegistry.js";
import type {
  GrantedTargets,
  Logger,
  SecurityDecision,
  Task,
  ToolCall,
  ToolError,
  ToolRegistry,
  ToolResult,
} from "../types/index.js";
import type { EventBus } from "../event/EventBus.js";
import type { Deadline } from "./Deadline.js";

/** 这些字段只有在安全决策显式授予后才会出现在工具输出中 */
export const SENSITIVE_FIELDS = ["salary", "notes"] as const;

const ALL_SENSITIVE: ReadonlySet<string> = new Set(SENSITIVE_FIELDS);

export interface ToolExecutorOptions {
  toolRegistry: ToolRegistry;
  eventBus: EventBus;
  logger?: Logger;
}

export interface ToolDispatch {
  task: Task;
  traceId: string;
  callerId: string | null;
  today: string;
  stepIndex: number;
  toolCall: ToolCall;
  decision: SecurityDecision;
  deadline: Deadline;
}

export class ToolExecutor {
  private toolRegistry: ToolRegistry;

  private eventBus: EventBus;

  private logger: Logger;

  constructor(options: ToolExecutorOptions) {
    this.toolRegistry = options.toolRegistry;
    this.eventBus = options.eventBus;
    this.logger = options.logger ?? console;
  }

  /**
   * Never throws for tool-level failures. Only the task deadline
   * escapes as an exception.
   */
  public async execute(dispatch: ToolDispatch): Promise<ToolResult> {
    const { task, toolCall, stepIndex } = dispatch;
    this.eventBus.publish(
      "tool.request",
      dispatch.traceId,
      { tool: toolCall.tool, stepIndex, arguments: toolCall.arguments },
      task.taskId
    );

    const startedAt = Date.now();
    const outcome = await this.invoke(dispatch);
    const latencyMs = Date.now() - startedAt;
    const result: ToolResult =
      "error" in outcome
        ? { success: false, tool: toolCall.tool, error: outcome.error, latencyMs }
        : {
            success: true,
            tool: toolCall.tool,
            output: redact(outcome.output, dispatch.decision),
            latencyMs,
          };

    this.eventBus.publish(
      "tool.result",
      dispatch.traceId,
      {
        tool: toolCall.tool,
        stepIndex,
        success: result.success,
        latencyMs,
        ...(result.success ? {} : { error: result.error }),
      },
      task.taskId
    );
    return result;
  }

  private async invoke(
    dispatch: ToolDispatch
  ): Promise<{ output: unknown } | { error: ToolError }> {
    const { toolCall, decision, deadline } = dispatch;
    const tool = this.toolRegistry.get(toolCall.tool);
    if (!tool) {
      return {
        error: {
          kind: "invalid_arguments",
          message: `Tool ${toolCall.tool} is not registered`,
          parameters: { tool: toolCall.tool },
        },
      };
    }

    if (tool.mutates && !decision.entitiesToChange.includes(tool.entity)) {
      return {
        error: {
          kind: "forbidden",
          message: `This task is not cleared to modify ${tool.entity} records`,
          parameters: { tool: tool.id, entity: tool.entity },
        },
      };
    }

    const params = tool.inputSchema.safeParse(toolCall.arguments);
    if (!params.success) {
      return {
        error: {
          kind: "invalid_arguments",
          message: formatZodIssues(params.error).join("; "),
          parameters: toolCall.arguments,
        },
      };
    }

    const granted = decision.grantedTargets;
    if (tool.mutates && granted !== "any") {
      const subjects = tool.subjects?.(params.data) ?? [];
      const outside = subjects.filter((id) => !granted.includes(id));
      if (subjects.length === 0 || outside.length > 0) {
        return {
          error: {
            kind: "forbidden",
            message:
              outside.length > 0
                ? `This task is not cleared to modify ${outside.join(", ")}`
                : `This task is only cleared to modify ${granted.join(", ") || "no records"}`,
            parameters: { tool: tool.id, granted },
          },
        };
      }
    }

    let output: unknown;
    try {
      output = await deadline.race(
        tool.execute({
          taskId: dispatch.task.taskId,
          traceId: dispatch.traceId,
          params: params.data,
          callerId: dispatch.callerId,
          today: dispatch.today,
        }),
        "executor"
      );
    } catch (error) {
      if (deadline.expired) {
        throw error;
      }
      return { error: toToolError(error, toolCall.arguments) };
    }

    const checked = tool.outputSchema.safeParse(output);
    if (!checked.success) {
      this.logger.warn(`[ToolExecutor] ${tool.id} returned malformed output`, {
        issues: formatZodIssues(checked.error),
      });
      return {
        error: {
          kind: "execution_failed",
          message: `Tool ${tool.id} returned output that does not match its schema`,
          parameters: {},
        },
      };
    }
    return { output: checked.data };
  }
}

export function toToolError(
  error: unknown,
  parameters: Record<string, unknown>
): ToolError {
  if (error instanceof PlatformError) {
    return {
      kind: error.notFound ? "not_found" : "backend",
      message: error.message,
      parameters,
    };
  }
  if (error instanceof ToolFailure) {
    return {
      kind: error.kind,
      message: error.message,
      parameters: { ...parameters, ...error.parameters },
    };
  }
  return {
    kind: "execution_failed",
    message: error instanceof Error ? error.message : String(error),
    parameters,
  };
}

export type GrantScope = Pick<SecurityDecision, "grantedFields" | "grantedTargets">;

function hiddenFields(decision: GrantScope): Set<string> {
  return new Set(
    SENSITIVE_FIELDS.filter((field) => !decision.grantedFields.includes(field))
  );
}

function withinGrant(targets: GrantedTargets, id: string): boolean {
  return targets === "any" || targets.includes(id);
}

/**
 * 递归移除未授权的敏感字段，返回新对象。带 id 的记录若不在授权对象内，
 * 其敏感字段全部移除。
 */
export function redact(value: unknown, decision: GrantScope): unknown {
  const hidden = hiddenFields(decision);
  if (hidden.size === 0 && decision.grantedTargets === "any") {
    return value;
  }
  return redactScoped(value, decision.grantedTargets, hidden, hidden);
}

export function redactRecord(
  record: Record<string, unknown>,
  decision: GrantScope
): Record<string, unknown> {
  const hidden = hiddenFields(decision);
  const id = typeof record.id === "string" ? record.id : null;
  const own =
    id === null || withinGrant(decision.grantedTargets, id) ? hidden : ALL_SENSITIVE;
  return Object.fromEntries(
    Object.entries(record)
      .filter(([key]) => !own.has(key))
      .map(([key, item]) => [
        key,
        redactScoped(item, decision.grantedTargets, hidden, own),
      ])
  );
}

function redactScoped(
  value: unknown,
  targets: GrantedTargets,
  granted: ReadonlySet<string>,
  inherited: ReadonlySet<string>
): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => redactScoped(item, targets, granted, inherited));
  }
  if (value !== null && typeof value === "object") {
    const id = "id" in value ? value.id : undefined;
    let hidden = inherited;
    if (typeof id === "string") {
      hidden = withinGrant(targets, id) ? granted : ALL_SENSITIVE;
    }
    return Object.fromEntries(
      Object.entries(value)
        .filter(([key]) => !hidden.has(key))
        .map(([key, item]) => [key, redactScoped(item, targets, granted, hidden)])
    );
  }
  return value;
}
