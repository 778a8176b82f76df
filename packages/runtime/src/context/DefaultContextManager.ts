import type { HistoryEntry } from "../types/index.js";
import type {
  ContextManager,
  PlannerContextFormatOptions,
  PlanningContext,
  PlanningInput,
} from "./DefaultContextManager.interface.js";

export interface DefaultContextManagerOptions {
  /**
   * 单条原样历史中工具输出的最大字符数，超出部分截断。
   * 压缩后的摘要已经有自己的长度上限。
   */
  maxVerbatimOutputChars?: number;
}

/**
 * DefaultContextManager 负责把 solver 视图与历史转换为规划模型看到的文本。
 * 它只读取 solver 视图，不接触安全视图。
 */
export class DefaultContextManager implements ContextManager {
  private readonly maxVerbatimOutputChars: number;

  constructor(options?: DefaultContextManagerOptions) {
    this.maxVerbatimOutputChars = options?.maxVerbatimOutputChars ?? 4_000;
  }

  async preparePlanningContext(input: PlanningInput): Promise<PlanningContext> {
    return {
      solver: input.solver,
      history: input.history,
      concerns: input.decision.concerns ? input.decision.reason : null,
      stepIndex: input.stepIndex,
      remainingSteps: Math.max(0, input.maxSteps - input.stepIndex),
    };
  }

  formatPlanningContext(
    planningContext: PlanningContext,
    options: PlannerContextFormatOptions
  ): string {
    const { solver, history } = planningContext;
    const toolLines = options.tools.map(
      (tool) =>
        `- ${tool.name}${tool.mutates ? " (modifies data)" : ""}: ${
          tool.description
        }\n  arguments: ${tool.arguments}`
    );

    const sections = [
      `Today: ${solver.today}`,
      `Task: ${solver.taggedText}`,
      solver.caller
        ? `Requester (the task refers to them): ${JSON.stringify(solver.caller)}`
        : null,
      solver.objects.length > 0
        ? `Known objects:\n${solver.objects
            .map(
              (object) =>
                `- {${object.kind}:${object.id}} ${JSON.stringify(object.record)}`
            )
            .join("\n")}`
        : null,
      solver.unresolved.length > 0
        ? `Mentions not matched to any record (search for them): ${solver.unresolved.join(", ")}`
        : null,
      planningContext.concerns
        ? `Security note: ${planningContext.concerns}`
        : null,
      `Available tools:\n${toolLines.join("\n")}`,
      history.length > 0
        ? `History (oldest first):\n${history
            .map((entry) => this.formatEntry(entry))
            .join("\n")}`
        : "History: none yet",
      `Steps used: ${planningContext.stepIndex}; steps left: ${planningContext.remainingSteps}`,
    ];

    return sections.filter((section): section is string => Boolean(section)).join("\n\n");
  }

  private formatEntry(entry: HistoryEntry): string {
    if (entry.kind === "summary") {
      const status = entry.success ? "ok" : `failed (${entry.errorKind ?? "error"})`;
      return `#${entry.index} ${entry.tool} ${status} [summarized]: ${entry.preview}`;
    }
    const { step, result } = entry;
    const call = step.toolCall
      ? `${step.toolCall.tool} ${JSON.stringify(step.toolCall.arguments)}`
      : "no tool";
    const body = result.success
      ? JSON.stringify(result.output)
      : JSON.stringify(result.error);
    const clipped =
      body.length > this.maxVerbatimOutputChars
        ? `${body.slice(0, this.maxVerbatimOutputChars)}…`
        : body;
    return `#${entry.index} ${call} -> ${result.success ? "ok" : "failed"}: ${clipped}`;
  }
}
