import type { ToolDescriptor } from "../registry/ToolRegistry.js";
import type {
  HistoryEntry,
  SecurityDecision,
  SolverContext,
} from "../types/index.js";

export interface PlanningInput {
  solver: SolverContext;
  history: readonly HistoryEntry[];
  decision: SecurityDecision;
  /** 已接受的步数 */
  stepIndex: number;
  maxSteps: number;
}

export interface PlanningContext {
  /** solver 视图，只包含被授权的数据 */
  solver: SolverContext;
  /** 已按策略压缩的历史，保持时间顺序 */
  history: readonly HistoryEntry[];
  /** 安全决策附带的提醒 */
  concerns: string | null;
  stepIndex: number;
  remainingSteps: number;
}

export interface PlannerContextFormatOptions {
  tools: ToolDescriptor[];
}

export interface ContextManager {
  /** 为规划阶段准备上下文数据 */
  preparePlanningContext(input: PlanningInput): Promise<PlanningContext>;
  /** 将上下文格式化为规划阶段的文本描述 */
  formatPlanningContext(
    planningContext: PlanningContext,
    options: PlannerContextFormatOptions
  ): string;
}
