import type { History } from "../context/HistoryCompressor.js";
import type { Deadline } from "../core/Deadline.js";
import type { PipelineError } from "../errors/PipelineError.js";
import type { UsageMeter } from "../llm/UsageMeter.js";
import type { FailureStreak } from "../reflector/StepReflector.js";
import type {
  SecurityDecision,
  SolverContext,
  Step,
  StepAnswer,
  Task,
  ToolResult,
} from "../types/index.js";

export interface StepMachineInput {
  task: Task;
  /** 同一任务内共享的链路 ID */
  traceId: string;
  /** 已按安全决策裁剪过的 solver 视图 */
  solver: SolverContext;
  decision: SecurityDecision;
  callerId: string | null;
  deadline: Deadline;
  /** 可变的历史缓冲，由 observing 状态追加并压缩 */
  history: History;
  meter?: UsageMeter;
}

export interface StepMachineContext extends StepMachineInput {
  /** 已接受的步数 */
  stepIndex: number;
  /** 最近一次被接受的步骤 */
  currentStep: Step | null;
  /** 最近一次工具执行结果，供 observing 使用 */
  lastResult: ToolResult | null;
  /** 同一工具同一错误的连续失败计数 */
  streak: FailureStreak;
  /** taskCompleted 时模型给出的回答 */
  answer: StepAnswer | null;
  /** 进入 aborted 的原因 */
  failure: PipelineError | null;
}

export interface StepServiceInput {
  context: StepMachineContext;
}
