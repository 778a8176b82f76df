import type { ZodType, ZodTypeDef } from "zod";
import type { UsageSnapshot } from "../llm/UsageMeter.js";
import type {
  EntityKind,
  Link,
  OutcomeKind,
  Step,
  StepAnswer,
  TerminalStatus,
  ToolName,
} from "./schemas.js";

export {
  ActionCategorySchema,
  EntityKindSchema,
  InboundTaskSchema,
  LinkSchema,
  LinkTypeSchema,
  OutboundResponseSchema,
  OutcomeKindSchema,
  PipelineStatusSchema,
  PolicyRuleSchema,
  RuleConditionSchema,
  RuleEffectSchema,
  RulebookSchema,
  StepAnswerSchema,
  StepSchema,
  TerminalStatusSchema,
  ToolCallSchema,
  ToolNameSchema,
} from "./schemas.js";

export type {
  ActionCategory,
  EntityKind,
  InboundTaskRecord,
  Link,
  LinkType,
  OutboundResponse,
  OutcomeKind,
  PipelineStatus,
  PolicyRule,
  RuleCondition,
  RuleEffect,
  RulebookDocument,
  Step,
  StepAnswer,
  TerminalStatus,
  ToolCall,
  ToolName,
} from "./schemas.js";

export type CallerKind = "employee" | "guest";

export type PipelineStage =
  | "intake"
  | "context"
  | "guest"
  | "resolver"
  | "watchdog"
  | "executor"
  | "finalizer";

export interface Task {
  /** 平台下发的任务 ID */
  taskId: string;
  /** 用户原始问题 */
  text: string;
  /** 员工 ID，访客为 "guest" */
  callerId: string;
  callerIsPublic: boolean;
  /** 接收时间戳（毫秒） */
  createdAt: number;
  /** 平台附带的其它字段，原样透传 */
  metadata: Record<string, unknown>;
}

export interface ProjectMembership {
  projectId: string;
  role: string;
}

export interface EmployeeSecurityView {
  id: string;
  name: string;
  department: string;
  location: string;
  isExecutive: boolean;
  /** 所在部门是否属于一线运营（工厂、仓库等） */
  isOperational: boolean;
  /** 自下而上的汇报链，不含本人 */
  managerChain: string[];
  projects: ProjectMembership[];
}

export interface SecurityTarget {
  kind: EntityKind;
  id: string;
  /** 仅当 kind 为 employee 时存在 */
  employee?: EmployeeSecurityView;
  /** 仅当 kind 为 project 时存在 */
  projectLeads?: string[];
  projectTeam?: string[];
  /** 客户的客户经理 */
  accountManagerId?: string | null;
}

export interface SecurityCaller {
  kind: CallerKind;
  employee: EmployeeSecurityView | null;
  /** "employee"/"executive"/"guest" 加上显式权限 */
  roles: string[];
  department: string | null;
  permissions: string[];
}

/**
 * Minimal projection read by the watchdog. Nothing here may be derived
 * from records the caller is not yet cleared to see.
 */
export interface SecurityContext {
  /** 请求者描述，如 "{employee:emp_x} (Sales)" 或 "public guest" */
  requester: string;
  /** 带 {kind:id} 标记的任务文本 */
  taggedText: string;
  caller: SecurityCaller;
  targets: SecurityTarget[];
  isAboutCaller: boolean;
  /** 未能解析的提及原文；存在时不能断定任务只涉及调用者本人 */
  unresolved: string[];
}

export interface SolverObject {
  kind: EntityKind;
  id: string;
  record: Record<string, unknown>;
}

export interface SolverContext {
  /** 带 {kind:id} 标记的任务文本 */
  taggedText: string;
  today: string;
  /** 仅当任务与调用者本人相关时存在 */
  caller: Record<string, unknown> | null;
  objects: SolverObject[];
  /** 未能解析的提及，作为提示交给 solver */
  unresolved: string[];
  wikiVersion: string | null;
}

export type MatchLevel = "id" | "exact" | "partial" | "fuzzy";

export interface TextSpan {
  start: number;
  end: number;
}

export interface EntityCandidate {
  kind: EntityKind;
  id: string;
  name: string;
  /** 0-100 */
  score: number;
  level: MatchLevel;
}

export interface ResolvedEntity {
  mention: string;
  kind: EntityKind;
  id: string;
  name: string;
  score: number;
  via: MatchLevel | "model";
  spans: TextSpan[];
}

export interface UnresolvedMention {
  mention: string;
  reason: "no_match" | "ambiguous" | "declined";
  candidates: EntityCandidate[];
  spans: TextSpan[];
}

export interface ClarificationMarker {
  mentions: string[];
  message: string;
}

export interface ResolutionResult {
  entities: ResolvedEntity[];
  unresolved: UnresolvedMention[];
  clarification: ClarificationMarker | null;
  isAboutCaller: boolean;
  modelCalls: number;
}

export interface TaskContext {
  task: Task;
  callerKind: CallerKind;
  /** 员工调用者的完整记录，访客为 null */
  identity: Record<string, unknown> | null;
  today: string;
  entities: ResolvedEntity[];
  unresolved: UnresolvedMention[];
  clarification: ClarificationMarker | null;
  isAboutCaller: boolean;
  securityContext: SecurityContext;
  solverContext: SolverContext;
}

export type SecurityVerdict = "allow" | "deny" | "needs_clarification";

/** "any" 表示不限对象，否则为允许读取敏感字段或修改的记录 ID */
export type GrantedTargets = "any" | string[];

export interface SecurityDecision {
  verdict: SecurityVerdict;
  reason: string;
  /** allow_with_concerns 命中时为 true */
  concerns: boolean;
  matchedRules: string[];
  actions: string[];
  /** 允许被修改的实体类型 */
  entitiesToChange: EntityKind[];
  /** 允许暴露给 solver 的敏感字段 */
  grantedFields: string[];
  grantedTargets: GrantedTargets;
}

export type ToolErrorKind =
  | "not_found"
  | "invalid_arguments"
  | "forbidden"
  | "conflict"
  | "execution_failed"
  | "backend";

export interface ToolError {
  kind: ToolErrorKind;
  message: string;
  /** 触发错误的参数，便于模型修正 */
  parameters: Record<string, unknown>;
}

export type ToolResult =
  | {
      success: true;
      tool: ToolName;
      output: unknown;
      latencyMs: number;
    }
  | {
      success: false;
      tool: ToolName;
      error: ToolError;
      latencyMs: number;
    };

export interface ToolInput<I> {
  taskId: string;
  traceId: string;
  /** 已通过 inputSchema 校验的参数 */
  params: I;
  callerId: string | null;
  today: string;
}

export interface ToolAdapter<I = unknown, O = unknown> {
  id: ToolName;
  description: string;
  inputSchema: ZodType<I, ZodTypeDef, unknown>;
  outputSchema: ZodType<O, ZodTypeDef, unknown>;
  /** 工具读写的实体类型 */
  entity: EntityKind;
  /** 是否修改数据；修改类工具失败后不会被自动重试 */
  mutates: boolean;
  /** 修改类工具将要改动的记录 ID，用于按授权对象限制修改 */
  subjects?(params: I): string[];
  execute(input: ToolInput<I>): Promise<O>;
}

export type AnyToolAdapter = ToolAdapter<unknown, unknown>;

export interface ToolRegistry {
  get(toolId: string): AnyToolAdapter | undefined;
  list(): AnyToolAdapter[];
}

export type HistoryEntry =
  | {
      kind: "verbatim";
      index: number;
      step: Step;
      result: ToolResult;
      recordedAt: number;
    }
  | {
      kind: "summary";
      index: number;
      tool: ToolName;
      success: boolean;
      errorKind?: ToolErrorKind;
      /** 截断后的输出或错误 */
      preview: string;
      recordedAt: number;
    };

export type StepRunResult =
  | {
      status: "completed";
      answer: StepAnswer;
      steps: number;
      history: HistoryEntry[];
    }
  | {
      status: "aborted";
      terminal: TerminalStatus;
      reason: string;
      steps: number;
      history: HistoryEntry[];
    };

export interface PipelineOutcome {
  status: TerminalStatus;
  message?: string;
  links: Link[];
  /** 内部原因，只写日志与遥测，不对外暴露 */
  reason?: string;
  stage?: PipelineStage;
  steps: number;
}

export interface FinalRecord {
  taskId: string;
  status: TerminalStatus;
  outcome: OutcomeKind;
  response: {
    outcome: OutcomeKind;
    message: string;
    links: Link[];
  };
  /** 本任务的模型用量，入口校验失败时为 null */
  usage: UsageSnapshot | null;
  finalizedAt: number;
}

export type Logger = Pick<Console, "info" | "warn" | "error" | "debug">;

export type EventType =
  | "task.received"
  | "stage.started"
  | "stage.completed"
  | "step.planned"
  | "tool.request"
  | "tool.result"
  | "history.compacted"
  | "agent.transition"
  | "task.finalized"
  | "session.finished";

export interface EventPayload {
  [key: string]: unknown;
}

export interface BusEvent {
  eventId: string; // 事件唯一标识
  type: EventType; // 事件类型
  timestamp: number; // 事件发生的时间戳（毫秒）
  traceId: string; // 链路追踪 ID，同一任务内共享
  relatedTaskId?: string; // 可选，关联的任务 ID
  payload: EventPayload; // 事件负载
}
