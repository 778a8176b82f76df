import { z } from "zod";

export const OutcomeKindSchema = z.enum([
  "ok_answer", // 已给出答案
  "ok_not_found", // 查询对象不存在
  "denied_security", // 安全策略拒绝
  "none_clarification_needed", // 需要用户澄清
  "none_unsupported", // 系统不支持该操作
  "error_internal", // 内部错误
]);

export const PipelineStatusSchema = z.enum([
  "timeout",
  "rate_limit_exhausted",
  "max_steps_exceeded",
  "server_error",
]);

export const TerminalStatusSchema = z.union([
  OutcomeKindSchema,
  PipelineStatusSchema,
]);

export const LinkTypeSchema = z.enum([
  "employee",
  "customer",
  "project",
  "wiki",
  "location",
  "skill_id",
  "will_id",
]);

export const LinkSchema = z
  .object({
    /** 链接对象类型，供 UI 导航使用 */
    type: LinkTypeSchema,
    /** 被引用对象的稳定 ID */
    id: z.string().min(1),
  })
  .strict();

export const InboundTaskSchema = z
  .object({
    task_id: z.string().min(1),
    text: z.string().min(1),
    /** 员工 ID；访客请求时为 "guest" */
    caller_id: z.string().min(1),
    caller_is_public: z.boolean(),
  })
  .passthrough();

export const OutboundResponseSchema = z
  .object({
    outcome: OutcomeKindSchema,
    message: z.string(),
    links: z.array(LinkSchema),
  })
  .strict();

export const ToolNameSchema = z.enum([
  "employees.search",
  "employees.get",
  "employees.current",
  "employees.update",
  "employees.workload",
  "projects.search",
  "projects.get",
  "projects.leads",
  "projects.updateStatus",
  "projects.updateTeam",
  "customers.search",
  "customers.get",
  "time.log",
  "time.update",
  "time.search",
  "time.summaryByEmployee",
  "wiki.search",
  "wiki.list",
  "wiki.get",
  "wiki.create",
  "wiki.rename",
  "wiki.delete",
]);

export const ToolCallSchema = z
  .object({
    /** 需要调用的工具名，必须来自注册表 */
    tool: ToolNameSchema,
    /** 工具参数，结构由工具自身的 inputSchema 约束 */
    arguments: z.record(z.string(), z.unknown()).default({}),
  })
  .strict();

export const StepAnswerSchema = z
  .object({
    outcome: OutcomeKindSchema,
    /** 面向用户的最终回答，只包含被询问的信息 */
    message: z.string().min(1),
    links: z.array(LinkSchema).max(100).default([]),
  })
  .strict();

/**
 * One decision of the solver loop. `superRefine` in `createStepSchema`
 * adds the registry-specific checks on top of this shape.
 */
export const StepSchema = z
  .object({
    /** 上一步的错误（若有），促使模型显式处理失败 */
    previousStepError: z.string().optional(),
    /** 当前进展与理由 */
    rationale: z.string().min(1),
    /** 剩余计划，仅第一项会被执行 */
    plan: z.array(z.string()).max(10).default([]),
    taskCompleted: z.boolean(),
    toolCall: ToolCallSchema.nullable().default(null),
    answer: StepAnswerSchema.nullable().default(null),
  })
  .strict()
  .superRefine((step, ctx) => {
    if (step.taskCompleted) {
      if (step.toolCall) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["toolCall"],
          message: "A completed step must not carry a tool call",
        });
      }
      if (!step.answer) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["answer"],
          message: "A completed step must carry an answer",
        });
      }
    } else if (!step.toolCall) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["toolCall"],
        message: "An unfinished step must name exactly one tool call",
      });
    }
  });

export const RuleEffectSchema = z.enum([
  "allow",
  "allow_with_concerns",
  "needs_clarification",
  "deny",
]);

export const RuleConditionSchema = z.enum([
  "target_is_self",
  "caller_manages_target",
  "caller_is_executive",
  "caller_leads_target_project",
  "caller_in_target_department",
]);

export const EntityKindSchema = z.enum([
  "employee",
  "customer",
  "project",
  "wiki",
  "location",
  "department",
  "skill",
  "will",
  "timeentry",
]);

export const ActionCategorySchema = z
  .object({
    id: z.string().min(1),
    description: z.string().min(1),
    /** 用于确定性分类的关键词（小写匹配） */
    keywords: z.array(z.string().min(1)).default([]),
    /** 若该动作会修改数据，则声明被修改的实体类型 */
    mutates: EntityKindSchema.optional(),
    /** 允许该动作后才会暴露给 solver 的敏感字段 */
    fields: z.array(z.string().min(1)).default([]),
  })
  .strict();

export const PolicyRuleSchema = z
  .object({
    id: z.string().min(1),
    /** 动作类别 ID，"*" 表示任意动作 */
    action: z.string().min(1),
    effect: RuleEffectSchema,
    callerRole: z.string().min(1).optional(),
    department: z.string().min(1).optional(),
    condition: RuleConditionSchema.optional(),
    reason: z.string().min(1),
  })
  .strict();

export const RulebookSchema = z
  .object({
    version: z.string().min(1),
    categories: z.array(ActionCategorySchema).min(1),
    rules: z.array(PolicyRuleSchema),
  })
  .strict()
  .superRefine((book, ctx) => {
    const ids = new Set(book.categories.map((category) => category.id));
    book.rules.forEach((rule, index) => {
      if (rule.action !== "*" && !ids.has(rule.action)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["rules", index, "action"],
          message: `Rule ${rule.id} references unknown action ${rule.action}`,
        });
      }
    });
  });

export type OutcomeKind = z.infer<typeof OutcomeKindSchema>;
export type PipelineStatus = z.infer<typeof PipelineStatusSchema>;
export type TerminalStatus = z.infer<typeof TerminalStatusSchema>;
export type LinkType = z.infer<typeof LinkTypeSchema>;
export type Link = z.infer<typeof LinkSchema>;
export type InboundTaskRecord = z.infer<typeof InboundTaskSchema>;
export type OutboundResponse = z.infer<typeof OutboundResponseSchema>;
export type ToolName = z.infer<typeof ToolNameSchema>;
export type ToolCall = z.infer<typeof ToolCallSchema>;
export type StepAnswer = z.infer<typeof StepAnswerSchema>;
export type Step = z.infer<typeof StepSchema>;
export type RuleEffect = z.infer<typeof RuleEffectSchema>;
export type RuleCondition = z.infer<typeof RuleConditionSchema>;
export type EntityKind = z.infer<typeof EntityKindSchema>;
export type ActionCategory = z.infer<typeof ActionCategorySchema>;
export type PolicyRule = z.infer<typeof PolicyRuleSchema>;
export type RulebookDocument = z.infer<typeof RulebookSchema>;
