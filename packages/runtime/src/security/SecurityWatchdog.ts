import { z } from "zod";
import type { AgentConfig } from "../config/agentConfig.js";
import type { Deadline } from "../core/Deadline.js";
import { callWithRetries } from "../llm/callWithRetries.js";
import type { StructuredModel } from "../llm/StructuredModel.js";
import type { UsageMeter } from "../llm/UsageMeter.js";
import type {
  ActionCategory,
  EntityKind,
  GrantedTargets,
  Logger,
  PolicyRule,
  RuleCondition,
  RuleEffect,
  SecurityContext,
  SecurityDecision,
} from "../types/index.js";
import type { PolicyRulebook, RulebookStore } from "./PolicyRulebook.js";

export interface SecurityWatchdogOptions {
  rulebook: RulebookStore;
  model: StructuredModel;
  config: AgentConfig;
  logger?: Logger;
}

/**
 * Policy gate in front of every data-touching action. It reads the
 * security view only: the solver view is not part of its signature.
 */
export class SecurityWatchdog {
  private readonly logger: Logger;

  constructor(private readonly options: SecurityWatchdogOptions) {
    this.logger = options.logger ?? console;
  }

  public async evaluate(
    security: SecurityContext,
    deadline: Deadline,
    meter?: UsageMeter
  ): Promise<SecurityDecision> {
    // 同一任务内使用同一份规则，避免中途被替换
    const rulebook = this.options.rulebook.current();
    const actions = await this.classify(security, rulebook, deadline, meter);
    const decision = decide(security, rulebook, actions);
    this.logger.info("[SecurityWatchdog] Decision", {
      requester: security.requester,
      rulebook: rulebook.version,
      actions,
      verdict: decision.verdict,
      matchedRules: decision.matchedRules,
      concerns: decision.concerns,
    });
    return decision;
  }

  public async classify(
    security: SecurityContext,
    rulebook: PolicyRulebook,
    deadline: Deadline,
    meter?: UsageMeter
  ): Promise<string[]> {
    const categories = rulebook.listCategories();
    const byKeyword = classifyByKeywords(security.taggedText, categories);
    if (byKeyword.length > 0) {
      return byKeyword;
    }

    const ids = categories.map((category) => category.id);
    const schema = z
      .object({
        categories: z.array(z.string()).max(ids.length),
        reason: z.string().optional(),
      })
      .superRefine((value, ctx) => {
        value.categories.forEach((id, position) => {
          if (!ids.includes(id)) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: ["categories", position],
              message: `Unknown action category ${id}`,
            });
          }
        });
      });

    const { config } = this.options;
    const answer = await callWithRetries({
      model: this.options.model,
      request: {
        purpose: "watchdog",
        schema,
        temperature: 0,
        messages: [
          {
            role: "system",
            content: [
              "Classify a workplace request into the action categories it would perform.",
              "Pick only from the list. Pick none if the request touches no company data.",
              'Reply with JSON: {"categories": string[], "reason": string}',
              "Categories:",
              ...categories.map(
                (category) => `- ${category.id}: ${category.description}`
              ),
            ].join("\n"),
          },
          {
            role: "user",
            content: `Requester: ${security.requester}\nRequest: ${security.taggedText}`,
          },
        ],
      },
      policy: {
        maxSchemaRetries: config.maxSchemaRetries,
        maxTransportRetries: config.maxTransportRetries,
        retryBackoffMs: config.retryBackoffMs,
      },
      deadline,
      stage: "watchdog",
      logger: this.logger,
      ...(meter ? { meter } : {}),
    });
    return Array.from(new Set(answer.categories));
  }
}

export function classifyByKeywords(
  text: string,
  categories: ActionCategory[]
): string[] {
  const lower = text.toLowerCase();
  return categories
    .filter((category) =>
      category.keywords.some((keyword) => containsPhrase(lower, keyword.toLowerCase()))
    )
    .map((category) => category.id);
}

function containsPhrase(text: string, phrase: string): boolean {
  const escaped = phrase.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  return new RegExp(`(^|[^\\p{L}\\p{N}])${escaped}($|[^\\p{L}\\p{N}])`, "u").test(
    text
  );
}

/**
 * Evaluates the closed set of rule conditions against the security view.
 * A target condition holds only if it holds for every target of that kind.
 */
export function evaluateConditions(
  security: SecurityContext
): Set<RuleCondition> {
  const conditions = new Set<RuleCondition>();
  const caller = security.caller.employee;
  if (!caller) {
    return conditions;
  }
  const employees = security.targets.flatMap((target) =>
    target.employee ? [target.employee] : []
  );
  const projects = security.targets.filter((target) => target.kind === "project");

  if (caller.isExecutive) {
    conditions.add("caller_is_executive");
  }
  if (
    employees.length > 0
      ? employees.every((target) => target.id === caller.id)
      : security.isAboutCaller && security.unresolved.length === 0
  ) {
    conditions.add("target_is_self");
  }
  if (
    employees.length > 0 &&
    employees.every((target) => target.managerChain.includes(caller.id))
  ) {
    conditions.add("caller_manages_target");
  }
  if (
    employees.length > 0 &&
    employees.every((target) => target.department === caller.department)
  ) {
    conditions.add("caller_in_target_department");
  }
  if (
    projects.length > 0 &&
    projects.every((target) => (target.projectLeads ?? []).includes(caller.id))
  ) {
    conditions.add("caller_leads_target_project");
  }
  return conditions;
}

export function decide(
  security: SecurityContext,
  rulebook: PolicyRulebook,
  actions: string[]
): SecurityDecision {
  const isGuest = security.caller.kind === "guest";
  const fallback: RuleEffect = isGuest ? "deny" : "allow";

  if (actions.length === 0) {
    return {
      verdict: fallback === "deny" ? "deny" : "allow",
      reason: isGuest
        ? "Guests may only ask about public company information"
        : "No restricted action detected",
      concerns: false,
      matchedRules: [],
      actions,
      entitiesToChange: [],
      grantedFields: [],
      grantedTargets: [],
    };
  }

  const conditions = evaluateConditions(security);
  const results = actions.map((action) => ({
    action,
    ...rulebook.decide(
      {
        action,
        roles: security.caller.roles,
        department: security.caller.department,
        conditions,
      },
      fallback
    ),
  }));

  const matchedRules = results.flatMap((result) =>
    result.rule ? [result.rule.id] : []
  );
  const denied = results.find((result) => result.effect === "deny");
  const unclear = results.find(
    (result) => result.effect === "needs_clarification"
  );
  const concerns = results.filter(
    (result) => result.effect === "allow_with_concerns"
  );

  if (denied || unclear) {
    const blocking = denied ?? unclear;
    return {
      verdict: denied ? "deny" : "needs_clarification",
      reason: blocking?.reason ?? "Request blocked by policy",
      concerns: concerns.length > 0,
      matchedRules,
      actions,
      entitiesToChange: [],
      grantedFields: [],
      grantedTargets: [],
    };
  }

  const allowedCategories = actions.flatMap((action) => {
    const category = rulebook.category(action);
    return category ? [category] : [];
  });
  const entitiesToChange = Array.from(
    new Set(
      allowedCategories.flatMap((category): EntityKind[] =>
        category.mutates ? [category.mutates] : []
      )
    )
  );
  const grantedFields = Array.from(
    new Set(allowedCategories.flatMap((category) => category.fields))
  );
  const grantedTargets = mergeScopes(
    results.flatMap((result) => {
      const category = rulebook.category(result.action);
      if (!category || (category.fields.length === 0 && !category.mutates)) {
        return [];
      }
      return [targetScope(security, result.rule)];
    })
  );

  return {
    verdict: "allow",
    reason:
      concerns.length > 0
        ? concerns.map((result) => result.reason).join("; ")
        : results.map((result) => result.reason).join("; "),
    concerns: concerns.length > 0,
    matchedRules,
    actions,
    entitiesToChange,
    grantedFields,
    grantedTargets,
  };
}

/** 规则凭哪个条件放行，授权就只覆盖满足该条件的对象 */
function targetScope(
  security: SecurityContext,
  rule: PolicyRule | null
): GrantedTargets {
  const caller = security.caller.employee;
  switch (rule?.condition) {
    case "target_is_self":
      return caller ? [caller.id] : [];
    case "caller_manages_target":
    case "caller_in_target_department":
      return security.targets.flatMap((target) =>
        target.employee ? [target.id] : []
      );
    case "caller_leads_target_project":
      return security.targets.flatMap((target) =>
        target.kind === "project" ? [target.id] : []
      );
    default:
      return "any";
  }
}

function mergeScopes(scopes: GrantedTargets[]): GrantedTargets {
  const listed = scopes.filter(
    (scope): scope is string[] => scope !== "any"
  );
  if (listed.length === 0) {
    return "any";
  }
  return Array.from(new Set(listed.flat()));
}
