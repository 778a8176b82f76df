import { readFile } from "node:fs/promises";
import { formatZodIssues } from "../llm/StructuredModel.js";
import {
  RulebookSchema,
  type ActionCategory,
  type PolicyRule,
  type RuleCondition,
  type RuleEffect,
  type RulebookDocument,
} from "../types/index.js";

export interface RuleQuery {
  action: string;
  roles: readonly string[];
  department: string | null;
  /** 仅对规则中出现的条件求值 */
  conditions: ReadonlySet<RuleCondition>;
}

export interface RuleDecision {
  effect: RuleEffect;
  rule: PolicyRule | null;
  reason: string;
}

const EFFECT_RANK: Record<RuleEffect, number> = {
  deny: 3,
  needs_clarification: 2,
  allow_with_concerns: 1,
  allow: 0,
};

export function ruleSpecificity(rule: PolicyRule): number {
  return (
    (rule.callerRole ? 1 : 0) + (rule.department ? 1 : 0) + (rule.condition ? 1 : 0)
  );
}

/**
 * An immutable, validated rulebook. Lookup is most-specific-wins; at
 * equal specificity the stricter effect wins, then declaration order.
 */
export class PolicyRulebook {
  public readonly version: string;

  private readonly categories: ReadonlyMap<string, ActionCategory>;

  private readonly rules: readonly PolicyRule[];

  constructor(document: RulebookDocument) {
    this.version = document.version;
    this.categories = new Map(
      document.categories.map((category) => [category.id, category])
    );
    this.rules = Object.freeze([...document.rules]);
  }

  public static parse(value: unknown): PolicyRulebook {
    const parsed = RulebookSchema.safeParse(value);
    if (!parsed.success) {
      throw new Error(
        `Invalid policy rulebook: ${formatZodIssues(parsed.error).join("; ")}`
      );
    }
    return new PolicyRulebook(parsed.data);
  }

  public listCategories(): ActionCategory[] {
    return Array.from(this.categories.values());
  }

  public category(id: string): ActionCategory | undefined {
    return this.categories.get(id);
  }

  public decide(query: RuleQuery, fallback: RuleEffect): RuleDecision {
    let best: PolicyRule | null = null;
    let bestSpecificity = -1;
    for (const rule of this.rules) {
      if (!matches(rule, query)) continue;
      const specificity = ruleSpecificity(rule);
      if (
        !best ||
        specificity > bestSpecificity ||
        (specificity === bestSpecificity &&
          EFFECT_RANK[rule.effect] > EFFECT_RANK[best.effect])
      ) {
        best = rule;
        bestSpecificity = specificity;
      }
    }
    if (!best) {
      return {
        effect: fallback,
        rule: null,
        reason:
          fallback === "deny"
            ? `No rule allows ${query.action} for this caller`
            : `No rule restricts ${query.action}`,
      };
    }
    return { effect: best.effect, rule: best, reason: best.reason };
  }
}

function matches(rule: PolicyRule, query: RuleQuery): boolean {
  if (rule.action !== "*" && rule.action !== query.action) return false;
  if (rule.callerRole && !query.roles.includes(rule.callerRole)) return false;
  if (rule.department && rule.department !== query.department) return false;
  if (rule.condition && !query.conditions.has(rule.condition)) return false;
  return true;
}

/**
 * Process-wide holder of the current rulebook. Reads are lock-free;
 * a reload swaps the whole rulebook in one assignment.
 */
export class RulebookStore {
  private currentBook: PolicyRulebook;

  constructor(initial: PolicyRulebook) {
    this.currentBook = initial;
  }

  public static async load(filePath: string): Promise<RulebookStore> {
    return new RulebookStore(await readRulebook(filePath));
  }

  public current(): PolicyRulebook {
    return this.currentBook;
  }

  public replace(next: PolicyRulebook): PolicyRulebook {
    const previous = this.currentBook;
    this.currentBook = next;
    return previous;
  }

  public async reload(filePath: string): Promise<PolicyRulebook> {
    const next = await readRulebook(filePath);
    this.replace(next);
    return next;
  }
}

export async function readRulebook(filePath: string): Promise<PolicyRulebook> {
  const raw = await readFile(filePath, "utf8");
  return PolicyRulebook.parse(JSON.parse(raw));
}
