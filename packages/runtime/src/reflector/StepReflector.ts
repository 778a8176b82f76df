import {
  BackendError,
  RepeatedToolFailureError,
  type PipelineError,
} from "../errors/PipelineError.js";
import type { ToolResult } from "../types/index.js";

export interface FailureStreak {
  /** `${tool}:${kind}`，无连续失败时为 null */
  key: string | null;
  count: number;
}

export type Reflection =
  | { directive: "continue"; streak: FailureStreak }
  | { directive: "abort"; error: PipelineError; streak: FailureStreak };

export const EMPTY_STREAK: FailureStreak = { key: null, count: 0 };

/**
 * Decides what the loop does with one tool result. `not_found` is local
 * and never counts toward the failure streak; backend failures are fatal.
 */
export class StepReflector {
  constructor(private readonly maxConsecutiveFailures: number) {}

  public reflect(result: ToolResult, streak: FailureStreak): Reflection {
    if (result.success) {
      return { directive: "continue", streak: EMPTY_STREAK };
    }

    const { kind, message } = result.error;
    if (kind === "not_found") {
      return { directive: "continue", streak: EMPTY_STREAK };
    }
    if (kind === "backend") {
      return {
        directive: "abort",
        error: new BackendError(
          "executor",
          `Tool ${result.tool} hit a backend failure: ${message}`
        ),
        streak,
      };
    }

    const key = `${result.tool}:${kind}`;
    const next: FailureStreak = {
      key,
      count: streak.key === key ? streak.count + 1 : 1,
    };
    if (next.count >= this.maxConsecutiveFailures) {
      return {
        directive: "abort",
        error: new RepeatedToolFailureError(result.tool, kind, next.count),
        streak: next,
      };
    }
    return { directive: "continue", streak: next };
  }
}
