import type { TokenUsage } from "./ChatModelClient.js";
import type { ModelPurpose } from "./StructuredModel.js";

export interface PurposeUsage {
  calls: number;
  failures: number;
  totalTokens: number;
  durationMs: number;
}

export interface UsageSnapshot extends TokenUsage {
  calls: number;
  failures: number;
  durationMs: number;
  byPurpose: Partial<Record<ModelPurpose, PurposeUsage>>;
}

/**
 * Token and call accounting for a single task.
 */
export class UsageMeter {
  private promptTokens = 0;

  private completionTokens = 0;

  private calls = 0;

  private failures = 0;

  private durationMs = 0;

  private readonly byPurpose = new Map<ModelPurpose, PurposeUsage>();

  public record(
    purpose: ModelPurpose,
    usage: TokenUsage | null,
    durationMs: number
  ): void {
    this.calls += 1;
    this.durationMs += durationMs;
    const bucket = this.bucket(purpose);
    bucket.calls += 1;
    bucket.durationMs += durationMs;
    if (usage) {
      this.promptTokens += usage.promptTokens;
      this.completionTokens += usage.completionTokens;
      bucket.totalTokens += usage.totalTokens;
    } else {
      this.failures += 1;
      bucket.failures += 1;
    }
  }

  public callsFor(purpose: ModelPurpose): number {
    return this.byPurpose.get(purpose)?.calls ?? 0;
  }

  public snapshot(): UsageSnapshot {
    return {
      promptTokens: this.promptTokens,
      completionTokens: this.completionTokens,
      totalTokens: this.promptTokens + this.completionTokens,
      calls: this.calls,
      failures: this.failures,
      durationMs: this.durationMs,
      byPurpose: Object.fromEntries(
        Array.from(this.byPurpose.entries()).map(([purpose, usage]) => [
          purpose,
          { ...usage },
        ])
      ),
    };
  }

  private bucket(purpose: ModelPurpose): PurposeUsage {
    let bucket = this.byPurpose.get(purpose);
    if (!bucket) {
      bucket = { calls: 0, failures: 0, totalTokens: 0, durationMs: 0 };
      this.byPurpose.set(purpose, bucket);
    }
    return bucket;
  }
}
