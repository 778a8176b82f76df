import { DeadlineExceededError } from "../errors/PipelineError.js";
import type { PipelineStage } from "../types/index.js";

/**
 * Overall wall-clock budget of one task. Every suspending call is raced
 * against it; `signal` is handed to calls that can abort themselves.
 */
export class Deadline {
  public readonly expiresAt: number;

  private readonly controller = new AbortController();

  private readonly timer: NodeJS.Timeout;

  constructor(
    public readonly budgetMs: number,
    private readonly now: () => number = Date.now
  ) {
    this.expiresAt = now() + budgetMs;
    this.timer = setTimeout(() => this.controller.abort(), budgetMs);
    this.timer.unref();
  }

  public get signal(): AbortSignal {
    return this.controller.signal;
  }

  public get expired(): boolean {
    return this.controller.signal.aborted || this.now() >= this.expiresAt;
  }

  public check(stage: PipelineStage): void {
    if (this.expired) {
      throw new DeadlineExceededError(stage, this.budgetMs);
    }
  }

  public race<T>(work: Promise<T>, stage: PipelineStage): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const onAbort = () =>
        reject(new DeadlineExceededError(stage, this.budgetMs));
      if (this.expired) {
        onAbort();
      } else {
        this.signal.addEventListener("abort", onAbort, { once: true });
      }
      work.then(
        (value) => {
          this.signal.removeEventListener("abort", onAbort);
          resolve(value);
        },
        (error: unknown) => {
          this.signal.removeEventListener("abort", onAbort);
          reject(error);
        }
      );
    });
  }

  public dispose(): void {
    clearTimeout(this.timer);
  }
}
