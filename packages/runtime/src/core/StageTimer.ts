import type { EventBus } from "../event/EventBus.js";
import type { PipelineStage } from "../types/index.js";

/**
 * Times pipeline stages for telemetry and announces them on the bus.
 * A stage measured twice accumulates.
 */
export class StageTimer {
  private readonly durations: Partial<Record<PipelineStage, number>> = {};

  private active: PipelineStage | null = null;

  constructor(
    private readonly eventBus: EventBus,
    private readonly traceId: string,
    private readonly taskId: string,
    private readonly now: () => number = Date.now
  ) {}

  /** 最近一次进入的阶段，用于给未分类的异常定位 */
  public get current(): PipelineStage | null {
    return this.active;
  }

  public async measure<T>(
    stage: PipelineStage,
    work: () => Promise<T>
  ): Promise<T> {
    this.active = stage;
    const startedAt = this.now();
    this.eventBus.publish("stage.started", this.traceId, { stage }, this.taskId);
    let success = false;
    try {
      const result = await work();
      success = true;
      return result;
    } finally {
      const durationMs = this.now() - startedAt;
      this.durations[stage] = (this.durations[stage] ?? 0) + durationMs;
      this.eventBus.publish(
        "stage.completed",
        this.traceId,
        { stage, durationMs, success },
        this.taskId
      );
    }
  }

  public snapshot(): Partial<Record<PipelineStage, number>> {
    return { ...this.durations };
  }
}
