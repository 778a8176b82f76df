import { appendFile, mkdir } from "node:fs/promises";
import path from "node:path";
import type { UsageSnapshot } from "../llm/UsageMeter.js";
import type {
  OutcomeKind,
  PipelineStage,
  TerminalStatus,
} from "../types/index.js";

export interface TelemetryRecord {
  taskId: string;
  status: TerminalStatus;
  outcome: OutcomeKind;
  /** 各阶段耗时（毫秒） */
  stages: Partial<Record<PipelineStage, number>>;
  usage: UsageSnapshot | null;
  steps: number;
  durationMs: number;
  finishedAt: string;
  /** 内部失败原因，仅用于离线分析 */
  error?: { stage?: PipelineStage; message: string };
}

export interface TelemetrySink {
  record(record: TelemetryRecord): Promise<void>;
}

/** One JSON line per finalized task. */
export class JsonlTelemetrySink implements TelemetrySink {
  private ready: Promise<unknown> | null = null;

  constructor(private readonly filePath: string) {}

  public async record(record: TelemetryRecord): Promise<void> {
    if (!this.ready) {
      // 失败后清空，下一条记录重新创建目录
      this.ready = mkdir(path.dirname(this.filePath), { recursive: true }).catch(
        (error: unknown) => {
          this.ready = null;
          throw error;
        }
      );
    }
    await this.ready;
    await appendFile(this.filePath, `${JSON.stringify(record)}\n`, "utf8");
  }
}

export class MemoryTelemetrySink implements TelemetrySink {
  public readonly records: TelemetryRecord[] = [];

  public async record(record: TelemetryRecord): Promise<void> {
    this.records.push(record);
  }
}
