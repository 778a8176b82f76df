import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

export const DEFAULT_DATA_DIR = fileURLToPath(
  new URL("../../data", import.meta.url)
);

const commaList = z
  .union([z.string(), z.array(z.string())])
  .transform((value) =>
    (Array.isArray(value) ? value : value.split(","))
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  );

export const AgentConfigSchema = z
  .object({
    /** 单个任务的整体时间预算（毫秒） */
    taskTimeoutMs: z.coerce.number().int().positive().default(300_000),
    /** 执行循环允许接受的最大步数 */
    maxSteps: z.coerce.number().int().positive().default(10),
    /** 模型输出不符合 schema 时的重试次数 */
    maxSchemaRetries: z.coerce.number().int().nonnegative().default(2),
    /** 同一工具同一错误连续出现的上限 */
    maxConsecutiveFailures: z.coerce.number().int().positive().default(3),
    /** 模型传输错误的重试次数 */
    maxTransportRetries: z.coerce.number().int().nonnegative().default(3),
    /** 线性退避的基数（毫秒） */
    retryBackoffMs: z.coerce.number().int().nonnegative().default(500),
    /** 历史中保持原样的最近条目数 */
    historyKeepRecent: z.coerce.number().int().positive().default(4),
    historyPayloadPreviewChars: z.coerce.number().int().positive().default(400),
    resolverMaxCandidates: z.coerce.number().int().positive().default(10),
    /** 模糊匹配阈值，0-1 */
    resolverFuzzyThreshold: z.coerce.number().min(0).max(1).default(0.6),
    /** 解析模型连续失败多少次后放弃 */
    resolverMaxFailures: z.coerce.number().int().positive().default(3),
    dataDir: z.string().min(1).default(DEFAULT_DATA_DIR),
    rulebookPath: z.string().min(1).optional(),
    telemetryFile: z.string().min(1).optional(),
    /** 只运行这些任务代码（spec_id），为空表示全部 */
    taskCodes: commaList.default([]),
    /** 只运行 ID 或文本包含该字符串的任务 */
    taskNameFilter: z.string().min(1).optional(),
    concurrency: z.coerce.number().int().positive().default(1),
  })
  .strict();

export type AgentConfigInput = z.input<typeof AgentConfigSchema>;

export type AgentConfig = Readonly<
  z.output<typeof AgentConfigSchema> & { rulebookPath: string }
>;

const ENV_KEYS: Record<string, keyof AgentConfigInput> = {
  ORGDESK_TASK_TIMEOUT_MS: "taskTimeoutMs",
  ORGDESK_MAX_STEPS: "maxSteps",
  ORGDESK_MAX_SCHEMA_RETRIES: "maxSchemaRetries",
  ORGDESK_MAX_CONSECUTIVE_FAILURES: "maxConsecutiveFailures",
  ORGDESK_MAX_TRANSPORT_RETRIES: "maxTransportRetries",
  ORGDESK_RETRY_BACKOFF_MS: "retryBackoffMs",
  ORGDESK_HISTORY_KEEP_RECENT: "historyKeepRecent",
  ORGDESK_HISTORY_PREVIEW_CHARS: "historyPayloadPreviewChars",
  ORGDESK_RESOLVER_MAX_CANDIDATES: "resolverMaxCandidates",
  ORGDESK_RESOLVER_FUZZY_THRESHOLD: "resolverFuzzyThreshold",
  ORGDESK_RESOLVER_MAX_FAILURES: "resolverMaxFailures",
  ORGDESK_DATA_DIR: "dataDir",
  ORGDESK_RULEBOOK: "rulebookPath",
  ORGDESK_TELEMETRY_FILE: "telemetryFile",
  ORGDESK_TASK_CODES: "taskCodes",
  ORGDESK_TASK_FILTER: "taskNameFilter",
  ORGDESK_CONCURRENCY: "concurrency",
};

/**
 * Builds the session configuration once: environment first, explicit
 * overrides on top. The result is frozen and handed to every stage.
 */
export function loadAgentConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: AgentConfigInput = {}
): AgentConfig {
  const fromEnv: Record<string, string> = {};
  for (const [envKey, field] of Object.entries(ENV_KEYS)) {
    const value = env[envKey];
    if (typeof value === "string" && value.trim().length > 0) {
      fromEnv[field] = value.trim();
    }
  }

  const parsed = AgentConfigSchema.safeParse({ ...fromEnv, ...overrides });
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid agent configuration: ${details}`);
  }

  const config = parsed.data;
  return Object.freeze({
    ...config,
    rulebookPath:
      config.rulebookPath ?? path.join(config.dataDir, "security_rules.json"),
  });
}
