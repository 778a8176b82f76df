import path from "node:path";
import {
  loadAgentConfig,
  type AgentConfig,
  type AgentConfigInput,
} from "../config/agentConfig.js";
import { AgentPipeline } from "../core/AgentPipeline.js";
import {
  scripted,
  ScriptedModel,
  type ScriptedReply,
} from "../llm/ScriptedModel.js";
import { InMemoryPlatform } from "../platform/InMemoryPlatform.js";
import {
  loadReferenceData,
  type ReferenceData,
} from "../platform/referenceData.js";
import { RulebookStore } from "../security/PolicyRulebook.js";
import { MemoryTelemetrySink } from "../telemetry/TelemetrySink.js";
import type {
  Link,
  Logger,
  OutcomeKind,
  SecurityDecision,
  Task,
  ToolName,
} from "../types/index.js";

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
};

export function testConfig(overrides: AgentConfigInput = {}): AgentConfig {
  return loadAgentConfig(
    {},
    { retryBackoffMs: 0, taskTimeoutMs: 5_000, ...overrides }
  );
}

export async function loadDemoPlatform(
  config: AgentConfig = testConfig()
): Promise<InMemoryPlatform> {
  return InMemoryPlatform.fromFile(path.join(config.dataDir, "demo-company.json"));
}

export interface TestWorld {
  config: AgentConfig;
  platform: InMemoryPlatform;
  reference: ReferenceData;
  rulebook: RulebookStore;
  model: ScriptedModel;
  telemetry: MemoryTelemetrySink;
  pipeline: AgentPipeline;
}

/** 基于演示公司数据的一整套流水线，模型由脚本驱动 */
export async function createWorld(
  overrides: AgentConfigInput = {}
): Promise<TestWorld> {
  const config = testConfig(overrides);
  const platform = await loadDemoPlatform(config);
  const reference = await loadReferenceData(config.dataDir);
  const rulebook = await RulebookStore.load(config.rulebookPath);
  const model = new ScriptedModel();
  const telemetry = new MemoryTelemetrySink();
  const pipeline = new AgentPipeline({
    config,
    platform,
    reference,
    rulebook,
    model,
    telemetry,
    logger: silentLogger,
  });
  return { config, platform, reference, rulebook, model, telemetry, pipeline };
}

export function inbound(
  taskId: string,
  text: string,
  callerId = "emp_marco_bianchi"
) {
  const isPublic = callerId === "guest";
  return {
    task_id: taskId,
    text,
    caller_id: callerId,
    caller_is_public: isPublic,
  };
}

export function makeTask(
  text: string,
  callerId = "emp_marco_bianchi",
  callerIsPublic = false
): Task {
  return {
    taskId: "task-1",
    text,
    callerId,
    callerIsPublic,
    createdAt: 0,
    metadata: {},
  };
}

export function toolStep(
  tool: ToolName,
  args: Record<string, unknown>
): ScriptedReply {
  return scripted.json({
    rationale: `Call ${tool}`,
    plan: [],
    taskCompleted: false,
    toolCall: { tool, arguments: args },
    answer: null,
  });
}

export function answerStep(
  outcome: OutcomeKind,
  message: string,
  links: Link[] = []
): ScriptedReply {
  return scripted.json({
    rationale: "The answer is known",
    plan: [],
    taskCompleted: true,
    toolCall: null,
    answer: { outcome, message, links },
  });
}

export function allowDecision(
  overrides: Partial<SecurityDecision> = {}
): SecurityDecision {
  return {
    verdict: "allow",
    reason: "No rule restricts directory.read",
    concerns: false,
    matchedRules: [],
    actions: ["directory.read"],
    entitiesToChange: [],
    grantedFields: [],
    grantedTargets: "any",
    ...overrides,
  };
}
