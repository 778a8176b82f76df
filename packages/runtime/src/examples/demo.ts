import path from "node:path";
import { loadAgentConfig } from "../config/agentConfig.js";
import { AgentPipeline } from "../core/AgentPipeline.js";
import { SessionRunner } from "../core/SessionRunner.js";
import { ChatModelClient } from "../llm/ChatModelClient.js";
import { ChatStructuredModel } from "../llm/StructuredModel.js";
import { InMemoryPlatform } from "../platform/InMemoryPlatform.js";
import { loadReferenceData } from "../platform/referenceData.js";
import { RulebookStore } from "../security/PolicyRulebook.js";
import { JsonlTelemetrySink } from "../telemetry/TelemetrySink.js";

async function main() {
  const config = loadAgentConfig();
  const platform = await InMemoryPlatform.fromFile(
    path.join(config.dataDir, "demo-company.json")
  );
  const pipeline = new AgentPipeline({
    config,
    platform,
    reference: await loadReferenceData(config.dataDir),
    rulebook: await RulebookStore.load(config.rulebookPath),
    model: new ChatStructuredModel(new ChatModelClient({ provider: "deepseek" })),
    ...(config.telemetryFile
      ? { telemetry: new JsonlTelemetrySink(config.telemetryFile) }
      : {}),
  });

  pipeline.eventBus.events().subscribe({
    next: (event) => console.log("Bus event:", event.type, event.payload),
  });

  const runner = new SessionRunner({ pipeline, config });
  const summary = await runner.run([
    {
      task_id: "demo-1",
      text: "Who is the plant manager in Serbia?",
      caller_id: "emp_marco_bianchi",
      caller_is_public: false,
    },
    {
      task_id: "demo-2",
      text: "What is Sara Romano's salary?",
      caller_id: "emp_luca_conti",
      caller_is_public: false,
    },
    {
      task_id: "demo-3",
      text: "Where is your headquarters?",
      caller_id: "guest",
      caller_is_public: true,
    },
  ]);

  // eslint-disable-next-line no-console
  console.log("Session summary:", JSON.stringify(summary, null, 2));
}

main().catch((error) => {
  // eslint-disable-next-line no-console
  console.error(error);
  process.exit(1);
});
