export * from './types/index.js';
export * from './config/agentConfig.js';
export * from './errors/PipelineError.js';
export * from './event/EventBus.js';
export * from './core/Deadline.js';
export * from './core/ToolExecutor.js';
export * from './core/StepExecutor.js';
export * from './core/StageTimer.js';
export * from './core/TaskFinalizer.js';
export * from './core/AgentPipeline.js';
export * from './core/SessionRunner.js';
export * from './context/ContextBuilder.js';
export * from './context/HistoryCompressor.js';
export * from './context/DefaultContextManager.js';
export * from './context/DefaultContextManager.interface.js';
export * from './resolver/EntityResolver.js';
export * from './resolver/EntityIndex.js';
export * from './security/PolicyRulebook.js';
export * from './security/SecurityWatchdog.js';
export * from './guest/GuestHandler.js';
export * from './planner/StepPlanner.js';
export * from './reflector/StepReflector.js';
export * from './fsm/stepMachine.js';
export * from './llm/ChatModelClient.js';
export * from './llm/StructuredModel.js';
export * from './llm/UsageMeter.js';
export * from './llm/callWithRetries.js';
export * from './llm/ScriptedModel.js';
export * from './platform/PlatformClient.js';
export * from './platform/InMemoryPlatform.js';
export * from './platform/records.js';
export * from './platform/referenceData.js';
export * from './retrieval/KeywordWikiRetriever.js';
export * from './registry/ToolRegistry.js';
export * from './telemetry/TelemetrySink.js';
export * from './tools/index.js';
