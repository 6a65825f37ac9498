// Market Intel — concurrent market-intelligence runs with live event streams
// Registry + orchestrator + stream gateway, with LLM-backed stage agents

export { Orchestrator, DEFAULT_STAGE_TIMEOUT_MS } from './orchestrator/coordinator.js';
export type { OrchestratorConfig } from './orchestrator/coordinator.js';
export { RunRegistry, DEFAULT_RETENTION } from './orchestrator/registry.js';
export type { RetentionPolicy, RunRegistryConfig } from './orchestrator/registry.js';
export { Run } from './orchestrator/run.js';
export { RunLog } from './orchestrator/run-log.js';
export type { RunLogHandler, RunLogNotification } from './orchestrator/run-log.js';
export { createPipeline, defineStage, StageOutputStore } from './orchestrator/pipeline.js';
export type {
  Pipeline, PipelineStage, StageCompletion, StageContext, StageDescriptor, StageInput,
} from './orchestrator/pipeline.js';
export { assembleReport } from './orchestrator/report.js';
export { createMarketAgents, createMarketIntelPipeline } from './orchestrator/stage-factory.js';
export type { MarketAgents, MarketAgentDeps } from './orchestrator/stage-factory.js';
export { MarketIntelService, createServiceFromConfig } from './orchestrator/service.js';
export type { MarketIntelServiceConfig, RunPoll, ServiceOverrides } from './orchestrator/service.js';

export { EventStreamGateway, RunSubscription, terminalEvent, toStreamEvent } from './gateway/event-stream.js';
export {
  SSE_HEADERS, SSE_KEEPALIVE, formatSseEvent, parseSseFrames, resolveFromSequence,
} from './gateway/sse.js';
export type { SseFrame } from './gateway/sse.js';

export { MarketAgent } from './agents/base-agent.js';
export type { AgentContext, StageAgent } from './agents/base-agent.js';
export { DataAgent } from './agents/data-agent.js';
export { TrendAgent } from './agents/trend-agent.js';
export { StrategyAgent } from './agents/strategy-agent.js';
export { RiskAgent } from './agents/risk-agent.js';
export type { RiskInput } from './agents/risk-agent.js';
export { VoiceAgent, buildVoiceBrief } from './agents/voice-agent.js';
export type { VoiceInput } from './agents/voice-agent.js';

// Bridge — external providers behind small interfaces
export { AnthropicChatModel } from './bridge/llm-client.js';
export type { ChatModel, ChatRequest, AnthropicChatConfig } from './bridge/llm-client.js';
export { TavilyNewsClient } from './bridge/news-client.js';
export type { NewsSearch, NewsResult, NewsClientConfig } from './bridge/news-client.js';

export { loadConfig, EnvSchema } from './config/index.js';
export type { Env, MarketIntelConfig } from './config/index.js';

export { createLogger, formatLogLine, isLogLevel } from './utils/logger.js';
export type { Logger, LogLevel, LoggerOptions } from './utils/logger.js';
export { parseJsonOutput, stripCodeFences, UNPARSED_PLACEHOLDER } from './utils/json-output.js';
export { renderReport, formatTimestamp } from './utils/report-renderer.js';

export { createApp, startServer, statusForError } from './src/server.js';
export type { AppOptions, ServerOptions } from './src/server.js';

export * from './types/index.js';
