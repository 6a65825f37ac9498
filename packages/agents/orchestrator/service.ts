// MarketIntelService — the request surface shared by HTTP, MCP and CLI
// submit → subscribe (push) or poll (pull), plus run inspection

import type { MarketIntelConfig } from '../config/env.js';
import { AnthropicChatModel, type ChatModel } from '../bridge/llm-client.js';
import { TavilyNewsClient, type NewsSearch } from '../bridge/news-client.js';
import { EventStreamGateway, terminalEvent, type RunSubscription } from '../gateway/event-stream.js';
import type { DomainEventHandler } from '../types/events.js';
import { SimpleEventBus } from '../types/events.js';
import { InvalidInputError, errorMessage } from '../types/errors.js';
import type { Report } from '../types/report.js';
import type { LogEvent, RunError, RunSnapshot, RunStatus, RunSummary } from '../types/run.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { Orchestrator } from './coordinator.js';
import type { Pipeline } from './pipeline.js';
import { RunRegistry, type RetentionPolicy } from './registry.js';
import { createMarketAgents, createMarketIntelPipeline } from './stage-factory.js';

export interface MarketIntelServiceConfig {
  pipeline: Pipeline;
  stageTimeoutMs?: number;
  retention?: Partial<RetentionPolicy>;
  logger?: Logger;
  /** Observer for run lifecycle events */
  onEvent?: DomainEventHandler;
}

export interface RunPoll {
  runId: string;
  status: RunStatus;
  events: LogEvent[];
  /** Pass back as fromSequence to continue without gaps */
  nextSequence: number;
  report?: Report;
  error?: Pick<RunError, 'kind' | 'message' | 'stage'>;
}

export class MarketIntelService {
  readonly registry: RunRegistry;
  readonly gateway: EventStreamGateway;
  readonly eventBus: SimpleEventBus;
  private readonly logger: Logger;

  constructor(config: MarketIntelServiceConfig) {
    this.logger = config.logger ?? createLogger('MarketIntel');
    this.eventBus = new SimpleEventBus((err, event) =>
      this.logger.warn('Event observer threw', { type: event.type, error: errorMessage(err) }),
    );
    if (config.onEvent) this.eventBus.onAny(config.onEvent);

    const orchestrator = new Orchestrator({
      pipeline: config.pipeline,
      stageTimeoutMs: config.stageTimeoutMs,
      eventBus: this.eventBus,
      logger: this.logger.child('Orchestrator'),
    });
    this.registry = new RunRegistry({
      orchestrator,
      retention: config.retention,
      eventBus: this.eventBus,
      logger: this.logger.child('Registry'),
    });
    this.gateway = new EventStreamGateway(this.registry);
  }

  /** Create and start a run. Throws InvalidInputError for an empty topic. */
  submit(topic: string, includeVoice: boolean): string {
    const runId = this.registry.create(topic, includeVoice);
    this.registry.start(runId);
    this.logger.info('Run submitted', { runId, includeVoice });
    return runId;
  }

  subscribe(runId: string, fromSequence = 0): RunSubscription {
    return this.gateway.subscribe(runId, fromSequence);
  }

  getRun(runId: string): RunSnapshot {
    return this.registry.get(runId).snapshot();
  }

  listRuns(): RunSummary[] {
    return this.registry.list();
  }

  /**
   * Pull-based read of the same contract the stream delivers.
   * The terminal outcome is included once the run's log is closed.
   */
  poll(runId: string, fromSequence = 0): RunPoll {
    if (!Number.isInteger(fromSequence) || fromSequence < 0) {
      throw new InvalidInputError(`fromSequence must be a non-negative integer, got: ${fromSequence}`);
    }
    const run = this.registry.get(runId);
    const events = run.log.since(fromSequence);
    const poll: RunPoll = {
      runId,
      status: run.status,
      events,
      nextSequence: Math.max(fromSequence, run.log.size),
    };

    if (run.log.closed) {
      const terminal = terminalEvent(run);
      if (terminal.type === 'done') poll.report = terminal.report;
      else if (terminal.type === 'error') {
        poll.error = {
          kind: terminal.kind,
          message: terminal.message,
          ...(terminal.stage !== undefined ? { stage: terminal.stage } : {}),
        };
      }
    }
    return poll;
  }
}

export interface ServiceOverrides {
  llm?: ChatModel;
  news?: NewsSearch;
  logger?: Logger;
  onEvent?: DomainEventHandler;
}

/** Wire the production pipeline from environment configuration */
export function createServiceFromConfig(
  config: MarketIntelConfig,
  overrides: ServiceOverrides = {},
): MarketIntelService {
  const llm = overrides.llm ?? new AnthropicChatModel(config.llm);
  const news = overrides.news ?? new TavilyNewsClient({
    apiKey: config.news.apiKey,
    baseUrl: config.news.baseUrl,
    rateLimit: config.news.rateLimit,
    cacheTtl: config.news.cacheTtl,
    maxResults: config.news.maxArticles,
  });

  return new MarketIntelService({
    pipeline: createMarketIntelPipeline(
      createMarketAgents({ llm, news, maxArticles: config.news.maxArticles }),
    ),
    stageTimeoutMs: config.pipeline.stageTimeoutMs,
    retention: config.retention,
    logger: overrides.logger ?? createLogger('MarketIntel', { level: config.logLevel }),
    onEvent: overrides.onEvent,
  });
}
