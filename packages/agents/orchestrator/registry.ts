// Run Registry — process-wide table of in-flight and recently completed runs
//
// The registry is the only component that creates or deletes runs.
// Retention: a terminal run stays addressable for maxAgeMs and at most
// maxCount terminal runs are kept. Runs that still have stream subscribers
// attached are never evicted; in-flight runs are never evicted.

import { randomUUID } from 'node:crypto';
import type { DomainEventType, EventBus } from '../types/events.js';
import { SimpleEventBus } from '../types/events.js';
import { InvalidInputError, NotFoundError, errorMessage } from '../types/errors.js';
import type { RunSummary } from '../types/run.js';
import { createLogger, type Logger } from '../utils/logger.js';
import type { Orchestrator } from './coordinator.js';
import { Run } from './run.js';

export interface RetentionPolicy {
  /** How long a terminal run remains addressable (ms) */
  maxAgeMs: number;
  /** Maximum number of terminal runs kept */
  maxCount: number;
}

export const DEFAULT_RETENTION: RetentionPolicy = {
  maxAgeMs: 15 * 60_000,
  maxCount: 100,
};

export interface RunRegistryConfig {
  orchestrator: Orchestrator;
  retention?: Partial<RetentionPolicy>;
  eventBus?: EventBus;
  logger?: Logger;
}

export class RunRegistry {
  private readonly runs = new Map<string, Run>();
  private readonly orchestrator: Orchestrator;
  private readonly retention: RetentionPolicy;
  private readonly eventBus: EventBus;
  private readonly logger: Logger;

  constructor(config: RunRegistryConfig) {
    this.orchestrator = config.orchestrator;
    this.retention = { ...DEFAULT_RETENTION, ...config.retention };
    this.eventBus = config.eventBus ?? new SimpleEventBus();
    this.logger = config.logger ?? createLogger('Registry');
  }

  /**
   * Create a pending run. Throws InvalidInputError for an empty topic,
   * in which case nothing is stored.
   */
  create(topic: string, includeVoice: boolean): string {
    const trimmed = topic.trim();
    if (!trimmed) {
      throw new InvalidInputError('topic is required');
    }

    this.sweep();

    const run = new Run({
      topic: trimmed,
      includeVoice,
      onLogHandlerError: (err) =>
        this.logger.warn('Log subscriber threw', { runId: run.id, error: errorMessage(err) }),
    });
    this.runs.set(run.id, run);
    this.emit('RunCreated', run.id, { topic: trimmed, includeVoice });
    return run.id;
  }

  /** Look up a run; throws NotFoundError if unknown or evicted */
  get(runId: string): Run {
    const run = this.find(runId);
    if (!run) throw new NotFoundError(runId);
    return run;
  }

  find(runId: string): Run | undefined {
    this.sweep();
    return this.runs.get(runId);
  }

  /**
   * Hand the run to the orchestrator. Idempotent; never waits for the pipeline.
   */
  start(runId: string): void {
    const run = this.get(runId);
    if (!run.claim()) return;

    this.orchestrator.drive(run).catch((err) => {
      // drive() contains its own failures; this only guards against bugs
      this.logger.error('Orchestrator rejected', { runId, error: errorMessage(err) });
    });
  }

  /** Retained runs, newest first */
  list(): RunSummary[] {
    this.sweep();
    return [...this.runs.values()]
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .map(r => r.summary());
  }

  get size(): number {
    return this.runs.size;
  }

  /**
   * Apply the retention policy. Called lazily from every registry operation.
   * Returns the ids evicted.
   */
  sweep(): string[] {
    const now = Date.now();
    const evicted: string[] = [];

    const evictable = [...this.runs.values()].filter(
      r => r.isTerminal && r.log.closed && r.log.subscriberCount === 0,
    );

    // Age bound
    for (const run of evictable) {
      const completedAt = run.completedAt?.getTime() ?? now;
      if (now - completedAt >= this.retention.maxAgeMs) {
        this.evict(run, 'expired');
        evicted.push(run.id);
      }
    }

    // Count bound — oldest completed first
    const terminal = [...this.runs.values()].filter(r => r.isTerminal);
    let excess = terminal.length - this.retention.maxCount;
    if (excess > 0) {
      const candidates = terminal
        .filter(r => r.log.closed && r.log.subscriberCount === 0)
        .sort((a, b) => (a.completedAt?.getTime() ?? 0) - (b.completedAt?.getTime() ?? 0));
      for (const run of candidates) {
        if (excess <= 0) break;
        this.evict(run, 'capacity');
        evicted.push(run.id);
        excess--;
      }
    }

    return evicted;
  }

  private evict(run: Run, reason: 'expired' | 'capacity'): void {
    this.runs.delete(run.id);
    this.emit('RunEvicted', run.id, { reason, status: run.status });
    this.logger.debug('Run evicted', { runId: run.id, reason });
  }

  private emit(type: DomainEventType, runId: string, payload: Record<string, unknown>): void {
    this.eventBus.emit({ eventId: randomUUID(), type, timestamp: new Date(), runId, payload });
  }
}
