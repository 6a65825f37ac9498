// Orchestrator — drives one Run through the pipeline definition
//
// pending → running → succeeded | failed
// Each call to drive() is an independent async task; nothing here is shared
// between runs except the frozen pipeline and the event bus.

import { randomUUID } from 'node:crypto';
import type { DomainEventType, EventBus } from '../types/events.js';
import { SimpleEventBus } from '../types/events.js';
import { StageTimeoutError, errorMessage } from '../types/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import type { Pipeline, PipelineStage, StageCompletion, StageContext } from './pipeline.js';
import { StageOutputStore } from './pipeline.js';
import { assembleReport } from './report.js';
import type { Run } from './run.js';

export const DEFAULT_STAGE_TIMEOUT_MS = 60_000;

export interface OrchestratorConfig {
  pipeline: Pipeline;
  /** Per-stage timeout; a timeout counts as a stage failure */
  stageTimeoutMs?: number;
  eventBus?: EventBus;
  logger?: Logger;
}

export class Orchestrator {
  private readonly pipeline: Pipeline;
  private readonly stageTimeoutMs: number;
  private readonly eventBus: EventBus;
  private readonly logger: Logger;

  constructor(config: OrchestratorConfig) {
    this.pipeline = config.pipeline;
    this.stageTimeoutMs = config.stageTimeoutMs ?? DEFAULT_STAGE_TIMEOUT_MS;
    this.eventBus = config.eventBus ?? new SimpleEventBus();
    this.logger = config.logger ?? createLogger('Orchestrator');
  }

  /**
   * Run the pipeline to a terminal state. Never rejects: unexpected errors
   * fail the run with kind "Internal". The log is closed exactly once.
   */
  async drive(run: Run): Promise<void> {
    try {
      await this.execute(run);
    } catch (err) {
      const cause = errorMessage(err);
      this.logger.error('Pipeline crashed', { runId: run.id, error: cause });
      if (!run.isTerminal) {
        run.fail({ kind: 'Internal', message: `Pipeline error: ${cause}`, cause });
        if (!run.log.closed) run.log.append(`❌ Pipeline error: ${cause}`, true);
        this.emit('RunFailed', run.id, { kind: 'Internal', error: cause });
      }
    } finally {
      run.log.close();
    }
  }

  private async execute(run: Run): Promise<void> {
    run.markRunning();
    this.emit('RunStarted', run.id, { topic: run.topic, includeVoice: run.includeVoice });
    run.log.append(`🚀 Pipeline started for topic: '${run.topic}'`);

    const outputs = new StageOutputStore();

    for (const stage of this.pipeline.stages) {
      if (!stage.isEnabled(run)) continue;

      run.log.append(stage.announce);
      this.emit('StageStarted', run.id, { stage: stage.name });
      const start = Date.now();

      let completion: StageCompletion;
      try {
        completion = await this.invokeStage(stage, outputs, run);
      } catch (err) {
        const cause = errorMessage(err);
        const durationMs = Date.now() - start;

        if (stage.optional) {
          run.log.append(`⚠️  [${stage.label}] Skipped: ${cause}`, true);
          this.emit('StageDegraded', run.id, { stage: stage.name, error: cause, durationMs });
          this.logger.warn(`Optional stage ${stage.name} failed — continuing`, { runId: run.id, error: cause });
          continue;
        }

        run.log.append(`❌ [${stage.label}] Failed: ${cause}`, true);
        run.fail({
          kind: 'StageFailure',
          stage: stage.name,
          message: `${stage.label} failed: ${cause}`,
          cause,
        });
        this.emit('StageFailed', run.id, { stage: stage.name, error: cause, durationMs });
        this.emit('RunFailed', run.id, { kind: 'StageFailure', stage: stage.name, error: cause });
        this.logger.warn(`Stage ${stage.name} failed — run aborted`, { runId: run.id, error: cause });
        return;
      }

      completion.commit();
      run.log.append(completion.summary);
      this.emit('StageSucceeded', run.id, { stage: stage.name, durationMs: Date.now() - start });
    }

    run.succeed(assembleReport(run.topic, outputs));
    run.log.append('✅ Pipeline complete.');
    this.emit('RunSucceeded', run.id, {
      durationMs: run.completedAt && run.startedAt
        ? run.completedAt.getTime() - run.startedAt.getTime()
        : 0,
    });
  }

  // ── Stage invocation with timeout ─────────────────────────────────
  // The AbortSignal lets a cooperative stage stop its provider calls;
  // progress lines from a stage that lost the race are dropped.

  private async invokeStage(
    stage: PipelineStage,
    outputs: StageOutputStore,
    run: Run,
  ): Promise<StageCompletion> {
    const controller = new AbortController();
    const ctx: StageContext = {
      runId: run.id,
      topic: run.topic,
      includeVoice: run.includeVoice,
      signal: controller.signal,
      log: (text: string) => {
        if (!controller.signal.aborted && !run.log.closed) run.log.append(text);
      },
    };

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const err = new StageTimeoutError(stage.label, this.stageTimeoutMs);
        controller.abort(err);
        reject(err);
      }, this.stageTimeoutMs);
    });

    try {
      return await Promise.race([stage.execute(outputs, ctx), timeout]);
    } finally {
      clearTimeout(timer);
      if (!controller.signal.aborted) controller.abort();
    }
  }

  private emit(type: DomainEventType, runId: string, payload: Record<string, unknown>): void {
    this.eventBus.emit({ eventId: randomUUID(), type, timestamp: new Date(), runId, payload });
  }
}
