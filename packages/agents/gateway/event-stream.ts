// Event Stream Gateway — replay + live forwarding of a run's log
//
// Each subscription is an independent cursor over the run's append-only log.
// The orchestrator never waits on subscribers: appends only wake them up,
// and each subscriber pulls at its own pace.

import { randomUUID } from 'node:crypto';
import type { LogEvent, StreamEvent } from '../types/run.js';
import { InvalidInputError } from '../types/errors.js';
import type { Run } from '../orchestrator/run.js';
import type { RunRegistry } from '../orchestrator/registry.js';

export function toStreamEvent(event: LogEvent): StreamEvent {
  return { type: 'log', sequence: event.sequence, text: event.text, isError: event.isError };
}

/** The single terminal event for a run whose log is closed */
export function terminalEvent(run: Run): StreamEvent {
  if (run.status === 'succeeded' && run.result) {
    return { type: 'done', report: run.result };
  }
  const error = run.error;
  if (error) {
    return {
      type: 'error',
      message: error.message,
      kind: error.kind,
      ...(error.stage !== undefined ? { stage: error.stage } : {}),
    };
  }
  return { type: 'error', message: 'Run ended without a result', kind: 'Internal' };
}

export class RunSubscription {
  readonly subscriptionId = randomUUID();
  private cursor: number;
  private wake: (() => void) | null = null;
  private detached = false;

  constructor(private readonly run: Run, fromSequence: number) {
    this.cursor = fromSequence;
    run.log.subscribe(this.subscriptionId, () => this.signal());
  }

  get runId(): string {
    return this.run.id;
  }

  /** Sequence of the next log event this subscription will deliver */
  get nextSequence(): number {
    return this.cursor;
  }

  get closed(): boolean {
    return this.detached;
  }

  /**
   * Replayed and live events followed by exactly one terminal event.
   * Ends early, without a terminal event, if close() is called.
   * Single consumer per subscription.
   */
  async *events(): AsyncGenerator<StreamEvent, void, undefined> {
    try {
      while (!this.detached) {
        const next = this.run.log.at(this.cursor);
        if (next) {
          this.cursor++;
          yield toStreamEvent(next);
          continue;
        }

        if (this.run.log.closed) {
          const terminal = terminalEvent(this.run);
          // Detach before handing over the terminal event so the registry
          // may evict the run even if the consumer never pulls again
          this.close();
          yield terminal;
          return;
        }

        await new Promise<void>((resolve) => {
          this.wake = resolve;
        });
      }
    } finally {
      this.close();
    }
  }

  /** Detach from the run. Does not affect the run's execution. */
  close(): void {
    if (this.detached) return;
    this.detached = true;
    this.run.log.unsubscribe(this.subscriptionId);
    this.signal();
  }

  private signal(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}

export class EventStreamGateway {
  constructor(private readonly registry: RunRegistry) {}

  /**
   * Subscribe to a run from the given sequence (default 0).
   * Throws NotFoundError for unknown runs and InvalidInputError for a bad sequence.
   */
  subscribe(runId: string, fromSequence = 0): RunSubscription {
    if (!Number.isInteger(fromSequence) || fromSequence < 0) {
      throw new InvalidInputError(`fromSequence must be a non-negative integer, got: ${fromSequence}`);
    }
    const run = this.registry.get(runId);
    return new RunSubscription(run, fromSequence);
  }
}
