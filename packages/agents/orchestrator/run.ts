// Run entity — owned by the registry, driven by the orchestrator
// Status is monotonic: pending → running → succeeded | failed

import { randomUUID } from 'node:crypto';
import type { Report } from '../types/report.js';
import type { RunError, RunSnapshot, RunStatus, RunSummary } from '../types/run.js';
import { isTerminal } from '../types/run.js';
import { RunStateError } from '../types/errors.js';
import { RunLog } from './run-log.js';

export interface RunInit {
  topic: string;
  includeVoice: boolean;
  id?: string;
  onLogHandlerError?: (err: unknown) => void;
}

export class Run {
  readonly id: string;
  readonly topic: string;
  readonly includeVoice: boolean;
  readonly log: RunLog;
  readonly createdAt = new Date();

  private currentStatus: RunStatus = 'pending';
  private claimed = false;
  private report?: Report;
  private failure?: RunError;
  private started?: Date;
  private completed?: Date;

  constructor(init: RunInit) {
    this.id = init.id ?? randomUUID();
    this.topic = init.topic;
    this.includeVoice = init.includeVoice;
    this.log = new RunLog(init.onLogHandlerError);
  }

  get status(): RunStatus {
    return this.currentStatus;
  }

  get result(): Report | undefined {
    return this.report;
  }

  get error(): RunError | undefined {
    return this.failure;
  }

  get startedAt(): Date | undefined {
    return this.started;
  }

  get completedAt(): Date | undefined {
    return this.completed;
  }

  get isTerminal(): boolean {
    return isTerminal(this.currentStatus);
  }

  /**
   * Claim the run for execution. Only the first caller gets true.
   */
  claim(): boolean {
    if (this.claimed) return false;
    this.claimed = true;
    return true;
  }

  markRunning(): void {
    this.transition('pending', 'running');
    this.started = new Date();
  }

  succeed(report: Report): void {
    this.transition('running', 'succeeded');
    this.report = report;
    this.completed = new Date();
  }

  fail(error: RunError): void {
    if (this.currentStatus !== 'pending' && this.currentStatus !== 'running') {
      throw new RunStateError(`Run ${this.id} cannot fail from status ${this.currentStatus}`);
    }
    this.currentStatus = 'failed';
    this.failure = error;
    this.completed = new Date();
  }

  summary(): RunSummary {
    return {
      runId: this.id,
      topic: this.topic,
      includeVoice: this.includeVoice,
      status: this.currentStatus,
      createdAt: this.createdAt,
      startedAt: this.started,
      completedAt: this.completed,
    };
  }

  snapshot(): RunSnapshot {
    return {
      ...this.summary(),
      logLength: this.log.size,
      logClosed: this.log.closed,
      result: this.report,
      error: this.failure,
    };
  }

  private transition(from: RunStatus, to: RunStatus): void {
    if (this.currentStatus !== from) {
      throw new RunStateError(`Run ${this.id} cannot move to ${to} from ${this.currentStatus}`);
    }
    this.currentStatus = to;
  }
}
