// Run aggregate — one execution of the pipeline for one topic

import type { Report } from './report.js';

export type RunStatus = 'pending' | 'running' | 'succeeded' | 'failed';

export type RunErrorKind = 'StageFailure' | 'Internal';

export interface LogEvent {
  readonly sequence: number;   // 0-based, gap-free per run
  readonly text: string;
  readonly isError: boolean;
  readonly timestamp: Date;
}

export interface RunError {
  readonly kind: RunErrorKind;
  readonly message: string;
  readonly stage?: string;
  /** Raw cause as reported by the failing stage */
  readonly cause: string;
}

export interface RunSummary {
  runId: string;
  topic: string;
  includeVoice: boolean;
  status: RunStatus;
  createdAt: Date;
  startedAt?: Date;
  completedAt?: Date;
}

export interface RunSnapshot extends RunSummary {
  logLength: number;
  logClosed: boolean;
  result?: Report;
  error?: RunError;
}

/** Events delivered to a stream subscriber */
export type StreamEvent =
  | { type: 'log'; sequence: number; text: string; isError: boolean }
  | { type: 'done'; report: Report }
  | { type: 'error'; message: string; kind: RunErrorKind; stage?: string };

export const TERMINAL_STATUSES: ReadonlySet<RunStatus> = new Set(['succeeded', 'failed']);

export function isTerminal(status: RunStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}
