// Append-only run log
// The orchestrator appends; stream subscribers read by sequence and are
// notified on every append and once on close.

import type { LogEvent } from '../types/run.js';
import { RunStateError } from '../types/errors.js';

export type RunLogNotification =
  | { type: 'appended'; event: LogEvent }
  | { type: 'closed' };

export type RunLogHandler = (notification: RunLogNotification) => void;

export class RunLog {
  private events: LogEvent[] = [];
  private subscribers = new Map<string, RunLogHandler>();
  private isClosed = false;

  constructor(private readonly onHandlerError?: (err: unknown) => void) {}

  /**
   * Append a line and notify all subscribers. Throws once the log is closed.
   */
  append(text: string, isError = false): LogEvent {
    if (this.isClosed) {
      throw new RunStateError('Cannot append to a closed run log');
    }
    const event: LogEvent = Object.freeze({
      sequence: this.events.length,
      text,
      isError,
      timestamp: new Date(),
    });
    this.events.push(event);
    this.notify({ type: 'appended', event });
    return event;
  }

  /**
   * Close the log. Returns false if it was already closed.
   */
  close(): boolean {
    if (this.isClosed) return false;
    this.isClosed = true;
    this.notify({ type: 'closed' });
    return true;
  }

  subscribe(subscriberId: string, handler: RunLogHandler): void {
    this.subscribers.set(subscriberId, handler);
  }

  unsubscribe(subscriberId: string): void {
    this.subscribers.delete(subscriberId);
  }

  /** Event at the given sequence, if it has been appended */
  at(sequence: number): LogEvent | undefined {
    return this.events[sequence];
  }

  /** Events with sequence >= fromSequence, in order */
  since(fromSequence = 0): LogEvent[] {
    return this.events.slice(Math.max(0, fromSequence));
  }

  get size(): number {
    return this.events.length;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  private notify(notification: RunLogNotification): void {
    for (const handler of [...this.subscribers.values()]) {
      try {
        handler(notification);
      } catch (err) {
        this.onHandlerError?.(err);
      }
    }
  }
}
