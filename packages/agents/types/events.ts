// Run lifecycle domain events
// Published by the registry and orchestrator for observers (logging, tests, metrics)

export type DomainEventType =
  // Run Registry
  | 'RunCreated'
  | 'RunEvicted'
  // Orchestrator
  | 'RunStarted'
  | 'StageStarted'
  | 'StageSucceeded'
  | 'StageFailed'
  | 'StageDegraded'
  | 'RunSucceeded'
  | 'RunFailed';

export const DOMAIN_EVENT_TYPES: readonly DomainEventType[] = [
  'RunCreated', 'RunEvicted',
  'RunStarted', 'StageStarted', 'StageSucceeded', 'StageFailed', 'StageDegraded',
  'RunSucceeded', 'RunFailed',
];

export interface DomainEvent<T = Record<string, unknown>> {
  eventId: string;
  type: DomainEventType;
  timestamp: Date;
  runId: string;
  payload: T;
}

export type DomainEventHandler = (event: DomainEvent) => void;

export interface EventBus {
  emit(event: DomainEvent): void;
  on(type: DomainEventType, handler: DomainEventHandler): void;
  off(type: DomainEventType, handler: DomainEventHandler): void;
}

// Simple in-process event bus implementation
export class SimpleEventBus implements EventBus {
  private handlers = new Map<DomainEventType, Set<DomainEventHandler>>();

  constructor(private readonly onHandlerError?: (err: unknown, event: DomainEvent) => void) {}

  emit(event: DomainEvent): void {
    const typeHandlers = this.handlers.get(event.type);
    if (!typeHandlers) return;
    for (const handler of typeHandlers) {
      // Observers must never break the pipeline
      try {
        handler(event);
      } catch (err) {
        this.onHandlerError?.(err, event);
      }
    }
  }

  on(type: DomainEventType, handler: DomainEventHandler): void {
    let typeHandlers = this.handlers.get(type);
    if (!typeHandlers) {
      typeHandlers = new Set();
      this.handlers.set(type, typeHandlers);
    }
    typeHandlers.add(handler);
  }

  off(type: DomainEventType, handler: DomainEventHandler): void {
    this.handlers.get(type)?.delete(handler);
  }

  /** Attach one handler to every event type */
  onAny(handler: DomainEventHandler): void {
    for (const type of DOMAIN_EVENT_TYPES) this.on(type, handler);
  }
}
