// Domain events across the orchestration, agent and model contexts

import { errorMessage } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';

export type DomainEventType =
  // BC1: Orchestration
  | 'RequestReceived'
  | 'StateChanged'
  | 'AgentInvoked'
  | 'AgentCompleted'
  | 'AgentFailed'
  | 'ResponseSynthesized'
  // BC2: Model serving
  | 'ModelLoaded'
  | 'ModelLoadFailed';

export interface DomainEvent<T = unknown> {
  eventId: string;
  type: DomainEventType;
  timestamp: Date;
  sourceContext: string;   // bounded context name
  payload: T;
}

export type DomainEventHandler = (event: DomainEvent) => void;

export interface EventBus {
  emit(event: DomainEvent): void;
  on(type: DomainEventType, handler: DomainEventHandler): void;
  off(type: DomainEventType, handler: DomainEventHandler): void;
}

// In-process bus; handlers run synchronously in registration order.
// A throwing handler is logged and never reaches the emitter.
export class SimpleEventBus implements EventBus {
  private handlers = new Map<DomainEventType, Set<DomainEventHandler>>();
  private readonly log: Logger;

  constructor(logger?: Logger) {
    this.log = logger ?? createLogger('event-bus');
  }

  emit(event: DomainEvent): void {
    const typeHandlers = this.handlers.get(event.type);
    if (typeHandlers) {
      for (const handler of typeHandlers) {
        try {
          handler(event);
        } catch (err) {
          this.log.error({ eventType: event.type, error: errorMessage(err) }, 'Event handler threw');
        }
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
}
