// Domain events emitted while answering a question
// Subscribers observe the pipeline without taking part in it

import { randomUUID } from 'node:crypto';

export type DomainEventType =
  // Catalog
  | 'CatalogLoaded'
  | 'CatalogDegraded'
  // Question answering
  | 'QuestionReceived'
  | 'IntentClassified'
  | 'ReportsRetrieved'
  | 'AggregateComputed'
  | 'AnswerRendered';

export interface DomainEvent<T = unknown> {
  eventId: string;
  type: DomainEventType;
  timestamp: Date;
  sourceContext: string;   // emitting module
  payload: T;
}

export function createEvent<T>(
  type: DomainEventType,
  sourceContext: string,
  payload: T,
): DomainEvent<T> {
  return { eventId: randomUUID(), type, timestamp: new Date(), sourceContext, payload };
}

export interface EventBus {
  emit(event: DomainEvent): void;
  on(type: DomainEventType, handler: (event: DomainEvent) => void): void;
  off(type: DomainEventType, handler: (event: DomainEvent) => void): void;
}

// Simple in-process event bus implementation
export class SimpleEventBus implements EventBus {
  private handlers = new Map<DomainEventType, Set<(event: DomainEvent) => void>>();

  emit(event: DomainEvent): void {
    const typeHandlers = this.handlers.get(event.type);
    if (typeHandlers) {
      for (const handler of typeHandlers) {
        handler(event);
      }
    }
  }

  on(type: DomainEventType, handler: (event: DomainEvent) => void): void {
    let typeHandlers = this.handlers.get(type);
    if (!typeHandlers) {
      typeHandlers = new Set();
      this.handlers.set(type, typeHandlers);
    }
    typeHandlers.add(handler);
  }

  off(type: DomainEventType, handler: (event: DomainEvent) => void): void {
    this.handlers.get(type)?.delete(handler);
  }
}
