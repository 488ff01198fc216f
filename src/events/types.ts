import { EventEmitter } from 'events';

/**
 * Event payload interfaces for the archive lifecycle
 */

export interface RecordLoadedEvent {
  recordId: number;
  threadId: number;
}

export type MatchField = 'phone' | 'email' | 'name';

export interface PartialResolvedEvent {
  identity: string;
  matchedOn: MatchField | 'none';
}

export interface InteractionCreatedEvent {
  conversationKey: string;
}

export interface IndexingCompleteEvent {
  recordCount: number;
  identityCount: number;
  conversationCount: number;
}

/**
 * Complete event interface mapping event names to their payload types
 */
export interface Events {
  record_loaded: RecordLoadedEvent;
  partial_resolved: PartialResolvedEvent;
  interaction_created: InteractionCreatedEvent;
  indexing_complete: IndexingCompleteEvent;
}

/**
 * Typed EventEmitter interface that provides type safety for event emission and subscription
 */
export interface TypedEmitter extends EventEmitter {
  emit<K extends keyof Events>(event: K, payload: Events[K]): boolean;
  on<K extends keyof Events>(event: K, listener: (payload: Events[K]) => void): this;
  once<K extends keyof Events>(event: K, listener: (payload: Events[K]) => void): this;
  removeAllListeners<K extends keyof Events>(event?: K): this;
  listenerCount<K extends keyof Events>(event: K): number;
}

export type EventName = keyof Events;

export type EventPayload<T extends EventName> = Events[T];
